import { router } from "../procedures";
import { authRouter } from "./auth";
import { usersRouter } from "./users";
import { auditRouter } from "./audit";
import { itemsRouter, locationsRouter } from "../../modules/inventory/router";
import { productionsRouter } from "../../modules/productions/router";
import { settingsRouter } from "../../modules/settings/router";

// ============================================
// App Router — merges core and module routers
// ============================================

export const appRouter = router({
  // Core routers
  auth: authRouter,
  users: usersRouter,
  audit: auditRouter,

  // Module routers
  items: itemsRouter,
  locations: locationsRouter,
  productions: productionsRouter,
  settings: settingsRouter,
});

export type AppRouter = typeof appRouter;
