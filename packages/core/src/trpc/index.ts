export { createContext, type Context } from "./context";
export {
  router,
  publicProcedure,
  protectedProcedure,
  adminProcedure,
  createCallerFactory,
  requirePermission,
} from "./procedures";
export { appRouter, type AppRouter } from "./routers/index";
