import { count } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index";
import { ensureSchema } from "./provision";
import { resolveDatabaseUrl } from "../config/index";
import { provisionInstance, getSetupStatus } from "../setup/index";

// ============================================
// Seed Script — creates a usable dev environment
// ============================================

const DEMO_LOCATIONS = [
  { key: "warehouse", name: "Warehouse", parent: null },
  { key: "rack-a", name: "Rack A", parent: "warehouse" },
  { key: "rack-b", name: "Rack B", parent: "warehouse" },
  { key: "van", name: "Van 1", parent: null },
] as const;

const DEMO_ITEMS = [
  { inventoryId: "AUD-0001", name: "Digital mixing console", category: "Audio", manufacturer: "Allen & Heath", model: "SQ-5", location: "rack-a" },
  { inventoryId: "AUD-0002", name: "Active loudspeaker", category: "Audio", manufacturer: "d&b", model: "E8", location: "rack-a" },
  { inventoryId: "AUD-0003", name: "Active loudspeaker", category: "Audio", manufacturer: "d&b", model: "E8", location: "rack-a" },
  { inventoryId: "LGT-0001", name: "Moving head spot", category: "Lighting", manufacturer: "Robe", model: "Robin T1", location: "rack-b" },
  { inventoryId: "LGT-0002", name: "LED par", category: "Lighting", manufacturer: "Cameo", model: "Zenit W600", location: "rack-b" },
  { inventoryId: "VID-0001", name: "Laser projector", category: "Video", manufacturer: "Epson", model: "EB-PU1007", location: "warehouse" },
  { inventoryId: "CBL-0001", name: "Power distro 32A", category: null, manufacturer: null, model: null, location: "van" },
] as const;

async function seed() {
  const connectionString = resolveDatabaseUrl();
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  const client = postgres(connectionString, { max: 1 });
  const db = drizzle(client, { schema });

  console.log("🌱 Seeding database...\n");
  await ensureSchema(db);

  // 1. Instance setup
  const status = await getSetupStatus(db);
  if (!status.completed) {
    console.log("👤 Creating admin and default user...");
    await provisionInstance(db, {
      adminUsername: "admin",
      adminPassword: "admin123456",
      defaultUser: { username: "crew", password: "crew123456" },
      companyName: "Demo Event Tech",
    });
    console.log("  ↳ admin / admin123456, crew / crew123456");
  } else {
    console.log("  ↳ Setup already completed, keeping existing accounts");
  }

  const [existing] = await db.select({ total: count() }).from(schema.items);
  if ((existing?.total ?? 0) > 0) {
    console.log("  ↳ Inventory already has items, skipping demo data.");
    await client.end();
    return;
  }

  // 2. Locations
  console.log("\n📦 Creating locations...");
  const locationIds = new Map<string, string>();
  for (const location of DEMO_LOCATIONS) {
    const [row] = await db
      .insert(schema.locations)
      .values({
        name: location.name,
        parentId: location.parent ? (locationIds.get(location.parent) ?? null) : null,
      })
      .returning({ id: schema.locations.id });
    if (row) locationIds.set(location.key, row.id);
    console.log(`  ↳ ${location.name}`);
  }

  // 3. Items
  console.log("\n🎛️  Creating items...");
  for (const { location, ...item } of DEMO_ITEMS) {
    await db
      .insert(schema.items)
      .values({ ...item, locationId: locationIds.get(location) ?? null });
    console.log(`  ↳ ${item.inventoryId} ${item.name}`);
  }

  // 4. A production with a few assignments
  console.log("\n🎪 Creating production...");
  const [production] = await db
    .insert(schema.productions)
    .values({
      name: "Summer Open Air",
      startDate: "2026-07-10",
      endDate: "2026-07-12",
      notes: "Load-in on the 9th from 14:00.",
    })
    .returning({ id: schema.productions.id });

  if (production) {
    await db.insert(schema.productionItems).values([
      { productionId: production.id, inventoryId: "AUD-0001", quantity: 1 },
      { productionId: production.id, inventoryId: "AUD-0002", quantity: 1 },
      { productionId: production.id, inventoryId: "LGT-0001", quantity: 1, startsOn: "2026-07-11", endsOn: "2026-07-12" },
      { productionId: production.id, inventoryId: "CBL-0001", quantity: 4 },
    ]);
    console.log("  ↳ Summer Open Air (4 lines)");
  }

  console.log("\n✅ Seed complete!");
  await client.end();
}

seed().catch((err) => {
  console.error("❌ Seed failed:", err);
  process.exit(1);
});
