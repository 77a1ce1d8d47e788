import { db, type Database } from "../../db/index";
import { locations } from "./schema";
import { buildLocationPaths, type LocationNode } from "./tree";

export async function loadLocationNodes(
  database: Database = db
): Promise<LocationNode[]> {
  return database
    .select({
      id: locations.id,
      parentId: locations.parentId,
      name: locations.name,
    })
    .from(locations);
}

/** Location id → "Parent / Child" */
export async function loadLocationPaths(
  database: Database = db
): Promise<Map<string, string>> {
  return buildLocationPaths(await loadLocationNodes(database));
}
