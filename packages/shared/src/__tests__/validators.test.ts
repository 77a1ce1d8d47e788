import { describe, it, expect } from "vitest";
import {
  assignItemSchema,
  createProductionSchema,
  itemSchema,
  passwordSchema,
  setupFormErrors,
  setupSchema,
} from "../validators/index";

describe("itemSchema", () => {
  it("trims values and turns empty optional fields into null", () => {
    const parsed = itemSchema.parse({
      inventoryId: "  SPK-0001 ",
      name: " Line array top ",
      category: "",
      description: "   ",
      serialNumber: "SN-42",
      manufacturer: undefined,
      model: null,
      locationId: "",
    });

    expect(parsed).toEqual({
      inventoryId: "SPK-0001",
      name: "Line array top",
      category: null,
      description: null,
      serialNumber: "SN-42",
      manufacturer: null,
      model: null,
      locationId: null,
    });
  });

  it("rejects inventory IDs that cannot travel in a URL or label", () => {
    const result = itemSchema.safeParse({
      inventoryId: "SPK 0001/A",
      name: "Speaker",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.inventoryId).toEqual([
        "Inventory ID may only contain letters, numbers, dots, dashes and underscores",
      ]);
    }
  });

  it("requires a name", () => {
    const result = itemSchema.safeParse({ inventoryId: "CBL-1", name: "  " });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.name).toEqual([
        "Name is required",
      ]);
    }
  });
});

describe("createProductionSchema", () => {
  it("accepts an open-ended production", () => {
    expect(
      createProductionSchema.parse({ name: "Spring Gala", startDate: "" })
    ).toEqual({
      name: "Spring Gala",
      startDate: null,
      endDate: null,
      notes: null,
    });
  });

  it("rejects an end date before the start date", () => {
    const result = createProductionSchema.safeParse({
      name: "Spring Gala",
      startDate: "2026-05-03",
      endDate: "2026-05-01",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.endDate).toEqual([
        "End date must be on or after the start date",
      ]);
    }
  });

  it("rejects impossible calendar dates", () => {
    const result = createProductionSchema.safeParse({
      name: "Spring Gala",
      startDate: "2026-02-30",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.startDate).toEqual([
        "Not a valid calendar date",
      ]);
    }
  });
});

describe("assignItemSchema", () => {
  it("defaults the quantity to one", () => {
    const parsed = assignItemSchema.parse({
      productionId: "8d0f5e0e-6a43-4a4e-9d0b-6f7d8c2b1a11",
      inventoryId: "MIC-7",
    });
    expect(parsed.quantity).toBe(1);
    expect(parsed.startsOn).toBeNull();
  });

  it("rejects a window that ends before it starts", () => {
    const result = assignItemSchema.safeParse({
      productionId: "8d0f5e0e-6a43-4a4e-9d0b-6f7d8c2b1a11",
      inventoryId: "MIC-7",
      startsOn: "2026-05-02",
      endsOn: "2026-05-01",
    });
    expect(result.success).toBe(false);
  });
});

describe("passwordSchema", () => {
  it("needs letters and digits", () => {
    expect(passwordSchema.safeParse("longenough").success).toBe(false);
    expect(passwordSchema.safeParse("12345678").success).toBe(false);
    expect(passwordSchema.safeParse("stage-left-42").success).toBe(true);
  });
});

describe("setupFormErrors", () => {
  it("reports database errors under the wizard's field names", () => {
    const result = setupSchema.safeParse({
      database: {
        host: "db.local",
        port: "70000",
        name: "",
        user: " ",
        password: "test-secret",
        ssl: false,
      },
      adminUsername: "admin",
      adminPassword: "test-secret-1",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(setupFormErrors(result.error)).toEqual({
        formErrors: [],
        fieldErrors: {
          dbPort: ["Port must be between 1 and 65535"],
          dbName: ["Database name is required"],
          dbUser: ["Database user is required"],
        },
      });
    }
  });

  it("keeps top-level fields as they are", () => {
    const result = setupSchema.safeParse({
      adminUsername: "admin",
      adminPassword: "test-secret-1",
      defaultUserUsername: "crew",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(setupFormErrors(result.error).fieldErrors).toEqual({
        defaultUserPassword: [
          "Provide both a username and a password for the default user",
        ],
      });
    }
  });
});

describe("setupSchema", () => {
  it("requires the default user's username and password together", () => {
    const result = setupSchema.safeParse({
      adminUsername: "admin",
      adminPassword: "test-secret-1",
      defaultUserUsername: "crew",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.defaultUserPassword).toEqual([
        "Provide both a username and a password for the default user",
      ]);
    }
  });

  it("defaults the database port", () => {
    const parsed = setupSchema.parse({
      adminUsername: "admin",
      adminPassword: "test-secret-1",
      database: {
        host: "localhost",
        name: "rigtrack",
        user: "rigtrack",
        password: "test-secret",
      },
    });
    expect(parsed.database?.port).toBe(5432);
    expect(parsed.companyName).toBe("");
  });
});
