import { describe, it, expect } from "vitest";
import { ROLE_PERMISSIONS } from "../types/index";
import { escapeLike, formatDateRange, hasPermission } from "../utils/index";

describe("hasPermission", () => {
  it("grants admins everything", () => {
    expect(hasPermission(ROLE_PERMISSIONS.admin, "core:users:manage")).toBe(
      true
    );
  });

  it("limits users to the inventory workflow", () => {
    const user = ROLE_PERMISSIONS.user;
    expect(hasPermission(user, "inventory:items:write")).toBe(true);
    expect(hasPermission(user, "productions:assignments:write")).toBe(true);
    expect(hasPermission(user, "core:users:manage")).toBe(false);
    expect(hasPermission(user, "core:settings:manage")).toBe(false);
  });

  it("matches resource-level wildcards", () => {
    expect(hasPermission(["reports:pdf:*"], "reports:pdf:read")).toBe(true);
    expect(hasPermission(["reports:pdf:*"], "reports:csv:read")).toBe(false);
  });
});

describe("formatDateRange", () => {
  it("collapses single-day ranges and open ends", () => {
    expect(formatDateRange("2026-05-01", "2026-05-03")).toBe(
      "2026-05-01 – 2026-05-03"
    );
    expect(formatDateRange("2026-05-01", "2026-05-01")).toBe("2026-05-01");
    expect(formatDateRange(null, "2026-05-03")).toBe("until 2026-05-03");
    expect(formatDateRange(null, null)).toBe("No dates");
  });
});

describe("escapeLike", () => {
  it("escapes LIKE wildcards", () => {
    expect(escapeLike("50%_off\\")).toBe("50\\%\\_off\\\\");
  });
});
