import { beforeEach, describe, expect, it, vi } from "vitest";

const labels = vi.hoisted(() => ({
  loadItemLabel: vi.fn(),
  renderLabels: vi.fn(),
}));

vi.mock("@rigtrack/core/labels", () => labels);
vi.mock("@rigtrack/core/settings", () => ({
  getCompanyLogo: vi.fn(async () => null),
}));
vi.mock("@/lib/auth", () => ({
  requireSession: vi.fn(async () => ({ ok: true, session: {} })),
}));

import { GET } from "../../app/api/labels/[inventoryId]/route";

function get(inventoryId: string) {
  return GET(new Request("https://rig.example/api/labels/x"), {
    params: Promise.resolve({ inventoryId }),
  });
}

beforeEach(() => {
  labels.loadItemLabel.mockReset();
  labels.renderLabels.mockReset();
});

describe("GET /api/labels/:inventoryId", () => {
  it("looks the item up by the route parameter as given", async () => {
    labels.loadItemLabel.mockResolvedValue(null);

    const response = await get("AMP-01");

    expect(labels.loadItemLabel).toHaveBeenCalledWith("AMP-01");
    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: "Item not found" });
  });

  it("answers 404 for identifiers that cannot exist", async () => {
    const response = await get("%ZZ");

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({ error: "Item not found" });
    expect(labels.loadItemLabel).not.toHaveBeenCalled();
  });
});
