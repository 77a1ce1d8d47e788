import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NextRequest } from "next/server";
import { middleware } from "../../middleware";

function request(
  url: string,
  init: { method?: string; headers?: Record<string, string> } = {}
): NextRequest {
  return new NextRequest(url, init);
}

const PUBLIC_CLIENT = { "x-forwarded-for": "203.0.113.9" };

beforeEach(() => {
  vi.stubEnv("HTTPS_ENFORCEMENT", "on");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("session gate", () => {
  it("lets a stale session cookie reach the login page", () => {
    const response = middleware(
      request("https://rig.example/login", {
        headers: { cookie: "session_token=stale-token" },
      })
    );
    expect(response.headers.get("x-middleware-next")).toBe("1");
    expect(response.headers.get("location")).toBeNull();
  });

  it("sends pages without a cookie to /login", () => {
    const response = middleware(request("https://rig.example/items"));
    expect(response.status).toBe(307);
    expect(response.headers.get("location")).toBe("https://rig.example/login");
  });
});

describe("transport policy", () => {
  it("redirects plaintext page loads from outside the LAN", () => {
    const response = middleware(
      request("http://rig.example/login", { headers: PUBLIC_CLIENT })
    );
    expect(response.status).toBe(301);
    expect(response.headers.get("location")).toBe("https://rig.example/login");
  });

  it("uses 308 for plaintext writes", () => {
    const response = middleware(
      request("http://rig.example/api/trpc/items.create", {
        method: "POST",
        headers: PUBLIC_CLIENT,
      })
    );
    expect(response.status).toBe(308);
    expect(response.headers.get("location")).toBe(
      "https://rig.example/api/trpc/items.create"
    );
  });

  it("serves the first-run setup over plain HTTP", () => {
    const page = middleware(
      request("http://rig.example/setup", { headers: PUBLIC_CLIENT })
    );
    expect(page.headers.get("x-middleware-next")).toBe("1");

    const submit = middleware(
      request("http://rig.example/api/setup", {
        method: "POST",
        headers: PUBLIC_CLIENT,
      })
    );
    expect(submit.headers.get("x-middleware-next")).toBe("1");
  });

  it("lets LAN clients use plain HTTP", () => {
    const response = middleware(
      request("http://rig.example/login", {
        headers: { "x-forwarded-for": "192.168.1.40" },
      })
    );
    expect(response.headers.get("x-middleware-next")).toBe("1");
  });
});
