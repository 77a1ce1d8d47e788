import { describe, it, expect } from "vitest";
import {
  evaluateTransportPolicy,
  isLanAddress,
  isSecureRequest,
  normalizeIp,
  isIpAddress,
  resolveClientIp,
} from "../network/index";

describe("isLanAddress", () => {
  it.each([
    "127.0.0.1",
    "10.4.0.12",
    "172.16.0.1",
    "172.31.255.254",
    "192.168.1.20",
    "::1",
    "::ffff:192.168.0.9",
    "fd12:3456:789a::1",
    "fe80::1",
  ])("treats %s as LAN", (ip) => {
    expect(isLanAddress(ip)).toBe(true);
  });

  it.each([
    "203.0.113.7",
    "172.15.0.1",
    "172.32.0.1",
    "192.169.0.1",
    "8.8.8.8",
    "2001:db8::1",
    "300.1.1.1",
    "not-an-ip",
  ])("treats %s as public", (ip) => {
    expect(isLanAddress(ip)).toBe(false);
  });
});

describe("normalizeIp", () => {
  it("strips brackets, ports and the IPv4-mapped prefix", () => {
    expect(normalizeIp("[::1]:3000")).toBe("::1");
    expect(normalizeIp("192.168.1.4:51234")).toBe("192.168.1.4");
    expect(normalizeIp("::FFFF:10.0.0.3")).toBe("10.0.0.3");
  });
});

describe("resolveClientIp", () => {
  it("uses the hop appended by the nearest proxy", () => {
    expect(resolveClientIp("192.168.1.5, 203.0.113.9", null)).toBe(
      "203.0.113.9"
    );
  });

  it("falls back to X-Real-IP", () => {
    expect(resolveClientIp(null, "10.1.1.1")).toBe("10.1.1.1");
    expect(resolveClientIp("", null)).toBeNull();
  });

  it("drops values that are not IP addresses", () => {
    expect(resolveClientIp("1".repeat(80), null)).toBeNull();
    expect(resolveClientIp(null, "x".repeat(100))).toBeNull();
    expect(resolveClientIp("10.0.0.1, unknown", "10.1.1.1")).toBeNull();
    expect(resolveClientIp("[2001:db8::7]:443", null)).toBe("2001:db8::7");
  });
});

describe("isIpAddress", () => {
  it.each(["10.0.0.1", "::1", "2001:db8::7", "fe80::1", "64:ff9b::192.0.2.33"])(
    "accepts %s",
    (ip) => {
      expect(isIpAddress(ip)).toBe(true);
    }
  );

  it.each(["", "unknown", "256.1.1.1", "1".repeat(80), "2001:db8::7::zz"])(
    "rejects %s",
    (ip) => {
      expect(isIpAddress(ip)).toBe(false);
    }
  );
});

describe("isSecureRequest", () => {
  it("prefers the forwarded protocol over the URL scheme", () => {
    expect(isSecureRequest("http://app.local/items", "https")).toBe(true);
    expect(isSecureRequest("https://app.local/items", "http")).toBe(false);
    expect(isSecureRequest("https://app.local/items", null)).toBe(true);
  });
});

describe("evaluateTransportPolicy", () => {
  const base = {
    url: "http://inventory.example.com:8080/items?category=Audio",
    method: "GET",
    enforce: true,
  };

  it("redirects plaintext requests from public clients to HTTPS", () => {
    expect(
      evaluateTransportPolicy({ ...base, forwardedFor: "203.0.113.7" })
    ).toEqual({
      action: "redirect",
      location: "https://inventory.example.com/items?category=Audio",
      status: 301,
    });
  });

  it("keeps the method for non-GET redirects", () => {
    const decision = evaluateTransportPolicy({
      ...base,
      method: "POST",
      forwardedFor: "203.0.113.7",
    });
    expect(decision).toMatchObject({ action: "redirect", status: 308 });
  });

  it("lets LAN clients through over plain HTTP", () => {
    expect(
      evaluateTransportPolicy({ ...base, forwardedFor: "192.168.1.20" })
    ).toEqual({ action: "allow", reason: "lan" });
  });

  it("does not trust a spoofed LAN address ahead of the proxy hop", () => {
    const decision = evaluateTransportPolicy({
      ...base,
      forwardedFor: "192.168.1.5, 203.0.113.9",
    });
    expect(decision.action).toBe("redirect");
  });

  it("redirects when the client address is unknown", () => {
    expect(evaluateTransportPolicy(base).action).toBe("redirect");
  });

  it("allows requests that arrived over TLS at the proxy", () => {
    expect(
      evaluateTransportPolicy({
        ...base,
        forwardedProto: "https",
        forwardedFor: "203.0.113.7",
      })
    ).toEqual({ action: "allow", reason: "secure" });
  });

  it("allows everything when enforcement is switched off", () => {
    expect(
      evaluateTransportPolicy({
        ...base,
        enforce: false,
        forwardedFor: "203.0.113.7",
      })
    ).toEqual({ action: "allow", reason: "disabled" });
  });
});
