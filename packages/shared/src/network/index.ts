// ============================================
// Transport Policy — HTTPS everywhere except the LAN
// ============================================
// Runs inside Next.js middleware (edge runtime), so it must stay free of
// Node-only APIs.

const IPV4_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Reduce the various spellings of a client address to a bare IP:
 * strips IPv6 brackets, a trailing IPv4 port and the IPv4-mapped prefix.
 */
export function normalizeIp(raw: string): string {
  let ip = raw.trim().toLowerCase();

  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(ip);
  if (bracketed?.[1]) {
    ip = bracketed[1];
  }

  const withPort = /^(\d{1,3}(?:\.\d{1,3}){3}):\d+$/.exec(ip);
  if (withPort?.[1]) {
    ip = withPort[1];
  }

  if (ip.startsWith("::ffff:") && IPV4_REGEX.test(ip.slice(7))) {
    ip = ip.slice(7);
  }

  return ip;
}

function parseIpv4(ip: string): [number, number, number, number] | null {
  const match = IPV4_REGEX.exec(ip);
  if (!match) return null;
  const octets = [match[1], match[2], match[3], match[4]].map(Number);
  if (octets.some((o) => o > 255)) return null;
  const [a = 0, b = 0, c = 0, d = 0] = octets;
  return [a, b, c, d];
}

const IPV6_REGEX = /^[0-9a-f]{0,4}(?::[0-9a-f]{0,4}){2,7}$/;
const IPV6_WITH_IPV4_TAIL_REGEX =
  /^[0-9a-f]{0,4}(?::[0-9a-f]{0,4}){1,6}:(\d{1,3}(?:\.\d{1,3}){3})$/;

/** Whether a normalized address is a literal IPv4 or IPv6 address */
export function isIpAddress(ip: string): boolean {
  if (parseIpv4(ip)) return true;
  if (ip.length > 45) return false;
  if (IPV6_REGEX.test(ip)) return true;
  const tail = IPV6_WITH_IPV4_TAIL_REGEX.exec(ip)?.[1];
  return tail !== undefined && parseIpv4(tail) !== null;
}

/**
 * Private, loopback and link-local ranges count as LAN:
 * 127/8, 10/8, 172.16/12, 192.168/16, ::1, fc00::/7, fe80::/10.
 */
export function isLanAddress(raw: string): boolean {
  const ip = normalizeIp(raw);

  const v4 = parseIpv4(ip);
  if (v4) {
    const [a, b] = v4;
    return (
      a === 127 ||
      a === 10 ||
      (a === 172 && b >= 16 && b <= 31) ||
      (a === 192 && b === 168)
    );
  }

  if (!ip.includes(":")) return false;
  if (ip === "::1") return true;

  const firstGroup = parseInt(ip.split(":")[0] || "0", 16);
  if (Number.isNaN(firstGroup)) return false;
  // fc00::/7 unique local, fe80::/10 link-local
  return (firstGroup & 0xfe00) === 0xfc00 || (firstGroup & 0xffc0) === 0xfe80;
}

/**
 * The client address as seen by the nearest proxy: the rightmost
 * X-Forwarded-For entry, falling back to X-Real-IP. Null when the
 * chosen value is not an IP address.
 */
export function resolveClientIp(
  forwardedFor: string | null | undefined,
  realIp: string | null | undefined
): string | null {
  const hops = (forwardedFor ?? "")
    .split(",")
    .map((hop) => hop.trim())
    .filter(Boolean);
  const candidate = hops[hops.length - 1] ?? realIp?.trim();
  if (!candidate) return null;
  const ip = normalizeIp(candidate);
  return isIpAddress(ip) ? ip : null;
}

/** True when the request reached us (or the proxy in front of us) over TLS */
export function isSecureRequest(
  url: string,
  forwardedProto: string | null | undefined
): boolean {
  const proto = forwardedProto?.split(",")[0]?.trim().toLowerCase();
  if (proto) return proto === "https";
  return new URL(url).protocol === "https:";
}

export interface TransportRequest {
  url: string;
  method: string;
  forwardedProto?: string | null;
  forwardedFor?: string | null;
  realIp?: string | null;
  enforce: boolean;
}

export type TransportDecision =
  | { action: "allow"; reason: "disabled" | "secure" | "lan" }
  | { action: "redirect"; location: string; status: 301 | 308 };

/**
 * Decide whether a request may be served as-is or must be bounced to HTTPS.
 * Plaintext is only accepted from LAN clients.
 */
export function evaluateTransportPolicy(
  request: TransportRequest
): TransportDecision {
  if (!request.enforce) return { action: "allow", reason: "disabled" };

  if (isSecureRequest(request.url, request.forwardedProto)) {
    return { action: "allow", reason: "secure" };
  }

  const clientIp = resolveClientIp(request.forwardedFor, request.realIp);
  if (clientIp && isLanAddress(clientIp)) {
    return { action: "allow", reason: "lan" };
  }

  const location = new URL(request.url);
  location.protocol = "https:";
  location.port = "";

  const method = request.method.toUpperCase();
  return {
    action: "redirect",
    location: location.toString(),
    status: method === "GET" || method === "HEAD" ? 301 : 308,
  };
}
