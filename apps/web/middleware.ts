import { NextRequest, NextResponse } from "next/server";
import { evaluateTransportPolicy } from "@rigtrack/shared";

const SESSION_COOKIE = "session_token";
const PUBLIC_PATHS = ["/login", "/setup"];
// Served over plain HTTP too: both refuse to run once setup has completed
const SETUP_PATHS = ["/setup", "/api/setup"];

function matchesAny(pathname: string, paths: string[]): boolean {
  return paths.some(
    (path) => pathname === path || pathname.startsWith(`${path}/`)
  );
}

/**
 * 1. HTTPS policy: plaintext is only served to LAN clients, and to the
 *    first-run setup.
 * 2. Pages without a session cookie redirect to /login. The cookie is only
 *    checked for presence here; pages and handlers validate it, so a stale
 *    cookie never redirects away from /login.
 */
export function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl;

  if (!matchesAny(pathname, SETUP_PATHS)) {
    const decision = evaluateTransportPolicy({
      url: request.url,
      method: request.method,
      forwardedProto: request.headers.get("x-forwarded-proto"),
      forwardedFor: request.headers.get("x-forwarded-for"),
      realIp: request.headers.get("x-real-ip"),
      enforce: process.env.HTTPS_ENFORCEMENT?.toLowerCase() !== "off",
    });
    if (decision.action === "redirect") {
      return NextResponse.redirect(decision.location, decision.status);
    }
  }

  if (pathname.startsWith("/api")) {
    return NextResponse.next();
  }

  const sessionToken = request.cookies.get(SESSION_COOKIE)?.value;
  const isPublic = matchesAny(pathname, PUBLIC_PATHS);

  if (!isPublic && !sessionToken) {
    return NextResponse.redirect(new URL("/login", request.url));
  }

  return NextResponse.next();
}

export const config = {
  matcher: [
    /*
     * Match all request paths except:
     * - _next static files
     * - _next images
     * - favicon
     */
    "/((?!_next/static|_next/image|favicon.ico).*)",
  ],
};
