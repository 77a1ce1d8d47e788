import { NextRequest, NextResponse } from "next/server";
import {
  loginWithPassword,
  AuthError,
  SESSION_COOKIE_NAME,
} from "@rigtrack/core/auth";
import { loginSchema } from "@rigtrack/shared";
import { getClientIp, getUserAgent, requestIsSecure } from "@/lib/request";

// ============================================
// POST /api/auth/login
//
// SECURITY: Session token is set as an httpOnly cookie in the response.
// The token NEVER appears in the response body, preventing XSS theft.
// ============================================

export async function POST(req: NextRequest) {
  try {
    const body: unknown = await req.json();
    const parsed = loginSchema.safeParse(body);

    if (!parsed.success) {
      return NextResponse.json(
        { error: "Invalid input", details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const result = await loginWithPassword({
      username: parsed.data.username,
      password: parsed.data.password,
      remember: parsed.data.remember,
      ipAddress: getClientIp(req),
      userAgent: getUserAgent(req),
    });

    // Build response WITHOUT the token
    const response = NextResponse.json({
      user: result.user,
      expiresAt: result.expiresAt,
    });

    response.cookies.set(SESSION_COOKIE_NAME, result.token, {
      httpOnly: true,
      secure: requestIsSecure(req),
      sameSite: "lax",
      path: "/",
      // Without "remember me" the cookie ends with the browser session
      ...(result.persistent ? { expires: result.expiresAt } : {}),
    });

    return response;
  } catch (error) {
    if (error instanceof AuthError) {
      return NextResponse.json(
        { error: error.message },
        { status: error.statusCode }
      );
    }
    console.error("Login error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}
