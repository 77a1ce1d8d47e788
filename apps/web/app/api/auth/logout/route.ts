import { NextRequest, NextResponse } from "next/server";
import {
  validateSession,
  invalidateSession,
  SESSION_COOKIE_NAME,
} from "@rigtrack/core/auth";

// ============================================
// POST /api/auth/logout — delete the session and clear the cookie
// ============================================

export async function POST(req: NextRequest) {
  try {
    const token = req.cookies.get(SESSION_COOKIE_NAME)?.value;
    if (token) {
      const session = await validateSession(token);
      if (session) {
        await invalidateSession(session.session.id);
      }
    }

    const response = NextResponse.json({ success: true });
    response.cookies.delete(SESSION_COOKIE_NAME);
    return response;
  } catch (error) {
    console.error("Logout error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}
