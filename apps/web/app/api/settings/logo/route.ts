import { NextRequest, NextResponse } from "next/server";
import { createAuditLog } from "@rigtrack/core";
import {
  getCompanyLogo,
  LogoError,
  parseLogoUpload,
  saveCompanyProfile,
} from "@rigtrack/core/settings";
import { requireSession } from "@/lib/auth";
import { getClientIp } from "@/lib/request";

// ============================================
// /api/settings/logo
// GET  → the stored logo (any signed-in user)
// POST → multipart `logo` field, PNG or JPEG up to 2 MB (admins)
// ============================================

export async function GET() {
  const guard = await requireSession();
  if (!guard.ok) return guard.response;

  try {
    const logo = await getCompanyLogo();
    if (!logo) {
      return NextResponse.json({ error: "No logo uploaded" }, { status: 404 });
    }
    const body = new ArrayBuffer(logo.data.byteLength);
    new Uint8Array(body).set(logo.data);
    return new Response(body, {
      headers: {
        "Content-Type": logo.mimeType,
        "Cache-Control": "no-cache",
      },
    });
  } catch (error) {
    console.error("Logo read error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}

export async function POST(req: NextRequest) {
  const guard = await requireSession("settings:company:manage");
  if (!guard.ok) return guard.response;

  try {
    const form = await req.formData();
    const file = form.get("logo");
    if (!(file instanceof File)) {
      throw new LogoError("Choose a logo file to upload");
    }
    const logo = parseLogoUpload(new Uint8Array(await file.arrayBuffer()), file.name);
    const profile = await saveCompanyProfile({ logo });

    await createAuditLog({
      userId: guard.session.user.id,
      action: "settings:logo_updated",
      resourceType: "company_profile",
      resourceId: String(profile.id),
      changes: { after: { fileName: logo.fileName, mimeType: logo.mimeType } },
      ipAddress: getClientIp(req),
    });

    return NextResponse.json({ success: true, fileName: logo.fileName });
  } catch (error) {
    if (error instanceof LogoError) {
      return NextResponse.json(
        { error: error.message },
        { status: error.statusCode }
      );
    }
    console.error("Logo upload error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}
