import { eq } from "drizzle-orm";
import { jsPDF } from "jspdf";
import { db, type Database } from "../../db/index";
import {
  companyProfile,
  COMPANY_PROFILE_ID,
  type CompanyProfile,
} from "../../db/schema/index";
import { MAX_LOGO_BYTES, type LogoMimeType } from "@rigtrack/shared";

// ============================================
// Company Profile — name and logo used on reports and labels
// ============================================

export class LogoError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = "LogoError";
  }
}

export interface CompanyLogo {
  data: Uint8Array;
  mimeType: LogoMimeType;
  fileName: string | null;
}

export interface CompanyBranding {
  companyName: string;
  logo: CompanyLogo | null;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  return (
    bytes.length >= signature.length &&
    signature.every((byte, i) => bytes[i] === byte)
  );
}

/** Sniff the image type from its leading bytes; the declared type is ignored */
export function detectLogoMimeType(bytes: Uint8Array): LogoMimeType | null {
  if (startsWith(bytes, PNG_SIGNATURE)) return "image/png";
  if (startsWith(bytes, JPEG_SIGNATURE)) return "image/jpeg";
  return null;
}

/** Embed the image in a scratch document, the same way reports and labels do */
function assertDecodable(bytes: Uint8Array, mimeType: LogoMimeType): void {
  const format = mimeType === "image/png" ? "PNG" : "JPEG";
  try {
    const doc = new jsPDF({ unit: "mm" });
    const { width, height } = doc.getImageProperties(bytes);
    if (!(width > 0 && height > 0)) {
      throw new Error("the image has no dimensions");
    }
    doc.addImage(bytes, format, 0, 0, 10, 10);
  } catch (error) {
    throw new LogoError(
      `The logo could not be read as ${format}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      415
    );
  }
}

/**
 * Validate an uploaded logo: PNG or JPEG, at most MAX_LOGO_BYTES, and
 * decodable by the PDF renderer.
 */
export function parseLogoUpload(
  bytes: Uint8Array,
  fileName?: string | null
): CompanyLogo {
  if (bytes.length === 0) {
    throw new LogoError("The logo file is empty");
  }
  if (bytes.length > MAX_LOGO_BYTES) {
    throw new LogoError("The logo must be 2 MB or smaller", 413);
  }
  const mimeType = detectLogoMimeType(bytes);
  if (!mimeType) {
    throw new LogoError("The logo must be a PNG or JPEG image", 415);
  }
  assertDecodable(bytes, mimeType);
  return { data: bytes, mimeType, fileName: fileName?.trim() || null };
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

function decodeLogo(profile: CompanyProfile): CompanyLogo | null {
  if (!profile.logoData || !profile.logoMimeType) return null;
  return {
    data: new Uint8Array(Buffer.from(profile.logoData, "base64")),
    mimeType: profile.logoMimeType,
    fileName: profile.logoFileName,
  };
}

export async function getCompanyProfile(
  database: Database = db
): Promise<CompanyProfile | null> {
  const [profile] = await database
    .select()
    .from(companyProfile)
    .where(eq(companyProfile.id, COMPANY_PROFILE_ID))
    .limit(1);
  return profile ?? null;
}

/** Name and decoded logo for PDF headers and labels */
export async function getCompanyBranding(
  database: Database = db
): Promise<CompanyBranding> {
  const profile = await getCompanyProfile(database);
  if (!profile) return { companyName: "", logo: null };
  return { companyName: profile.companyName, logo: decodeLogo(profile) };
}

export async function getCompanyLogo(
  database: Database = db
): Promise<CompanyLogo | null> {
  const profile = await getCompanyProfile(database);
  return profile ? decodeLogo(profile) : null;
}

/** Insert or update the single profile row */
export async function saveCompanyProfile(
  values: { companyName?: string; logo?: CompanyLogo | null },
  database: Database = db
): Promise<CompanyProfile> {
  const patch: Partial<typeof companyProfile.$inferInsert> = {};
  if (values.companyName !== undefined) patch.companyName = values.companyName;
  if (values.logo !== undefined) {
    patch.logoData = values.logo ? toBase64(values.logo.data) : null;
    patch.logoMimeType = values.logo?.mimeType ?? null;
    patch.logoFileName = values.logo?.fileName ?? null;
  }

  const [profile] = await database
    .insert(companyProfile)
    .values({ id: COMPANY_PROFILE_ID, ...patch })
    .onConflictDoUpdate({
      target: companyProfile.id,
      set: { ...patch, updatedAt: new Date() },
    })
    .returning();

  if (!profile) {
    throw new Error("Failed to save company profile");
  }
  return profile;
}
