import { describe, it, expect } from "vitest";
import { detectLogoMimeType, LogoError, parseLogoUpload } from "../company";
import { createPng } from "../../../testing/images";
import { MAX_LOGO_BYTES } from "@rigtrack/shared";

const JPEG_HEAD = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);

describe("detectLogoMimeType", () => {
  it("recognises PNG and JPEG by their magic bytes", () => {
    expect(detectLogoMimeType(createPng(1, 1))).toBe("image/png");
    expect(detectLogoMimeType(JPEG_HEAD)).toBe("image/jpeg");
  });

  it("ignores everything else", () => {
    expect(detectLogoMimeType(new TextEncoder().encode("GIF89a"))).toBeNull();
    expect(detectLogoMimeType(new TextEncoder().encode("<svg/>"))).toBeNull();
  });
});

describe("parseLogoUpload", () => {
  it("keeps the bytes, the sniffed type and the file name", () => {
    const png = createPng(2, 2);
    expect(parseLogoUpload(png, " logo.png ")).toEqual({
      data: png,
      mimeType: "image/png",
      fileName: "logo.png",
    });
  });

  it("rejects files that only claim to be images", () => {
    const fake = new TextEncoder().encode("not really a png");
    expect(() => parseLogoUpload(fake, "logo.png")).toThrow(
      "The logo must be a PNG or JPEG image"
    );
  });

  it("rejects a PNG that only has the signature", () => {
    const broken = new Uint8Array([
      0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3, 4, 5, 6, 7, 8,
    ]);
    try {
      parseLogoUpload(broken, "logo.png");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LogoError);
      expect(err).toMatchObject({ statusCode: 415 });
      expect(String(err)).toContain("The logo could not be read as PNG");
    }
  });

  it("rejects a truncated JPEG", () => {
    expect(() => parseLogoUpload(JPEG_HEAD, "logo.jpg")).toThrow(
      "The logo could not be read as JPEG"
    );
  });

  it("rejects empty and oversized uploads", () => {
    expect(() => parseLogoUpload(new Uint8Array(0))).toThrow(LogoError);

    const huge = new Uint8Array(MAX_LOGO_BYTES + 1);
    huge.set(JPEG_HEAD);
    try {
      parseLogoUpload(huge);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LogoError);
      expect(err).toMatchObject({ statusCode: 413 });
    }
  });
});
