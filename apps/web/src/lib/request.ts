import { isSecureRequest, resolveClientIp } from "@rigtrack/shared";

// ============================================
// Request metadata for sessions and the activity log
// ============================================

export function getClientIp(req: Request): string | undefined {
  return (
    resolveClientIp(
      req.headers.get("x-forwarded-for"),
      req.headers.get("x-real-ip")
    ) ?? undefined
  );
}

export function getUserAgent(req: Request): string | undefined {
  return req.headers.get("user-agent") ?? undefined;
}

/** Session cookies are only marked Secure when the browser reached us over TLS */
export function requestIsSecure(req: Request): boolean {
  return isSecureRequest(req.url, req.headers.get("x-forwarded-proto"));
}

/** `inline` lets the browser show the PDF; `attachment` downloads it */
export function pdfResponse(
  body: ArrayBuffer,
  fileName: string,
  disposition: "inline" | "attachment" = "inline"
): Response {
  return new Response(body, {
    headers: {
      "Content-Type": "application/pdf",
      "Content-Disposition": `${disposition}; filename="${fileName}"`,
      "Cache-Control": "no-store",
    },
  });
}
