import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  transpilePackages: ["@rigtrack/core", "@rigtrack/shared", "@rigtrack/ui"],
  serverExternalPackages: ["postgres", "argon2", "jspdf", "jspdf-autotable", "qrcode"],
};

export default nextConfig;
