import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: [
    "sharp",
    "mupdf",
    "pdf-parse",
    "pdf-lib",
    "exceljs",
    "docx",
    "tinyld",
  ],
};

export default nextConfig;
