import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: [
    "@azure/ai-form-recognizer",
    "mammoth",
    "pdf-lib",
  ],
};

export default nextConfig;
