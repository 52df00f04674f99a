import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // required at run time from node_modules, not bundled
  serverExternalPackages: ["pdf-parse", "mammoth"],
};

export default nextConfig;
