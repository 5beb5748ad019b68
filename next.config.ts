import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // sql.js locates its .wasm beside its own script, which bundling would break
  serverExternalPackages: ["sql.js"],
  poweredByHeader: false,
};

export default nextConfig;
