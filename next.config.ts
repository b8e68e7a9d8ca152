import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Self-contained server bundle for the container image
  output: "standalone",
  reactStrictMode: true,
};

export default nextConfig;
