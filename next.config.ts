import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // pg pulls in optional native bindings that the bundler should not trace
  serverExternalPackages: ["pg"],
  experimental: {
    staleTimes: {
      dynamic: 0,
      static: 0,
    },
  },
};

export default nextConfig;
