import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  devIndicators: false,
  logging: {
    fetches: {
      fullUrl: false,
    },
  },
  // The catalog is read from disk at request time
  outputFileTracingIncludes: {
    "/api/**": ["./data/catalog/**"],
  },
};

export default nextConfig;
