import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // CSV 로더는 서버 라우트에서만 fs 로 읽는다
  serverExternalPackages: ["papaparse"],
};

export default nextConfig;
