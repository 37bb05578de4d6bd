// next.config.ts
import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // pdfjs-dist は bundle せず Node から直接読む（worker / wasm の解決を Next に任せない）
  serverExternalPackages: ['pdfjs-dist'],
};

export default nextConfig;
