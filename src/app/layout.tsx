// src/app/layout.tsx  ← Server Component（'use client' なし）

import './globals.css';
import type { Metadata, Viewport } from 'next';

export const metadata: Metadata = {
  title: 'Relay Chat',
  description: 'Blood test summary chat (streaming)',
};

export const viewport: Viewport = {
  themeColor: '#f4f4f9',
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="relay-body">{children}</body>
    </html>
  );
}
