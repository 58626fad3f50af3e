import type { Metadata } from 'next';
import type React from 'react';
import '@xyflow/react/dist/style.css';
import './globals.css';

export const metadata: Metadata = {
  title: 'Prompt Chain Writer',
  description: 'Topics, outline, draft and polish in four chained model calls',
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
