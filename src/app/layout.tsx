import type { Metadata, Viewport } from 'next';
import './globals.css';

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  themeColor: '#f4f1ef',
};

export const metadata: Metadata = {
  title: {
    default: 'Crime Context Explorer',
    template: '%s | Crime Context Explorer',
  },
  description:
    'Search an address or postcode to see recorded crime alongside street lighting, greenspace, buildings and land use within a chosen distance.',
  robots: { index: false, follow: false },
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en-GB">
      <body className="font-sans antialiased text-ink">{children}</body>
    </html>
  );
}
