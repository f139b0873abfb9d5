import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Payback Period Simulator",
  description: "When does an electric vehicle pay back its price premium over a gasoline one?",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en" suppressHydrationWarning className="h-full">
      <body suppressHydrationWarning className="h-full bg-slate-950 text-white">
        {children}
      </body>
    </html>
  );
}
