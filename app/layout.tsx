import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "ThreadTally - Model Mention Leaderboard",
  description: "Which speaker models do discussion threads actually recommend? Mentions ranked by count and votes.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body style={{ margin: 0, minHeight: '100vh' }}>
        {children}
      </body>
    </html>
  );
}
