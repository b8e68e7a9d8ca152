import type { NextRequest } from "next/server";
import { NextResponse } from "next/server";
import { getConfig } from "@/lib/config";

export const config = {
  matcher: ["/api/:path*"],
};

const ALLOW_METHODS = "GET, POST, DELETE, OPTIONS";

function corsHeaders(origin: string | null): Record<string, string> {
  if (!origin || !getConfig().corsOrigins.includes(origin)) return {};
  return {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Credentials": "true",
    "Access-Control-Allow-Methods": ALLOW_METHODS,
    "Access-Control-Allow-Headers": "*",
    Vary: "Origin",
  };
}

export function middleware(req: NextRequest) {
  const headers = corsHeaders(req.headers.get("origin"));

  // Preflight never reaches the route handlers
  if (req.method === "OPTIONS") {
    return new NextResponse(null, { status: 204, headers });
  }

  const res = NextResponse.next();
  for (const [k, v] of Object.entries(headers)) res.headers.set(k, v);
  return res;
}
