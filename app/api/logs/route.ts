// app/api/logs/route.ts
import { NextRequest } from "next/server";
import { getConfig } from "@/lib/config";
import { getQueryStats, readQueryLogs } from "@/lib/logging/sessions";
import { genRequestId } from "@/lib/server/reqid";
import { jsonResponse } from "@/lib/server/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// Bearer <ADMIN_TOKEN>, or Basic with the token as password. No token configured → nobody gets in.
function isAuthenticated(req: NextRequest): boolean {
  const token = getConfig().adminToken;
  const authHeader = req.headers.get("authorization");
  if (!token || !authHeader) return false;

  if (authHeader.startsWith("Bearer ")) {
    return authHeader.substring(7) === token;
  }

  if (authHeader.startsWith("Basic ")) {
    const decoded = Buffer.from(authHeader.substring(6), "base64").toString();
    const sep = decoded.indexOf(":");
    // the password may itself contain colons
    return sep >= 0 && decoded.slice(sep + 1) === token;
  }

  return false;
}

function intParam(value: string | null, fallback: number, max: number): number {
  if (!value) return fallback;
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 0) return fallback;
  return Math.min(n, max);
}

export async function GET(req: NextRequest) {
  const reqId = genRequestId();

  if (!isAuthenticated(req)) {
    return jsonResponse(
      { detail: "Unauthorized" },
      { status: 401, reqId, headers: { "WWW-Authenticate": "Bearer" } }
    );
  }

  const { searchParams } = new URL(req.url);

  if (searchParams.get("action") === "stats") {
    return jsonResponse(await getQueryStats(), { reqId });
  }

  const result = await readQueryLogs({
    limit: intParam(searchParams.get("limit"), 50, 500),
    offset: intParam(searchParams.get("offset"), 0, Number.MAX_SAFE_INTEGER),
    sessionId: searchParams.get("sessionId") ?? undefined,
    startDate: searchParams.get("startDate") ?? undefined,
    endDate: searchParams.get("endDate") ?? undefined,
    route: searchParams.get("route") ?? undefined,
  });

  return jsonResponse(result, { reqId });
}
