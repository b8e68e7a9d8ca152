// app/api/route.ts
import { genRequestId } from "@/lib/server/reqid";
import { jsonResponse } from "@/lib/server/http";

export const runtime = "nodejs";

const API_VERSION = "1.0.0";

export async function GET() {
  return jsonResponse(
    { message: "RAG Foundations API", version: API_VERSION, status: "healthy" },
    { reqId: genRequestId(), headers: { "cache-control": "no-store" } }
  );
}
