// app/api/index/route.ts
import { getRagComponents } from "@/lib/rag/components";
import { log } from "@/lib/logging/logger";
import { genRequestId } from "@/lib/server/reqid";
import { errorResponse, jsonResponse, toErrorResponse } from "@/lib/server/http";

export const runtime = "nodejs";

export async function GET() {
  const reqId = genRequestId();
  const { vectorStore } = await getRagComponents();
  if (!vectorStore) {
    return errorResponse(500, "Vector store not initialized", reqId);
  }
  return jsonResponse(vectorStore.stats(), { reqId, headers: { "cache-control": "no-store" } });
}

export async function DELETE() {
  const reqId = genRequestId();
  const t0 = Date.now();
  try {
    const { vectorStore } = await getRagComponents();
    if (!vectorStore) {
      return errorResponse(500, "Vector store not initialized", reqId, t0);
    }
    await vectorStore.clear();
    return jsonResponse({ message: "Cleared all documents from vector store" }, { reqId, t0 });
  } catch (err) {
    log.error("rag.index.clear.error", err, { reqId });
    return toErrorResponse(err, reqId, t0);
  }
}
