// app/api/search/route.ts
import { NextRequest } from "next/server";
import { getRagComponents } from "@/lib/rag/components";
import { parseSearchRequest } from "@/lib/rag/validate";
import type { SearchResponse } from "@/lib/rag/schema";
import { log } from "@/lib/logging/logger";
import { genRequestId } from "@/lib/server/reqid";
import { errorResponse, jsonResponse, readJsonBody, toErrorResponse } from "@/lib/server/http";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  const reqId = genRequestId();
  const t0 = Date.now();

  try {
    const { query, top_k } = parseSearchRequest(await readJsonBody(req));

    const { vectorStore, embedder } = await getRagComponents();
    if (!vectorStore || !embedder) {
      return errorResponse(500, "Vector store not initialized", reqId, t0);
    }

    const [qVec] = await embedder.embedTexts([query]);
    if (!Array.isArray(qVec) || qVec.length !== vectorStore.dimension) {
      return errorResponse(
        500,
        `Embedding dim mismatch. index=${vectorStore.dimension}, q=${qVec?.length ?? 0}`,
        reqId,
        t0
      );
    }

    const results = vectorStore.search(qVec, top_k);

    log.info("rag.search", {
      reqId,
      topK: top_k,
      hits: results.length,
      topScore: results[0]?.score ?? 0,
      ms: Date.now() - t0,
    });

    const body: SearchResponse = { results, query };
    return jsonResponse(body, { reqId, t0 });
  } catch (err) {
    log.error("rag.search.error", err, { reqId });
    return toErrorResponse(err, reqId, t0);
  }
}
