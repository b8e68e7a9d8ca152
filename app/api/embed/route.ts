// app/api/embed/route.ts
import { NextRequest } from "next/server";
import { getRagComponents } from "@/lib/rag/components";
import { parseEmbedRequest } from "@/lib/rag/validate";
import type { EmbedResponse } from "@/lib/rag/schema";
import { log } from "@/lib/logging/logger";
import { genRequestId } from "@/lib/server/reqid";
import { errorResponse, jsonResponse, readJsonBody, toErrorResponse } from "@/lib/server/http";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  const reqId = genRequestId();
  const t0 = Date.now();

  try {
    const { texts, metadata } = parseEmbedRequest(await readJsonBody(req));

    const { vectorStore, embedder } = await getRagComponents();
    if (!vectorStore || !embedder) {
      return errorResponse(500, "Vector store not initialized", reqId, t0);
    }

    const embeddings = await embedder.embedTexts(texts);
    await vectorStore.addDocuments(texts, embeddings, metadata);

    log.info("rag.embed", { reqId, count: texts.length, total: vectorStore.size, ms: Date.now() - t0 });

    const body: EmbedResponse = {
      message: `Successfully embedded ${texts.length} documents`,
      count: texts.length,
    };
    return jsonResponse(body, { reqId, t0 });
  } catch (err) {
    log.error("rag.embed.error", err, { reqId });
    return toErrorResponse(err, reqId, t0);
  }
}
