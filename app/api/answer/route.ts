// app/api/answer/route.ts
import { NextRequest } from "next/server";
import crypto from "crypto";
import { getRagComponents } from "@/lib/rag/components";
import { buildAnswerPrompt } from "@/lib/rag/prompt";
import { deriveSources } from "@/lib/rag/sources";
import { parseAnswerRequest } from "@/lib/rag/validate";
import type { AnswerRequest, AnswerResponse } from "@/lib/rag/schema";
import { log } from "@/lib/logging/logger";
import { logQuerySession, type QueryLogEntry } from "@/lib/logging/sessions";
import { genRequestId } from "@/lib/server/reqid";
import { jsonResponse, readJsonBody, toErrorResponse } from "@/lib/server/http";

export const runtime = "nodejs";

type Outcome = {
  answer: string;
  sources: string[];
  route: QueryLogEntry["metadata"]["route"];
  error?: string;
  provider?: string;
  model?: string;
};

async function audit(req: NextRequest, reqId: string, t0: number, request: AnswerRequest, outcome: Outcome) {
  const ip = req.headers.get("x-forwarded-for") || req.headers.get("x-real-ip") || "unknown";
  await logQuerySession({
    sessionId: req.headers.get("x-session-id") || crypto.randomUUID(),
    timestamp: new Date().toISOString(),
    question: request.question,
    answer: outcome.answer,
    sources: outcome.sources,
    metadata: {
      route: outcome.route,
      contextCount: request.context.length,
      responseTimeMs: Date.now() - t0,
      provider: outcome.provider,
      model: outcome.model,
      error: outcome.error,
    },
    requestId: reqId,
    userAgent: req.headers.get("user-agent") || undefined,
    ipHash: crypto.createHash("sha256").update(ip).digest("hex").slice(0, 16),
  });
}

export async function POST(req: NextRequest) {
  const reqId = genRequestId();
  const t0 = Date.now();
  let request: AnswerRequest | null = null;

  try {
    request = parseAnswerRequest(await readJsonBody(req));
    const { question, context, search_results } = request;

    const { llmClient } = await getRagComponents();
    if (!llmClient) {
      throw new Error("LLM client not initialized");
    }

    const answer = await llmClient.generate(buildAnswerPrompt(question, context));
    const sources = deriveSources(search_results, context.length);

    log.info("rag.answer", {
      reqId,
      contextCount: context.length,
      sources: sources.length,
      provider: llmClient.provider,
      model: llmClient.model,
      ms: Date.now() - t0,
    });
    await audit(req, reqId, t0, request, {
      answer,
      sources,
      route: "ANSWERED",
      provider: llmClient.provider,
      model: llmClient.model,
    });

    const body: AnswerResponse = { answer, sources, question };
    return jsonResponse(body, { reqId, t0 });
  } catch (err) {
    log.error("rag.answer.error", err, { reqId });
    if (request) {
      await audit(req, reqId, t0, request, {
        answer: "",
        sources: [],
        route: "FAILED",
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return toErrorResponse(err, reqId, t0);
  }
}
