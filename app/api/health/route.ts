// app/api/health/route.ts
import { getConfig } from "@/lib/config";
import { checkDatabaseReady } from "@/lib/db/init";
import { getRagComponents } from "@/lib/rag/components";
import { genRequestId } from "@/lib/server/reqid";
import { jsonResponse } from "@/lib/server/http";

export const runtime = "nodejs";

export async function GET() {
  const reqId = genRequestId();
  const t0 = Date.now();

  const { vectorStore, embedder, llmClient } = await getRagComponents();
  const usePostgres = Boolean(getConfig().postgresUrl);

  const body = {
    status: "healthy",
    components: {
      vector_store: vectorStore !== null,
      embedder: embedder !== null,
      llm_client: llmClient !== null,
    },
    index: vectorStore ? vectorStore.stats() : null,
    llm: llmClient ? llmClient.getModelInfo() : null,
    audit_log: {
      backend: usePostgres ? "postgres" : "file",
      ready: usePostgres ? await checkDatabaseReady() : true,
    },
  };

  return jsonResponse(body, { reqId, t0, headers: { "cache-control": "no-store" } });
}
