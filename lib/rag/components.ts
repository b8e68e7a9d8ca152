// lib/rag/components.ts
// Lazily built, process-wide RAG components. A component that cannot be
// created is logged and left null; routes report it as not initialized.
import { getConfig } from "@/lib/config";
import { LLMClient } from "@/lib/llm/client";
import { embedTexts } from "@/lib/llm/embed";
import { log } from "@/lib/logging/logger";
import { VectorStore } from "./store";

export type Embedder = {
  model: string;
  embedTexts: (texts: string[]) => Promise<number[][]>;
};

export type RagComponents = {
  vectorStore: VectorStore | null;
  embedder: Embedder | null;
  llmClient: LLMClient | null;
};

let memo: Promise<RagComponents> | null = null;

async function initVectorStore(): Promise<VectorStore | null> {
  const cfg = getConfig();
  try {
    const store = new VectorStore({ indexPath: cfg.vectorIndexPath, dimension: cfg.embedding.dimension });
    await store.load();
    return store;
  } catch (err) {
    log.error("rag.init.vector_store", err, { indexPath: cfg.vectorIndexPath });
    return null;
  }
}

function initEmbedder(): Embedder | null {
  const { model, apiKey } = getConfig().embedding;
  if (!apiKey) {
    log.warn("rag.init.embedder", { reason: "Missing EMBEDDING_API_KEY" });
    return null;
  }
  return { model, embedTexts };
}

function initLLMClient(): LLMClient | null {
  const { llm } = getConfig();
  try {
    return new LLMClient(llm);
  } catch (err) {
    log.error("rag.init.llm_client", err, { provider: llm.provider });
    return null;
  }
}

async function init(): Promise<RagComponents> {
  log.info("rag.init", {});
  const components = {
    vectorStore: await initVectorStore(),
    embedder: initEmbedder(),
    llmClient: initLLMClient(),
  };
  log.info("rag.init.done", {
    vector_store: components.vectorStore !== null,
    embedder: components.embedder !== null,
    llm_client: components.llmClient !== null,
  });
  return components;
}

export function getRagComponents(): Promise<RagComponents> {
  memo ??= init();
  return memo;
}

export function resetRagComponents(): void {
  memo = null;
}
