// lib/llm/embed.ts
// Server-side helper to turn texts into vectors via the OpenAI embeddings API.
// Usage (server only): const [vec] = await embedTexts(["your question"]);
import { getConfig } from "@/lib/config";
import { safeText } from "@/lib/server/http";

const OPENAI_URL = "https://api.openai.com/v1/embeddings";

type EmbeddingRow = { index: number; embedding: number[] };

function isEmbeddingRow(value: unknown): value is EmbeddingRow {
  return (
    !!value &&
    typeof value === "object" &&
    "index" in value &&
    typeof value.index === "number" &&
    "embedding" in value &&
    Array.isArray(value.embedding) &&
    value.embedding.every((x: unknown) => typeof x === "number")
  );
}

export async function embedTexts(texts: string[]): Promise<number[][]> {
  if (texts.length === 0) return [];

  const { model, apiKey } = getConfig().embedding;
  if (!apiKey) {
    throw new Error("Missing EMBEDDING_API_KEY");
  }

  const resp = await fetch(OPENAI_URL, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify({ model, input: texts }),
  });

  if (!resp.ok) {
    const msg = await safeText(resp);
    throw new Error(`Embedding failed: ${resp.status} ${resp.statusText} — ${msg}`);
  }

  const json: unknown = await resp.json();
  const data = json && typeof json === "object" && "data" in json ? json.data : undefined;
  if (!Array.isArray(data) || data.length !== texts.length || !data.every(isEmbeddingRow)) {
    throw new Error("Invalid embedding response shape");
  }

  return [...data].sort((a, b) => a.index - b.index).map((row) => row.embedding);
}

export async function embedText(input: string): Promise<number[]> {
  const [vec] = await embedTexts([input]);
  return vec;
}
