// lib/rag/validate.ts
// Request body parsing for the RAG routes. Every failure names the field.
import { DEFAULT_TOP_K } from "@/lib/config";
import { RequestValidationError } from "@/lib/server/http";
import type { AnswerRequest, ChunkMetadata, EmbedRequest, SearchRequest, SearchResult } from "./schema";

type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function stringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${field} must be an array of strings`);
  }
  return value.map((v: unknown, i) => {
    if (typeof v !== "string") throw new RequestValidationError(`${field}[${i}] must be a string`);
    return v;
  });
}

function optionalType(meta: Body, key: string, type: "string" | "number", field: string) {
  if (meta[key] !== undefined && typeof meta[key] !== type) {
    throw new RequestValidationError(`${field}.${key} must be a ${type}`);
  }
}

export function parseMetadata(value: unknown, field: string): ChunkMetadata {
  if (!isRecord(value)) {
    throw new RequestValidationError(`${field} must be an object`);
  }
  optionalType(value, "source", "string", field);
  optionalType(value, "title", "string", field);
  optionalType(value, "page", "number", field);
  optionalType(value, "chunk_index", "number", field);
  return { ...value };
}

function parseSearchResult(value: unknown, field: string): SearchResult {
  if (!isRecord(value)) {
    throw new RequestValidationError(`${field} must be an object`);
  }
  const { text, score, index } = value;
  if (typeof text !== "string") throw new RequestValidationError(`${field}.text must be a string`);
  if (typeof score !== "number") throw new RequestValidationError(`${field}.score must be a number`);
  if (typeof index !== "number" || !Number.isInteger(index)) {
    throw new RequestValidationError(`${field}.index must be an integer`);
  }
  const metadata = value.metadata === undefined ? {} : parseMetadata(value.metadata, `${field}.metadata`);
  return { text, metadata, score, index };
}

export function parseEmbedRequest(body: Body): EmbedRequest {
  const texts = stringArray(body.texts, "texts");
  if (body.metadata === undefined || body.metadata === null) {
    return { texts };
  }
  if (!Array.isArray(body.metadata)) {
    throw new RequestValidationError("metadata must be an array of objects");
  }
  if (body.metadata.length !== texts.length) {
    throw new RequestValidationError(
      `metadata length (${body.metadata.length}) must match texts length (${texts.length})`
    );
  }
  const metadata = body.metadata.map((m: unknown, i) => parseMetadata(m, `metadata[${i}]`));
  return { texts, metadata };
}

export function parseSearchRequest(body: Body): SearchRequest {
  if (typeof body.query !== "string") {
    throw new RequestValidationError("query must be a string");
  }
  const topK = body.top_k ?? DEFAULT_TOP_K;
  if (typeof topK !== "number" || !Number.isInteger(topK) || topK < 1) {
    throw new RequestValidationError("top_k must be a positive integer");
  }
  return { query: body.query, top_k: topK };
}

export function parseAnswerRequest(body: Body): AnswerRequest {
  if (typeof body.question !== "string") {
    throw new RequestValidationError("question must be a string");
  }
  const context = stringArray(body.context, "context");
  if (body.search_results === undefined || body.search_results === null) {
    return { question: body.question, context };
  }
  if (!Array.isArray(body.search_results)) {
    throw new RequestValidationError("search_results must be an array");
  }
  const searchResults = body.search_results.map((r: unknown, i) =>
    parseSearchResult(r, `search_results[${i}]`)
  );
  return { question: body.question, context, search_results: searchResults };
}
