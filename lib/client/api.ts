// lib/client/api.ts
// Browser-side calls to the RAG routes.
import type { AnswerResponse, SearchResult } from "@/lib/rag/schema";

const SEARCH_ENDPOINT = "/search";
const ANSWER_ENDPOINT = "/answer";

export class ApiRequestError extends Error {
  /** `detail` from the server's error body, when it sent one. */
  readonly detail: string | undefined;
  readonly status: number | undefined;

  constructor(message: string, opts?: { status?: number; detail?: string }) {
    super(message);
    this.name = "ApiRequestError";
    this.status = opts?.status;
    this.detail = opts?.detail;
  }
}

export const apiBaseUrl = () => (process.env.NEXT_PUBLIC_API_URL ?? "/api").replace(/\/$/, "");

export const buildUrl = (endpoint: string) => `${apiBaseUrl()}${endpoint}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isSearchResult(value: unknown): value is SearchResult {
  return isRecord(value) && typeof value.text === "string";
}

function isAnswerResponse(value: unknown): value is AnswerResponse {
  return (
    isRecord(value) &&
    typeof value.answer === "string" &&
    typeof value.question === "string" &&
    Array.isArray(value.sources) &&
    value.sources.every((s: unknown) => typeof s === "string")
  );
}

async function postJson(endpoint: string, payload: unknown, signal?: AbortSignal): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(buildUrl(endpoint), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal,
    });
  } catch (error) {
    if (error instanceof DOMException && error.name === "AbortError") {
      throw error;
    }
    throw new ApiRequestError(`Network request to ${endpoint} failed`);
  }

  if (!response.ok) {
    let detail: string | undefined;
    try {
      const data: unknown = await response.json();
      if (isRecord(data) && typeof data.detail === "string") {
        detail = data.detail;
      }
    } catch {
      // no JSON body; the caller falls back to a generic message
    }
    throw new ApiRequestError(detail ?? `HTTP ${response.status}`, { status: response.status, detail });
  }

  try {
    return await response.json();
  } catch {
    throw new ApiRequestError(`Invalid JSON from ${endpoint}`, { status: response.status });
  }
}

export async function searchDocuments(query: string, topK: number, signal?: AbortSignal): Promise<SearchResult[]> {
  const data = await postJson(SEARCH_ENDPOINT, { query, top_k: topK }, signal);
  if (!isRecord(data) || !Array.isArray(data.results) || !data.results.every(isSearchResult)) {
    throw new ApiRequestError("Unexpected search response shape");
  }
  return data.results;
}

/** Context is the result texts in order; the raw results go along for source attribution. */
export async function generateAnswer(
  question: string,
  results: SearchResult[],
  signal?: AbortSignal
): Promise<AnswerResponse> {
  const data = await postJson(
    ANSWER_ENDPOINT,
    { question, context: results.map((r) => r.text), search_results: results },
    signal
  );
  if (!isAnswerResponse(data)) {
    throw new ApiRequestError("Unexpected answer response shape");
  }
  return data;
}
