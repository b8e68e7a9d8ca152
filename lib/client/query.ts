// lib/client/query.ts
// Query lifecycle: idle → searching → answering → done, with error exits.
import { DEFAULT_TOP_K } from "@/lib/config";
import type { AnswerResponse, SearchResult } from "@/lib/rag/schema";
import { ApiRequestError } from "./api";

export const EMPTY_QUERY_MESSAGE = "Please enter a question";
export const NO_RESULTS_MESSAGE = "No relevant documents found";
export const FALLBACK_ERROR_MESSAGE = "An error occurred while processing your request";

export type QueryStatus = "idle" | "searching" | "answering" | "done" | "error";

export type QueryState = {
  status: QueryStatus;
  answer: string;
  sources: string[];
  error: string;
};

export type QueryAction =
  | { type: "rejected"; message: string }
  | { type: "search-started" }
  | { type: "answer-started" }
  | { type: "succeeded"; response: AnswerResponse }
  | { type: "failed"; message: string }
  | { type: "reset" };

export type QueryApi = {
  search: (query: string, topK: number) => Promise<SearchResult[]>;
  answer: (question: string, results: SearchResult[]) => Promise<AnswerResponse>;
};

export const initialQueryState: QueryState = { status: "idle", answer: "", sources: [], error: "" };

export function isBusy(state: QueryState): boolean {
  return state.status === "searching" || state.status === "answering";
}

export function queryReducer(state: QueryState, action: QueryAction): QueryState {
  switch (action.type) {
    case "rejected":
      return { ...initialQueryState, status: "error", error: action.message };
    case "search-started":
      return { ...initialQueryState, status: "searching" };
    case "answer-started":
      return { ...state, status: "answering" };
    case "succeeded":
      return { status: "done", answer: action.response.answer, sources: action.response.sources, error: "" };
    case "failed":
      return { ...initialQueryState, status: "error", error: action.message };
    case "reset":
      return initialQueryState;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof ApiRequestError && err.detail) return err.detail;
  return FALLBACK_ERROR_MESSAGE;
}

/**
 * Search, then answer over the hits. Never rejects: every outcome is
 * reported through `dispatch`. A blank question is refused before any request.
 */
export async function runQuery(question: string, api: QueryApi, dispatch: (action: QueryAction) => void): Promise<void> {
  if (!question.trim()) {
    dispatch({ type: "rejected", message: EMPTY_QUERY_MESSAGE });
    return;
  }

  dispatch({ type: "search-started" });

  try {
    const results = await api.search(question, DEFAULT_TOP_K);
    if (results.length === 0) {
      dispatch({ type: "failed", message: NO_RESULTS_MESSAGE });
      return;
    }

    dispatch({ type: "answer-started" });
    const response = await api.answer(question, results);
    dispatch({ type: "succeeded", response });
  } catch (err) {
    console.error("[query] request failed:", err);
    dispatch({ type: "failed", message: errorMessage(err) });
  }
}
