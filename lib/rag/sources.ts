// lib/rag/sources.ts
import type { SearchResult } from "./schema";

/**
 * Source labels for an answer. Taken from the search results that produced
 * the context; positional placeholders when the caller sent none.
 */
export function deriveSources(searchResults: SearchResult[] | undefined, contextLength: number): string[] {
  if (searchResults && searchResults.length > 0) {
    return searchResults.map((r) => {
      const source = r.metadata.source;
      return typeof source === "string" && source.trim() ? source : `document_${r.index}`;
    });
  }
  return Array.from({ length: contextLength }, (_, i) => `source_${i}`);
}
