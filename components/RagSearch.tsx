"use client";

import { useState, type KeyboardEvent } from "react";
import { useRagQuery } from "@/hooks/useRagQuery";
import ErrorMessage from "./ErrorMessage";
import SourceList from "./SourceList";

export default function RagSearch() {
  const [query, setQuery] = useState("");
  const { state, busy, submit, reset } = useRagQuery();

  const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>) => {
    if (e.key === "Enter" && !busy) submit(query);
  };

  return (
    <main className="app-main">
      <div className="search-container">
        <div className="input-group">
          <input
            type="text"
            value={query}
            onChange={(e) => setQuery(e.target.value)}
            onKeyDown={handleKeyDown}
            placeholder="Ask a question..."
            aria-label="Question"
            className="search-input"
            disabled={busy}
          />
          <button
            type="button"
            onClick={() => submit(query)}
            disabled={busy || !query.trim()}
            className="search-button"
          >
            {busy ? "Searching..." : "Search"}
          </button>
          {busy && (
            <button type="button" onClick={reset} className="cancel-button">
              Cancel
            </button>
          )}
        </div>
      </div>

      {state.error && <ErrorMessage message={state.error} onDismiss={reset} />}

      {busy && (
        <div className="loading" aria-live="polite">
          <div className="spinner" />
          <p>{state.status === "answering" ? "Generating answer..." : "Processing your question..."}</p>
        </div>
      )}

      {state.answer && (
        <div className="results">
          <div className="answer-section">
            <h3>Answer:</h3>
            <div className="answer-text" data-testid="answer">
              {state.answer}
            </div>
          </div>
          <SourceList sources={state.sources} />
        </div>
      )}
    </main>
  );
}
