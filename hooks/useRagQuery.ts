"use client";

import { useCallback, useEffect, useReducer, useRef } from "react";
import { generateAnswer, searchDocuments } from "@/lib/client/api";
import { initialQueryState, isBusy, queryReducer, runQuery, type QueryAction } from "@/lib/client/query";

/**
 * Binds the query state machine to React. Only the latest submission may
 * update state; `reset()` supersedes (and aborts) whatever is in flight.
 */
export function useRagQuery() {
  const [state, dispatch] = useReducer(queryReducer, initialQueryState);
  const seqRef = useRef(0);
  const busyRef = useRef(false);
  const ctrlRef = useRef<AbortController | null>(null);

  const submit = useCallback((question: string) => {
    if (busyRef.current) return;

    const seq = ++seqRef.current;
    const guarded = (action: QueryAction) => {
      if (seq === seqRef.current) dispatch(action);
    };

    const ctrl = new AbortController();
    ctrlRef.current = ctrl;
    busyRef.current = question.trim().length > 0;

    void runQuery(
      question,
      {
        search: (q, topK) => searchDocuments(q, topK, ctrl.signal),
        answer: (q, results) => generateAnswer(q, results, ctrl.signal),
      },
      guarded
    ).finally(() => {
      if (seq === seqRef.current) {
        busyRef.current = false;
        ctrlRef.current = null;
      }
    });
  }, []);

  const reset = useCallback(() => {
    seqRef.current++;
    busyRef.current = false;
    ctrlRef.current?.abort();
    ctrlRef.current = null;
    dispatch({ type: "reset" });
  }, []);

  useEffect(() => () => ctrlRef.current?.abort(), []);

  return { state, busy: isBusy(state), submit, reset };
}
