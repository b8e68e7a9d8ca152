import { beforeEach, describe, expect, it, vi } from "vitest";

const { sqlMock, queryMock } = vi.hoisted(() => {
  const queryMock = vi.fn();
  const sqlMock = Object.assign(vi.fn(), { query: queryMock });
  return { sqlMock, queryMock };
});

vi.mock("@vercel/postgres", () => ({ sql: sqlMock }));

import { getQueryStats, logQuerySession, readQueryLogs } from "../session-logger-pg";

beforeEach(() => {
  sqlMock.mockReset();
  queryMock.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("postgres audit log", () => {
  it("creates the schema once, then inserts the entry", async () => {
    queryMock.mockResolvedValue({ rows: [] });
    sqlMock.mockResolvedValue({ rows: [] });

    await logQuerySession({
      sessionId: "s1",
      timestamp: "2026-03-10T09:00:00.000Z",
      question: "What is ML?",
      answer: "A field of AI.",
      sources: ["ml.txt", "ai.txt"],
      metadata: { route: "ANSWERED", contextCount: 2, responseTimeMs: 120, provider: "openai", model: "gpt-4" },
      requestId: "req-1",
    });
    await logQuerySession({
      sessionId: "s1",
      timestamp: "2026-03-10T09:01:00.000Z",
      question: "Again?",
      answer: "",
      sources: [],
      metadata: { route: "FAILED", contextCount: 0 },
    });

    expect(queryMock).toHaveBeenCalledTimes(1);
    expect(String(queryMock.mock.calls[0][0])).toContain("CREATE TABLE IF NOT EXISTS query_sessions");

    expect(sqlMock).toHaveBeenCalledTimes(2);
    expect(sqlMock.mock.calls[0].slice(1)).toEqual([
      "s1",
      "2026-03-10T09:00:00.000Z",
      "What is ML?",
      "A field of AI.",
      JSON.stringify(["ml.txt", "ai.txt"]),
      "ANSWERED",
      2,
      120,
      "openai",
      "gpt-4",
      null,
      "req-1",
      null,
      null,
    ]);
  });

  it("does not throw when the insert fails", async () => {
    sqlMock.mockRejectedValue(new Error("connection refused"));

    await expect(
      logQuerySession({
        sessionId: "s1",
        timestamp: "2026-03-10T09:00:00.000Z",
        question: "q",
        answer: "",
        sources: [],
        metadata: { route: "FAILED", contextCount: 0 },
      })
    ).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalled();
  });

  it("builds parameterized filters and maps rows", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ count: "1" }] }).mockResolvedValueOnce({
      rows: [
        {
          session_id: "s1",
          timestamp: new Date("2026-03-09T10:00:00.000Z"),
          question: "Why?",
          answer: "",
          sources: ["a.txt"],
          route: "FAILED",
          context_count: 3,
          response_time_ms: null,
          provider: null,
          model: null,
          error: "LLM error 500: boom",
          request_id: "req-9",
          user_agent: null,
          ip_hash: "abc",
        },
      ],
    });

    const result = await readQueryLogs({ sessionId: "s1", route: "FAILED" });

    expect(queryMock.mock.calls[0]).toEqual([
      "SELECT COUNT(*) AS count FROM query_sessions WHERE 1=1 AND session_id = $1 AND route = $2",
      ["s1", "FAILED"],
    ]);
    expect(queryMock.mock.calls[1][1]).toEqual(["s1", "FAILED", 50, 0]);
    expect(result).toEqual({
      total: 1,
      logs: [
        {
          sessionId: "s1",
          timestamp: "2026-03-09T10:00:00.000Z",
          question: "Why?",
          answer: "",
          sources: ["a.txt"],
          metadata: { route: "FAILED", contextCount: 3, error: "LLM error 500: boom" },
          requestId: "req-9",
          ipHash: "abc",
        },
      ],
    });
  });

  it("returns an empty page when the query fails", async () => {
    queryMock.mockRejectedValue(new Error("relation does not exist"));

    await expect(readQueryLogs()).resolves.toEqual({ logs: [], total: 0 });
  });

  it("aggregates stats from three queries", async () => {
    sqlMock
      .mockResolvedValueOnce({ rows: [{ unique_sessions: "2", total_queries: "3", avg_response_time: "200.4" }] })
      .mockResolvedValueOnce({
        rows: [
          { route: "ANSWERED", count: "2" },
          { route: "FAILED", count: "1" },
        ],
      })
      .mockResolvedValueOnce({
        rows: [
          { date: new Date("2026-03-09T00:00:00.000Z"), count: "1" },
          { date: "2026-03-10", count: "2" },
        ],
      });

    const stats = await getQueryStats(new Date("2026-03-10T12:00:00Z"));

    expect(stats).toEqual({
      totalSessions: 2,
      totalQueries: 3,
      avgResponseTime: 200,
      routeDistribution: { ANSWERED: 2, FAILED: 1 },
      recentActivity: [
        { date: "2026-03-04", count: 0 },
        { date: "2026-03-05", count: 0 },
        { date: "2026-03-06", count: 0 },
        { date: "2026-03-07", count: 0 },
        { date: "2026-03-08", count: 0 },
        { date: "2026-03-09", count: 1 },
        { date: "2026-03-10", count: 2 },
      ],
    });
  });
});
