// lib/logging/session-logger.ts
// JSONL-file query audit log (used when no Postgres is configured).
import { promises as fs } from "fs";
import path from "path";
import { getConfig } from "@/lib/config";
import { log } from "./logger";

export type QueryRoute = "ANSWERED" | "FAILED";

export type QueryLogEntry = {
  sessionId: string;
  timestamp: string;
  question: string;
  answer: string;
  sources: string[];
  metadata: {
    route: QueryRoute;
    contextCount: number;
    responseTimeMs?: number;
    provider?: string;
    model?: string;
    error?: string;
  };
  requestId?: string;
  userAgent?: string;
  ipHash?: string; // Hashed for privacy
};

export type ReadLogsOptions = {
  limit?: number;
  offset?: number;
  sessionId?: string;
  startDate?: string;
  endDate?: string;
  route?: string;
};

export type QueryStats = {
  totalSessions: number;
  totalQueries: number;
  avgResponseTime: number;
  routeDistribution: Record<string, number>;
  recentActivity: Array<{ date: string; count: number }>;
};

const LOG_FILE = "query-sessions.jsonl";

function logFilePath(): string {
  return path.join(getConfig().queryLogDir, LOG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isEntry(value: unknown): value is QueryLogEntry {
  return (
    isRecord(value) &&
    typeof value.sessionId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.question === "string" &&
    Array.isArray(value.sources) &&
    isRecord(value.metadata)
  );
}

/** Last seven days including today, oldest first. */
export function lastSevenDays(now = new Date()): string[] {
  const days: string[] = [];
  for (let i = 6; i >= 0; i--) {
    const date = new Date(now);
    date.setDate(date.getDate() - i);
    days.push(date.toISOString().split("T")[0]);
  }
  return days;
}

// Append a log entry to the JSONL file
export async function logQuerySession(entry: QueryLogEntry): Promise<void> {
  try {
    const file = logFilePath();
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.appendFile(file, JSON.stringify(entry) + "\n", "utf-8");
  } catch (err) {
    log.error("audit.write", err);
  }
}

export async function readQueryLogs(options?: ReadLogsOptions): Promise<{ logs: QueryLogEntry[]; total: number }> {
  let content: string;
  try {
    content = await fs.readFile(logFilePath(), "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { logs: [], total: 0 };
    }
    log.error("audit.read", err);
    return { logs: [], total: 0 };
  }

  let logs = content
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => {
      try {
        return JSON.parse(line);
      } catch {
        return null;
      }
    })
    .filter(isEntry);

  const { sessionId, startDate, endDate, route } = options ?? {};
  if (sessionId) logs = logs.filter((l) => l.sessionId === sessionId);
  if (startDate) logs = logs.filter((l) => l.timestamp >= startDate);
  if (endDate) logs = logs.filter((l) => l.timestamp <= endDate);
  if (route) logs = logs.filter((l) => l.metadata.route === route);

  const total = logs.length;

  // newest first
  logs.sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime());

  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 50;
  return { logs: logs.slice(offset, offset + limit), total };
}

export async function getQueryStats(now = new Date()): Promise<QueryStats> {
  const { logs } = await readQueryLogs({ limit: 10000 });

  const responseTimes = logs
    .map((l) => l.metadata.responseTimeMs)
    .filter((t): t is number => t !== undefined);
  const avgResponseTime =
    responseTimes.length > 0 ? responseTimes.reduce((a, b) => a + b, 0) / responseTimes.length : 0;

  const routeDistribution: Record<string, number> = {};
  for (const l of logs) {
    const route = l.metadata.route ?? "UNKNOWN";
    routeDistribution[route] = (routeDistribution[route] ?? 0) + 1;
  }

  return {
    totalSessions: new Set(logs.map((l) => l.sessionId)).size,
    totalQueries: logs.length,
    avgResponseTime: Math.round(avgResponseTime),
    routeDistribution,
    recentActivity: lastSevenDays(now).map((date) => ({
      date,
      count: logs.filter((l) => l.timestamp.startsWith(date)).length,
    })),
  };
}
