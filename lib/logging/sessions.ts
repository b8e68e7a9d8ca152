// lib/logging/sessions.ts
// Picks the audit-log backend: Postgres when POSTGRES_URL is set, JSONL otherwise.
import { getConfig } from "@/lib/config";
import * as fileLog from "./session-logger";
import * as pgLog from "./session-logger-pg";

export type { QueryLogEntry, QueryRoute, QueryStats, ReadLogsOptions } from "./session-logger";

function backend() {
  return getConfig().postgresUrl ? pgLog : fileLog;
}

export function logQuerySession(entry: fileLog.QueryLogEntry): Promise<void> {
  return backend().logQuerySession(entry);
}

export function readQueryLogs(options?: fileLog.ReadLogsOptions) {
  return backend().readQueryLogs(options);
}

export function getQueryStats() {
  return backend().getQueryStats();
}
