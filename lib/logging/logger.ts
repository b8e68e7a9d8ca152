// lib/logging/logger.ts
// One JSON object per line on the console, filtered by LOG_LEVEL.
import { getConfig, type LogLevel } from "@/lib/config";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emit(level: LogLevel, event: string, data?: Record<string, unknown>) {
  if (RANK[level] < RANK[getConfig().logLevel]) return;

  let line: string;
  try {
    line = JSON.stringify({ level, event, ts: new Date().toISOString(), ...data });
  } catch {
    line = JSON.stringify({ level, event, ts: new Date().toISOString(), note: "unserializable payload" });
  }

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const log = {
  debug: (event: string, data?: Record<string, unknown>) => emit("debug", event, data),
  info: (event: string, data?: Record<string, unknown>) => emit("info", event, data),
  warn: (event: string, data?: Record<string, unknown>) => emit("warn", event, data),
  error: (event: string, err: unknown, data?: Record<string, unknown>) =>
    emit("error", event, { ...data, error: errorMessage(err) }),
};
