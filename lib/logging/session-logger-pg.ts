// lib/logging/session-logger-pg.ts
// Postgres-backed query audit log for deployments with POSTGRES_URL set
import { sql } from "@vercel/postgres";
import { ensureDatabase } from "@/lib/db/init";
import { log } from "./logger";
import {
  lastSevenDays,
  type QueryLogEntry,
  type QueryRoute,
  type QueryStats,
  type ReadLogsOptions,
} from "./session-logger";

function toRoute(value: unknown): QueryRoute {
  return value === "FAILED" ? "FAILED" : "ANSWERED";
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v: unknown): v is string => typeof v === "string") : [];
}

function rowToEntry(row: Record<string, unknown>): QueryLogEntry {
  const ts = row.timestamp;
  return {
    sessionId: String(row.session_id),
    timestamp: ts instanceof Date ? ts.toISOString() : String(ts),
    question: String(row.question),
    answer: String(row.answer ?? ""),
    sources: toStringArray(row.sources),
    metadata: {
      route: toRoute(row.route),
      contextCount: Number(row.context_count ?? 0),
      responseTimeMs: row.response_time_ms == null ? undefined : Number(row.response_time_ms),
      provider: optionalString(row.provider),
      model: optionalString(row.model),
      error: optionalString(row.error),
    },
    requestId: optionalString(row.request_id),
    userAgent: optionalString(row.user_agent),
    ipHash: optionalString(row.ip_hash),
  };
}

/**
 * Log a query session to Postgres
 */
export async function logQuerySession(entry: QueryLogEntry): Promise<void> {
  try {
    await ensureDatabase();
    await sql`
      INSERT INTO query_sessions (
        session_id,
        timestamp,
        question,
        answer,
        sources,
        route,
        context_count,
        response_time_ms,
        provider,
        model,
        error,
        request_id,
        user_agent,
        ip_hash
      ) VALUES (
        ${entry.sessionId},
        ${entry.timestamp},
        ${entry.question},
        ${entry.answer},
        ${JSON.stringify(entry.sources)},
        ${entry.metadata.route},
        ${entry.metadata.contextCount},
        ${entry.metadata.responseTimeMs ?? null},
        ${entry.metadata.provider ?? null},
        ${entry.metadata.model ?? null},
        ${entry.metadata.error ?? null},
        ${entry.requestId ?? null},
        ${entry.userAgent ?? null},
        ${entry.ipHash ?? null}
      )
    `;
  } catch (err) {
    log.error("audit.pg.write", err);
  }
}

export async function readQueryLogs(options?: ReadLogsOptions): Promise<{ logs: QueryLogEntry[]; total: number }> {
  try {
    const limit = options?.limit ?? 50;
    const offset = options?.offset ?? 0;

    const conditions: string[] = ["1=1"];
    const params: Array<string | number> = [];

    if (options?.sessionId) {
      params.push(options.sessionId);
      conditions.push(`session_id = $${params.length}`);
    }
    if (options?.startDate) {
      params.push(options.startDate);
      conditions.push(`timestamp >= $${params.length}`);
    }
    if (options?.endDate) {
      params.push(options.endDate);
      conditions.push(`timestamp <= $${params.length}`);
    }
    if (options?.route) {
      params.push(options.route);
      conditions.push(`route = $${params.length}`);
    }

    const whereClause = conditions.join(" AND ");

    const countResult = await sql.query(`SELECT COUNT(*) AS count FROM query_sessions WHERE ${whereClause}`, params);
    const total = Number.parseInt(String(countResult.rows[0]?.count ?? "0"), 10);

    const dataResult = await sql.query(
      `SELECT
        session_id, timestamp, question, answer, sources, route, context_count,
        response_time_ms, provider, model, error, request_id, user_agent, ip_hash
      FROM query_sessions
      WHERE ${whereClause}
      ORDER BY timestamp DESC
      LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );

    return { logs: dataResult.rows.map(rowToEntry), total };
  } catch (err) {
    log.error("audit.pg.read", err);
    return { logs: [], total: 0 };
  }
}

export async function getQueryStats(now = new Date()): Promise<QueryStats> {
  try {
    const statsResult = await sql`
      SELECT
        COUNT(DISTINCT session_id) AS unique_sessions,
        COUNT(*) AS total_queries,
        AVG(response_time_ms) AS avg_response_time
      FROM query_sessions
      WHERE timestamp >= NOW() - INTERVAL '30 days'
    `;
    const stats = statsResult.rows[0];

    const routeResult = await sql`
      SELECT route, COUNT(*) AS count
      FROM query_sessions
      WHERE timestamp >= NOW() - INTERVAL '30 days'
      GROUP BY route
    `;
    const routeDistribution: Record<string, number> = {};
    for (const row of routeResult.rows) {
      routeDistribution[String(row.route ?? "UNKNOWN")] = Number.parseInt(String(row.count), 10);
    }

    const activityResult = await sql`
      SELECT DATE(timestamp) AS date, COUNT(*) AS count
      FROM query_sessions
      WHERE timestamp >= NOW() - INTERVAL '7 days'
      GROUP BY DATE(timestamp)
      ORDER BY date ASC
    `;
    const counts = new Map<string, number>();
    for (const row of activityResult.rows) {
      const d: unknown = row.date;
      const key = d instanceof Date ? d.toISOString().split("T")[0] : String(d);
      counts.set(key, Number.parseInt(String(row.count), 10));
    }

    return {
      totalSessions: Number.parseInt(String(stats?.unique_sessions ?? "0"), 10),
      totalQueries: Number.parseInt(String(stats?.total_queries ?? "0"), 10),
      avgResponseTime: Math.round(Number.parseFloat(String(stats?.avg_response_time ?? "0")) || 0),
      routeDistribution,
      recentActivity: lastSevenDays(now).map((date) => ({ date, count: counts.get(date) ?? 0 })),
    };
  } catch (err) {
    log.error("audit.pg.stats", err);
    return {
      totalSessions: 0,
      totalQueries: 0,
      avgResponseTime: 0,
      routeDistribution: {},
      recentActivity: [],
    };
  }
}
