// lib/server/http.ts
// Response helpers shared by the route handlers. Errors always leave as { detail }.
import type { ErrorBody } from "@/lib/rag/schema";

export class RequestValidationError extends Error {
  readonly status: number;

  constructor(message: string, status = 422) {
    super(message);
    this.name = "RequestValidationError";
    this.status = status;
  }
}

export function jsonResponse(
  body: unknown,
  init: { status?: number; reqId: string; t0?: number; headers?: Record<string, string> }
): Response {
  const headers: Record<string, string> = {
    "content-type": "application/json",
    "x-request-id": init.reqId,
    ...init.headers,
  };
  if (init.t0 !== undefined) headers["x-runtime-ms"] = String(Date.now() - init.t0);
  return new Response(JSON.stringify(body), { status: init.status ?? 200, headers });
}

export function errorResponse(status: number, detail: string, reqId: string, t0?: number): Response {
  const body: ErrorBody = { detail };
  return jsonResponse(body, { status, reqId, t0 });
}

/** Maps anything thrown inside a handler to a status + detail pair. */
export function toErrorResponse(err: unknown, reqId: string, t0?: number): Response {
  if (err instanceof RequestValidationError) {
    return errorResponse(err.status, err.message, reqId, t0);
  }
  return errorResponse(500, err instanceof Error ? err.message : String(err), reqId, t0);
}

export async function readJsonBody(req: Request): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON body", 400);
  }
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }
  return { ...body };
}

export async function safeText(r: Response): Promise<string> {
  try {
    return await r.text();
  } catch {
    return "<no body>";
  }
}
