import { NextRequest } from "next/server";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { middleware } from "../middleware";

const request = (method: string, origin?: string) =>
  new NextRequest("http://localhost/api/search", { method, headers: origin ? { origin } : {} });

beforeEach(() => {
  vi.stubEnv("CORS_ORIGINS", "http://localhost:3000,https://app.example");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("middleware", () => {
  it("answers preflight for an allowed origin", () => {
    const res = middleware(request("OPTIONS", "https://app.example"));

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("https://app.example");
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, DELETE, OPTIONS");
    expect(res.headers.get("access-control-allow-credentials")).toBe("true");
  });

  it("adds CORS headers to regular requests from allowed origins", () => {
    const res = middleware(request("POST", "http://localhost:3000"));

    expect(res.headers.get("access-control-allow-origin")).toBe("http://localhost:3000");
    expect(res.headers.get("vary")).toBe("Origin");
  });

  it("leaves other origins without CORS headers", () => {
    const preflight = middleware(request("OPTIONS", "https://evil.example"));
    expect(preflight.status).toBe(204);
    expect(preflight.headers.get("access-control-allow-origin")).toBeNull();

    expect(middleware(request("GET")).headers.get("access-control-allow-origin")).toBeNull();
  });
});
