import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { log } from "../logger";

beforeEach(() => {
  vi.stubEnv("LOG_LEVEL", "info");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("log", () => {
  it("writes one JSON line per event", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);

    log.info("store.created", { path: "/tmp/idx.json" });

    expect(out).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(out.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "info", event: "store.created", path: "/tmp/idx.json" });
    expect(typeof line.ts).toBe("string");
  });

  it("drops events below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    log.debug("noise");
    log.info("noise");
    log.warn("store.load_failed", { reason: "bad json" });

    expect(out).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("records the error message", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);

    log.error("rag.search.error", new Error("boom"), { reqId: "r1" });

    expect(JSON.parse(String(err.mock.calls[0][0]))).toMatchObject({
      level: "error",
      event: "rag.search.error",
      reqId: "r1",
      error: "boom",
    });
  });

  it("survives payloads that cannot be serialized", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    log.info("weird", circular);

    expect(JSON.parse(String(out.mock.calls[0][0]))).toMatchObject({
      event: "weird",
      note: "unserializable payload",
    });
  });
});
