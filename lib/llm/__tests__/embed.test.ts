import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { embedText, embedTexts } from "../embed";

beforeEach(() => {
  vi.stubEnv("EMBEDDING_API_KEY", "test-secret");
  vi.stubEnv("EMBEDDING_MODEL", "test-embed-model");
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});

const okResponse = (payload: unknown) => ({
  ok: true,
  status: 200,
  statusText: "OK",
  json: async () => payload,
  text: async () => JSON.stringify(payload),
});

describe("embedTexts", () => {
  it("skips the network for empty input", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(embedTexts([])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("posts the batch and orders vectors by index", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      okResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const vectors = await embedTexts(["first", "second"]);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/embeddings");
    expect(init.headers.Authorization).toBe("Bearer test-secret");
    expect(JSON.parse(init.body)).toEqual({ model: "test-embed-model", input: ["first", "second"] });
  });

  it("falls back to OPENAI_API_KEY", async () => {
    vi.stubEnv("EMBEDDING_API_KEY", "");
    vi.stubEnv("OPENAI_API_KEY", "openai-placeholder");
    const fetchMock = vi.fn().mockResolvedValue(okResponse({ data: [{ index: 0, embedding: [0.5] }] }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(embedText("hi")).resolves.toEqual([0.5]);
    expect(fetchMock.mock.calls[0][1].headers.Authorization).toBe("Bearer openai-placeholder");
  });

  it("fails without any key", async () => {
    vi.stubEnv("EMBEDDING_API_KEY", "");
    vi.stubEnv("OPENAI_API_KEY", "");
    vi.stubGlobal("fetch", vi.fn());

    await expect(embedTexts(["x"])).rejects.toThrow("Missing EMBEDDING_API_KEY");
  });

  it("surfaces upstream errors with status and body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: false,
        status: 401,
        statusText: "Unauthorized",
        text: async () => "bad key",
      })
    );

    await expect(embedTexts(["x"])).rejects.toThrow("Embedding failed: 401 Unauthorized — bad key");
  });

  it("rejects a response with the wrong number of vectors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(okResponse({ data: [{ index: 0, embedding: [1] }] })));

    await expect(embedTexts(["a", "b"])).rejects.toThrow("Invalid embedding response shape");
  });
});
