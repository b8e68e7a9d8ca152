// lib/llm/client.ts
import type { LLMProvider } from "@/lib/config";
import { log } from "@/lib/logging/logger";
import { safeText } from "@/lib/server/http";

const OPENAI_CHAT_URL = "https://api.openai.com/v1/chat/completions";
const ANTHROPIC_MESSAGES_URL = "https://api.anthropic.com/v1/messages";
const ANTHROPIC_VERSION = "2023-06-01";

export class LLMConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LLMConfigError";
  }
}

export type LLMClientOptions = {
  provider: string;
  model: string;
  apiKey: string | undefined;
  maxTokens?: number;
  temperature?: number;
};

export type GenerateOptions = {
  maxTokens?: number;
  temperature?: number;
};

export type ModelInfo = {
  provider: LLMProvider;
  model: string;
  max_tokens: number;
  temperature: number;
};

function asProvider(raw: string): LLMProvider | null {
  const p = raw.toLowerCase();
  return p === "openai" || p === "anthropic" ? p : null;
}

function pick(obj: unknown, ...path: Array<string | number>): unknown {
  let cur: unknown = obj;
  for (const key of path) {
    if (!cur || typeof cur !== "object") return undefined;
    cur = Reflect.get(cur, key);
  }
  return cur;
}

/** Single-turn text generation against OpenAI or Anthropic over plain fetch. */
export class LLMClient {
  readonly provider: LLMProvider;
  readonly model: string;
  private readonly apiKey: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(opts: LLMClientOptions) {
    const provider = asProvider(opts.provider);
    if (!provider) {
      throw new LLMConfigError(`Unsupported provider: ${opts.provider}`);
    }
    if (!opts.apiKey) {
      throw new LLMConfigError(`API key required for ${opts.provider}`);
    }
    this.provider = provider;
    this.model = opts.model;
    this.apiKey = opts.apiKey;
    this.maxTokens = opts.maxTokens ?? 1000;
    this.temperature = opts.temperature ?? 0.1;
    log.info("llm.init", { provider, model: this.model });
  }

  async generate(prompt: string, opts?: GenerateOptions): Promise<string> {
    const maxTokens = opts?.maxTokens ?? this.maxTokens;
    const temperature = opts?.temperature ?? this.temperature;
    try {
      return this.provider === "openai"
        ? await this.generateOpenAI(prompt, maxTokens, temperature)
        : await this.generateAnthropic(prompt, maxTokens, temperature);
    } catch (err) {
      log.error("llm.generate.error", err, { provider: this.provider, model: this.model });
      throw err;
    }
  }

  getModelInfo(): ModelInfo {
    return {
      provider: this.provider,
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    };
  }

  private async generateOpenAI(prompt: string, maxTokens: number, temperature: number): Promise<string> {
    const resp = await fetch(OPENAI_CHAT_URL, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: maxTokens,
        temperature,
      }),
    });
    if (!resp.ok) {
      throw new Error(`LLM error ${resp.status}: ${await safeText(resp)}`);
    }
    const content = pick(await resp.json(), "choices", 0, "message", "content");
    if (typeof content !== "string") {
      throw new Error("Invalid chat completion response shape");
    }
    return content.trim();
  }

  private async generateAnthropic(prompt: string, maxTokens: number, temperature: number): Promise<string> {
    const resp = await fetch(ANTHROPIC_MESSAGES_URL, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: "user", content: prompt }],
      }),
    });
    if (!resp.ok) {
      throw new Error(`LLM error ${resp.status}: ${await safeText(resp)}`);
    }
    const text = pick(await resp.json(), "content", 0, "text");
    if (typeof text !== "string") {
      throw new Error("Invalid messages response shape");
    }
    return text.trim();
  }
}
