import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import type { LLMProvider } from "../config/models";
import { LLMProviderError, getErrorMessage } from "../utils/errorHandler";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export type LLMRequestOptions = {
  provider: LLMProvider;
  model: string;
  prompt: string;
  /** Base64 payload without the data: prefix. */
  imageBase64?: string;
  imageMimeType?: string;
  temperature?: number;
  maxTokens?: number;
  jsonResponse?: boolean;
};

export type LLMResponse = {
  text: string;
  provider: LLMProvider;
  model: string;
  latencyMs: number;
};

/**
 * The only seam between the engine and the model providers. Tests swap in
 * a stub that returns canned bodies or throws canned provider errors.
 */
export interface LLMClient {
  generateText(opts: LLMRequestOptions): Promise<LLMResponse>;
}

export type LLMClientConfig = {
  groqApiKey?: string;
  geminiApiKey?: string;
  timeoutMs: number;
};

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Normalizes SDK failures (APIError, connection errors, timeouts) to a
 * provider error carrying a rate-limit / http / transport kind.
 */
export function toProviderError(provider: LLMProvider, model: string, err: unknown): LLMProviderError {
  if (err instanceof LLMProviderError) return err;
  const status = statusOf(err);
  const message = getErrorMessage(err);
  if (status === 429) {
    return new LLMProviderError(provider, model, "rate_limit", message, status);
  }
  if (status !== undefined) {
    return new LLMProviderError(provider, model, "http", message, status);
  }
  return new LLMProviderError(provider, model, "transport", message);
}

export function createLLMClient(config: LLMClientConfig): LLMClient {
  let _groq: OpenAI | null = null;
  function getGroq(model: string): OpenAI {
    if (!_groq) {
      if (!config.groqApiKey) {
        throw new LLMProviderError("groq", model, "config", "GROQ_API_KEY is not set");
      }
      _groq = new OpenAI({
        apiKey: config.groqApiKey,
        baseURL: GROQ_BASE_URL,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
    }
    return _groq;
  }

  let _gemini: GoogleGenAI | null = null;
  function getGemini(model: string): GoogleGenAI {
    if (!_gemini) {
      if (!config.geminiApiKey) {
        throw new LLMProviderError("gemini", model, "config", "GEMINI_API_KEY is not set");
      }
      _gemini = new GoogleGenAI({
        apiKey: config.geminiApiKey,
        httpOptions: { timeout: config.timeoutMs },
      });
    }
    return _gemini;
  }

  async function callGroq(opts: LLMRequestOptions): Promise<string> {
    const client = getGroq(opts.model);
    const mimeType = opts.imageMimeType ?? "image/jpeg";

    const response = await client.chat.completions.create({
      model: opts.model,
      messages: [
        opts.imageBase64
          ? {
              role: "user",
              content: [
                { type: "text", text: opts.prompt },
                { type: "image_url", image_url: { url: `data:${mimeType};base64,${opts.imageBase64}` } },
              ],
            }
          : { role: "user", content: opts.prompt },
      ],
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
      ...(opts.jsonResponse && { response_format: { type: "json_object" as const } }),
    });

    return response.choices[0]?.message?.content ?? "";
  }

  async function callGemini(opts: LLMRequestOptions): Promise<string> {
    const client = getGemini(opts.model);

    const parts = opts.imageBase64
      ? [
          { text: opts.prompt },
          { inlineData: { mimeType: opts.imageMimeType ?? "image/jpeg", data: opts.imageBase64 } },
        ]
      : [{ text: opts.prompt }];

    const response = await client.models.generateContent({
      model: opts.model,
      contents: [{ role: "user", parts }],
      config: {
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
        ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
        ...(opts.jsonResponse && { responseMimeType: "application/json" }),
      },
    });

    return response.text ?? "";
  }

  return {
    async generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
      const started = Date.now();
      let text: string;
      try {
        switch (opts.provider) {
          case "groq":
            text = await callGroq(opts);
            break;
          case "gemini":
            text = await callGemini(opts);
            break;
          default: {
            const _exhaustive: never = opts.provider;
            throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
          }
        }
      } catch (err) {
        throw toProviderError(opts.provider, opts.model, err);
      }

      if (!text.trim()) {
        throw new LLMProviderError(opts.provider, opts.model, "empty", "provider returned an empty response");
      }

      return {
        text,
        provider: opts.provider,
        model: opts.model,
        latencyMs: Date.now() - started,
      };
    },
  };
}
