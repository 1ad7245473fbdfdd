/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for every model the bot may call. Each capability
 * maps to an ordered list of attempts; the first entry is preferred and the
 * rest are fallbacks tried in order when a call fails.
 *
 * TIERS:
 *
 * vision - Groq, multimodal
 *   Used only when the message carries an image.
 *
 * text - Groq, text-only
 *   Primary extraction tier.
 *
 * fallback - Gemini
 *   Second provider, used only after the Groq tiers are exhausted by errors.
 *
 * contextResolver - Groq, small and fast
 *   Pre-extraction hint pass (courses, parallel codes, deadline type).
 *
 * matching - Gemini
 *   Update-to-assignment resolution. Same chain as fallback, never the
 *   lightweight resolver models.
 */

export type LLMProvider = "groq" | "gemini";

export type ModelAttempt = {
  provider: LLMProvider;
  model: string;
};

export type ModelTier = "vision" | "text" | "fallback" | "contextResolver" | "matching";

export type ModelTierTable = Record<ModelTier, readonly ModelAttempt[]>;

export const GROQ_MODELS = {
  VISION_PRIMARY: "meta-llama/llama-4-scout-17b-16e-instruct",
  VISION_SECONDARY: "meta-llama/llama-4-maverick-17b-128e-instruct",
  TEXT_PRIMARY: "llama-3.3-70b-versatile",
  TEXT_SECONDARY: "mixtral-8x7b-32768",
  INSTANT: "llama-3.1-8b-instant",
} as const;

export const GEMINI_MODELS = {
  PREVIEW: "gemini-3-flash-preview",
  FLASH: "gemini-2.5-flash",
  FLASH_LITE: "gemini-2.5-flash-lite",
} as const;

const groq = (model: string): ModelAttempt => ({ provider: "groq", model });
const gemini = (model: string): ModelAttempt => ({ provider: "gemini", model });

const GEMINI_CHAIN = [gemini(GEMINI_MODELS.PREVIEW), gemini(GEMINI_MODELS.FLASH), gemini(GEMINI_MODELS.FLASH_LITE)];

export const MODEL_TIERS: ModelTierTable = {
  vision: [groq(GROQ_MODELS.VISION_PRIMARY), groq(GROQ_MODELS.VISION_SECONDARY)],
  text: [groq(GROQ_MODELS.TEXT_PRIMARY), groq(GROQ_MODELS.TEXT_SECONDARY)],
  fallback: GEMINI_CHAIN,
  contextResolver: [groq(GROQ_MODELS.TEXT_PRIMARY), groq(GROQ_MODELS.INSTANT)],
  matching: GEMINI_CHAIN,
};

export function describeAttempt(attempt: ModelAttempt): string {
  return `${attempt.provider}/${attempt.model}`;
}
