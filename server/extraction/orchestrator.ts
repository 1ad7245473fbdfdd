/**
 * Extraction Orchestrator
 *
 * Purpose:
 * Turns one message (plus optional image) into a Classification by walking
 * the model tiers in order:
 *
 *   vision (image only) → text → fallback (second provider)
 *
 * Within a tier, rate limits, transport errors, bad status codes and
 * unparseable bodies all fall over to the next model. A clean
 * "unrecognized" from the text or fallback tier is a valid answer; from the
 * vision tier it is only provisional, since the image may be irrelevant.
 *
 * Layer: Extraction
 */

import type { AssignmentWithCourse, Course } from "@shared/schema";
import type { ModelAttempt, ModelTier, ModelTierTable } from "../config/models";
import { LLM_SAMPLING } from "../config/constants";
import { buildExtractionPrompt } from "../config/prompts";
import type { LLMClient } from "../llm/client";
import { runModelChain, type ChainResult } from "../llm/fallback";
import type { Clock } from "../utils/civilTime";
import { TierExhaustedError, type AttemptFailure } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";
import { describeClassification, parseClassificationText } from "./classification";
import type { Classification, MessageContext } from "./types";

export type ExtractionInput = {
  message: string;
  imageBase64?: string;
  imageMimeType?: string;
  courses: readonly Course[];
  activeAssignments: readonly AssignmentWithCourse[];
  context: MessageContext;
};

export type ExtractionDeps = {
  llm: LLMClient;
  tiers: ModelTierTable;
  clock: Clock;
  logger?: RequestLogger;
};

export type ExtractionResult = {
  classification: Classification;
  tier: ModelTier;
  model: string;
  failures: AttemptFailure[];
};

type TierRun = ChainResult<Classification>;

function runExtractionTier(
  tier: ModelTier,
  prompt: string,
  deps: ExtractionDeps,
  image?: { base64: string; mimeType?: string },
): Promise<TierRun> {
  return runModelChain({ tier, attempts: deps.tiers[tier], logger: deps.logger }, async (attempt: ModelAttempt) => {
    const response = await deps.llm.generateText({
      provider: attempt.provider,
      model: attempt.model,
      prompt,
      imageBase64: image?.base64,
      imageMimeType: image?.mimeType,
      temperature: LLM_SAMPLING.EXTRACTION.temperature,
      maxTokens: LLM_SAMPLING.EXTRACTION.maxTokens,
      jsonResponse: true,
    });
    return parseClassificationText(response.text);
  });
}

export async function extractClassification(input: ExtractionInput, deps: ExtractionDeps): Promise<ExtractionResult> {
  const { logger } = deps;
  const prompt = buildExtractionPrompt({
    message: input.message,
    courses: input.courses,
    activeAssignments: input.activeAssignments,
    context: input.context,
    now: deps.clock(),
  });

  logger?.startStage("extraction");
  logger?.info("[Extraction] Starting", {
    hasImage: Boolean(input.imageBase64),
    activeAssignments: input.activeAssignments.length,
    courses: input.courses.length,
  });

  // Failures from tiers that did not produce the final answer
  const failures: AttemptFailure[] = [];
  const done = (run: Extract<TierRun, { status: "success" }>, tier: ModelTier): ExtractionResult => {
    logger?.endStage("extraction");
    logger?.info(`[Extraction] ${describeClassification(run.value)}`, { tier, model: run.attempt.model });
    return { classification: run.value, tier, model: run.attempt.model, failures: [...failures, ...run.failures] };
  };

  // Tier 1: vision
  if (input.imageBase64) {
    const vision = await runExtractionTier("vision", prompt, deps, {
      base64: input.imageBase64,
      mimeType: input.imageMimeType,
    });

    if (vision.status === "success" && vision.value.type !== "unrecognized") {
      return done(vision, "vision");
    }

    if (vision.status === "success") {
      logger?.info("[Extraction] Vision says unrecognized, retrying text-only");

      const text = await runExtractionTier("text", prompt, deps);
      if (text.status === "success") {
        failures.push(...vision.failures);
        return done(text, "text");
      }
      const fallback = await runExtractionTier("fallback", prompt, deps);
      if (fallback.status === "success") {
        failures.push(...vision.failures, ...text.failures);
        return done(fallback, "fallback");
      }

      // Every text model failed; the vision verdict stands.
      failures.push(...text.failures, ...fallback.failures);
      return done(vision, "vision");
    }

    failures.push(...vision.failures);
  }

  // Tier 2: primary text
  const text = await runExtractionTier("text", prompt, deps);
  if (text.status === "success") return done(text, "text");
  failures.push(...text.failures);

  // Tier 3: second provider
  const fallback = await runExtractionTier("fallback", prompt, deps);
  if (fallback.status === "success") return done(fallback, "fallback");
  failures.push(...fallback.failures);

  logger?.endStage("extraction");
  logger?.error("[Extraction] All tiers exhausted", undefined, { attempts: failures.length });
  throw new TierExhaustedError("extraction", failures);
}
