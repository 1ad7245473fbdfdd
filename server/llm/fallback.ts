/**
 * Model Fallback Chain
 *
 * Purpose:
 * Runs one tier of interchangeable model attempts in list order until one
 * succeeds. The fallover contract is a tiny state machine:
 *
 *   pending(i) --success--> success
 *   pending(i) --retry----> pending(i + 1)   (or exhausted when i is last)
 *
 * Attempts are strictly sequential; the list order encodes preference.
 *
 * Layer: LLM infrastructure
 */

import type { ModelAttempt } from "../config/models";
import { describeAttempt } from "../config/models";
import type { AttemptFailure } from "../utils/errorHandler";
import { getErrorMessage } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";

export type ChainState<T> =
  | { status: "pending"; index: number; failures: AttemptFailure[] }
  | { status: "success"; value: T; attempt: ModelAttempt; failures: AttemptFailure[] }
  | { status: "exhausted"; failures: AttemptFailure[] };

export type ChainResult<T> = Exclude<ChainState<T>, { status: "pending" }>;

export type AttemptOutcome<T> =
  | { status: "success"; value: T }
  | { status: "retry"; reason: string };

/**
 * Pure transition for a pending chain given the outcome of its current attempt.
 */
export function advanceChain<T>(
  tier: string,
  attempts: readonly ModelAttempt[],
  state: Extract<ChainState<T>, { status: "pending" }>,
  outcome: AttemptOutcome<T>,
): ChainState<T> {
  const attempt = attempts[state.index];
  if (!attempt) {
    return { status: "exhausted", failures: state.failures };
  }

  if (outcome.status === "success") {
    return { status: "success", value: outcome.value, attempt, failures: state.failures };
  }

  const failures = [...state.failures, { tier, model: attempt.model, reason: outcome.reason }];
  const nextIndex = state.index + 1;
  if (nextIndex >= attempts.length) {
    return { status: "exhausted", failures };
  }
  return { status: "pending", index: nextIndex, failures };
}

export type RunChainOptions = {
  tier: string;
  attempts: readonly ModelAttempt[];
  logger?: RequestLogger;
};

/**
 * Runs `run` against each attempt in order. Any thrown error counts as a
 * retry within the tier; the caller decides what exhaustion means.
 */
export async function runModelChain<T>(
  options: RunChainOptions,
  run: (attempt: ModelAttempt) => Promise<T>,
): Promise<ChainResult<T>> {
  const { tier, attempts, logger } = options;
  let state: ChainState<T> =
    attempts.length === 0
      ? { status: "exhausted", failures: [] }
      : { status: "pending", index: 0, failures: [] };

  while (state.status === "pending") {
    const attempt: ModelAttempt = attempts[state.index];
    const label = `${describeAttempt(attempt)} (${tier} ${state.index + 1}/${attempts.length})`;
    const started = Date.now();

    let outcome: AttemptOutcome<T>;
    try {
      outcome = { status: "success", value: await run(attempt) };
      logger?.info(`[Fallback] ${label} succeeded`, { tier, model: attempt.model, latencyMs: Date.now() - started });
    } catch (err) {
      const reason = getErrorMessage(err);
      outcome = { status: "retry", reason };
      logger?.warn(`[Fallback] ${label} failed, moving on`, { tier, model: attempt.model, error: reason });
    }

    state = advanceChain(tier, attempts, state, outcome);
  }

  if (state.status === "exhausted") {
    logger?.warn(`[Fallback] Tier "${tier}" exhausted`, { tier, attempts: state.failures.length });
  }
  return state;
}
