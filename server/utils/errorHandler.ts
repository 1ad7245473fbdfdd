import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

export type ProviderFailureKind = "rate_limit" | "http" | "transport" | "empty" | "config";

/**
 * A single model call failed at the provider boundary.
 * Always retryable within the tier.
 */
export class LLMProviderError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  provider: string;
  model: string;
  kind: ProviderFailureKind;
  status?: number;
  constructor(provider: string, model: string, kind: ProviderFailureKind, message: string, status?: number) {
    super(`${provider}/${model} ${kind}: ${message}`);
    this.name = "LLMProviderError";
    this.provider = provider;
    this.model = model;
    this.kind = kind;
    this.status = status;
    if (kind === "rate_limit") this.statusCode = 429;
  }
}

/**
 * The model answered, but the body was not a usable JSON object
 * for the expected schema. Retryable within the tier.
 */
export class ResponseFormatError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  rawText: string;
  constructor(message: string, rawText: string) {
    super(message);
    this.name = "ResponseFormatError";
    this.rawText = rawText;
  }
}

export type AttemptFailure = {
  tier: string;
  model: string;
  reason: string;
};

/**
 * Every model in every applicable tier failed for one request.
 */
export class TierExhaustedError extends Error implements AppError {
  statusCode = 503;
  isOperational = true;
  code = "tier_exhausted";
  failures: AttemptFailure[];
  constructor(operation: string, failures: AttemptFailure[]) {
    super(`${operation}: all model tiers exhausted after ${failures.length} attempt(s)`);
    this.name = "TierExhaustedError";
    this.failures = failures;
  }
}

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

/** The slice of an Express response the error helpers write to. */
export type JsonResponder = { status(code: number): { json(body: unknown): unknown } };

export function handleRouteError(res: JsonResponder, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

/**
 * Terminal Express error middleware. Registered after all routes.
 */
export function errorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  handleRouteError(res, err, "HTTP");
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export interface ClassifiedError {
  type: "tier_exhausted" | "rate_limit" | "config" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

/**
 * Maps a pipeline failure to a user-facing reply. The user always gets a
 * next step, never the internal error text.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);
  const stack = err instanceof Error ? err.stack : undefined;
  const errorCode =
    err instanceof TierExhaustedError ? err.code : hasStatusCode(err) ? err.statusCode : undefined;

  if (err instanceof TierExhaustedError) {
    return {
      type: "tier_exhausted",
      userMessage:
        "⚠️ Bot lagi kewalahan, semua model AI sedang tidak tersedia.\n_Kirim ulang pesan tugasnya beberapa menit lagi ya._",
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof LLMProviderError && err.kind === "rate_limit") {
    return {
      type: "rate_limit",
      userMessage: "⚠️ Bot sedang dibatasi (rate limit).\n_Kirim ulang pesannya beberapa menit lagi ya._",
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof LLMProviderError && err.kind === "config") {
    return {
      type: "config",
      userMessage: "⚠️ Konfigurasi AI bot bermasalah. Hubungi admin bot ya.",
      errorMessage, errorCode, stack,
    };
  }

  return {
    type: "internal",
    userMessage: "❌ Maaf, terjadi kesalahan saat memproses pesan.\n_Coba kirim ulang sebentar lagi ya._",
    errorMessage, errorCode, stack,
  };
}
