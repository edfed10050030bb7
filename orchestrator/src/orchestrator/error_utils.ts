import type { Logger } from "pino";
import { CollectorError } from "@mention-pulse/collector";

export interface ErrorContext {
  readonly location: string;
  readonly platform?: string;
  readonly metadata?: Record<string, unknown>;
}

interface NormalisedError {
  readonly name: string;
  readonly message: string;
  readonly code?: string;
  readonly stack?: string;
  readonly cause?: unknown;
}

export function normaliseError(error: unknown): NormalisedError {
  if (error instanceof CollectorError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      stack: error.stack,
      // axios errors drag the whole request config along; keep only the message
      cause: error.cause instanceof Error ? error.cause.message : error.cause,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause,
    };
  }

  if (typeof error === "string") {
    return {
      name: "Error",
      message: error,
    };
  }

  return {
    name: "UnknownError",
    message: JSON.stringify(error, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)),
  };
}

export function errorMessage(error: unknown): string {
  return normaliseError(error).message;
}

export function logRecoverableError(logger: Logger, error: unknown, context: ErrorContext, message: string): void {
  logger.error(
    {
      error: normaliseError(error),
      context,
    },
    message
  );
}
