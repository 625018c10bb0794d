import { ZodError } from "zod";

import type { ErrorCode } from "../contracts/envelope";
import {
  CollaboratorError,
  CollaboratorUnavailableError,
  InvariantViolationError,
} from "./collaborator_errors";

export type FailureClass = "recoverable" | "fatal";

export type ClassifiedFailure = {
  classification: FailureClass;
  code: ErrorCode;
  message: string;
  retryAfterMs?: number;
};

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "EHOSTUNREACH",
]);

function errnoCode(value: unknown): string | null {
  if (!value || typeof value !== "object") return null;
  const code = Reflect.get(value, "code");
  return typeof code === "string" ? code : null;
}

function isTransientNetworkError(error: unknown, depth = 0): boolean {
  if (depth > 3 || !(error instanceof Error)) return false;
  const code = errnoCode(error);
  if (code && (TRANSIENT_NETWORK_CODES.has(code) || code.startsWith("UND_ERR_"))) return true;
  // undici reports socket failures as TypeError("fetch failed") with the errno on `cause`.
  return isTransientNetworkError(error.cause, depth + 1);
}

function describe(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * Map any thrown value to recoverable or fatal.
 *
 * Unknown error classes are fatal: a retry loop must never hide a structural bug.
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  if (error instanceof CollaboratorError) {
    const retryAfterMs = error instanceof CollaboratorUnavailableError ? error.retryAfterMs : undefined;
    return {
      classification: error.retryable ? "recoverable" : "fatal",
      code: error.code,
      message: error.message,
      ...(typeof retryAfterMs === "number" ? { retryAfterMs } : {}),
    };
  }

  if (error instanceof InvariantViolationError) {
    return { classification: "fatal", code: error.code, message: error.message };
  }

  if (error instanceof ZodError) {
    return { classification: "fatal", code: "contract_violation", message: describe(error) };
  }

  if (error instanceof Error && error.name === "TimeoutError") {
    return { classification: "recoverable", code: "collaborator_timeout", message: describe(error) };
  }

  if (isTransientNetworkError(error)) {
    return { classification: "recoverable", code: "collaborator_unavailable", message: describe(error) };
  }

  return { classification: "fatal", code: "unknown_error", message: describe(error) };
}
