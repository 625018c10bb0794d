import type { ErrorCode } from "../contracts/envelope";

export type CollaboratorErrorCode = Extract<
  ErrorCode,
  | "collaborator_timeout"
  | "collaborator_unavailable"
  | "collaborator_inconsistent"
  | "contract_violation"
  | "invariant_violation"
  | "cancelled"
>;

export class CollaboratorError extends Error {
  public readonly code: CollaboratorErrorCode;
  public readonly retryable: boolean;
  public readonly collaborator?: string;

  constructor(
    message: string,
    args: { code: CollaboratorErrorCode; retryable: boolean; collaborator?: string; cause?: unknown }
  ) {
    super(message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "CollaboratorError";
    this.code = args.code;
    this.retryable = args.retryable;
    this.collaborator = args.collaborator;
  }
}

export class CollaboratorTimeoutError extends CollaboratorError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, collaborator?: string) {
    super(`Collaborator call exceeded ${timeoutMs}ms`, {
      code: "collaborator_timeout",
      retryable: true,
      collaborator,
    });
    this.name = "CollaboratorTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CollaboratorUnavailableError extends CollaboratorError {
  public readonly statusCode?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    args: { statusCode?: number; retryAfterMs?: number; collaborator?: string; cause?: unknown } = {}
  ) {
    super(message, { code: "collaborator_unavailable", retryable: true, ...args });
    this.name = "CollaboratorUnavailableError";
    this.statusCode = args.statusCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

/** The collaborator answered, but with state it reports as temporarily inconsistent. */
export class CollaboratorInconsistencyError extends CollaboratorError {
  constructor(message: string, collaborator?: string) {
    super(message, { code: "collaborator_inconsistent", retryable: true, collaborator });
    this.name = "CollaboratorInconsistencyError";
  }
}

export class CollaboratorContractError extends CollaboratorError {
  public readonly statusCode?: number;

  constructor(message: string, args: { statusCode?: number; collaborator?: string; cause?: unknown } = {}) {
    super(message, { code: "contract_violation", retryable: false, ...args });
    this.name = "CollaboratorContractError";
    this.statusCode = args.statusCode;
  }
}

export class CollaboratorCancelledError extends CollaboratorError {
  constructor(collaborator?: string) {
    super("Collaborator call cancelled", { code: "cancelled", retryable: false, collaborator });
    this.name = "CollaboratorCancelledError";
  }
}

export class InvariantViolationError extends Error {
  public readonly code = "invariant_violation" as const;

  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}
