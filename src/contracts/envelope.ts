import { randomUUID } from "node:crypto";

import { z } from "zod";

export const ENVELOPE_TYPES = ["control", "input", "question", "progress", "result", "error"] as const;
export type EnvelopeType = (typeof ENVELOPE_TYPES)[number];

export const CONTROL_ACTIONS = ["start", "cancel", "ping", "pong", "resume", "close", "ack"] as const;
export type ControlAction = (typeof CONTROL_ACTIONS)[number];

export const DEFAULT_MAX_INPUT_CHARS = 5_000;

export const PHASES = [
  "intake",
  "analyzing",
  "clarifying",
  "generating",
  "delivering",
  "completed",
  "error_recovery",
  "failed",
] as const;
export type Phase = (typeof PHASES)[number];

export const QUESTION_KINDS = ["text", "choice", "multi_choice", "scale"] as const;
export type QuestionKind = (typeof QUESTION_KINDS)[number];

export const AnswerValue = z.union([z.string(), z.number(), z.array(z.string())]);
export type AnswerValue = z.infer<typeof AnswerValue>;

export const ClarificationQuestion = z.object({
  question_id: z.string().min(1),
  prompt: z.string().min(1),
  kind: z.enum(QUESTION_KINDS),
  required: z.boolean().default(true),
  options: z.array(z.string().min(1)).optional(),
});
export type ClarificationQuestion = z.infer<typeof ClarificationQuestion>;

export const ERROR_CODES = [
  "invalid_json",
  "invalid_envelope",
  "unexpected_type",
  "session_not_found",
  "queue_full",
  "rate_limited",
  "validation_failed",
  "invalid_phase",
  "collaborator_timeout",
  "collaborator_unavailable",
  "collaborator_inconsistent",
  "contract_violation",
  "invariant_violation",
  "unknown_error",
  "retries_exhausted",
  "cancelled",
] as const;
export type ErrorCode = (typeof ERROR_CODES)[number];

export const ControlPayload = z
  .object({
    action: z.enum(CONTROL_ACTIONS),
    // Only meaningful on `start`: the initial request, when the client sends it up front.
    text: z.string().min(1).optional(),
  })
  .strict();
export type ControlPayload = z.infer<typeof ControlPayload>;

const makeInputPayload = (maxInputChars: number) =>
  z
    .object({
      text: z.string().max(maxInputChars),
      answers: z.record(z.string().min(1), AnswerValue).optional(),
    })
    .strict();
export type InputPayload = z.infer<ReturnType<typeof makeInputPayload>>;

export type QuestionPayload = {
  round_number: number;
  questions: ClarificationQuestion[];
};

export type ProgressPayload = {
  phase: Phase;
  percent_complete: number;
  degraded?: boolean;
  attempt?: number;
};

export type ResultPayload = {
  final: boolean;
  agent?: string;
  artifact: Record<string, unknown>;
  summary?: string;
};

export type ErrorPayload = {
  code: ErrorCode;
  message: string;
  recoverable: boolean;
};

type EnvelopeBase = {
  message_id: string;
  timestamp: string;
  session_id: string | null;
};

export type ControlEnvelope = EnvelopeBase & { type: "control"; payload: ControlPayload };
export type InputEnvelope = EnvelopeBase & { type: "input"; session_id: string; payload: InputPayload };
export type QuestionEnvelope = EnvelopeBase & { type: "question"; session_id: string; payload: QuestionPayload };
export type ProgressEnvelope = EnvelopeBase & { type: "progress"; session_id: string; payload: ProgressPayload };
export type ResultEnvelope = EnvelopeBase & { type: "result"; session_id: string; payload: ResultPayload };
export type ErrorEnvelope = EnvelopeBase & { type: "error"; payload: ErrorPayload };

export type InboundEnvelope = ControlEnvelope | InputEnvelope;
export type OutboundEnvelope =
  | ControlEnvelope
  | QuestionEnvelope
  | ProgressEnvelope
  | ResultEnvelope
  | ErrorEnvelope;

const EnvelopeHeader = z.object({
  message_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  session_id: z.string().min(1).nullable(),
  type: z.enum(ENVELOPE_TYPES),
  payload: z.record(z.string(), z.unknown()),
});

const OUTBOUND_ONLY: ReadonlySet<EnvelopeType> = new Set(["question", "progress", "result", "error"]);

export type EnvelopeDecodeFailure = {
  ok: false;
  code: Extract<ErrorCode, "invalid_json" | "invalid_envelope" | "unexpected_type">;
  message: string;
  // Echoed back on the error envelope when the header was readable.
  sessionId: string | null;
};

export type EnvelopeDecodeResult = { ok: true; envelope: InboundEnvelope } | EnvelopeDecodeFailure;

function describeIssue(error: z.ZodError, prefix?: string): string {
  const issue = error.issues[0];
  if (!issue) return "validation_failed";
  const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

function readSessionId(value: unknown): string | null {
  if (!value || typeof value !== "object") return null;
  const sessionId = Reflect.get(value, "session_id");
  return typeof sessionId === "string" && sessionId.length > 0 ? sessionId : null;
}

/**
 * Structural validation of one inbound frame.
 *
 * Checks the header, rejects outbound-only types, then validates the payload
 * against the shape its `type` demands. Business rules (phase, answers) are
 * not checked here.
 */
export function decodeEnvelope(
  raw: string,
  opts: { maxInputChars?: number } = {}
): EnvelopeDecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, code: "invalid_json", message: "Frame is not valid JSON", sessionId: null };
  }

  const sessionId = readSessionId(json);
  const header = EnvelopeHeader.safeParse(json);
  if (!header.success) {
    return { ok: false, code: "invalid_envelope", message: describeIssue(header.error), sessionId };
  }

  const { type, payload, ...base } = header.data;
  if (OUTBOUND_ONLY.has(type)) {
    return {
      ok: false,
      code: "unexpected_type",
      message: `type: '${type}' is emitted by the server only`,
      sessionId,
    };
  }

  if (type === "control") {
    const parsed = ControlPayload.safeParse(payload);
    if (!parsed.success) {
      return { ok: false, code: "invalid_envelope", message: describeIssue(parsed.error, "payload"), sessionId };
    }
    const maxChars = opts.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
    if (parsed.data.text !== undefined && parsed.data.text.length > maxChars) {
      return {
        ok: false,
        code: "invalid_envelope",
        message: `payload.text: must be at most ${maxChars} characters`,
        sessionId,
      };
    }
    return { ok: true, envelope: { ...base, type, payload: parsed.data } };
  }

  if (base.session_id === null) {
    return {
      ok: false,
      code: "invalid_envelope",
      message: "session_id: required for input envelopes",
      sessionId,
    };
  }

  const parsed = makeInputPayload(opts.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS).safeParse(payload);
  if (!parsed.success) {
    return { ok: false, code: "invalid_envelope", message: describeIssue(parsed.error, "payload"), sessionId };
  }
  return { ok: true, envelope: { ...base, session_id: base.session_id, type: "input", payload: parsed.data } };
}

const envelopeBase = (sessionId: string | null): EnvelopeBase => ({
  message_id: randomUUID(),
  timestamp: new Date().toISOString(),
  session_id: sessionId,
});

export const buildControlEnvelope = (sessionId: string | null, action: ControlAction): ControlEnvelope => ({
  ...envelopeBase(sessionId),
  type: "control",
  payload: { action },
});

export const buildProgressEnvelope = (sessionId: string, payload: ProgressPayload): ProgressEnvelope => ({
  ...envelopeBase(sessionId),
  session_id: sessionId,
  type: "progress",
  payload,
});

export const buildQuestionEnvelope = (sessionId: string, payload: QuestionPayload): QuestionEnvelope => ({
  ...envelopeBase(sessionId),
  session_id: sessionId,
  type: "question",
  payload,
});

export const buildResultEnvelope = (sessionId: string, payload: ResultPayload): ResultEnvelope => ({
  ...envelopeBase(sessionId),
  session_id: sessionId,
  type: "result",
  payload,
});

export const buildErrorEnvelope = (sessionId: string | null, payload: ErrorPayload): ErrorEnvelope => ({
  ...envelopeBase(sessionId),
  type: "error",
  payload,
});
