import { z } from "zod";

import { AnswerValue, ClarificationQuestion, ERROR_CODES, PHASES, type Phase } from "./envelope";

export type ActivePhase = Exclude<Phase, "completed" | "failed">;

export const CallPhase = z.enum(["analyzing", "clarifying", "generating"]);
export type CallPhase = z.infer<typeof CallPhase>;

export const TERMINAL_PHASES: ReadonlySet<Phase> = new Set(["completed", "failed"]);

export const PHASE_PERCENT: Record<Exclude<Phase, "error_recovery" | "failed">, number> = {
  intake: 0,
  analyzing: 10,
  clarifying: 25,
  generating: 50,
  delivering: 90,
  completed: 100,
};

export const ClarificationRound = z.object({
  round_number: z.number().int().min(1),
  questions: z.array(ClarificationQuestion),
  answers: z.record(z.string(), AnswerValue),
});
export type ClarificationRound = z.infer<typeof ClarificationRound>;

export const CollaboratorCall = z.object({
  call_id: z.string(),
  phase: CallPhase,
  agent: z.string(),
  attempt_number: z.number().int().min(1),
  started_at: z.string(),
  timeout_at: z.string(),
  outcome: z.enum(["pending", "success", "recoverable-failure", "fatal-failure"]),
});
export type CollaboratorCall = z.infer<typeof CollaboratorCall>;

const StoredResult = z.object({
  final: z.boolean(),
  agent: z.string().optional(),
  artifact: z.record(z.string(), z.unknown()),
  summary: z.string().optional(),
});

const StoredError = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  recoverable: z.boolean(),
});

export const Session = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  phase: z.enum(PHASES),
  created_at: z.string(),
  last_activity_at: z.string(),
  connection_state: z.enum(["attached", "suspended"]),
  request_text: z.string().nullable(),
  clarification_round_count: z.number().int().min(0),
  rounds: z.array(ClarificationRound),
  retry_count: z.number().int().min(0),
  // Phase being retried while in error_recovery.
  resume_phase: CallPhase.nullable(),
  pending_request: z
    .object({
      message_id: z.string(),
      text: z.string(),
      answers: z.record(z.string(), AnswerValue).optional(),
    })
    .nullable(),
  active_call: CollaboratorCall.nullable(),
  analysis: z
    .object({
      completeness: z.number(),
      agents: z.array(z.string()),
      notes: z.string().optional(),
    })
    .nullable(),
  degraded: z.boolean(),
  artifacts: z.record(z.string(), z.record(z.string(), z.unknown())),
  final_result: StoredResult.nullable(),
  result_delivered: z.boolean(),
  terminal_error: StoredError.nullable(),
  terminal_error_delivered: z.boolean(),
  accepted_message_ids: z.array(z.string()),
});
export type Session = z.infer<typeof Session>;

export function currentRound(session: Session): ClarificationRound | null {
  return session.rounds.at(-1) ?? null;
}

export function isRoundComplete(round: ClarificationRound): boolean {
  return round.questions
    .filter((question) => question.required)
    .every((question) => round.answers[question.question_id] !== undefined);
}

export function progressPercent(session: Pick<Session, "phase" | "resume_phase">): number {
  if (session.phase === "error_recovery") {
    return session.resume_phase ? PHASE_PERCENT[session.resume_phase] : 0;
  }
  if (session.phase === "failed") return 0;
  return PHASE_PERCENT[session.phase];
}
