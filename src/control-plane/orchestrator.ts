import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";

import {
  buildErrorEnvelope,
  buildProgressEnvelope,
  buildQuestionEnvelope,
  buildResultEnvelope,
  type AnswerValue,
  type ClarificationQuestion,
  type ErrorPayload,
  type InputEnvelope,
  type OutboundEnvelope,
  type Phase,
  type ResultPayload,
} from "../contracts/envelope";
import {
  currentRound,
  isRoundComplete,
  progressPercent,
  TERMINAL_PHASES,
  type CallPhase,
  type CollaboratorCall,
  type Session,
} from "../contracts/session";
import type { Logger } from "../logger";
import type { SessionStore } from "../store/session_store";
import { MAX_REMEMBERED_MESSAGE_IDS } from "../store/session_store";
import type {
  AnalysisResult,
  CollaboratorGateway,
  CollaboratorRequest,
  GatewayResult,
  GenerationResult,
  InvokeOptions,
} from "./collaborator_gateway";
import { InvariantViolationError } from "./collaborator_errors";
import { classifyFailure } from "./error_classifier";
import { decideRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry_policy";
import { SessionLocks } from "./session_locks";

/** Where outbound envelopes go. False means nothing received it. */
export interface Outbox {
  deliver(sessionId: string, envelope: OutboundEnvelope): boolean;
  release(sessionId: string): void;
}

export type WorkflowLimits = {
  maxClarificationRounds: number;
  completenessThreshold: number;
  collaboratorTimeoutMs: number;
};

export const DEFAULT_WORKFLOW_LIMITS: WorkflowLimits = {
  maxClarificationRounds: 3,
  completenessThreshold: 0.7,
  collaboratorTimeoutMs: 30_000,
};

export const DEFAULT_AGENT = "content";
const ANALYST_AGENT = "analyst";

export type OrchestratorOptions = {
  store: SessionStore;
  gateway: CollaboratorGateway;
  outbox: Outbox;
  log: Logger;
  limits?: Partial<WorkflowLimits>;
  retry?: Partial<RetryPolicy>;
  idleTtlMs?: number;
  sleepImpl?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => Date;
};

type CallResolution<R> = { status: "applied"; value: R } | { status: "stopped" };

type InputAction = "none" | "analyze" | "reanalyze";
type AnalysisAction = "generate" | "await_answers" | "stop";

const defaultSleep = async (ms: number, signal: AbortSignal) => {
  await sleep(ms, undefined, { signal });
};

function sameAnswer(a: AnswerValue | undefined, b: AnswerValue): boolean {
  if (a === undefined) return false;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, index) => value === b[index]);
  }
  return a === b;
}

function checkAnswer(question: ClarificationQuestion, answer: AnswerValue): string | null {
  const options = question.options ?? [];
  switch (question.kind) {
    case "text":
      return typeof answer === "string" && answer.trim().length > 0 ? null : "expected non-empty text";
    case "choice":
      if (typeof answer !== "string") return "expected one option";
      return options.length === 0 || options.includes(answer) ? null : `'${answer}' is not an option`;
    case "multi_choice":
      if (!Array.isArray(answer) || answer.length === 0) return "expected a non-empty list of options";
      return options.length === 0 || answer.every((value) => options.includes(value))
        ? null
        : "list contains an unknown option";
    case "scale":
      return typeof answer === "number" && Number.isInteger(answer) && answer >= 1 && answer <= 10
        ? null
        : "expected an integer from 1 to 10";
  }
}

function collectAnswers(session: Session): Record<string, AnswerValue> {
  const answers: Record<string, AnswerValue> = {};
  for (const round of session.rounds) Object.assign(answers, round.answers);
  return answers;
}

export class WorkflowOrchestrator {
  private readonly store: SessionStore;
  private readonly gateway: CollaboratorGateway;
  private readonly outbox: Outbox;
  private readonly log: Logger;
  private readonly limits: WorkflowLimits;
  private readonly retryPolicy: RetryPolicy;
  private readonly idleTtlMs: number | null;
  private readonly sleepImpl: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private readonly locks = new SessionLocks();
  private readonly inflight = new Map<string, AbortController>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(opts: OrchestratorOptions) {
    this.store = opts.store;
    this.gateway = opts.gateway;
    this.outbox = opts.outbox;
    this.log = opts.log;
    this.limits = { ...DEFAULT_WORKFLOW_LIMITS, ...opts.limits };
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.idleTtlMs = opts.idleTtlMs ?? null;
    this.sleepImpl = opts.sleepImpl ?? defaultSleep;
    this.now = opts.now ?? (() => new Date());
  }

  async getSession(sessionId: string): Promise<Session | null> {
    return this.store.get(sessionId);
  }

  async createSession(userId: string): Promise<Session> {
    const session = await this.store.create({ userId });
    this.log.info({ sessionId: session.id, userId }, "session.created");
    return session;
  }

  /** Announce a freshly created session on its connection. */
  async announce(sessionId: string): Promise<void> {
    await this.mutate(sessionId, (session) => {
      this.emitProgress(session);
    });
  }


  async handleInput(envelope: Pick<InputEnvelope, "message_id" | "session_id" | "payload">): Promise<void> {
    const sessionId = envelope.session_id;
    const accepted = await this.mutate(sessionId, (session) => this.acceptInput(session, envelope));
    if (!accepted) {
      this.log.debug({ sessionId }, "workflow.input_for_missing_session");
      return;
    }

    if (accepted.value === "analyze") {
      await this.runAnalysis(sessionId, "analyzing");
    } else if (accepted.value === "reanalyze") {
      await this.runAnalysis(sessionId, "clarifying");
    }
  }

  private acceptInput(
    session: Session,
    envelope: Pick<InputEnvelope, "message_id" | "payload">
  ): InputAction {
    const log = { sessionId: session.id, messageId: envelope.message_id, phase: session.phase };

    if (session.phase === "failed") {
      this.log.warn(log, "workflow.input_ignored_failed");
      return "none";
    }
    if (session.accepted_message_ids.includes(envelope.message_id)) {
      this.log.debug(log, "workflow.duplicate_message_ignored");
      return "none";
    }
    session.accepted_message_ids.push(envelope.message_id);
    if (session.accepted_message_ids.length > MAX_REMEMBERED_MESSAGE_IDS) {
      session.accepted_message_ids.splice(0, session.accepted_message_ids.length - MAX_REMEMBERED_MESSAGE_IDS);
    }

    const { text, answers } = envelope.payload;

    switch (session.phase) {
      case "intake": {
        if (text.trim().length === 0) {
          this.emitValidationError(session, "validation_failed", "text: initial request must not be empty");
          return "none";
        }
        session.request_text = text;
        session.pending_request = { message_id: envelope.message_id, text };
        this.advance(session, "analyzing");
        return "analyze";
      }

      case "clarifying":
        return this.acceptAnswers(session, envelope.message_id, text, answers ?? {});

      case "delivering":
      case "completed":
        if (answers && this.isResubmission(session, answers)) {
          this.log.debug({ ...log, answers: Object.keys(answers).length }, "workflow.resubmitted_answers_ignored");
          return "none";
        }
        this.emitValidationError(session, "invalid_phase", `session is ${session.phase}; no input is expected`);
        return "none";

      default:
        this.emitValidationError(session, "invalid_phase", `session is ${session.phase}; input is not accepted now`);
        return "none";
    }
  }

  private acceptAnswers(
    session: Session,
    messageId: string,
    text: string,
    answers: Record<string, AnswerValue>
  ): InputAction {
    const round = currentRound(session);
    if (!round) {
      // clarifying without a round is a broken state, not a client mistake.
      const failure = classifyFailure(new InvariantViolationError("clarifying phase without an open round"));
      this.failSession(session, { code: failure.code, message: failure.message, recoverable: false });
      return "none";
    }

    const entries = Object.entries(answers);
    if (entries.length === 0) {
      this.emitValidationError(session, "validation_failed", `answers: required for round ${round.round_number}`);
      return "none";
    }

    // Validate everything before touching the round.
    const fresh: Array<[string, AnswerValue]> = [];
    for (const [questionId, answer] of entries) {
      const question = round.questions.find((candidate) => candidate.question_id === questionId);
      if (!question) {
        if (this.isResubmission(session, { [questionId]: answer })) continue;
        this.emitValidationError(session, "validation_failed", `answers.${questionId}: unknown question`);
        return "none";
      }
      const problem = checkAnswer(question, answer);
      if (problem) {
        this.emitValidationError(session, "validation_failed", `answers.${questionId}: ${problem}`);
        return "none";
      }
      if (!sameAnswer(round.answers[questionId], answer)) fresh.push([questionId, answer]);
    }

    if (fresh.length === 0) {
      this.log.debug({ sessionId: session.id, round: round.round_number }, "workflow.resubmitted_answers_ignored");
      return "none";
    }

    for (const [questionId, answer] of fresh) {
      round.answers[questionId] = answer;
    }

    if (!isRoundComplete(round)) {
      this.log.info(
        {
          sessionId: session.id,
          round: round.round_number,
          answered: Object.keys(round.answers).length,
          questions: round.questions.length,
        },
        "workflow.round_partial"
      );
      this.emitProgress(session);
      return "none";
    }

    session.pending_request = { message_id: messageId, text, answers: { ...round.answers } };
    this.log.info({ sessionId: session.id, round: round.round_number }, "workflow.round_complete");
    return "reanalyze";
  }

  private isResubmission(session: Session, answers: Record<string, AnswerValue>): boolean {
    const recorded = collectAnswers(session);
    return Object.entries(answers).every(([questionId, answer]) => sameAnswer(recorded[questionId], answer));
  }


  private async runAnalysis(sessionId: string, phase: "analyzing" | "clarifying"): Promise<void> {
    const resolution = await this.runCall<AnalysisResult, AnalysisAction>(
      sessionId,
      phase,
      ANALYST_AGENT,
      (request, opts) => this.gateway.analyze(request, opts),
      (session, analysis) => this.applyAnalysis(session, analysis)
    );

    if (resolution.status === "applied" && resolution.value === "generate") {
      await this.runGeneration(sessionId);
    }
  }

  private applyAnalysis(session: Session, analysis: AnalysisResult): AnalysisAction {
    session.pending_request = null;
    session.analysis = {
      completeness: analysis.completeness,
      agents: analysis.agents,
      ...(analysis.notes ? { notes: analysis.notes } : {}),
    };

    const log = {
      sessionId: session.id,
      completeness: analysis.completeness,
      threshold: this.limits.completenessThreshold,
      rounds: session.clarification_round_count,
    };

    if (analysis.completeness >= this.limits.completenessThreshold) {
      this.log.info(log, "workflow.analysis_sufficient");
      this.advance(session, "generating");
      return "generate";
    }

    if (analysis.questions.length === 0) {
      this.failSession(session, {
        code: "contract_violation",
        message: "analysis reported an underspecified request without questions",
        recoverable: false,
      });
      return "stop";
    }

    if (session.clarification_round_count >= this.limits.maxClarificationRounds) {
      session.degraded = true;
      this.log.warn(log, "workflow.degraded_transition");
      this.advance(session, "generating");
      return "generate";
    }

    session.clarification_round_count += 1;
    const round = {
      round_number: session.clarification_round_count,
      questions: analysis.questions,
      answers: {},
    };
    session.rounds.push(round);
    this.advance(session, "clarifying");
    this.emit(session, buildQuestionEnvelope(session.id, { round_number: round.round_number, questions: round.questions }));
    return "await_answers";
  }

  private async runGeneration(sessionId: string): Promise<void> {
    const session = await this.store.get(sessionId);
    if (!session || session.phase !== "generating") return;

    const agents = session.analysis?.agents.length ? session.analysis.agents : [DEFAULT_AGENT];
    const assembled = agents.length > 1;

    for (const agent of agents) {
      const resolution = await this.runCall<GenerationResult, true>(
        sessionId,
        "generating",
        agent,
        (request, opts) => this.gateway.generate(request, opts),
        (current, generation) => {
          current.artifacts[agent] = generation.artifact;
          this.emit(
            current,
            buildResultEnvelope(current.id, {
              final: false,
              agent,
              artifact: generation.artifact,
              ...(generation.summary ? { summary: generation.summary } : {}),
            })
          );
          return true;
        }
      );
      if (resolution.status === "stopped") return;
    }

    await this.mutate(sessionId, (current) => {
      if (current.phase !== "generating") return;
      // One agent: its artifact is the result. Several: keyed by agent.
      const artifact = assembled ? { ...current.artifacts } : current.artifacts[agents[0] ?? DEFAULT_AGENT] ?? {};
      const result: ResultPayload = {
        final: true,
        artifact,
        ...(current.degraded ? { summary: "generated with best-effort defaults" } : {}),
      };
      current.final_result = result;
      this.advance(current, "delivering");
      this.deliverResult(current);
    });
  }

  /**
   * One logical collaborator call with bounded retries.
   *
   * Every state change happens under the session lock. An outcome is applied
   * only while the call is still the session's active call; anything else
   * (cancel, destroy, a newer call) makes it a late result and it is dropped.
   */
  private async runCall<T, R>(
    sessionId: string,
    phase: CallPhase,
    agent: string,
    invoke: (request: CollaboratorRequest, opts: InvokeOptions) => Promise<GatewayResult<T>>,
    apply: (session: Session, value: T) => R
  ): Promise<CallResolution<R>> {
    let attempt = 1;

    for (;;) {
      const signal = this.signalFor(sessionId);
      const started = await this.mutate(sessionId, (session) => {
        if (TERMINAL_PHASES.has(session.phase)) return null;
        if (session.phase === "error_recovery") {
          session.phase = phase;
          session.resume_phase = null;
          this.log.info({ sessionId, phase, agent, attempt }, "workflow.retry_resumed");
        }
        const startedAt = this.now();
        const call: CollaboratorCall = {
          call_id: randomUUID(),
          phase,
          agent,
          attempt_number: attempt,
          started_at: startedAt.toISOString(),
          timeout_at: new Date(startedAt.getTime() + this.limits.collaboratorTimeoutMs).toISOString(),
          outcome: "pending",
        };
        session.active_call = call;
        return { call, request: this.buildRequest(session, phase, agent, attempt) };
      });
      if (!started?.value) return { status: "stopped" };

      const { call, request } = started.value;
      this.log.debug(
        { sessionId, phase, agent, attempt, callId: call.call_id, collaborator: this.gateway.collaboratorName },
        "collaborator.call_started"
      );
      const result = await invoke(request, { timeoutMs: this.limits.collaboratorTimeoutMs, signal });

      const settled = await this.mutate(sessionId, (session) => {
        if (session.phase === "failed" || session.active_call?.call_id !== call.call_id) {
          this.log.info({ sessionId, callId: call.call_id, phase: session.phase }, "collaborator.late_result_discarded");
          return { kind: "stop" as const };
        }

        if (result.ok) {
          session.active_call = null;
          // The next call (another agent, or the next phase) gets a fresh budget.
          session.retry_count = 0;
          return { kind: "applied" as const, value: apply(session, result.value) };
        }

        const failure = classifyFailure(result.error);
        const decision = decideRetry(this.retryPolicy, failure, session.retry_count);
        session.active_call = null;

        if (decision.action === "retry") {
          session.retry_count = decision.nextRetryCount;
          session.resume_phase = phase;
          session.phase = "error_recovery";
          this.log.warn(
            {
              sessionId,
              phase,
              agent,
              attempt,
              code: failure.code,
              retryCount: session.retry_count,
              delayMs: decision.delayMs,
            },
            "workflow.retry_scheduled"
          );
          this.emit(
            session,
            buildProgressEnvelope(session.id, {
              phase: "error_recovery",
              percent_complete: progressPercent(session),
              attempt: attempt + 1,
            })
          );
          return { kind: "retry" as const, delayMs: decision.delayMs };
        }

        const exhausted = decision.reason === "retries_exhausted";
        this.failSession(session, {
          code: exhausted ? "retries_exhausted" : failure.code,
          message: exhausted ? `${phase} failed after ${session.retry_count} retries: ${failure.message}` : failure.message,
          recoverable: false,
        });
        return { kind: "stop" as const };
      });

      if (!settled) {
        this.log.info({ sessionId, callId: call.call_id }, "collaborator.late_result_discarded");
        return { status: "stopped" };
      }
      const outcome = settled.value;
      if (outcome.kind === "applied") return { status: "applied", value: outcome.value };
      if (outcome.kind === "stop") return { status: "stopped" };

      try {
        await this.sleepImpl(outcome.delayMs, signal);
      } catch (error) {
        if (signal.aborted) return { status: "stopped" };
        throw error;
      }
      attempt += 1;
    }
  }

  private buildRequest(session: Session, phase: CallPhase, agent: string, attempt: number): CollaboratorRequest {
    return {
      session_id: session.id,
      phase,
      agent,
      attempt,
      text: session.request_text ?? "",
      answers: collectAnswers(session),
      round_number: session.clarification_round_count,
      degraded: session.degraded,
      ...(session.analysis?.notes ? { analysis_notes: session.analysis.notes } : {}),
    };
  }


  /** Force any active phase to failed. Outstanding calls are aborted and their results dropped. */
  async cancel(sessionId: string): Promise<boolean> {
    const outcome = await this.mutate(sessionId, (session) => {
      if (TERMINAL_PHASES.has(session.phase)) {
        this.log.debug({ sessionId, phase: session.phase }, "workflow.cancel_ignored");
        return false;
      }
      this.failSession(session, { code: "cancelled", message: "Cancelled by client", recoverable: false });
      return true;
    });
    if (outcome?.value) this.abortInflight(sessionId);
    return outcome?.value ?? false;
  }

  /**
   * Mark a session as having no live connection. `stillDetached` is checked
   * under the session lock, so a session that was rebound in the meantime
   * stays attached.
   */
  async suspend(sessionId: string, stillDetached: () => boolean = () => true): Promise<void> {
    await this.mutate(sessionId, (session) => {
      if (!stillDetached()) {
        this.log.debug({ sessionId }, "session.suspend_skipped_rebound");
        return;
      }
      session.connection_state = "suspended";
      this.log.info({ sessionId, phase: session.phase }, "session.suspended");
    });
  }

  /**
   * Re-attach a session to a connection. With `replay`, the client gets a
   * snapshot of where the session stands plus anything it missed while away.
   */
  async resume(sessionId: string, opts: { replay: boolean }): Promise<boolean> {
    const outcome = await this.mutate(sessionId, (session) => {
      session.connection_state = "attached";
      this.log.info({ sessionId, phase: session.phase, replay: opts.replay }, "session.resumed");
      if (!opts.replay) return;

      this.emitProgress(session);
      const round = currentRound(session);
      if (session.phase === "clarifying" && round) {
        this.emit(session, buildQuestionEnvelope(session.id, { round_number: round.round_number, questions: round.questions }));
      }
      if (session.phase === "delivering" && !session.result_delivered) {
        this.deliverResult(session);
      }
      if (session.phase === "failed" && session.terminal_error && !session.terminal_error_delivered) {
        session.terminal_error_delivered = this.emit(session, buildErrorEnvelope(session.id, session.terminal_error));
      }
    });
    return outcome !== null;
  }

  /** The client saw the terminal error; a failed session is removed. */
  async acknowledge(sessionId: string): Promise<boolean> {
    const session = await this.store.get(sessionId);
    if (!session) return false;
    if (session.phase !== "failed") {
      await this.mutate(sessionId, (current) => {
        this.emitValidationError(current, "invalid_phase", `session is ${current.phase}; only failed sessions are acknowledged`);
      });
      return false;
    }
    await this.destroy(sessionId, "acknowledged");
    return true;
  }

  async destroy(sessionId: string, reason: "closed" | "acknowledged" | "idle_timeout"): Promise<boolean> {
    this.abortInflight(sessionId);
    const deleted = await this.locks.run(sessionId, () => this.store.delete(sessionId));
    this.outbox.release(sessionId);
    if (deleted) this.log.info({ sessionId, reason }, "session.destroyed");
    return deleted;
  }

  async sweepIdle(now: Date = this.now()): Promise<number> {
    if (this.idleTtlMs === null) return 0;
    const idle = await this.store.listIdle(new Date(now.getTime() - this.idleTtlMs));
    let removed = 0;
    for (const sessionId of idle) {
      if (await this.destroy(sessionId, "idle_timeout")) removed += 1;
    }
    if (removed > 0) this.log.info({ removed }, "session.idle_sweep");
    return removed;
  }

  startSweeper(intervalMs: number) {
    if (this.sweepTimer || this.idleTtlMs === null) return;
    this.sweepTimer = setInterval(() => {
      this.sweepIdle().catch((error: unknown) => {
        this.log.error({ err: String(error) }, "session.idle_sweep_failed");
      });
    }, intervalMs);
    if (typeof this.sweepTimer.unref === "function") {
      this.sweepTimer.unref();
    }
  }

  stop() {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const sessionId of Array.from(this.inflight.keys())) {
      this.abortInflight(sessionId);
    }
  }


  private async mutate<R>(
    sessionId: string,
    fn: (session: Session) => R
  ): Promise<{ session: Session; value: R } | null> {
    return this.locks.run(sessionId, async () => {
      const session = await this.store.get(sessionId);
      if (!session) return null;
      const value = fn(session);
      session.last_activity_at = this.now().toISOString();
      await this.store.save(session);
      return { session, value };
    });
  }

  /** A successful transition: the retry budget starts over. */
  private advance(session: Session, to: Phase) {
    const from = session.phase;
    session.phase = to;
    session.retry_count = 0;
    session.resume_phase = null;
    this.log.info({ sessionId: session.id, from, to, degraded: session.degraded || undefined }, "workflow.transition");
    this.emitProgress(session);
    if (to === "completed") this.abortInflight(session.id);
  }

  private deliverResult(session: Session) {
    if (!session.final_result) return;
    session.result_delivered = this.emit(session, buildResultEnvelope(session.id, session.final_result));
    if (session.result_delivered) {
      this.advance(session, "completed");
    } else {
      this.log.info({ sessionId: session.id }, "workflow.delivery_deferred");
    }
  }

  /** Terminal. Emits the session's single error envelope. */
  private failSession(session: Session, error: ErrorPayload) {
    if (session.phase === "failed") return;
    const from = session.phase;
    session.phase = "failed";
    session.active_call = null;
    session.resume_phase = null;
    session.pending_request = null;
    session.terminal_error = error;
    session.terminal_error_delivered = this.emit(session, buildErrorEnvelope(session.id, error));
    // Nothing runs after a terminal phase; an outstanding call is aborted.
    this.abortInflight(session.id);
    const level = error.code === "cancelled" ? "info" : "error";
    this.log[level]({ sessionId: session.id, from, code: error.code, retryCount: session.retry_count }, "workflow.failed");
  }

  private emitValidationError(session: Session, code: "validation_failed" | "invalid_phase", message: string) {
    this.log.info({ sessionId: session.id, phase: session.phase, code }, "workflow.validation_error");
    this.emit(session, buildErrorEnvelope(session.id, { code, message, recoverable: true }));
  }

  private emitProgress(session: Session) {
    this.emit(
      session,
      buildProgressEnvelope(session.id, {
        phase: session.phase,
        percent_complete: progressPercent(session),
        ...(session.degraded ? { degraded: true } : {}),
      })
    );
  }

  private emit(session: Session, envelope: OutboundEnvelope): boolean {
    if (session.connection_state !== "attached") return false;
    return this.outbox.deliver(session.id, envelope);
  }

  private signalFor(sessionId: string): AbortSignal {
    let controller = this.inflight.get(sessionId);
    if (!controller || controller.signal.aborted) {
      controller = new AbortController();
      this.inflight.set(sessionId, controller);
    }
    return controller.signal;
  }

  private abortInflight(sessionId: string) {
    const controller = this.inflight.get(sessionId);
    if (!controller) return;
    this.inflight.delete(sessionId);
    controller.abort();
  }
}
