import { z } from "zod";

import { AnswerValue, ClarificationQuestion } from "../contracts/envelope";
import { CallPhase } from "../contracts/session";
import {
  CollaboratorCancelledError,
  CollaboratorContractError,
  CollaboratorTimeoutError,
} from "./collaborator_errors";

export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 30_000;

export const CollaboratorRequest = z.object({
  session_id: z.string().min(1),
  phase: CallPhase,
  agent: z.string().min(1),
  attempt: z.number().int().min(1),
  text: z.string(),
  answers: z.record(z.string(), AnswerValue),
  round_number: z.number().int().min(0),
  degraded: z.boolean(),
  analysis_notes: z.string().optional(),
});
export type CollaboratorRequest = z.infer<typeof CollaboratorRequest>;

export const AnalysisResult = z.object({
  completeness: z.number().min(0).max(1),
  questions: z.array(ClarificationQuestion).default([]),
  agents: z.array(z.string().min(1)).default([]),
  notes: z.string().optional(),
});
export type AnalysisResult = z.infer<typeof AnalysisResult>;

export const GenerationResult = z.object({
  artifact: z.record(z.string(), z.unknown()),
  summary: z.string().optional(),
});
export type GenerationResult = z.infer<typeof GenerationResult>;

/**
 * Contract every content-producing service satisfies. Any conforming
 * implementation can stand behind the gateway without orchestrator changes.
 */
export interface Collaborator {
  readonly name: string;
  invoke(phase: CallPhase, request: CollaboratorRequest, signal: AbortSignal): Promise<unknown>;
}

export type GatewayResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type InvokeOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export class CollaboratorGateway {
  private readonly collaborator: Collaborator;
  private readonly defaultTimeoutMs: number;

  constructor(collaborator: Collaborator, opts: { timeoutMs?: number } = {}) {
    this.collaborator = collaborator;
    this.defaultTimeoutMs = opts.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
  }

  get collaboratorName(): string {
    return this.collaborator.name;
  }

  /**
   * Time-boxed call. Never throws: timeouts, cancellation and collaborator
   * failures all come back as `{ ok: false, error }` for the classifier.
   * A cancelled or timed-out call may still settle later; its result is dropped here.
   */
  async invoke(request: CollaboratorRequest, opts: InvokeOptions = {}): Promise<GatewayResult<unknown>> {
    const name = this.collaborator.name;
    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;
    const parent = opts.signal;

    if (parent?.aborted) {
      return { ok: false, error: new CollaboratorCancelledError(name) };
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const call = Promise.resolve()
      .then(() => this.collaborator.invoke(request.phase, request, controller.signal))
      .then(
        (value): GatewayResult<unknown> => ({ ok: true, value }),
        (error: unknown): GatewayResult<unknown> => ({ ok: false, error })
      );

    const timedOut = new Promise<GatewayResult<unknown>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, error: new CollaboratorTimeoutError(timeoutMs, name) });
      }, timeoutMs);
    });

    const cancelled = new Promise<GatewayResult<unknown>>((resolve) => {
      if (!parent) return;
      onParentAbort = () => {
        controller.abort();
        resolve({ ok: false, error: new CollaboratorCancelledError(name) });
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    });

    try {
      return await Promise.race([call, timedOut, cancelled]);
    } finally {
      clearTimeout(timer);
      if (parent && onParentAbort) parent.removeEventListener("abort", onParentAbort);
    }
  }

  async analyze(request: CollaboratorRequest, opts: InvokeOptions = {}): Promise<GatewayResult<AnalysisResult>> {
    return this.parseWith(AnalysisResult, await this.invoke(request, opts));
  }

  async generate(request: CollaboratorRequest, opts: InvokeOptions = {}): Promise<GatewayResult<GenerationResult>> {
    return this.parseWith(GenerationResult, await this.invoke(request, opts));
  }

  private parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, result: GatewayResult<unknown>): GatewayResult<T> {
    if (!result.ok) return result;
    const parsed = schema.safeParse(result.value);
    if (parsed.success) return { ok: true, value: parsed.data };
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "result"}: ${issue.message}` : "result: invalid";
    return {
      ok: false,
      error: new CollaboratorContractError(`Collaborator result violates contract (${where})`, {
        collaborator: this.collaborator.name,
        cause: parsed.error,
      }),
    };
  }
}
