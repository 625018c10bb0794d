import { setTimeout as sleep } from "node:timers/promises";

import type { ClarificationQuestion } from "../contracts/envelope";
import type { CallPhase } from "../contracts/session";
import type {
  AnalysisResult,
  Collaborator,
  CollaboratorRequest,
  GenerationResult,
} from "../control-plane/collaborator_gateway";

// Questions the mock asks when a request is too thin to act on.
export const MOCK_QUESTIONS: ClarificationQuestion[] = [
  { question_id: "audience", prompt: "Who is this for?", kind: "text", required: true },
  { question_id: "length", prompt: "How long should it be (1 = very short, 10 = very long)?", kind: "scale", required: true },
  {
    question_id: "tone",
    prompt: "Which tone fits best?",
    kind: "choice",
    required: true,
    options: ["formal", "casual", "playful"],
  },
];

const PRESENTATION_AGENTS = ["researcher", "layout", "visual"];

/**
 * How complete the mock considers a request, from 0 to 1.
 * A number in the text and at least four words each raise it;
 * answers to every mock question raise it most.
 */
export function scoreCompleteness(request: Pick<CollaboratorRequest, "text" | "answers">): number {
  let score = 0.3;
  if (/\d/.test(request.text)) score += 0.3;
  if (request.text.trim().split(/\s+/).filter(Boolean).length >= 4) score += 0.2;
  if (MOCK_QUESTIONS.every((question) => request.answers[question.question_id] !== undefined)) score += 0.4;
  return Math.min(1, Math.round(score * 100) / 100);
}

function agentsFor(text: string): string[] {
  return /\b(slides?|deck|presentation)\b/i.test(text) ? PRESENTATION_AGENTS : [];
}

/**
 * Deterministic stand-in for the real collaborators, used when no collaborator
 * service is configured. Same contract, same state machine, canned content.
 */
export class MockCollaborator implements Collaborator {
  readonly name = "mock";
  private readonly latencyMs: number;

  constructor(opts: { latencyMs?: number } = {}) {
    this.latencyMs = opts.latencyMs ?? 0;
  }

  async invoke(phase: CallPhase, request: CollaboratorRequest, signal: AbortSignal): Promise<unknown> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, undefined, { signal });
    }
    return phase === "generating" ? this.generate(request) : this.analyze(request);
  }

  private analyze(request: CollaboratorRequest): AnalysisResult {
    const completeness = scoreCompleteness(request);
    const unanswered = MOCK_QUESTIONS.filter((question) => request.answers[question.question_id] === undefined);
    const followUp: ClarificationQuestion = {
      question_id: `detail_${request.round_number + 1}`,
      prompt: "Anything else we should know?",
      kind: "text",
      required: true,
    };
    return {
      completeness,
      questions: unanswered.length > 0 ? unanswered : [followUp],
      agents: agentsFor(request.text),
      notes: `mock analysis after ${request.round_number} round(s)`,
    };
  }

  private generate(request: CollaboratorRequest): GenerationResult {
    const audience = request.answers.audience ?? "a general audience";
    const tone = request.answers.tone ?? "neutral";
    return {
      artifact: {
        agent: request.agent,
        title: request.text.slice(0, 80),
        body: `Draft for ${String(audience)} in a ${String(tone)} tone.`,
        defaults_applied: request.degraded,
      },
      summary: `${request.agent} output (mock)`,
    };
  }
}
