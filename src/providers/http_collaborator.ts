import type { CallPhase } from "../contracts/session";
import type { Collaborator, CollaboratorRequest } from "../control-plane/collaborator_gateway";
import {
  CollaboratorContractError,
  CollaboratorInconsistencyError,
  CollaboratorUnavailableError,
} from "../control-plane/collaborator_errors";
import type { Logger } from "../logger";

type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export type HttpCollaboratorOptions = {
  baseUrl: string;
  name?: string;
  apiKey?: string;
  fetchImpl?: FetchImpl;
  logger?: Logger;
};

function parseRetryAfter(header: string | null, nowMs: number): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - nowMs);
  }
  return undefined;
}

const RETRYABLE_STATUS = new Set([408, 425, 429]);

/**
 * Collaborator reached over HTTP. Each phase is a POST to `<baseUrl>/<phase>`
 * carrying `{ phase, agent, request }`; the JSON body is the phase result.
 */
export class HttpCollaborator implements Collaborator {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: FetchImpl;
  private readonly logger?: Logger;

  constructor(opts: HttpCollaboratorOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.name = opts.name ?? "http";
    this.apiKey = opts.apiKey;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.logger = opts.logger;
  }

  async invoke(phase: CallPhase, request: CollaboratorRequest, signal: AbortSignal): Promise<unknown> {
    // Network failures propagate as-is; the classifier reads their errno.
    const res = await this.fetchImpl(`${this.baseUrl}/${phase}`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(this.apiKey ? { authorization: `Bearer ${this.apiKey}` } : {}),
      },
      body: JSON.stringify({ phase, agent: request.agent, request }),
      signal,
    });

    const text = await res.text();

    if (!res.ok) {
      const statusCode = res.status;
      const bodySnippet = text.slice(0, 500);
      this.logger?.warn(
        { collaborator: this.name, phase, agent: request.agent, statusCode, bodyChars: text.length },
        "collaborator.request_failed"
      );

      if (statusCode === 409) {
        throw new CollaboratorInconsistencyError(`Collaborator reported a conflict: ${bodySnippet}`, this.name);
      }
      if (statusCode >= 500 || RETRYABLE_STATUS.has(statusCode)) {
        throw new CollaboratorUnavailableError(`Collaborator error ${statusCode}: ${bodySnippet}`, {
          statusCode,
          retryAfterMs: parseRetryAfter(res.headers.get("retry-after"), Date.now()),
          collaborator: this.name,
        });
      }
      throw new CollaboratorContractError(`Collaborator rejected the request ${statusCode}: ${bodySnippet}`, {
        statusCode,
        collaborator: this.name,
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new CollaboratorContractError("Collaborator response is not JSON", {
        statusCode: res.status,
        collaborator: this.name,
        cause: error,
      });
    }
  }
}
