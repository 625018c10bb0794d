import { randomUUID } from "node:crypto";

import type { Session } from "../contracts/session";

export const DEFAULT_SESSION_IDLE_TTL_MS = 60 * 60 * 1000;

// Bound on remembered message ids per session, for de-duplication.
export const MAX_REMEMBERED_MESSAGE_IDS = 256;

export function newSession(args: { userId: string; id?: string; now?: Date }): Session {
  const ts = (args.now ?? new Date()).toISOString();
  return {
    id: args.id ?? randomUUID(),
    user_id: args.userId,
    phase: "intake",
    created_at: ts,
    last_activity_at: ts,
    connection_state: "attached",
    request_text: null,
    clarification_round_count: 0,
    rounds: [],
    retry_count: 0,
    resume_phase: null,
    pending_request: null,
    active_call: null,
    analysis: null,
    degraded: false,
    artifacts: {},
    final_result: null,
    result_delivered: false,
    terminal_error: null,
    terminal_error_delivered: false,
    accepted_message_ids: [],
  };
}

/**
 * Per-session state. Readers get copies; writes replace the whole record.
 * The orchestrator is the only writer and serializes writes per session id.
 */
export interface SessionStore {
  create(args: { userId: string }): Promise<Session>;
  get(sessionId: string): Promise<Session | null>;
  save(session: Session): Promise<void>;
  delete(sessionId: string): Promise<boolean>;

  /** Ids of sessions whose last activity is older than the idle cutoff. */
  listIdle(olderThan: Date): Promise<string[]>;
  count(): Promise<number>;
}

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();

  async create(args: { userId: string }): Promise<Session> {
    const session = newSession({ userId: args.userId });
    this.sessions.set(session.id, structuredClone(session));
    return session;
  }

  async get(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.id, structuredClone(session));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async listIdle(olderThan: Date): Promise<string[]> {
    const cutoff = olderThan.getTime();
    const idle: string[] = [];
    for (const session of this.sessions.values()) {
      if (Date.parse(session.last_activity_at) < cutoff) idle.push(session.id);
    }
    return idle;
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }
}
