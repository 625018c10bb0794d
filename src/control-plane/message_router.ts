import type { ConnectionHandle } from "../connections/connection_manager";
import { FrameRateLimiter } from "../connections/frame_rate_limiter";
import {
  buildControlEnvelope,
  buildErrorEnvelope,
  decodeEnvelope,
  DEFAULT_MAX_INPUT_CHARS,
  type ControlEnvelope,
  type ErrorCode,
  type InputEnvelope,
  type OutboundEnvelope,
} from "../contracts/envelope";
import type { Session } from "../contracts/session";
import type { Logger } from "../logger";
import type { Outbox, WorkflowOrchestrator } from "./orchestrator";
import { SessionLocks } from "./session_locks";
import { SessionQueue } from "./session_queue";

export const DEFAULT_MAX_QUEUE_DEPTH = 32;

type QueuedInput = Pick<InputEnvelope, "message_id" | "session_id" | "payload">;

/**
 * Which connection currently carries each session. A session is bound to at
 * most one connection; binding it elsewhere moves it.
 */
export class SessionBindings implements Outbox {
  private readonly bySession = new Map<string, ConnectionHandle>();
  private readonly byConnection = new Map<string, Set<string>>();

  bind(sessionId: string, connection: ConnectionHandle) {
    this.release(sessionId);
    this.bySession.set(sessionId, connection);
    const sessions = this.byConnection.get(connection.id) ?? new Set<string>();
    sessions.add(sessionId);
    this.byConnection.set(connection.id, sessions);
  }

  connectionFor(sessionId: string): ConnectionHandle | null {
    return this.bySession.get(sessionId) ?? null;
  }

  /** Unbind everything carried by the connection; returns the session ids. */
  detach(connectionId: string): string[] {
    const sessions = Array.from(this.byConnection.get(connectionId) ?? []);
    this.byConnection.delete(connectionId);
    for (const sessionId of sessions) this.bySession.delete(sessionId);
    return sessions;
  }

  release(sessionId: string) {
    const previous = this.bySession.get(sessionId);
    if (!previous) return;
    this.bySession.delete(sessionId);
    const sessions = this.byConnection.get(previous.id);
    sessions?.delete(sessionId);
    if (sessions && sessions.size === 0) this.byConnection.delete(previous.id);
  }

  deliver(sessionId: string, envelope: OutboundEnvelope): boolean {
    const connection = this.bySession.get(sessionId);
    if (!connection?.isOpen()) return false;
    return connection.send(envelope);
  }
}

export type MessageRouterOptions = {
  orchestrator: WorkflowOrchestrator;
  bindings: SessionBindings;
  log: Logger;
  maxInputChars?: number;
  maxQueueDepth?: number;
  framesPerMinute?: number;
  now?: () => number;
  onPong?: (connectionId: string) => void;
};

export class MessageRouter {
  private readonly orchestrator: WorkflowOrchestrator;
  private readonly bindings: SessionBindings;
  private readonly log: Logger;
  private readonly maxInputChars: number;
  private readonly onPong?: (connectionId: string) => void;
  private readonly queue: SessionQueue<QueuedInput>;
  private readonly rate: FrameRateLimiter;
  // Frames of one connection are dispatched in arrival order.
  private readonly frames = new SessionLocks();

  constructor(opts: MessageRouterOptions) {
    this.orchestrator = opts.orchestrator;
    this.bindings = opts.bindings;
    this.log = opts.log;
    this.maxInputChars = opts.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
    this.onPong = opts.onPong;
    this.rate = new FrameRateLimiter({ framesPerMinute: opts.framesPerMinute, now: opts.now });
    this.queue = new SessionQueue<QueuedInput>({
      maxDepth: opts.maxQueueDepth ?? DEFAULT_MAX_QUEUE_DEPTH,
      handle: (_sessionId, item) => this.orchestrator.handleInput(item),
      onError: (sessionId, item, error) => {
        this.log.error(
          { sessionId, messageId: item.message_id, err: error instanceof Error ? error.message : String(error) },
          "router.handler_failed"
        );
      },
    });
  }

  /** One raw frame from a connection. Protocol errors go back on the same connection. */
  handleFrame(connection: ConnectionHandle, raw: string): Promise<void> {
    return this.frames.run(connection.id, () => this.dispatch(connection, raw));
  }

  private async dispatch(connection: ConnectionHandle, raw: string): Promise<void> {
    const decoded = decodeEnvelope(raw, { maxInputChars: this.maxInputChars });

    // Heartbeat traffic is never throttled.
    const heartbeat =
      decoded.ok && decoded.envelope.type === "control" && ["ping", "pong"].includes(decoded.envelope.payload.action);
    if (!heartbeat && !this.rate.take(connection.id)) {
      const retryAfter = this.rate.retryAfterSeconds(connection.id);
      this.log.warn({ connectionId: connection.id, retryAfter }, "router.rate_limited");
      this.protocolError(
        connection,
        decoded.ok ? decoded.envelope.session_id : decoded.sessionId,
        "rate_limited",
        `Too many frames; retry in ${retryAfter}s`
      );
      return;
    }

    if (!decoded.ok) {
      this.protocolError(connection, decoded.sessionId, decoded.code, decoded.message);
      return;
    }

    const envelope = decoded.envelope;
    if (envelope.type === "control") {
      await this.handleControl(connection, envelope);
      return;
    }
    await this.handleInput(connection, envelope);
  }

  /** The connection is gone: its sessions stay, suspended, for a later resume. */
  async detachConnection(connectionId: string): Promise<void> {
    this.rate.forget(connectionId);
    const sessions = this.bindings.detach(connectionId);
    for (const sessionId of sessions) {
      // A resume on another connection may have claimed it meanwhile.
      await this.orchestrator.suspend(sessionId, () => this.bindings.connectionFor(sessionId) === null);
    }
  }

  waiting(sessionId: string): number {
    return this.queue.waiting(sessionId);
  }

  whenIdle(sessionId: string): Promise<void> {
    return this.queue.whenIdle(sessionId);
  }

  whenAllIdle(): Promise<void> {
    return this.queue.whenAllIdle();
  }

  private async handleInput(connection: ConnectionHandle, envelope: InputEnvelope) {
    const sessionId = envelope.session_id;
    const session = await this.resolveOwned(connection, sessionId);
    if (!session) return;
    await this.ensureBound(connection, session);

    const accepted = this.queue.enqueue(sessionId, {
      message_id: envelope.message_id,
      session_id: sessionId,
      payload: envelope.payload,
    });
    if (!accepted) {
      this.log.warn({ sessionId, connectionId: connection.id, waiting: this.queue.waiting(sessionId) }, "router.queue_full");
      this.protocolError(connection, sessionId, "queue_full", "Too many envelopes waiting for this session");
      return;
    }
    this.log.debug(
      {
        sessionId,
        messageId: envelope.message_id,
        textChars: envelope.payload.text.length,
        answers: Object.keys(envelope.payload.answers ?? {}).length,
      },
      "router.input_queued"
    );
  }

  // Controls never wait behind queued input; cancel must reach a session mid-call.
  private async handleControl(connection: ConnectionHandle, envelope: ControlEnvelope) {
    const { action } = envelope.payload;

    switch (action) {
      case "ping":
        connection.send(buildControlEnvelope(envelope.session_id, "pong"));
        return;

      case "pong":
        this.onPong?.(connection.id);
        return;

      case "start": {
        const session = await this.orchestrator.createSession(connection.userId);
        this.bindings.bind(session.id, connection);
        await this.orchestrator.announce(session.id);
        const text = envelope.payload.text;
        if (text !== undefined) {
          this.queue.enqueue(session.id, {
            message_id: envelope.message_id,
            session_id: session.id,
            payload: { text },
          });
        }
        return;
      }

      default:
        break;
    }

    const sessionId = envelope.session_id;
    if (sessionId === null) {
      this.protocolError(connection, null, "invalid_envelope", `session_id: required for control/${action}`);
      return;
    }
    const session = await this.resolveOwned(connection, sessionId);
    if (!session) return;

    switch (action) {
      case "resume":
        this.bindings.bind(sessionId, connection);
        await this.orchestrator.resume(sessionId, { replay: true });
        return;

      case "cancel":
        await this.ensureBound(connection, session);
        this.queue.clear(sessionId);
        await this.orchestrator.cancel(sessionId);
        return;

      case "ack":
        await this.ensureBound(connection, session);
        await this.orchestrator.acknowledge(sessionId);
        return;

      case "close":
        this.queue.clear(sessionId);
        await this.orchestrator.destroy(sessionId, "closed");
        return;
    }
  }

  private async resolveOwned(connection: ConnectionHandle, sessionId: string): Promise<Session | null> {
    const session = await this.orchestrator.getSession(sessionId);
    // Another user's session is indistinguishable from a missing one.
    if (session && session.user_id === connection.userId) return session;
    this.protocolError(connection, sessionId, "session_not_found", `session_id: no session '${sessionId}'`);
    return null;
  }

  /** Implicit rebind: traffic for a session pulls it onto this connection, attached. */
  private async ensureBound(connection: ConnectionHandle, session: Session) {
    const bound = this.bindings.connectionFor(session.id)?.id === connection.id;
    if (bound && session.connection_state === "attached") return;
    if (!bound) this.bindings.bind(session.id, connection);
    await this.orchestrator.resume(session.id, { replay: false });
  }

  private protocolError(connection: ConnectionHandle, sessionId: string | null, code: ErrorCode, message: string) {
    this.log.info({ connectionId: connection.id, sessionId, code }, "router.protocol_error");
    connection.send(buildErrorEnvelope(sessionId, { code, message, recoverable: true }));
  }
}
