import { randomUUID } from "node:crypto";

import { buildControlEnvelope, type OutboundEnvelope } from "../contracts/envelope";
import type { Logger } from "../logger";
import { AuthError, type IdentityVerifier } from "./identity";

/** Transport-side view of one physical channel (a WebSocket in production). */
export interface Channel {
  send(data: string): void;
  close(code: number, reason: string): void;
}

export type TeardownReason = "client_closed" | "heartbeat_timeout" | "send_failed" | "server_shutdown";

export const CLOSE_CODES = {
  normal: 1000,
  goingAway: 1001,
  policyViolation: 1008,
  heartbeatTimeout: 4000,
} as const;

export interface ConnectionHandle {
  readonly id: string;
  readonly userId: string;
  isOpen(): boolean;
  /** False when the channel is gone; the envelope is then dropped. */
  send(envelope: OutboundEnvelope): boolean;
}

export type AcceptResult = { ok: true; connection: ConnectionHandle } | { ok: false; error: AuthError };

type ConnectionRecord = {
  handle: ConnectionHandle;
  channel: Channel;
  open: boolean;
  probeTimer: NodeJS.Timeout | null;
};

export type ConnectionManagerOptions = {
  verifier: IdentityVerifier;
  log: Logger;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  onTeardown?: (connection: ConnectionHandle, reason: TeardownReason) => void;
};

const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const DEFAULT_HEARTBEAT_TIMEOUT_MS = 10_000;

export class ConnectionManager {
  private readonly connections = new Map<string, ConnectionRecord>();
  private readonly verifier: IdentityVerifier;
  private readonly log: Logger;
  private readonly heartbeatIntervalMs: number;
  private readonly heartbeatTimeoutMs: number;
  private readonly onTeardown?: ConnectionManagerOptions["onTeardown"];
  private pingTimer: NodeJS.Timeout | null = null;

  constructor(opts: ConnectionManagerOptions) {
    this.verifier = opts.verifier;
    this.log = opts.log;
    this.heartbeatIntervalMs = opts.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.heartbeatTimeoutMs = opts.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
    this.onTeardown = opts.onTeardown;
  }

  /**
   * Verify the credential and register the channel. Never creates a session:
   * sessions come from the first `control/start` on the connection.
   */
  async accept(credential: string | null, channel: Channel): Promise<AcceptResult> {
    if (!credential) {
      return { ok: false, error: new AuthError("missing_credential") };
    }

    const verified = await this.verifier.verify(credential);
    if (!verified.ok) {
      this.log.warn({ reason: verified.reason }, "connection.auth_rejected");
      return { ok: false, error: new AuthError(verified.reason) };
    }

    const id = randomUUID();
    const record: ConnectionRecord = {
      channel,
      open: true,
      probeTimer: null,
      handle: {
        id,
        userId: verified.userId,
        isOpen: () => record.open,
        send: (envelope) => this.send(record, envelope),
      },
    };

    this.connections.set(id, record);
    this.ensurePingLoop();
    this.log.info({ connectionId: id, userId: verified.userId }, "connection.accepted");
    return { ok: true, connection: record.handle };
  }

  /** A pong (or any probe response) arrived on this connection. */
  markAlive(connectionId: string) {
    const record = this.connections.get(connectionId);
    if (!record?.probeTimer) return;
    clearTimeout(record.probeTimer);
    record.probeTimer = null;
  }

  /** The transport reports the channel already closed. */
  handleChannelClosed(connectionId: string) {
    this.release(connectionId, "client_closed", null);
  }

  teardown(connectionId: string, reason: TeardownReason) {
    const code =
      reason === "heartbeat_timeout"
        ? CLOSE_CODES.heartbeatTimeout
        : reason === "server_shutdown"
          ? CLOSE_CODES.goingAway
          : CLOSE_CODES.normal;
    this.release(connectionId, reason, code);
  }

  get(connectionId: string): ConnectionHandle | null {
    return this.connections.get(connectionId)?.handle ?? null;
  }

  activeConnectionCount(): number {
    return this.connections.size;
  }

  shutdown() {
    for (const id of Array.from(this.connections.keys())) {
      this.teardown(id, "server_shutdown");
    }
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private release(connectionId: string, reason: TeardownReason, closeCode: number | null) {
    const record = this.connections.get(connectionId);
    if (!record) return;

    this.connections.delete(connectionId);
    record.open = false;
    if (record.probeTimer) {
      clearTimeout(record.probeTimer);
      record.probeTimer = null;
    }

    if (closeCode !== null) {
      try {
        record.channel.close(closeCode, reason);
      } catch (error) {
        this.log.debug({ connectionId, reason, err: String(error) }, "connection.close_failed");
      }
    }

    this.log.info({ connectionId, userId: record.handle.userId, reason }, "connection.teardown");
    this.onTeardown?.(record.handle, reason);

    if (this.connections.size === 0 && this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private send(record: ConnectionRecord, envelope: OutboundEnvelope): boolean {
    if (!record.open) return false;
    try {
      record.channel.send(JSON.stringify(envelope));
      return true;
    } catch (error) {
      this.log.warn(
        { connectionId: record.handle.id, type: envelope.type, err: String(error) },
        "connection.send_failed"
      );
      this.teardown(record.handle.id, "send_failed");
      return false;
    }
  }

  private ensurePingLoop() {
    if (this.pingTimer) return;
    this.pingTimer = setInterval(() => this.probeAll(), this.heartbeatIntervalMs);
    if (typeof this.pingTimer.unref === "function") {
      this.pingTimer.unref();
    }
  }

  private probeAll() {
    for (const record of Array.from(this.connections.values())) {
      // Still waiting on the previous probe; its timer decides.
      if (record.probeTimer) continue;
      const connectionId = record.handle.id;
      if (!this.send(record, buildControlEnvelope(null, "ping"))) continue;

      record.probeTimer = setTimeout(() => {
        record.probeTimer = null;
        this.log.warn(
          { connectionId, timeoutMs: this.heartbeatTimeoutMs },
          "connection.heartbeat_timeout"
        );
        this.teardown(connectionId, "heartbeat_timeout");
      }, this.heartbeatTimeoutMs);
      if (typeof record.probeTimer.unref === "function") {
        record.probeTimer.unref();
      }
    }
  }
}
