import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CLOSE_CODES, ConnectionManager, type Channel, type ConnectionHandle } from "../src/connections/connection_manager";
import { HmacCredentialVerifier, signCredential } from "../src/connections/identity";
import { buildControlEnvelope } from "../src/contracts/envelope";
import { silentLogger } from "../src/logger";

const SECRET = "test-secret";

class FakeChannel implements Channel {
  readonly frames: string[] = [];
  closed: { code: number; reason: string } | null = null;
  failSends = false;

  send(data: string) {
    if (this.failSends) throw new Error("socket is not open");
    this.frames.push(data);
  }

  close(code: number, reason: string) {
    this.closed = { code, reason };
  }
}

function createManager(onTeardown = vi.fn()) {
  const manager = new ConnectionManager({
    verifier: new HmacCredentialVerifier(SECRET),
    log: silentLogger(),
    heartbeatIntervalMs: 1_000,
    heartbeatTimeoutMs: 500,
    onTeardown,
  });
  return { manager, onTeardown };
}

async function acceptOrThrow(manager: ConnectionManager, channel: Channel): Promise<ConnectionHandle> {
  const accepted = await manager.accept(signCredential(SECRET, { sub: "user-1" }), channel);
  if (!accepted.ok) throw new Error(`expected accept, got ${accepted.error.reason}`);
  return accepted.connection;
}

describe("ConnectionManager", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("accepts a valid credential and binds the user id", async () => {
    const { manager } = createManager();
    const connection = await acceptOrThrow(manager, new FakeChannel());

    expect(connection.userId).toBe("user-1");
    expect(connection.isOpen()).toBe(true);
    expect(manager.get(connection.id)).toBe(connection);
    expect(manager.activeConnectionCount()).toBe(1);
    manager.shutdown();
  });

  it("rejects a missing credential", async () => {
    const { manager } = createManager();
    const result = await manager.accept(null, new FakeChannel());

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe("missing_credential");
    expect(manager.activeConnectionCount()).toBe(0);
  });

  it("rejects a credential signed with another secret", async () => {
    const { manager } = createManager();
    const result = await manager.accept(signCredential("other-secret", { sub: "user-1" }), new FakeChannel());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe("invalid_credential");
      expect(result.error.code).toBe("unauthorized");
    }
  });

  it("serializes envelopes onto the channel", async () => {
    const { manager } = createManager();
    const channel = new FakeChannel();
    const connection = await acceptOrThrow(manager, channel);

    const envelope = buildControlEnvelope("s-1", "pong");
    expect(connection.send(envelope)).toBe(true);
    expect(channel.frames.map((frame) => JSON.parse(frame))).toEqual([envelope]);
    manager.shutdown();
  });

  it("probes with a ping and keeps a connection that answers", async () => {
    const { manager, onTeardown } = createManager();
    const channel = new FakeChannel();
    const connection = await acceptOrThrow(manager, channel);

    vi.advanceTimersByTime(1_000);
    expect(channel.frames).toHaveLength(1);
    const probe: unknown = JSON.parse(channel.frames[0] ?? "null");
    expect(probe).toMatchObject({ type: "control", session_id: null, payload: { action: "ping" } });

    manager.markAlive(connection.id);
    vi.advanceTimersByTime(500);

    expect(connection.isOpen()).toBe(true);
    expect(onTeardown).not.toHaveBeenCalled();
    manager.shutdown();
  });

  it("closes a connection that misses the heartbeat with 4000", async () => {
    const { manager, onTeardown } = createManager();
    const channel = new FakeChannel();
    const connection = await acceptOrThrow(manager, channel);

    vi.advanceTimersByTime(1_000);
    vi.advanceTimersByTime(500);

    expect(channel.closed).toEqual({ code: CLOSE_CODES.heartbeatTimeout, reason: "heartbeat_timeout" });
    expect(connection.isOpen()).toBe(false);
    expect(manager.get(connection.id)).toBeNull();
    expect(onTeardown).toHaveBeenCalledWith(connection, "heartbeat_timeout");
  });

  it("tears the connection down when a send fails", async () => {
    const { manager, onTeardown } = createManager();
    const channel = new FakeChannel();
    const connection = await acceptOrThrow(manager, channel);

    channel.failSends = true;
    expect(connection.send(buildControlEnvelope(null, "pong"))).toBe(false);

    expect(onTeardown).toHaveBeenCalledWith(connection, "send_failed");
    expect(channel.closed?.code).toBe(CLOSE_CODES.normal);
    expect(connection.send(buildControlEnvelope(null, "pong"))).toBe(false);
  });

  it("releases a channel the client closed without closing it again", async () => {
    const { manager, onTeardown } = createManager();
    const channel = new FakeChannel();
    const connection = await acceptOrThrow(manager, channel);

    manager.handleChannelClosed(connection.id);
    manager.handleChannelClosed(connection.id);

    expect(channel.closed).toBeNull();
    expect(onTeardown).toHaveBeenCalledTimes(1);
    expect(onTeardown).toHaveBeenCalledWith(connection, "client_closed");
  });

  it("closes every connection with 1001 on shutdown", async () => {
    const { manager, onTeardown } = createManager();
    const first = new FakeChannel();
    const second = new FakeChannel();
    await acceptOrThrow(manager, first);
    await acceptOrThrow(manager, second);

    manager.shutdown();

    expect(first.closed?.code).toBe(CLOSE_CODES.goingAway);
    expect(second.closed?.code).toBe(CLOSE_CODES.goingAway);
    expect(onTeardown).toHaveBeenCalledTimes(2);
    expect(manager.activeConnectionCount()).toBe(0);
  });
});
