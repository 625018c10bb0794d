import { describe, it, expect, vi } from "vitest";

import type { Session } from "../src/contracts/session";
import { CollaboratorContractError } from "../src/control-plane/collaborator_errors";
import { MemorySessionStore } from "../src/store/session_store";
import {
  ScriptedCollaborator,
  controlFrame,
  createHarness,
  deferred,
  inputFrame,
  startSession,
  waitFor,
} from "./fakes";

const AUDIENCE_QUESTION = { question_id: "audience", prompt: "Who is it for?", kind: "text" };

/** Memory store whose reads of one session wait until released. */
class GatedStore extends MemorySessionStore {
  private held: { sessionId: string; gate: Promise<unknown> } | null = null;

  hold(sessionId: string, gate: Promise<unknown>) {
    this.held = { sessionId, gate };
  }

  async get(sessionId: string): Promise<Session | null> {
    const held = this.held;
    if (held && held.sessionId === sessionId) {
      this.held = null;
      await held.gate;
    }
    return super.get(sessionId);
  }
}

describe("Session lifecycle", () => {
  describe("cancel", () => {
    it("fails the session mid-call and drops the late result", async () => {
      const pending = deferred<unknown>();
      let callSignal: AbortSignal | undefined;
      const collaborator = new ScriptedCollaborator({
        analysis: [
          (_request, signal) => {
            callSignal = signal;
            return pending.promise;
          },
        ],
      });
      const h = createHarness({ collaborator });
      const conn = h.connect();

      const sessionId = await startSession(h, conn, "Make a 5-point summary");
      await waitFor(() => collaborator.calls.length === 1);

      await h.send(conn, controlFrame("cancel", sessionId));
      await h.settle();

      expect(callSignal?.aborted).toBe(true);
      pending.resolve({ completeness: 1 });
      await h.settle();

      const errors = conn.ofType("error");
      expect(errors.map((envelope) => envelope.payload)).toEqual([
        { code: "cancelled", message: "Cancelled by client", recoverable: false },
      ]);
      const session = await h.store.get(sessionId);
      expect(session?.phase).toBe("failed");
      expect(session?.active_call).toBeNull();
      expect(collaborator.callsFor("generating")).toHaveLength(0);
    });

    it("drops input that was waiting behind the cancelled call", async () => {
      const pending = deferred<unknown>();
      const collaborator = new ScriptedCollaborator({
        analysis: [() => pending.promise],
      });
      const h = createHarness({ collaborator });
      const conn = h.connect();

      const sessionId = await startSession(h, conn, "Make a 5-point summary");
      await waitFor(() => collaborator.calls.length === 1);
      await h.send(conn, inputFrame(sessionId, { answers: { audience: "engineers" } }));
      expect(h.router.waiting(sessionId)).toBe(1);

      await h.send(conn, controlFrame("cancel", sessionId));
      await h.settle();

      expect(h.router.waiting(sessionId)).toBe(0);
      expect(conn.ofType("error")).toHaveLength(1);
    });

    it("does nothing to a completed session", async () => {
      const h = createHarness();
      const conn = h.connect();
      const sessionId = await startSession(h, conn, "Make a 5-point summary");
      await h.settle();

      await h.send(conn, controlFrame("cancel", sessionId));

      expect(conn.ofType("error")).toHaveLength(0);
      expect((await h.store.get(sessionId))?.phase).toBe("completed");
    });
  });

  describe("disconnect and resume", () => {
    it("resumes from the phase the outstanding call produced", async () => {
      const pending = deferred<unknown>();
      const collaborator = new ScriptedCollaborator({
        analysis: [() => pending.promise, () => ({ completeness: 0.9 })],
      });
      const h = createHarness({ collaborator });
      const first = h.connect();

      const sessionId = await startSession(h, first, "Write something");
      await waitFor(() => collaborator.calls.length === 1);

      first.open = false;
      await h.router.detachConnection(first.id);
      expect((await h.store.get(sessionId))?.connection_state).toBe("suspended");
      const sentWhileAttached = first.sent.length;

      pending.resolve({ completeness: 0.2, questions: [AUDIENCE_QUESTION] });
      await h.settle();

      const suspended = await h.store.get(sessionId);
      expect(suspended?.phase).toBe("clarifying");
      expect(suspended?.clarification_round_count).toBe(1);
      expect(first.sent).toHaveLength(sentWhileAttached);

      const second = h.connect();
      await h.send(second, controlFrame("resume", sessionId));

      expect(second.sent.map((envelope) => envelope.type)).toEqual(["progress", "question"]);
      expect(second.ofType("progress")[0]?.payload).toEqual({ phase: "clarifying", percent_complete: 25 });
      expect(second.ofType("question")[0]?.payload.round_number).toBe(1);
      expect((await h.store.get(sessionId))?.connection_state).toBe("attached");

      await h.send(second, inputFrame(sessionId, { answers: { audience: "engineers" } }));
      await h.settle();
      expect((await h.store.get(sessionId))?.phase).toBe("completed");
    });

    it("delivers a result that completed while the client was away", async () => {
      const pending = deferred<unknown>();
      const collaborator = new ScriptedCollaborator({ generation: [() => pending.promise] });
      const h = createHarness({ collaborator });
      const first = h.connect();

      const sessionId = await startSession(h, first, "Make a 5-point summary");
      await waitFor(() => collaborator.callsFor("generating").length === 1);
      first.open = false;
      await h.router.detachConnection(first.id);

      pending.resolve({ artifact: { text: "done" } });
      await h.settle();

      const waiting = await h.store.get(sessionId);
      expect(waiting?.phase).toBe("delivering");
      expect(waiting?.result_delivered).toBe(false);

      const second = h.connect();
      await h.send(second, controlFrame("resume", sessionId));

      expect(second.sent.map((envelope) => envelope.type)).toEqual(["progress", "result", "progress"]);
      expect(second.ofType("result")[0]?.payload).toEqual({ final: true, artifact: { text: "done" } });
      expect(second.progressPhases()).toEqual(["delivering", "completed"]);
      expect((await h.store.get(sessionId))?.phase).toBe("completed");
    });

    it("replays an undelivered terminal error exactly once", async () => {
      const pending = deferred<unknown>();
      const collaborator = new ScriptedCollaborator({ generation: [() => pending.promise] });
      const h = createHarness({ collaborator });
      const first = h.connect();

      const sessionId = await startSession(h, first, "Make a 5-point summary");
      await waitFor(() => collaborator.callsFor("generating").length === 1);
      first.open = false;
      await h.router.detachConnection(first.id);

      pending.reject(new CollaboratorContractError("bad artifact"));
      await h.settle();
      expect(first.ofType("error")).toHaveLength(0);
      expect((await h.store.get(sessionId))?.terminal_error_delivered).toBe(false);

      const second = h.connect();
      await h.send(second, controlFrame("resume", sessionId));
      await h.send(second, controlFrame("resume", sessionId));

      expect(second.ofType("error").map((envelope) => envelope.payload.code)).toEqual(["contract_violation"]);
      expect(second.progressPhases()).toEqual(["failed", "failed"]);
    });

    it("moves a session to the connection that resumed it", async () => {
      const h = createHarness();
      const first = h.connect();
      const sessionId = await startSession(h, first);

      const second = h.connect();
      await h.send(second, controlFrame("resume", sessionId));
      expect(h.bindings.connectionFor(sessionId)?.id).toBe(second.id);

      // The old connection going away no longer suspends the session.
      await h.router.detachConnection(first.id);
      expect((await h.store.get(sessionId))?.connection_state).toBe("attached");
    });

    it("keeps a session attached when it is resumed elsewhere while the old connection detaches", async () => {
      const pending = deferred<unknown>();
      const collaborator = new ScriptedCollaborator({ generation: [() => pending.promise] });
      const store = new GatedStore();
      const h = createHarness({ collaborator, store });
      const first = h.connect();

      const idle = await startSession(h, first);
      const working = await startSession(h, first, "Make a 5-point summary");
      await waitFor(() => collaborator.callsFor("generating").length === 1);

      // Detach stalls on the first session while the second moves to a new connection.
      const gate = deferred<void>();
      store.hold(idle, gate.promise);
      first.open = false;
      const detaching = h.router.detachConnection(first.id);

      const second = h.connect();
      await h.send(second, controlFrame("resume", working));
      expect(h.bindings.connectionFor(working)?.id).toBe(second.id);

      gate.resolve();
      await detaching;
      expect((await h.store.get(idle))?.connection_state).toBe("suspended");
      expect((await h.store.get(working))?.connection_state).toBe("attached");

      pending.resolve({ artifact: { text: "done" } });
      await h.settle();

      expect(second.ofType("result").map((envelope) => envelope.payload.final)).toEqual([false, true]);
      expect((await h.store.get(working))?.phase).toBe("completed");
    });

    it("re-attaches a suspended session on traffic from its own connection", async () => {
      const h = createHarness();
      const conn = h.connect();
      const sessionId = await startSession(h, conn);
      await h.orchestrator.suspend(sessionId);
      expect(h.bindings.connectionFor(sessionId)?.id).toBe(conn.id);

      await h.send(conn, inputFrame(sessionId, { text: "Make a 5-point summary" }));
      await h.settle();

      const session = await h.store.get(sessionId);
      expect(session?.connection_state).toBe("attached");
      expect(session?.phase).toBe("completed");
      expect(conn.ofType("result").map((envelope) => envelope.payload.final)).toEqual([false, true]);
    });
  });

  describe("ack and close", () => {
    it("removes a failed session once the error is acknowledged", async () => {
      const h = createHarness({
        collaborator: new ScriptedCollaborator({
          analysis: [
            () => {
              throw new CollaboratorContractError("nope");
            },
          ],
        }),
      });
      const conn = h.connect();
      const sessionId = await startSession(h, conn, "Make a 5-point summary");
      await h.settle();

      await h.send(conn, controlFrame("ack", sessionId));

      expect(await h.store.get(sessionId)).toBeNull();
      expect(h.bindings.connectionFor(sessionId)).toBeNull();
    });

    it("refuses to acknowledge a session that has not failed", async () => {
      const h = createHarness();
      const conn = h.connect();
      const sessionId = await startSession(h, conn);

      await h.send(conn, controlFrame("ack", sessionId));

      expect(conn.ofType("error").map((envelope) => envelope.payload.code)).toEqual(["invalid_phase"]);
      expect(await h.store.get(sessionId)).not.toBeNull();
    });

    it("destroys the session on close and aborts its call", async () => {
      let callSignal: AbortSignal | undefined;
      const collaborator = new ScriptedCollaborator({
        analysis: [
          (_request, signal) => {
            callSignal = signal;
            return deferred<unknown>().promise;
          },
        ],
      });
      const h = createHarness({ collaborator });
      const conn = h.connect();
      const sessionId = await startSession(h, conn, "Make a 5-point summary");
      await waitFor(() => collaborator.calls.length === 1);

      await h.send(conn, controlFrame("close", sessionId));
      await h.settle();

      expect(callSignal?.aborted).toBe(true);
      expect(await h.store.get(sessionId)).toBeNull();
      expect(conn.ofType("error")).toHaveLength(0);
    });
  });

  describe("idle expiry", () => {
    it("sweeps sessions idle longer than the ttl", async () => {
      let nowMs = Date.parse("2026-03-01T10:00:00.000Z");
      const h = createHarness({ idleTtlMs: 60_000, now: () => new Date(nowMs) });
      const conn = h.connect();

      const stale = await startSession(h, conn);
      nowMs += 45_000;
      const fresh = await startSession(h, conn);
      nowMs += 30_000;

      const removed = await h.orchestrator.sweepIdle(new Date(nowMs));

      expect(removed).toBe(1);
      expect(await h.store.get(stale)).toBeNull();
      expect(await h.store.get(fresh)).not.toBeNull();
    });

    it("sweeps on the configured interval", async () => {
      let nowMs = Date.parse("2026-03-01T10:00:00.000Z");
      const h = createHarness({ idleTtlMs: 60_000, now: () => new Date(nowMs) });
      const conn = h.connect();
      const sessionId = await startSession(h, conn);

      vi.useFakeTimers();
      try {
        h.orchestrator.startSweeper(10_000);
        nowMs += 61_000;
        await vi.advanceTimersByTimeAsync(10_000);
      } finally {
        h.orchestrator.stop();
        vi.useRealTimers();
      }

      await waitFor(async () => (await h.store.get(sessionId)) === null);
    });
  });
});
