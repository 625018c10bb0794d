import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";

import { MemorySessionStore, type SessionStore } from "../src/store/session_store";
import { SqliteSessionStore } from "../src/store/sqlite_session_store";

const stores: Array<{ name: string; make: () => SessionStore }> = [
  { name: "memory", make: () => new MemorySessionStore() },
  { name: "sqlite", make: () => new SqliteSessionStore(":memory:") },
];

describe.each(stores)("$name session store", ({ make }) => {
  it("creates a fresh intake session for the user", async () => {
    const store = make();
    const session = await store.create({ userId: "user-1" });

    expect(session.phase).toBe("intake");
    expect(session.user_id).toBe("user-1");
    expect(session.connection_state).toBe("attached");
    expect(session.clarification_round_count).toBe(0);
    expect(await store.get(session.id)).toEqual(session);
    expect(await store.count()).toBe(1);
  });

  it("returns copies, so only save changes the stored record", async () => {
    const store = make();
    const session = await store.create({ userId: "user-1" });

    const read = await store.get(session.id);
    if (!read) throw new Error("session missing");
    read.phase = "analyzing";
    expect((await store.get(session.id))?.phase).toBe("intake");

    await store.save(read);
    expect((await store.get(session.id))?.phase).toBe("analyzing");
  });

  it("round-trips nested workflow state", async () => {
    const store = make();
    const session = await store.create({ userId: "user-1" });
    session.phase = "clarifying";
    session.clarification_round_count = 1;
    session.rounds = [
      {
        round_number: 1,
        questions: [{ question_id: "tone", prompt: "Tone?", kind: "choice", required: true, options: ["formal", "casual"] }],
        answers: { tone: "casual" },
      },
    ];
    session.artifacts = { content: { body: "draft" } };
    await store.save(session);

    expect(await store.get(session.id)).toEqual(session);
  });

  it("deletes once", async () => {
    const store = make();
    const session = await store.create({ userId: "user-1" });

    expect(await store.delete(session.id)).toBe(true);
    expect(await store.delete(session.id)).toBe(false);
    expect(await store.get(session.id)).toBeNull();
  });

  it("lists sessions idle before the cutoff", async () => {
    const store = make();
    const stale = await store.create({ userId: "user-1" });
    const fresh = await store.create({ userId: "user-1" });
    stale.last_activity_at = "2026-03-01T09:00:00.000Z";
    fresh.last_activity_at = "2026-03-01T09:59:00.000Z";
    await store.save(stale);
    await store.save(fresh);

    expect(await store.listIdle(new Date("2026-03-01T09:30:00.000Z"))).toEqual([stale.id]);
  });
});

describe("SqliteSessionStore on disk", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  function tempDbPath() {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-sessions-"));
    return path.join(dir, "nested", "sessions.db");
  }

  it("keeps sessions across reopen", async () => {
    const dbPath = tempDbPath();
    const first = new SqliteSessionStore(dbPath);
    const session = await first.create({ userId: "user-1" });
    session.phase = "clarifying";
    await first.save(session);
    first.close();

    const second = new SqliteSessionStore(dbPath);
    expect((await second.get(session.id))?.phase).toBe("clarifying");
    second.close();
  });

  it("treats a snapshot that fails validation as missing", async () => {
    const dbPath = tempDbPath();
    const store = new SqliteSessionStore(dbPath);
    const session = await store.create({ userId: "user-1" });

    const raw = new Database(dbPath);
    raw.prepare("UPDATE sessions SET snapshot_json = ? WHERE id = ?").run(JSON.stringify({ id: session.id }), session.id);
    raw.close();

    expect(await store.get(session.id)).toBeNull();
    store.close();
  });
});
