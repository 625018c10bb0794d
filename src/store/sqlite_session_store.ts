import * as fs from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";

import { Session } from "../contracts/session";
import type { Logger } from "../logger";
import { newSession, type SessionStore } from "./session_store";

type SessionRow = {
  id: string;
  snapshot_json: string;
};

/**
 * Session snapshots in SQLite, one JSON document per session. Survives a
 * process restart; idle rows are removed by the orchestrator's sweep.
 */
export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;
  private log?: Logger;

  constructor(dbPath: string = "./data/sessions.db", log?: Logger) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        phase TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_activity_at_ms INTEGER NOT NULL,
        snapshot_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_last_activity ON sessions(last_activity_at_ms);
      CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);
    `);
  }

  private write(session: Session) {
    this.db
      .prepare(
        `INSERT INTO sessions (id, user_id, phase, created_at, last_activity_at_ms, snapshot_json)
         VALUES (@id, @user_id, @phase, @created_at, @last_activity_at_ms, @snapshot_json)
         ON CONFLICT(id) DO UPDATE SET
           phase = excluded.phase,
           last_activity_at_ms = excluded.last_activity_at_ms,
           snapshot_json = excluded.snapshot_json`
      )
      .run({
        id: session.id,
        user_id: session.user_id,
        phase: session.phase,
        created_at: session.created_at,
        last_activity_at_ms: Date.parse(session.last_activity_at),
        snapshot_json: JSON.stringify(session),
      });
  }

  async create(args: { userId: string }): Promise<Session> {
    const session = newSession({ userId: args.userId });
    this.write(session);
    return session;
  }

  async get(sessionId: string): Promise<Session | null> {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT id, snapshot_json FROM sessions WHERE id = ?")
      .get(sessionId);
    if (!row) return null;

    let json: unknown;
    try {
      json = JSON.parse(row.snapshot_json);
    } catch (error) {
      this.log?.error({ sessionId, error: String(error) }, "session_store.snapshot_json_invalid");
      return null;
    }
    const parsed = Session.safeParse(json);
    if (!parsed.success) {
      this.log?.error(
        { sessionId, issue: parsed.error.issues[0]?.message ?? "unknown" },
        "session_store.snapshot_schema_invalid"
      );
      return null;
    }
    return parsed.data;
  }

  async save(session: Session): Promise<void> {
    this.write(session);
  }

  async delete(sessionId: string): Promise<boolean> {
    const info = this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?").run(sessionId);
    return info.changes > 0;
  }

  async listIdle(olderThan: Date): Promise<string[]> {
    const rows = this.db
      .prepare<[number], { id: string }>(
        "SELECT id FROM sessions WHERE last_activity_at_ms < ? ORDER BY last_activity_at_ms"
      )
      .all(olderThan.getTime());
    return rows.map((row) => row.id);
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM sessions").get();
    return row?.total ?? 0;
  }

  close() {
    this.db.close();
  }
}
