import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS contacts (
  id            TEXT PRIMARY KEY,
  channel_id    TEXT NOT NULL,
  sender_id     TEXT NOT NULL,
  display_name  TEXT,
  consent       TEXT NOT NULL DEFAULT 'unknown'
                CHECK(consent IN ('unknown','granted','denied','revoked')),
  profile_id    TEXT NOT NULL,
  created_at    INTEGER NOT NULL,
  updated_at    INTEGER NOT NULL,
  UNIQUE (channel_id, sender_id)
);

CREATE TABLE IF NOT EXISTS consent_history (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  contact_id  TEXT NOT NULL REFERENCES contacts(id),
  previous    TEXT NOT NULL,
  status      TEXT NOT NULL,
  actor       TEXT NOT NULL,
  timestamp   INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_consent_history_contact ON consent_history(contact_id, id);

CREATE TABLE IF NOT EXISTS conversations (
  id                     TEXT PRIMARY KEY,
  contact_id             TEXT NOT NULL REFERENCES contacts(id),
  channel_id             TEXT NOT NULL,
  in_flight_decision_id  TEXT,
  mood_override          TEXT,
  safety_mode_override   TEXT CHECK(safety_mode_override IN ('strict','moderate','lenient')),
  created_at             INTEGER NOT NULL,
  last_activity_at       INTEGER NOT NULL,
  UNIQUE (contact_id, channel_id)
);

CREATE TABLE IF NOT EXISTS message_events (
  id                  TEXT PRIMARY KEY,
  conversation_id     TEXT NOT NULL REFERENCES conversations(id),
  channel_message_id  TEXT NOT NULL,
  content             TEXT NOT NULL,
  received_at         INTEGER NOT NULL,
  recorded_at         INTEGER NOT NULL,
  UNIQUE (conversation_id, channel_message_id)
);
CREATE INDEX IF NOT EXISTS idx_message_events_conversation
  ON message_events(conversation_id, received_at);

CREATE TABLE IF NOT EXISTS decisions (
  id                   TEXT PRIMARY KEY,
  conversation_id      TEXT NOT NULL REFERENCES conversations(id),
  message_event_id     TEXT NOT NULL UNIQUE REFERENCES message_events(id),
  state                TEXT NOT NULL,
  profile_id           TEXT,
  mood                 TEXT,
  safety_mode          TEXT,
  candidate_text       TEXT,
  final_text           TEXT,
  verdict              TEXT CHECK(verdict IN ('ALLOW','BLOCK','REQUIRE_APPROVAL')),
  verdict_reason       TEXT,
  outbound_message_id  TEXT,
  created_at           INTEGER NOT NULL,
  updated_at           INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_decisions_conversation ON decisions(conversation_id, created_at);
CREATE INDEX IF NOT EXISTS idx_decisions_state ON decisions(state);

CREATE TABLE IF NOT EXISTS approval_requests (
  id               TEXT PRIMARY KEY,
  decision_id      TEXT NOT NULL REFERENCES decisions(id),
  status           TEXT NOT NULL DEFAULT 'pending'
                   CHECK(status IN ('pending','approved','edited','denied','expired')),
  reason           TEXT NOT NULL,
  deadline         INTEGER NOT NULL,
  fallback_action  TEXT NOT NULL DEFAULT 'discard' CHECK(fallback_action IN ('discard')),
  resolution_text  TEXT,
  resolved_by      TEXT,
  created_at       INTEGER NOT NULL,
  resolved_at      INTEGER
);
CREATE INDEX IF NOT EXISTS idx_approval_pending
  ON approval_requests(created_at, id) WHERE status = 'pending';
CREATE UNIQUE INDEX IF NOT EXISTS idx_approval_one_pending
  ON approval_requests(decision_id) WHERE status = 'pending';
CREATE INDEX IF NOT EXISTS idx_approval_deadline
  ON approval_requests(deadline) WHERE status = 'pending';

CREATE TABLE IF NOT EXISTS settings (
  key         TEXT PRIMARY KEY,
  value       TEXT NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS audit_log (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp        INTEGER NOT NULL,
  decision_id      TEXT,
  conversation_id  TEXT,
  action           TEXT NOT NULL,
  actor            TEXT NOT NULL CHECK(actor IN ('system','operator')),
  operator         TEXT,
  from_state       TEXT,
  to_state         TEXT,
  reason           TEXT,
  detail           TEXT
);
CREATE INDEX IF NOT EXISTS idx_audit_decision ON audit_log(decision_id, id);
CREATE INDEX IF NOT EXISTS idx_audit_conversation ON audit_log(conversation_id, id);
CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log(timestamp);

CREATE TRIGGER IF NOT EXISTS audit_log_no_update BEFORE UPDATE ON audit_log BEGIN
  SELECT RAISE(ABORT, 'audit_log is append-only');
END;

CREATE TRIGGER IF NOT EXISTS audit_log_no_delete BEFORE DELETE ON audit_log BEGIN
  SELECT RAISE(ABORT, 'audit_log is append-only');
END;
`;

export class TwinDB {
  private db: Database.Database;

  /** Pass `":memory:"` as the directory for a throwaway database. */
  constructor(stateDir: string) {
    this.db = new Database(stateDir === ":memory:" ? ":memory:" : join(stateDir, "twin.db"));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for existing databases.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    const columns = this.db
      .prepare("PRAGMA table_info(decisions)")
      .all() as Array<{ name: string }>;
    if (columns.length > 0 && !columns.some((c) => c.name === "profile_id")) {
      this.db.exec("ALTER TABLE decisions ADD COLUMN profile_id TEXT");
    }
  }

  raw(): Database.Database {
    return this.db;
  }

  /** Run `fn` inside one SQLite transaction; it commits only if `fn` returns. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
