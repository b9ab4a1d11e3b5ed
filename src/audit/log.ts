import type { TwinDB } from "../storage/db.js";
import { ConversationId, DecisionId } from "../utils/types.js";
import { isDecisionState } from "../engine/types.js";
import type {
  AppendAuditParams,
  AuditAction,
  AuditQuery,
  AuditRecord,
} from "./types.js";

interface AuditRow {
  id: number;
  timestamp: number;
  decision_id: string | null;
  conversation_id: string | null;
  action: string;
  actor: string;
  operator: string | null;
  from_state: string | null;
  to_state: string | null;
  reason: string | null;
  detail: string | null;
}

const DEFAULT_QUERY_LIMIT = 100;
const MAX_QUERY_LIMIT = 1_000;

/**
 * Append-only record of everything the engine and operators do. The table
 * carries triggers that abort UPDATE and DELETE, so "append-only" holds even
 * for code that bypasses this class.
 */
export class AuditLog {
  private readonly db;
  private readonly insert;

  constructor(twinDb: TwinDB) {
    this.db = twinDb.raw();
    this.insert = this.db.prepare(
      `INSERT INTO audit_log
       (timestamp, decision_id, conversation_id, action, actor, operator, from_state, to_state, reason, detail)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
  }

  append(params: AppendAuditParams): AuditRecord {
    const timestamp = Date.now();
    const actor = params.actor ?? "system";
    const result = this.insert.run(
      timestamp,
      params.decisionId ?? null,
      params.conversationId ?? null,
      params.action,
      actor,
      params.operator ?? null,
      params.fromState ?? null,
      params.toState ?? null,
      params.reason ?? null,
      params.detail ? JSON.stringify(params.detail) : null,
    );
    return {
      id: Number(result.lastInsertRowid),
      timestamp,
      decisionId: params.decisionId ?? null,
      conversationId: params.conversationId ?? null,
      action: params.action,
      actor,
      operator: params.operator ?? null,
      fromState: params.fromState ?? null,
      toState: params.toState ?? null,
      reason: params.reason ?? null,
      detail: params.detail ?? null,
    };
  }

  byDecision(decisionId: DecisionId): AuditRecord[] {
    return this.query({ decisionId, limit: MAX_QUERY_LIMIT });
  }

  /** Records in insertion order, filtered by conversation, decision and/or time range. */
  query(params: AuditQuery = {}): AuditRecord[] {
    const conditions: string[] = [];
    const values: Array<string | number> = [];

    if (params.conversationId) {
      conditions.push("conversation_id = ?");
      values.push(params.conversationId);
    }
    if (params.decisionId) {
      conditions.push("decision_id = ?");
      values.push(params.decisionId);
    }
    if (params.from !== undefined) {
      conditions.push("timestamp >= ?");
      values.push(params.from);
    }
    if (params.to !== undefined) {
      conditions.push("timestamp < ?");
      values.push(params.to);
    }
    if (params.afterId !== undefined) {
      conditions.push("id > ?");
      values.push(params.afterId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = Math.min(params.limit ?? DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT);

    const rows = this.db
      .prepare(`SELECT * FROM audit_log ${where} ORDER BY id ASC LIMIT ?`)
      .all(...values, limit) as AuditRow[];
    return rows.map((r) => this.toRecord(r));
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS cnt FROM audit_log").get() as { cnt: number };
    return row.cnt;
  }

  private toRecord(row: AuditRow): AuditRecord {
    return {
      id: row.id,
      timestamp: row.timestamp,
      decisionId: row.decision_id === null ? null : DecisionId.make(row.decision_id),
      conversationId:
        row.conversation_id === null ? null : ConversationId.make(row.conversation_id),
      action: toAction(row.action),
      actor: row.actor === "operator" ? "operator" : "system",
      operator: row.operator,
      fromState: row.from_state !== null && isDecisionState(row.from_state) ? row.from_state : null,
      toState: row.to_state !== null && isDecisionState(row.to_state) ? row.to_state : null,
      reason: row.reason,
      detail: parseDetail(row.detail),
    };
  }
}

const AUDIT_ACTIONS: ReadonlySet<string> = new Set<AuditAction>([
  "received",
  "context_built",
  "context_rebuilt",
  "generated",
  "generation_failed",
  "screened",
  "auto_dispatched",
  "queued_for_approval",
  "blocked",
  "sent",
  "discarded",
  "expired",
  "approved",
  "edited",
  "denied",
  "consent_changed",
  "recovered",
]);

function isAuditAction(value: string): value is AuditAction {
  return AUDIT_ACTIONS.has(value);
}

function toAction(value: string): AuditAction {
  if (!isAuditAction(value)) {
    throw new Error(`Unknown audit action in log: ${value}`);
  }
  return value;
}

function parseDetail(raw: string | null): Record<string, unknown> | null {
  if (raw === null) return null;
  const parsed: unknown = JSON.parse(raw);
  if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return { value: parsed };
}
