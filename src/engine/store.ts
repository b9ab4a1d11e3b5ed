import type { TwinDB } from "../storage/db.js";
import type { AuditLog } from "../audit/log.js";
import type { AppendAuditParams } from "../audit/types.js";
import type { SafetyMode, VerdictKind } from "../safety/types.js";
import { ConversationId, DecisionId, MessageEventId } from "../utils/types.js";
import { NotFoundError } from "../utils/errors.js";
import {
  canTransition,
  isDecisionState,
  InvalidTransitionError,
  type Decision,
  type DecisionPatch,
  type DecisionState,
} from "./types.js";

interface DecisionRow {
  id: string;
  conversation_id: string;
  message_event_id: string;
  state: string;
  profile_id: string | null;
  mood: string | null;
  safety_mode: SafetyMode | null;
  candidate_text: string | null;
  final_text: string | null;
  verdict: VerdictKind | null;
  verdict_reason: string | null;
  outbound_message_id: string | null;
  created_at: number;
  updated_at: number;
}

/** Audit fields a transition records; decision, conversation and states are filled in. */
export type TransitionAudit = Omit<
  AppendAuditParams,
  "decisionId" | "conversationId" | "fromState" | "toState"
>;

export interface SentReply {
  readonly text: string;
  readonly at: number;
}

export class DecisionStore {
  private readonly db;

  constructor(
    private readonly twinDb: TwinDB,
    private readonly audit: AuditLog,
  ) {
    this.db = twinDb.raw();
  }

  get(decisionId: DecisionId): Decision | null {
    const row = this.db
      .prepare("SELECT * FROM decisions WHERE id = ?")
      .get(decisionId) as DecisionRow | undefined;
    return row ? toDecision(row) : null;
  }

  require(decisionId: DecisionId): Decision {
    const decision = this.get(decisionId);
    if (!decision) throw new NotFoundError("decision", decisionId);
    return decision;
  }

  /**
   * Move `decisionId` from `from` to `to`, applying `patch`, and append one
   * audit record, all in a single transaction. Throws
   * `InvalidTransitionError` if the edge is not in the table or the decision
   * is no longer in `from`.
   */
  transition(
    decisionId: DecisionId,
    from: DecisionState,
    to: DecisionState,
    patch: DecisionPatch,
    audit: TransitionAudit,
  ): Decision {
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(decisionId, from, to, this.get(decisionId)?.state ?? null);
    }

    return this.twinDb.transaction(() => {
      const sets = ["state = ?", "updated_at = ?"];
      const values: Array<string | number> = [to, Date.now()];
      for (const [column, value] of patchColumns(patch)) {
        if (value !== undefined) {
          sets.push(`${column} = ?`);
          values.push(value);
        }
      }

      const result = this.db
        .prepare(`UPDATE decisions SET ${sets.join(", ")} WHERE id = ? AND state = ?`)
        .run(...values, decisionId, from);
      if (result.changes === 0) {
        throw new InvalidTransitionError(decisionId, from, to, this.get(decisionId)?.state ?? null);
      }

      const decision = this.require(decisionId);
      this.audit.append({
        ...audit,
        decisionId,
        conversationId: decision.conversationId,
        fromState: from,
        toState: to,
      });
      return decision;
    });
  }

  /**
   * Record operator-edited text on a decision still awaiting dispatch.
   * Not a state change, so it carries no audit record of its own.
   */
  setFinalText(decisionId: DecisionId, text: string): void {
    const result = this.db
      .prepare(
        "UPDATE decisions SET final_text = ?, updated_at = ? WHERE id = ? AND state = 'PENDING_APPROVAL'",
      )
      .run(text, Date.now(), decisionId);
    if (result.changes === 0) {
      const actual = this.get(decisionId)?.state ?? null;
      throw new InvalidTransitionError(decisionId, "PENDING_APPROVAL", "PENDING_APPROVAL", actual);
    }
  }

  /** Append an audit record about a decision without changing its state. */
  note(decision: Decision, audit: TransitionAudit): void {
    this.audit.append({
      ...audit,
      decisionId: decision.id,
      conversationId: decision.conversationId,
      fromState: decision.state,
      toState: decision.state,
    });
  }

  forMessageEvent(messageEventId: MessageEventId): Decision | null {
    const row = this.db
      .prepare("SELECT * FROM decisions WHERE message_event_id = ?")
      .get(messageEventId) as DecisionRow | undefined;
    return row ? toDecision(row) : null;
  }

  listByState(states: readonly DecisionState[]): Decision[] {
    if (states.length === 0) return [];
    const placeholders = states.map(() => "?").join(", ");
    const rows = this.db
      .prepare(`SELECT * FROM decisions WHERE state IN (${placeholders}) ORDER BY created_at ASC, id ASC`)
      .all(...states) as DecisionRow[];
    return rows.map(toDecision);
  }

  listForConversation(conversationId: ConversationId, limit = 50): Decision[] {
    const rows = this.db
      .prepare("SELECT * FROM decisions WHERE conversation_id = ? ORDER BY created_at DESC LIMIT ?")
      .all(conversationId, limit) as DecisionRow[];
    return rows.map(toDecision);
  }

  /** Text the twin actually sent in this conversation, most recent `limit`, oldest first. */
  sentReplies(conversationId: ConversationId, limit: number): SentReply[] {
    const rows = this.db
      .prepare(
        `SELECT final_text, updated_at FROM (
           SELECT final_text, updated_at FROM decisions
           WHERE conversation_id = ? AND state = 'SENT' AND final_text IS NOT NULL
           ORDER BY updated_at DESC LIMIT ?
         ) ORDER BY updated_at ASC`,
      )
      .all(conversationId, limit) as Array<{ final_text: string; updated_at: number }>;
    return rows.map((r) => ({ text: r.final_text, at: r.updated_at }));
  }

  countByState(): Partial<Record<DecisionState, number>> {
    const rows = this.db
      .prepare("SELECT state, COUNT(*) AS cnt FROM decisions GROUP BY state")
      .all() as Array<{ state: string; cnt: number }>;
    const counts: Partial<Record<DecisionState, number>> = {};
    for (const row of rows) {
      if (isDecisionState(row.state)) counts[row.state] = row.cnt;
    }
    return counts;
  }
}

function patchColumns(patch: DecisionPatch): Array<[string, string | undefined]> {
  return [
    ["profile_id", patch.profileId],
    ["mood", patch.mood],
    ["safety_mode", patch.safetyMode],
    ["candidate_text", patch.candidateText],
    ["final_text", patch.finalText],
    ["verdict", patch.verdict],
    ["verdict_reason", patch.verdictReason],
    ["outbound_message_id", patch.outboundMessageId],
  ];
}

function toDecision(row: DecisionRow): Decision {
  if (!isDecisionState(row.state)) {
    throw new Error(`Unknown decision state in store: ${row.state}`);
  }
  return {
    id: DecisionId.make(row.id),
    conversationId: ConversationId.make(row.conversation_id),
    messageEventId: MessageEventId.make(row.message_event_id),
    state: row.state,
    profileId: row.profile_id,
    mood: row.mood,
    safetyMode: row.safety_mode,
    candidateText: row.candidate_text,
    finalText: row.final_text,
    verdict: row.verdict,
    verdictReason: row.verdict_reason,
    outboundMessageId: row.outbound_message_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
