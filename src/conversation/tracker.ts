import { randomUUID } from "node:crypto";
import type { TwinDB } from "../storage/db.js";
import {
  ContactId,
  ConversationId,
  DecisionId,
  MessageEventId,
} from "../utils/types.js";
import { NotFoundError, TwinError } from "../utils/errors.js";
import { isTerminal, type TerminalState } from "../engine/types.js";
import type { SafetyMode } from "../safety/types.js";
import type {
  BeginDecisionResult,
  Conversation,
  ConversationHandle,
  MessageEvent,
  RecordEventParams,
  RecordEventResult,
} from "./types.js";

interface ConversationRow {
  id: string;
  contact_id: string;
  channel_id: string;
  in_flight_decision_id: string | null;
  mood_override: string | null;
  safety_mode_override: SafetyMode | null;
  created_at: number;
  last_activity_at: number;
}

interface MessageEventRow {
  id: string;
  conversation_id: string;
  channel_message_id: string;
  content: string;
  received_at: number;
  recorded_at: number;
}

/**
 * Single source of truth for conversation identity and the single-flight
 * gate. Every state change is a conditional UPDATE so two callers racing on
 * the same conversation cannot both win, and readers never wait on a lock.
 */
export class ConversationTracker {
  private readonly db;

  constructor(private readonly twinDb: TwinDB) {
    this.db = twinDb.raw();
  }

  resolve(contactId: ContactId, channelId: string): ConversationHandle {
    const now = Date.now();
    const inserted = this.db
      .prepare(
        `INSERT OR IGNORE INTO conversations (id, contact_id, channel_id, created_at, last_activity_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(randomUUID(), contactId, channelId, now, now);

    if (inserted.changes === 0) {
      this.db
        .prepare(
          "UPDATE conversations SET last_activity_at = ? WHERE contact_id = ? AND channel_id = ?",
        )
        .run(now, contactId, channelId);
    }

    const row = this.db
      .prepare("SELECT * FROM conversations WHERE contact_id = ? AND channel_id = ?")
      .get(contactId, channelId) as ConversationRow | undefined;
    if (!row) throw new NotFoundError("conversation", `${channelId}/${contactId}`);

    return {
      id: ConversationId.make(row.id),
      contactId: ContactId.make(row.contact_id),
      channelId: row.channel_id,
      created: inserted.changes > 0,
    };
  }

  /**
   * Claim the conversation for a new decision about `messageEventId`. Fails
   * with the current in-flight decision when one is still non-terminal.
   */
  tryBeginDecision(
    conversationId: ConversationId,
    messageEventId: MessageEventId,
  ): BeginDecisionResult {
    return this.twinDb.transaction((): BeginDecisionResult => {
      const now = Date.now();
      const existing = this.db
        .prepare("SELECT id FROM decisions WHERE message_event_id = ?")
        .get(messageEventId) as { id: string } | undefined;
      if (existing) {
        throw new TwinError(
          "event_already_decided",
          `Message event ${messageEventId} already has decision ${existing.id}`,
        );
      }

      const decisionId = DecisionId.make(randomUUID());
      const claimed = this.db
        .prepare(
          `UPDATE conversations SET in_flight_decision_id = ?, last_activity_at = ?
           WHERE id = ? AND in_flight_decision_id IS NULL`,
        )
        .run(decisionId, now, conversationId);

      if (claimed.changes === 0) {
        const current = this.require(conversationId);
        this.touch(conversationId, now);
        if (current.inFlightDecisionId === null) {
          throw new TwinError("conversation_race", `Conversation ${conversationId} changed mid-claim`);
        }
        return { ok: false, busy: current.inFlightDecisionId };
      }

      this.db
        .prepare(
          `INSERT INTO decisions (id, conversation_id, message_event_id, state, created_at, updated_at)
           VALUES (?, ?, ?, 'RECEIVED', ?, ?)`,
        )
        .run(decisionId, conversationId, messageEventId, now, now);
      return { ok: true, decisionId };
    });
  }

  /**
   * Release the single-flight claim once `decisionId` has reached
   * `terminalState`. Returns false when the conversation was not held by it.
   */
  completeDecision(decisionId: DecisionId, terminalState: TerminalState): boolean {
    if (!isTerminal(terminalState)) {
      throw new TwinError("not_terminal", `${String(terminalState)} is not a terminal state`);
    }
    const decision = this.db
      .prepare("SELECT state, conversation_id FROM decisions WHERE id = ?")
      .get(decisionId) as { state: string; conversation_id: string } | undefined;
    if (!decision) throw new NotFoundError("decision", decisionId);
    if (decision.state !== terminalState) {
      throw new TwinError(
        "state_mismatch",
        `Decision ${decisionId} is ${decision.state}, not ${terminalState}`,
      );
    }

    const released = this.db
      .prepare(
        `UPDATE conversations SET in_flight_decision_id = NULL, last_activity_at = ?
         WHERE id = ? AND in_flight_decision_id = ?`,
      )
      .run(Date.now(), decision.conversation_id, decisionId);
    return released.changes > 0;
  }

  recordEvent(conversationId: ConversationId, params: RecordEventParams): RecordEventResult {
    const now = Date.now();
    const inserted = this.db
      .prepare(
        `INSERT OR IGNORE INTO message_events
         (id, conversation_id, channel_message_id, content, received_at, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(randomUUID(), conversationId, params.channelMessageId, params.content, params.receivedAt, now);
    this.touch(conversationId, now);

    const row = this.db
      .prepare("SELECT * FROM message_events WHERE conversation_id = ? AND channel_message_id = ?")
      .get(conversationId, params.channelMessageId) as MessageEventRow | undefined;
    if (!row) throw new NotFoundError("message event", params.channelMessageId);

    const event = toEvent(row);
    return inserted.changes > 0 ? { kind: "recorded", event } : { kind: "duplicate", event };
  }

  findEvent(conversationId: ConversationId, channelMessageId: string): MessageEvent | null {
    const row = this.db
      .prepare("SELECT * FROM message_events WHERE conversation_id = ? AND channel_message_id = ?")
      .get(conversationId, channelMessageId) as MessageEventRow | undefined;
    return row ? toEvent(row) : null;
  }

  getEvent(messageEventId: MessageEventId): MessageEvent | null {
    const row = this.db
      .prepare("SELECT * FROM message_events WHERE id = ?")
      .get(messageEventId) as MessageEventRow | undefined;
    return row ? toEvent(row) : null;
  }

  /** Most recent `limit` events, returned oldest first. */
  recentEvents(conversationId: ConversationId, limit: number): MessageEvent[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM (
           SELECT * FROM message_events WHERE conversation_id = ?
           ORDER BY received_at DESC, recorded_at DESC LIMIT ?
         ) ORDER BY received_at ASC, recorded_at ASC`,
      )
      .all(conversationId, limit) as MessageEventRow[];
    return rows.map(toEvent);
  }

  get(conversationId: ConversationId): Conversation | null {
    const row = this.db
      .prepare("SELECT * FROM conversations WHERE id = ?")
      .get(conversationId) as ConversationRow | undefined;
    return row ? toConversation(row) : null;
  }

  require(conversationId: ConversationId): Conversation {
    const conversation = this.get(conversationId);
    if (!conversation) throw new NotFoundError("conversation", conversationId);
    return conversation;
  }

  list(limit = 100): Conversation[] {
    const rows = this.db
      .prepare("SELECT * FROM conversations ORDER BY last_activity_at DESC LIMIT ?")
      .all(limit) as ConversationRow[];
    return rows.map(toConversation);
  }

  setMood(conversationId: ConversationId, mood: string | null): Conversation {
    const result = this.db
      .prepare("UPDATE conversations SET mood_override = ?, last_activity_at = ? WHERE id = ?")
      .run(mood, Date.now(), conversationId);
    if (result.changes === 0) throw new NotFoundError("conversation", conversationId);
    return this.require(conversationId);
  }

  setSafetyMode(conversationId: ConversationId, mode: SafetyMode | null): Conversation {
    const result = this.db
      .prepare("UPDATE conversations SET safety_mode_override = ?, last_activity_at = ? WHERE id = ?")
      .run(mode, Date.now(), conversationId);
    if (result.changes === 0) throw new NotFoundError("conversation", conversationId);
    return this.require(conversationId);
  }

  private touch(conversationId: ConversationId, now: number): void {
    this.db
      .prepare("UPDATE conversations SET last_activity_at = ? WHERE id = ?")
      .run(now, conversationId);
  }
}

function toConversation(row: ConversationRow): Conversation {
  return {
    id: ConversationId.make(row.id),
    contactId: ContactId.make(row.contact_id),
    channelId: row.channel_id,
    inFlightDecisionId:
      row.in_flight_decision_id === null ? null : DecisionId.make(row.in_flight_decision_id),
    moodOverride: row.mood_override,
    safetyModeOverride: row.safety_mode_override,
    createdAt: row.created_at,
    lastActivityAt: row.last_activity_at,
  };
}

function toEvent(row: MessageEventRow): MessageEvent {
  return {
    id: MessageEventId.make(row.id),
    conversationId: ConversationId.make(row.conversation_id),
    channelMessageId: row.channel_message_id,
    content: row.content,
    receivedAt: row.received_at,
    recordedAt: row.recorded_at,
  };
}
