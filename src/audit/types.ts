import type { ConversationId, DecisionId } from "../utils/types.js";
import type { DecisionState } from "../engine/types.js";

export type AuditAction =
  | "received"
  | "context_built"
  | "context_rebuilt"
  | "generated"
  | "generation_failed"
  | "screened"
  | "auto_dispatched"
  | "queued_for_approval"
  | "blocked"
  | "sent"
  | "discarded"
  | "expired"
  | "approved"
  | "edited"
  | "denied"
  | "consent_changed"
  | "recovered";

export type AuditActor = "system" | "operator";

export interface AuditRecord {
  readonly id: number;
  readonly timestamp: number;
  readonly decisionId: DecisionId | null;
  readonly conversationId: ConversationId | null;
  readonly action: AuditAction;
  readonly actor: AuditActor;
  readonly operator: string | null;
  readonly fromState: DecisionState | null;
  readonly toState: DecisionState | null;
  readonly reason: string | null;
  readonly detail: Record<string, unknown> | null;
}

export interface AppendAuditParams {
  readonly decisionId?: DecisionId | null;
  readonly conversationId?: ConversationId | null;
  readonly action: AuditAction;
  readonly actor?: AuditActor;
  readonly operator?: string | null;
  readonly fromState?: DecisionState | null;
  readonly toState?: DecisionState | null;
  readonly reason?: string | null;
  readonly detail?: Record<string, unknown> | null;
}

export interface AuditQuery {
  readonly conversationId?: ConversationId;
  readonly decisionId?: DecisionId;
  /** Inclusive lower bound, epoch ms. */
  readonly from?: number;
  /** Exclusive upper bound, epoch ms. */
  readonly to?: number;
  readonly limit?: number;
  /** Return records with an id greater than this, for paging. */
  readonly afterId?: number;
}
