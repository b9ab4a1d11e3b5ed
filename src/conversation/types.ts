import type { ContactId, ConversationId, DecisionId, MessageEventId } from "../utils/types.js";
import type { SafetyMode } from "../safety/types.js";

export interface Conversation {
  readonly id: ConversationId;
  readonly contactId: ContactId;
  readonly channelId: string;
  readonly inFlightDecisionId: DecisionId | null;
  readonly moodOverride: string | null;
  readonly safetyModeOverride: SafetyMode | null;
  readonly createdAt: number;
  readonly lastActivityAt: number;
}

/** What `resolve` hands back: enough to address the conversation and its channel. */
export interface ConversationHandle {
  readonly id: ConversationId;
  readonly contactId: ContactId;
  readonly channelId: string;
  readonly created: boolean;
}

export interface MessageEvent {
  readonly id: MessageEventId;
  readonly conversationId: ConversationId;
  readonly channelMessageId: string;
  readonly content: string;
  readonly receivedAt: number;
  readonly recordedAt: number;
}

export interface RecordEventParams {
  readonly channelMessageId: string;
  readonly content: string;
  readonly receivedAt: number;
}

export type RecordEventResult =
  | { readonly kind: "recorded"; readonly event: MessageEvent }
  | { readonly kind: "duplicate"; readonly event: MessageEvent };

export type BeginDecisionResult =
  | { readonly ok: true; readonly decisionId: DecisionId }
  | { readonly ok: false; readonly busy: DecisionId };
