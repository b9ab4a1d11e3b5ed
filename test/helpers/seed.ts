import type { TwinDB } from "../../src/storage/db.js";
import { AuditLog } from "../../src/audit/log.js";
import { ConsentRegistry } from "../../src/profile/consent.js";
import { ConversationTracker } from "../../src/conversation/tracker.js";
import type { ContactId, ConversationId, DecisionId, MessageEventId } from "../../src/utils/types.js";

export interface SeededDecision {
  readonly contactId: ContactId;
  readonly conversationId: ConversationId;
  readonly messageEventId: MessageEventId;
  readonly decisionId: DecisionId;
}

/** Insert a contact, conversation, inbound event and a RECEIVED decision for it. */
export function seedDecision(db: TwinDB, senderId = "alice", channelMessageId = "m1"): SeededDecision {
  const audit = new AuditLog(db);
  const tracker = new ConversationTracker(db);
  const contact = new ConsentRegistry(db, audit).ensureContact({
    channelId: "fake",
    senderId,
    profileId: "default",
  });
  const conversation = tracker.resolve(contact.id, "fake");
  const { event } = tracker.recordEvent(conversation.id, {
    channelMessageId,
    content: "hello",
    receivedAt: 1_000,
  });
  const begun = tracker.tryBeginDecision(conversation.id, event.id);
  if (!begun.ok) throw new Error(`conversation busy with ${begun.busy}`);
  return {
    contactId: contact.id,
    conversationId: conversation.id,
    messageEventId: event.id,
    decisionId: begun.decisionId,
  };
}
