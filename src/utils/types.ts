declare const brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [brand]: B };

export type ContactId = Brand<string, "ContactId">;
export type ConversationId = Brand<string, "ConversationId">;
export type DecisionId = Brand<string, "DecisionId">;
export type MessageEventId = Brand<string, "MessageEventId">;
export type ApprovalRequestId = Brand<string, "ApprovalRequestId">;

export const ContactId = {
  make: (value: string): ContactId => value as ContactId,
  /** Contacts are channel-qualified: the same person on two channels is two contacts. */
  forSender: (channelId: string, senderId: string): ContactId =>
    `${channelId}:${senderId}` as ContactId,
};

export const ConversationId = {
  make: (value: string): ConversationId => value as ConversationId,
};

export const DecisionId = {
  make: (value: string): DecisionId => value as DecisionId,
};

export const MessageEventId = {
  make: (value: string): MessageEventId => value as MessageEventId,
};

export const ApprovalRequestId = {
  make: (value: string): ApprovalRequestId => value as ApprovalRequestId,
};
