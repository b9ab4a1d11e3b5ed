import type { ConversationId, DecisionId, MessageEventId, ApprovalRequestId } from "../utils/types.js";
import type { SafetyMode, VerdictKind } from "../safety/types.js";
import { TwinError } from "../utils/errors.js";

export const DECISION_STATES = [
  "RECEIVED",
  "CONTEXT_BUILT",
  "GENERATED",
  "SCREENED",
  "AUTO_DISPATCHED",
  "PENDING_APPROVAL",
  "BLOCKED",
  "SENT",
  "DISCARDED",
  "EXPIRED",
] as const;

export type DecisionState = (typeof DECISION_STATES)[number];

export type TerminalState = Extract<DecisionState, "BLOCKED" | "SENT" | "DISCARDED" | "EXPIRED">;

const TERMINAL: ReadonlySet<DecisionState> = new Set<DecisionState>([
  "BLOCKED",
  "SENT",
  "DISCARDED",
  "EXPIRED",
]);

export const TRANSITIONS: Readonly<Record<DecisionState, readonly DecisionState[]>> = {
  RECEIVED: ["CONTEXT_BUILT", "PENDING_APPROVAL"],
  // CONTEXT_BUILT -> CONTEXT_BUILT is the rebuild after a newer message supersedes generation.
  CONTEXT_BUILT: ["CONTEXT_BUILT", "GENERATED", "PENDING_APPROVAL"],
  GENERATED: ["SCREENED", "PENDING_APPROVAL"],
  SCREENED: ["AUTO_DISPATCHED", "PENDING_APPROVAL", "BLOCKED"],
  AUTO_DISPATCHED: ["SENT", "PENDING_APPROVAL", "DISCARDED"],
  PENDING_APPROVAL: ["SENT", "DISCARDED", "EXPIRED"],
  BLOCKED: [],
  SENT: [],
  DISCARDED: [],
  EXPIRED: [],
};

export function isDecisionState(value: string): value is DecisionState {
  return DECISION_STATES.some((state) => state === value);
}

export function isTerminal(state: DecisionState): state is TerminalState {
  return TERMINAL.has(state);
}

/** Generation may still be restarted with fresh context while in these states. */
export function isPreGenerated(state: DecisionState): boolean {
  return state === "RECEIVED" || state === "CONTEXT_BUILT";
}

export function canTransition(from: DecisionState, to: DecisionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface Decision {
  readonly id: DecisionId;
  readonly conversationId: ConversationId;
  readonly messageEventId: MessageEventId;
  readonly state: DecisionState;
  readonly profileId: string | null;
  readonly mood: string | null;
  readonly safetyMode: SafetyMode | null;
  readonly candidateText: string | null;
  readonly finalText: string | null;
  readonly verdict: VerdictKind | null;
  readonly verdictReason: string | null;
  readonly outboundMessageId: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** Fields a transition may set alongside the new state. */
export interface DecisionPatch {
  readonly profileId?: string;
  readonly mood?: string;
  readonly safetyMode?: SafetyMode;
  readonly candidateText?: string;
  readonly finalText?: string;
  readonly verdict?: VerdictKind;
  readonly verdictReason?: string;
  readonly outboundMessageId?: string;
}

export type ApprovalAction =
  | { readonly kind: "approve" }
  | { readonly kind: "edit"; readonly text: string }
  | { readonly kind: "deny" };

/** What became of one inbound message. */
export type InboundOutcome =
  | { readonly kind: "decided"; readonly decisionId: DecisionId; readonly state: DecisionState }
  | { readonly kind: "duplicate"; readonly messageEventId: MessageEventId }
  | { readonly kind: "superseded"; readonly decisionId: DecisionId }
  | { readonly kind: "queued-as-context"; readonly decisionId: DecisionId }
  | { readonly kind: "refused"; readonly reason: string };

export interface ApprovalOutcome {
  readonly requestId: ApprovalRequestId;
  readonly decisionId: DecisionId;
  readonly state: DecisionState;
}

export class InvalidTransitionError extends TwinError {
  constructor(
    readonly decisionId: DecisionId,
    readonly expected: DecisionState,
    readonly target: DecisionState,
    readonly actual: DecisionState | null,
  ) {
    super(
      "invalid_transition",
      `Decision ${decisionId} cannot move ${expected} -> ${target} (currently ${actual ?? "missing"})`,
    );
  }
}

export class NothingToSendError extends TwinError {
  constructor(readonly decisionId: DecisionId) {
    super(
      "nothing_to_send",
      `Decision ${decisionId} has no candidate text; edit it with replacement text instead`,
    );
  }
}

export class UnknownMoodError extends TwinError {
  constructor(
    readonly mood: string,
    readonly known: readonly string[],
  ) {
    super("unknown_mood", `Unknown mood "${mood}". Known moods: ${known.join(", ")}`);
  }
}
