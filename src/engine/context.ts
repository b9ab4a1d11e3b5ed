import type { MessageEvent } from "../conversation/types.js";
import type { ContextTurn } from "../generation/types.js";
import type { SentReply } from "./store.js";

/**
 * Interleave what the contact wrote with what the twin sent, by time, and
 * keep the newest `window` turns. Ties put the contact's message first.
 */
export function buildContext(
  events: readonly MessageEvent[],
  replies: readonly SentReply[],
  window: number,
): ContextTurn[] {
  const turns: ContextTurn[] = [
    ...events.map((e): ContextTurn => ({ role: "contact", text: e.content, at: e.receivedAt })),
    ...replies.map((r): ContextTurn => ({ role: "twin", text: r.text, at: r.at })),
  ];
  turns.sort((a, b) => a.at - b.at || rank(a) - rank(b));
  return turns.slice(-window);
}

function rank(turn: ContextTurn): number {
  return turn.role === "contact" ? 0 : 1;
}
