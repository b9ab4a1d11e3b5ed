import type { PersonalityProfile } from "../profile/types.js";
import type { ContextTurn } from "./types.js";

export interface PromptMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string;
}

export interface Prompt {
  readonly messages: readonly PromptMessage[];
  readonly temperature?: number;
}

const MAX_EXAMPLES = 8;

/**
 * Fold the profile, the active mood and the conversation so far into a chat
 * prompt. Contact turns become `user` messages and the twin's own sent
 * replies become `assistant` messages.
 */
export function buildPrompt(
  profile: PersonalityProfile,
  context: readonly ContextTurn[],
  mood: string,
): Prompt {
  const preset = profile.moodPresets[mood];
  const sections: string[] = [
    `You are replying as ${profile.displayName}'s digital twin. ` +
      "Match their exact communication style, humor and personality. " +
      "Reply with the message text only.",
  ];

  if (preset && preset.instruction.length > 0) {
    sections.push(`Mood (${mood}): ${preset.instruction}`);
  }

  const style = describeStyle(profile.style);
  if (style) {
    sections.push(`Style notes:\n${style}`);
  }

  const examples = profile.examples.slice(0, MAX_EXAMPLES);
  if (examples.length > 0) {
    sections.push(`Messages they have written:\n${examples.map((e) => `- ${e}`).join("\n")}`);
  }

  const messages: PromptMessage[] = [{ role: "system", content: sections.join("\n\n") }];
  for (const turn of context) {
    messages.push({ role: turn.role === "twin" ? "assistant" : "user", content: turn.text });
  }

  return preset?.temperature === undefined
    ? { messages }
    : { messages, temperature: preset.temperature };
}

function describeStyle(style: Readonly<Record<string, unknown>>): string {
  return Object.entries(style)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key, value]) => `- ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join("\n");
}
