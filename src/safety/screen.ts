import type { PersonalityProfile, ConsentStatus } from "../profile/types.js";
import { evaluateRedlines } from "./redline.js";
import { SEVERITY_RANK, type SafetyPolicy, type Verdict } from "./types.js";

export interface ScreenInput {
  readonly profile: PersonalityProfile;
  readonly contact: { readonly consent: ConsentStatus };
  readonly candidateText: string;
  readonly mood: string;
  readonly policy: SafetyPolicy;
}

const MAX_EXCLAMATIONS = 3;
const SHOUTED_WORD = /\b[A-Z]{3,}\b/;

/**
 * Decide what may happen to a candidate reply. Checks run in a fixed order
 * and the first one that fires wins:
 *
 * 1. unknown consent -> REQUIRE_APPROVAL, whatever the mood or mode
 * 2. denied/revoked consent -> BLOCK
 * 3. redline at or above the block threshold -> BLOCK (mood is never consulted)
 * 4. strict mode -> REQUIRE_APPROVAL
 * 5. moderate mode only: sub-threshold redline, sensitive topic, or a tone the
 *    active mood does not allow -> REQUIRE_APPROVAL
 * 6. otherwise ALLOW
 */
export function screen(input: ScreenInput): Verdict {
  const { profile, contact, candidateText, mood, policy } = input;

  if (contact.consent === "unknown") {
    return { kind: "REQUIRE_APPROVAL", reason: "unknown contact" };
  }
  if (contact.consent === "denied" || contact.consent === "revoked") {
    return { kind: "BLOCK", reason: "consent withdrawn" };
  }

  const hits = evaluateRedlines(profile.redlines, candidateText);
  const threshold = SEVERITY_RANK[policy.blockThreshold];
  const blocking = hits.find((h) => SEVERITY_RANK[h.rule.severity] >= threshold);
  if (blocking) {
    return { kind: "BLOCK", reason: `redline: ${blocking.rule.id}` };
  }

  if (policy.mode === "strict") {
    return { kind: "REQUIRE_APPROVAL", reason: "strict mode" };
  }

  if (policy.mode === "moderate") {
    const minor = hits[0];
    if (minor) {
      return { kind: "REQUIRE_APPROVAL", reason: `redline below threshold: ${minor.rule.id}` };
    }

    const topic = findSensitiveTopic(profile.sensitiveTopics, candidateText);
    if (topic !== null) {
      return { kind: "REQUIRE_APPROVAL", reason: `sensitive topic: ${topic}` };
    }

    const allowsIntensity = profile.moodPresets[mood]?.allowsIntensity ?? false;
    if (!allowsIntensity && isAggressive(candidateText)) {
      return { kind: "REQUIRE_APPROVAL", reason: `tone inconsistent with mood ${mood}` };
    }
  }

  return { kind: "ALLOW" };
}

export function findSensitiveTopic(topics: readonly string[], text: string): string | null {
  for (const topic of topics) {
    const re = new RegExp(`\\b${escapeRegex(topic)}\\b`, "i");
    if (re.test(text)) return topic;
  }
  return null;
}

export function isAggressive(text: string): boolean {
  const exclamations = text.split("!").length - 1;
  return exclamations > MAX_EXCLAMATIONS || SHOUTED_WORD.test(text);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
