import type { InboundMessage } from "../../src/channels/adapter.js";
import type { TwinConfig } from "../../src/config/types.js";
import { parseConfig } from "../../src/config/schema.js";
import type { ProfileSource } from "../../src/engine/decision-engine.js";
import { ProfileUnavailableError, type PersonalityProfile } from "../../src/profile/types.js";

export function makeInboundMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    id: "msg-1",
    channelId: "fake",
    senderId: "alice",
    senderName: "Alice",
    text: "are we still on for tonight?",
    timestamp: 1_000,
    raw: {},
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<PersonalityProfile> = {}): PersonalityProfile {
  return {
    id: "default",
    displayName: "Sam",
    defaultMood: "default",
    moodPresets: {
      default: { instruction: "", allowsIntensity: false },
      savage: { instruction: "Be sarcastic and witty.", temperature: 0.9, allowsIntensity: true },
      professional: { instruction: "Be formal.", temperature: 0.4, allowsIntensity: false },
    },
    redlines: [
      {
        id: "passwords",
        category: "credentials",
        match: { kind: "keyword", value: "password" },
        severity: "critical",
      },
      {
        id: "phone-number",
        category: "personal-info",
        match: { kind: "pattern", value: "phone" },
        severity: "medium",
      },
    ],
    sensitiveTopics: ["politics", "legal issues"],
    style: {},
    examples: [],
    ...overrides,
  };
}

/** In-memory profile source; unknown ids are reported missing. */
export class StaticProfiles implements ProfileSource {
  private readonly profiles = new Map<string, PersonalityProfile>();

  constructor(...profiles: PersonalityProfile[]) {
    for (const p of profiles) this.profiles.set(p.id, p);
  }

  set(profile: PersonalityProfile): void {
    this.profiles.set(profile.id, profile);
  }

  delete(id: string): void {
    this.profiles.delete(id);
  }

  async load(id: string): Promise<PersonalityProfile> {
    const profile = this.profiles.get(id);
    if (!profile) throw new ProfileUnavailableError(id, "missing");
    return profile;
  }
}

const TEST_DEFAULTS: Readonly<Record<string, Record<string, unknown>>> = {
  generation: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 1, timeoutMs: 1_000 },
  dispatch: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 1 },
  safety: { defaultMode: "lenient", blockThreshold: "high" },
  approval: { timeoutMs: 60_000 },
};

/** Defaults tuned for tests: no backoff delays, short timeouts. Sections merge one level deep. */
export function makeConfig(overrides: Record<string, unknown> = {}): TwinConfig {
  const merged: Record<string, unknown> = { ...TEST_DEFAULTS };
  for (const [key, value] of Object.entries(overrides)) {
    const base = TEST_DEFAULTS[key];
    merged[key] = base && isRecord(value) ? { ...base, ...value } : value;
  }
  return parseConfig(merged);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
