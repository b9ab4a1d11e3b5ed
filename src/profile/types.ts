import type { RedlineRule } from "../safety/types.js";
import type { ContactId } from "../utils/types.js";
import { TwinError } from "../utils/errors.js";

export interface MoodPreset {
  /** Folded into the system prompt when this mood is active. */
  readonly instruction: string;
  readonly temperature?: number;
  /** Moods like "savage" legitimately shout; the tone check skips them. */
  readonly allowsIntensity: boolean;
}

export interface PersonalityProfile {
  readonly id: string;
  readonly displayName: string;
  readonly defaultMood: string;
  readonly moodPresets: Readonly<Record<string, MoodPreset>>;
  readonly redlines: readonly RedlineRule[];
  readonly sensitiveTopics: readonly string[];
  /** Learned style parameters. Opaque to the engine, handed to the generator as-is. */
  readonly style: Readonly<Record<string, unknown>>;
  readonly examples: readonly string[];
}

export type ConsentStatus = "unknown" | "granted" | "denied" | "revoked";

export interface Contact {
  readonly id: ContactId;
  readonly channelId: string;
  readonly senderId: string;
  readonly displayName: string | null;
  readonly consent: ConsentStatus;
  readonly profileId: string;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface ConsentChange {
  readonly id: number;
  readonly contactId: ContactId;
  readonly previous: ConsentStatus;
  readonly status: ConsentStatus;
  readonly actor: string;
  readonly timestamp: number;
}

export class ProfileUnavailableError extends TwinError {
  constructor(
    readonly profileId: string,
    readonly reason: "missing" | "corrupt",
    detail?: string,
  ) {
    super(
      `profile_${reason}`,
      `Personality profile "${profileId}" is ${reason}${detail ? `: ${detail}` : ""}`,
    );
  }
}
