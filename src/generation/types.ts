import type { PersonalityProfile } from "../profile/types.js";
import { TwinError } from "../utils/errors.js";

/** One message of conversation history, as the generator sees it. */
export interface ContextTurn {
  readonly role: "contact" | "twin";
  readonly text: string;
  readonly at: number;
}

export interface GenerationRequest {
  readonly profile: PersonalityProfile;
  readonly mood: string;
  /** Oldest first; the message being answered is last. */
  readonly context: readonly ContextTurn[];
}

/**
 * Produces a candidate reply. Implementations must stop promptly when
 * `signal` aborts and report failures as `GenerationError`.
 */
export interface GenerationService {
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export class GenerationError extends TwinError {
  constructor(
    message: string,
    readonly retryable: boolean,
    options?: ErrorOptions,
  ) {
    super("generation_failed", message, options);
  }
}
