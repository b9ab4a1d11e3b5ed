import type { ChannelRegistry } from "../channels/registry.js";
import type { SendResult, SendTextParams } from "../channels/adapter.js";
import type { DispatchConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { retry } from "../utils/retry.js";
import { TwinError, errorMessage } from "../utils/errors.js";

export class DispatchError extends TwinError {
  constructor(
    readonly reason: string,
    readonly retryable: boolean,
  ) {
    super("dispatch_failed", reason);
  }
}

export type DispatchOutcome =
  | { readonly ok: true; readonly messageId: string; readonly attempts: number }
  | {
      readonly ok: false;
      readonly retryable: boolean;
      readonly reason: string;
      readonly attempts: number;
    };

export interface DispatcherDeps {
  registry: ChannelRegistry;
  config: DispatchConfig;
  logger: Logger;
}

/**
 * Sends through the channel adapter, retrying retryable failures with
 * jittered exponential backoff. Never throws for delivery problems.
 */
export class Dispatcher {
  private readonly registry: ChannelRegistry;
  private readonly config: DispatchConfig;
  private readonly logger: Logger;

  constructor(deps: DispatcherDeps) {
    this.registry = deps.registry;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: "dispatch" });
  }

  async dispatch(channelId: string, params: SendTextParams, signal?: AbortSignal): Promise<DispatchOutcome> {
    const adapter = this.registry.get(channelId);
    if (!adapter) {
      return { ok: false, retryable: false, reason: `channel ${channelId} is not available`, attempts: 0 };
    }

    let attempts = 0;
    try {
      const messageId = await retry(
        async () => {
          attempts++;
          let result: SendResult;
          try {
            result = await adapter.send(params);
          } catch (err) {
            throw new DispatchError(`adapter threw: ${errorMessage(err)}`, true);
          }
          if (!result.ok) throw new DispatchError(result.reason, result.retryable);
          return result.messageId;
        },
        {
          maxAttempts: this.config.maxAttempts,
          baseDelayMs: this.config.baseDelayMs,
          maxDelayMs: this.config.maxDelayMs,
          signal,
          shouldRetry: (err) => err instanceof DispatchError && err.retryable,
          onRetry: (err, attempt, delayMs) => {
            this.logger.warn(
              { channel: channelId, attempt: attempt + 1, delayMs, err: errorMessage(err) },
              "Send failed, retrying",
            );
          },
        },
      );
      return { ok: true, messageId, attempts };
    } catch (err) {
      if (err instanceof DispatchError) {
        return { ok: false, retryable: err.retryable, reason: err.reason, attempts };
      }
      throw err;
    }
  }
}
