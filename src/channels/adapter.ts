import type { TypedEventEmitter } from "../utils/typed-emitter.js";
import type { ChannelAccountConfig } from "../config/types.js";

export interface InboundMessage {
  /** Channel-native message id; replays of the same id are deduplicated. */
  readonly id: string;
  readonly channelId: string;
  readonly senderId: string;
  readonly senderName: string;
  readonly text: string;
  readonly replyToId?: string;
  readonly timestamp: number;
  readonly raw: unknown;
}

export interface SendTextParams {
  readonly to: string;
  readonly text: string;
  readonly replyToId?: string;
}

export type SendResult =
  | { readonly ok: true; readonly messageId: string }
  | { readonly ok: false; readonly retryable: boolean; readonly reason: string };

export interface ChannelEvents {
  error: (err: Error) => void;
  connected: () => void;
  disconnected: (reason?: string) => void;
}

/**
 * The fixed capability set every messaging platform integration provides.
 * The engine depends only on this interface.
 */
export interface ChannelAdapter {
  readonly id: string;
  readonly label: string;
  readonly events: TypedEventEmitter<ChannelEvents>;

  start(config: ChannelAccountConfig, signal: AbortSignal): Promise<void>;
  stop(): Promise<void>;

  /**
   * Inbound messages for as long as the adapter runs. Single-consumer and
   * not restartable: a second call throws.
   */
  receive(): AsyncIterable<InboundMessage>;

  /** Never throws for delivery problems; failures come back as `{ ok: false }`. */
  send(params: SendTextParams): Promise<SendResult>;
}
