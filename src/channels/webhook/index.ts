import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { bearerAuth } from "hono/bearer-auth";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type {
  ChannelAdapter,
  ChannelEvents,
  InboundMessage,
  SendResult,
  SendTextParams,
} from "../adapter.js";
import type { ChannelAccountConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import { errorMessage, TwinError } from "../../utils/errors.js";
import { InboundStream } from "../inbound-stream.js";

const inboundSchema = z.object({
  messageId: z.string().min(1),
  senderId: z.string().min(1),
  senderName: z.string().optional(),
  text: z.string().min(1),
  replyToId: z.string().optional(),
  timestamp: z.number().int().positive().optional(),
});

const callbackResponseSchema = z.object({ messageId: z.string().min(1) });

const SEND_TIMEOUT_MS = 10_000;

export interface WebhookAdapterOptions {
  id: string;
  logger: Logger;
  fetch?: typeof fetch;
}

/**
 * Generic HTTP channel. Inbound messages are POSTed to `path`; replies are
 * POSTed as JSON to `callbackUrl`. 408, 429, 5xx and network errors are
 * reported as retryable, any other non-2xx as terminal.
 */
export class WebhookAdapter implements ChannelAdapter {
  readonly id: string;
  readonly label: string;
  readonly events = new TypedEventEmitter<ChannelEvents>();

  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly stream: InboundStream<InboundMessage>;
  private config: ChannelAccountConfig | null = null;
  private server: ReturnType<typeof serve> | null = null;
  private receiving = false;

  constructor(options: WebhookAdapterOptions) {
    this.id = options.id;
    this.label = `Webhook (${options.id})`;
    this.logger = options.logger.child({ channel: options.id });
    this.fetchImpl = options.fetch ?? fetch;
    this.stream = new InboundStream(options.id);
  }

  /** Build the inbound HTTP app for `config` without listening. */
  configure(config: ChannelAccountConfig): Hono {
    this.config = config;
    const app = new Hono();

    if (config.token) {
      app.use(config.path, bearerAuth({ token: config.token }));
    }

    app.post(config.path, async (c) => {
      const body: unknown = await c.req.json().catch(() => null);
      const parsed = inboundSchema.safeParse(body);
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }

      const msg: InboundMessage = {
        id: parsed.data.messageId,
        channelId: this.id,
        senderId: parsed.data.senderId,
        senderName: parsed.data.senderName ?? parsed.data.senderId,
        text: parsed.data.text,
        replyToId: parsed.data.replyToId,
        timestamp: parsed.data.timestamp ?? Date.now(),
        raw: body,
      };
      if (!this.stream.push(msg)) {
        return c.json({ error: "Channel stopped" }, 503);
      }
      return c.json({ accepted: true, messageId: msg.id }, 202);
    });

    return app;
  }

  async start(config: ChannelAccountConfig, signal: AbortSignal): Promise<void> {
    const app = this.configure(config);
    this.server = serve({ fetch: app.fetch, port: config.port, hostname: config.hostname });
    signal.addEventListener("abort", () => {
      this.stop().catch((err) => {
        this.logger.error({ err }, "Webhook stop failed");
      });
    }, { once: true });

    this.logger.info({ port: config.port, path: config.path }, "Webhook channel listening");
    this.events.emit("connected");
  }

  async stop(): Promise<void> {
    this.stream.close();
    if (this.server) {
      this.server.close();
      this.server = null;
      this.events.emit("disconnected", "stopped");
    }
  }

  receive(): AsyncIterable<InboundMessage> {
    if (this.receiving) {
      throw new TwinError("stream_consumed", `Channel ${this.id} already has a receiver`);
    }
    this.receiving = true;
    return this.stream;
  }

  async send(params: SendTextParams): Promise<SendResult> {
    const callbackUrl = this.config?.callbackUrl;
    if (!callbackUrl) {
      return { ok: false, retryable: false, reason: "no callbackUrl configured" };
    }
    const limit = this.config?.maxTextLength;
    if (limit !== undefined && params.text.length > limit) {
      return { ok: false, retryable: false, reason: `text exceeds ${limit} characters` };
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config?.token) headers["Authorization"] = `Bearer ${this.config.token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(callbackUrl, {
        method: "POST",
        headers,
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      });
    } catch (err) {
      return { ok: false, retryable: true, reason: `network error: ${errorMessage(err)}` };
    }

    if (!res.ok) {
      const retryable = res.status === 408 || res.status === 429 || res.status >= 500;
      return { ok: false, retryable, reason: `callback returned HTTP ${res.status}` };
    }

    // A 2xx is a send even when the body cannot be read.
    let body = "";
    try {
      body = await res.text();
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "Callback body unreadable, using a generated message id");
    }
    return { ok: true, messageId: parseMessageId(body) ?? `webhook-${randomUUID()}` };
  }
}

function parseMessageId(body: string): string | null {
  if (body.length === 0) return null;
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = callbackResponseSchema.safeParse(json);
  return parsed.success ? parsed.data.messageId : null;
}
