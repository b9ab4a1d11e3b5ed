import { describe, it, expect, vi } from "vitest";
import { WebhookAdapter } from "../../src/channels/webhook/index.js";
import type { ChannelAccountConfig } from "../../src/config/types.js";
import { silentLogger } from "../helpers/logger.js";

const baseConfig: ChannelAccountConfig = {
  type: "webhook",
  enabled: true,
  port: 0,
  hostname: "127.0.0.1",
  path: "/inbound",
  callbackUrl: "http://callback.test/reply",
  token: "test-secret",
};

function post(body: unknown, token: string | null = "test-secret"): RequestInit {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (token) headers["Authorization"] = `Bearer ${token}`;
  return { method: "POST", headers, body: JSON.stringify(body) };
}

function setup(fetchImpl?: typeof fetch, config: ChannelAccountConfig = baseConfig) {
  const adapter = new WebhookAdapter({ id: "hooks", logger: silentLogger(), fetch: fetchImpl });
  const app = adapter.configure(config);
  return { adapter, app };
}

describe("WebhookAdapter inbound", () => {
  it("accepts a valid message and yields it from receive()", async () => {
    const { adapter, app } = setup();
    const res = await app.request(
      "/inbound",
      post({ messageId: "m1", senderId: "alice", text: "hi there", timestamp: 1_234 }),
    );
    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ accepted: true, messageId: "m1" });

    const iterator = adapter.receive()[Symbol.asyncIterator]();
    const { value } = await iterator.next();
    expect(value).toMatchObject({
      id: "m1",
      channelId: "hooks",
      senderId: "alice",
      senderName: "alice",
      text: "hi there",
      timestamp: 1_234,
    });
  });

  it("requires the bearer token when one is configured", async () => {
    const { app } = setup();
    const res = await app.request("/inbound", post({ messageId: "m1", senderId: "a", text: "x" }, null));
    expect(res.status).toBe(401);
  });

  it("rejects an invalid body", async () => {
    const { app } = setup();
    const res = await app.request("/inbound", post({ senderId: "a" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Invalid request" });
  });

  it("answers 503 once stopped", async () => {
    const { adapter, app } = setup();
    await adapter.stop();
    const res = await app.request("/inbound", post({ messageId: "m1", senderId: "a", text: "x" }));
    expect(res.status).toBe(503);
  });

  it("has a single receiver", () => {
    const { adapter } = setup();
    adapter.receive();
    expect(() => adapter.receive()).toThrow("already has a receiver");
  });
});

describe("WebhookAdapter send", () => {
  const params = { to: "alice", text: "see you at 8", replyToId: "m1" };

  it("posts to the callback and returns its message id", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ messageId: "cb-1" }), { status: 200 }));
    const { adapter } = setup(fetchImpl);

    expect(await adapter.send(params)).toEqual({ ok: true, messageId: "cb-1" });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://callback.test/reply");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(params));
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
  });

  it("generates a message id when the callback returns none", async () => {
    const { adapter } = setup(async () => new Response(null, { status: 204 }));
    const result = await adapter.send(params);
    expect(result.ok && result.messageId.startsWith("webhook-")).toBe(true);
  });

  it("still reports success when the callback body cannot be read", async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("connection reset"));
      },
    });
    const { adapter } = setup(async () => new Response(body, { status: 200 }));
    const result = await adapter.send(params);
    expect(result.ok).toBe(true);
    expect(result.ok && result.messageId.startsWith("webhook-")).toBe(true);
  });

  it.each([
    [503, true],
    [429, true],
    [408, true],
    [400, false],
    [404, false],
  ])("maps HTTP %i to retryable=%s", async (status, retryable) => {
    const { adapter } = setup(async () => new Response("nope", { status }));
    expect(await adapter.send(params)).toEqual({
      ok: false,
      retryable,
      reason: `callback returned HTTP ${status}`,
    });
  });

  it("treats a network error as retryable", async () => {
    const { adapter } = setup(async () => {
      throw new TypeError("fetch failed");
    });
    expect(await adapter.send(params)).toEqual({
      ok: false,
      retryable: true,
      reason: "network error: fetch failed",
    });
  });

  it("refuses text over the configured limit without calling out", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const { adapter } = setup(fetchImpl, { ...baseConfig, maxTextLength: 5 });
    expect(await adapter.send(params)).toEqual({
      ok: false,
      retryable: false,
      reason: "text exceeds 5 characters",
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("fails terminally without a callback URL", async () => {
    const { callbackUrl: _omitted, ...noCallback } = baseConfig;
    const { adapter } = setup(undefined, noCallback);
    expect(await adapter.send(params)).toEqual({
      ok: false,
      retryable: false,
      reason: "no callbackUrl configured",
    });
  });
});
