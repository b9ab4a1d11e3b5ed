import { describe, it, expect } from "vitest";
import { InboundStream } from "../../src/channels/inbound-stream.js";

describe("InboundStream", () => {
  it("delivers buffered items before waiting for new ones", async () => {
    const stream = new InboundStream<number>("test");
    stream.push(1);
    stream.push(2);
    expect(stream.buffered).toBe(2);

    const iterator = stream[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 1, done: false });
    expect(await iterator.next()).toEqual({ value: 2, done: false });

    const pending = iterator.next();
    stream.push(3);
    expect(await pending).toEqual({ value: 3, done: false });
  });

  it("ends after close once the buffer drains", async () => {
    const stream = new InboundStream<string>("test");
    stream.push("last");
    stream.close();
    expect(stream.push("late")).toBe(false);

    const seen: string[] = [];
    for await (const item of stream) seen.push(item);
    expect(seen).toEqual(["last"]);
  });

  it("wakes a waiting consumer on close", async () => {
    const stream = new InboundStream<string>("test");
    const iterator = stream[Symbol.asyncIterator]();
    const pending = iterator.next();
    stream.close();
    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it("accepts exactly one consumer", () => {
    const stream = new InboundStream<string>("test");
    stream[Symbol.asyncIterator]();
    expect(() => stream[Symbol.asyncIterator]()).toThrow("already has a consumer");
  });

  it("closes when the consumer breaks out of the loop", async () => {
    const stream = new InboundStream<string>("test");
    stream.push("a");
    stream.push("b");
    for await (const item of stream) {
      expect(item).toBe("a");
      break;
    }
    expect(stream.isClosed).toBe(true);
    expect(stream.buffered).toBe(0);
  });
});
