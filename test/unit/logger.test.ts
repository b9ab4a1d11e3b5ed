import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("defaults to info", () => {
    const logger = createLogger({ level: "info", json: true });
    expect(logger.level).toBe("info");
  });

  it("uses the configured level", () => {
    expect(createLogger({ level: "debug", json: true }).level).toBe("debug");
    expect(createLogger({ level: "warn", json: true }).level).toBe("warn");
  });

  it("creates child loggers bound to a conversation", () => {
    const logger = createLogger({ level: "error", json: true });
    const child = logger.child({ conversation: "c-1" });
    expect(child.level).toBe("error");
    expect(child.bindings()).toMatchObject({ conversation: "c-1" });
  });
});
