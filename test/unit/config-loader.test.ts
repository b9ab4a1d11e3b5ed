import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError, loadConfig, parseConfigText, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-secret";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("token: ${env:TEST_TOKEN}")).toBe("token: test-secret");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TOKEN}:${env:TEST_PORT}")).toBe("test-secret:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.gateway).toEqual({ port: 19876, hostname: "127.0.0.1" });
    expect(config.safety).toEqual({ defaultMode: "strict", blockThreshold: "low" });
    expect(config.approval).toEqual({ timeoutMs: 600_000, sweepIntervalMs: 30_000 });
    expect(config.engine.contextWindow).toBe(20);
    expect(config.engine.defaultProfileId).toBe("default");
    expect(config.generation.provider).toBe("openai-compat");
    expect(config.dispatch.maxAttempts).toBe(3);
    expect(config.channels).toEqual({});
  });

  it("defaults webhook channel fields", () => {
    const config = parseConfig({
      channels: { hooks: { type: "webhook", enabled: true, port: 8081 } },
    });
    expect(config.channels["hooks"]).toEqual({
      type: "webhook",
      enabled: true,
      port: 8081,
      hostname: "127.0.0.1",
      path: "/inbound",
    });
  });

  it("rejects an unknown safety mode", () => {
    expect(() => parseConfig({ safety: { defaultMode: "yolo" } })).toThrow();
  });

  it("rejects an unknown channel type", () => {
    expect(() => parseConfig({ channels: { x: { type: "telegram", port: 1 } } })).toThrow();
  });

  it("rejects a webhook path without a leading slash", () => {
    expect(() =>
      parseConfig({ channels: { x: { type: "webhook", port: 1, path: "inbound" } } }),
    ).toThrow();
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "twin-config-"));
    process.env["TEST_DASHBOARD_TOKEN"] = "test-secret";
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    delete process.env["TEST_DASHBOARD_TOKEN"];
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(tempDir, "absent.json"));
    expect(config.gateway.port).toBe(19876);
  });

  it("reads the file and substitutes env references", () => {
    const path = join(tempDir, "twin.config.json");
    writeFileSync(
      path,
      JSON.stringify({ dashboard: { token: "${env:TEST_DASHBOARD_TOKEN}" }, safety: { defaultMode: "moderate" } }),
    );
    const config = loadConfig(path);
    expect(config.dashboard.token).toBe("test-secret");
    expect(config.safety.defaultMode).toBe("moderate");
  });

  it("throws on malformed JSON", () => {
    const path = join(tempDir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow();
  });

  it("names the file and the failing fields", () => {
    const path = join(tempDir, "bad.json");
    writeFileSync(path, JSON.stringify({ gateway: { port: "not-a-number" } }));
    let caught: unknown;
    try {
      loadConfig(path);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: "config_invalid",
      problems: ["gateway.port: Expected number, received string"],
    });
  });
});

describe("parseConfigText", () => {
  it("reports a missing env reference as a config problem", () => {
    expect(() => parseConfigText('{"dashboard":{"token":"${env:TWIN_NOT_SET}"}}', "inline")).toThrow(
      "inline: Missing environment variable: TWIN_NOT_SET (referenced as ${env:TWIN_NOT_SET})",
    );
  });
});
