import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import { ConfigShowCommand, ConfigValidateCommand, redact } from "../../src/cli/commands/config-cmd.js";
import {
  ProfileInitCommand,
  ProfileRedlineAddCommand,
  ProfileRedlineRemoveCommand,
  ProfileShowCommand,
  ProfileTopicAddCommand,
} from "../../src/cli/commands/profile.js";
import { ProfileStore } from "../../src/profile/store.js";
import { getProfilesDir } from "../../src/config/paths.js";
import { ConsentSetCommand, ConsentShowCommand } from "../../src/cli/commands/consent.js";
import { AuditCommand, formatRecord } from "../../src/cli/commands/audit.js";
import {
  ApprovalsApproveCommand,
  ApprovalsEditCommand,
  ApprovalsListCommand,
} from "../../src/cli/commands/approvals.js";
import { TwinDB } from "../../src/storage/db.js";
import { AuditLog } from "../../src/audit/log.js";
import { ConsentRegistry } from "../../src/profile/consent.js";
import { ApprovalQueue } from "../../src/approval/queue.js";
import { DecisionStore } from "../../src/engine/store.js";
import { DecisionId } from "../../src/utils/types.js";
import { makeConfig } from "../helpers/fixtures.js";
import { seedDecision } from "../helpers/seed.js";

// Helper to capture stdout
function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += String(chunk);
      cb();
    },
  });
  return { stream, output: () => buf };
}

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "twin-cli-"));
  vi.stubEnv("TWIN_STATE_DIR", tempDir);
  vi.stubEnv("TWIN_CONFIG_PATH", join(tempDir, "twin.config.json"));
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  process.exitCode = undefined;
  rmSync(tempDir, { recursive: true, force: true });
});

describe("CLI: config", () => {
  it("validates a correct config file", async () => {
    const configPath = join(tempDir, "valid.json");
    writeFileSync(configPath, JSON.stringify({ safety: { defaultMode: "lenient" } }));

    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(output()).toBe(`Config is valid: ${configPath}\n`);
  });

  it("rejects an invalid config file", async () => {
    const configPath = join(tempDir, "invalid.json");
    writeFileSync(configPath, JSON.stringify({ gateway: { port: "not-a-number" } }));

    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(output()).toBe(`Config is INVALID: ${configPath}\n  - gateway.port: Expected number, received string\n`);
    expect(process.exitCode).toBe(1);
  });

  it("reports a missing config file", async () => {
    const cmd = new ConfigValidateCommand();
    cmd.configFile = join(tempDir, "nonexistent.json");
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(output()).toBe(`Config file not found: ${join(tempDir, "nonexistent.json")}\n`);
  });

  it("shows config with secrets redacted", async () => {
    writeFileSync(
      join(tempDir, "twin.config.json"),
      JSON.stringify({ dashboard: { token: "test-secret" }, generation: { apiKey: "test-secret" } }),
    );
    const cmd = new ConfigShowCommand();
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    const parsed: unknown = JSON.parse(output());
    expect(parsed).toMatchObject({
      dashboard: { token: "***REDACTED***" },
      generation: { apiKey: "***REDACTED***", model: "gpt-4o-mini" },
      safety: { defaultMode: "strict" },
    });
  });

  it("redacts channel tokens and leaves channels without one alone", () => {
    const base = makeConfig();
    const redacted = redact({
      ...base,
      channels: {
        inbox: { ...defaultWebhook(), token: "test-secret" },
        open: defaultWebhook(),
      },
    });
    expect(redacted.channels["inbox"]?.token).toBe("***REDACTED***");
    expect(redacted.channels["open"]?.token).toBeUndefined();
  });
});

function defaultWebhook() {
  return {
    type: "webhook" as const,
    enabled: true,
    port: 19877,
    hostname: "127.0.0.1",
    path: "/inbound",
    callbackUrl: "http://127.0.0.1:9000/outbound",
  };
}

describe("CLI: profile", () => {
  it("creates the starter profile once", async () => {
    const first = new ProfileInitCommand();
    const a = captureStdout();
    first.context = { ...first.context, stdout: a.stream };
    await first.execute();
    expect(a.output()).toBe('Created profile "default" with 6 moods and 12 redlines\n');

    const second = new ProfileInitCommand();
    const b = captureStdout();
    second.context = { ...second.context, stdout: b.stream };
    await second.execute();
    expect(b.output()).toBe('Profile "default" already exists (use --force to overwrite)\n');
    expect(process.exitCode).toBe(1);
  });

  it("overwrites with --force", async () => {
    const init = new ProfileInitCommand();
    init.context = { ...init.context, stdout: captureStdout().stream };
    await init.execute();

    const forced = new ProfileInitCommand();
    forced.force = true;
    forced.displayName = "Sam";
    const { stream, output } = captureStdout();
    forced.context = { ...forced.context, stdout: stream };
    await forced.execute();

    expect(output()).toBe('Created profile "default" with 6 moods and 12 redlines\n');
  });

  it("shows a saved profile", async () => {
    const init = new ProfileInitCommand();
    init.id = "work";
    init.displayName = "Sam at work";
    init.context = { ...init.context, stdout: captureStdout().stream };
    await init.execute();

    const show = new ProfileShowCommand();
    show.id = "work";
    const { stream, output } = captureStdout();
    show.context = { ...show.context, stdout: stream };
    await show.execute();

    const parsed: unknown = JSON.parse(output());
    expect(parsed).toMatchObject({ id: "work", displayName: "Sam at work", defaultMood: "default" });
  });

  it("reports a missing profile", async () => {
    const show = new ProfileShowCommand();
    show.id = "nobody";
    const { stream, output } = captureStdout();
    show.context = { ...show.context, stdout: stream };
    await show.execute();

    expect(output()).toContain('Personality profile "nobody" is missing');
    expect(process.exitCode).toBe(1);
  });
});

describe("CLI: profile rules", () => {
  beforeEach(async () => {
    const init = new ProfileInitCommand();
    init.context = { ...init.context, stdout: captureStdout().stream };
    await init.execute();
  });

  function stored() {
    return new ProfileStore(getProfilesDir(tempDir)).load("default");
  }

  it("adds a keyword redline", async () => {
    const cmd = new ProfileRedlineAddCommand();
    cmd.ruleId = "codename";
    cmd.value = "bluebird";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe('Added redline "codename" to "default" (13 redlines)\n');
    const profile = await stored();
    expect(profile.redlines.at(-1)).toEqual({
      id: "codename",
      category: "custom",
      match: { kind: "keyword", value: "bluebird" },
      severity: "high",
    });
  });

  it("rejects a regex that does not compile", async () => {
    const cmd = new ProfileRedlineAddCommand();
    cmd.ruleId = "broken";
    cmd.value = "(";
    cmd.kind = "regex";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("Invalid redline:\n  - match.value: invalid regular expression\n");
    expect(process.exitCode).toBe(1);
    expect((await stored()).redlines).toHaveLength(12);
  });

  it("rejects an unknown match kind", async () => {
    const cmd = new ProfileRedlineAddCommand();
    cmd.ruleId = "x";
    cmd.value = "y";
    cmd.kind = "glob";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe('Unknown match kind "glob" (expected keyword, regex or pattern)\n');
    expect(process.exitCode).toBe(1);
  });

  it("reports a profile that does not exist", async () => {
    const cmd = new ProfileRedlineAddCommand();
    cmd.ruleId = "codename";
    cmd.value = "bluebird";
    cmd.profile = "nobody";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe('Personality profile "nobody" is missing\n');
    expect(process.exitCode).toBe(1);
  });

  it("removes a redline once", async () => {
    const first = new ProfileRedlineRemoveCommand();
    first.ruleId = "passwords";
    const a = captureStdout();
    first.context = { ...first.context, stdout: a.stream };
    await first.execute();
    expect(a.output()).toBe('Removed redline "passwords" from "default" (11 redlines)\n');

    const again = new ProfileRedlineRemoveCommand();
    again.ruleId = "passwords";
    const b = captureStdout();
    again.context = { ...again.context, stdout: b.stream };
    await again.execute();
    expect(b.output()).toBe('Profile "default" has no redline "passwords"\n');
    expect(process.exitCode).toBe(1);
  });

  it("adds a sensitive topic in lower case, once", async () => {
    for (const topic of ["Rent ", "rent"]) {
      const cmd = new ProfileTopicAddCommand();
      cmd.topic = topic;
      const { stream, output } = captureStdout();
      cmd.context = { ...cmd.context, stdout: stream };
      await cmd.execute();
      expect(output()).toBe('Added sensitive topic "rent" to "default" (7 topics)\n');
    }
    expect((await stored()).sensitiveTopics.at(-1)).toBe("rent");
  });
});

describe("CLI: consent", () => {
  beforeEach(() => {
    const db = new TwinDB(tempDir);
    new ConsentRegistry(db, new AuditLog(db)).ensureContact({
      channelId: "webhook",
      senderId: "alice",
      profileId: "default",
    });
    db.close();
  });

  it("sets consent and shows the history", async () => {
    const set = new ConsentSetCommand();
    set.contactId = "webhook:alice";
    set.status = "granted";
    set.operator = "pat";
    const a = captureStdout();
    set.context = { ...set.context, stdout: a.stream };
    await set.execute();
    expect(a.output()).toBe("webhook:alice: consent granted\n");

    const show = new ConsentShowCommand();
    show.contactId = "webhook:alice";
    const b = captureStdout();
    show.context = { ...show.context, stdout: b.stream };
    await show.execute();

    const lines = b.output().split("\n");
    expect(lines[0]).toBe("webhook:alice: consent granted (profile default)");
    expect(lines[1]).toMatch(/^ {2}\S+ {2}unknown -> granted {2}by pat$/);
    expect(lines).toHaveLength(3);
  });

  it("rejects an unknown status", async () => {
    const set = new ConsentSetCommand();
    set.contactId = "webhook:alice";
    set.status = "maybe";
    const { stream, output } = captureStdout();
    set.context = { ...set.context, stdout: stream };
    await set.execute();

    expect(output()).toBe('Unknown consent status "maybe" (expected unknown, granted, denied or revoked)\n');
    expect(process.exitCode).toBe(1);
  });

  it("reports an unknown contact", async () => {
    const set = new ConsentSetCommand();
    set.contactId = "webhook:nobody";
    set.status = "granted";
    const { stream, output } = captureStdout();
    set.context = { ...set.context, stdout: stream };
    await set.execute();

    expect(output()).toBe("contact not found: webhook:nobody\n");
    expect(process.exitCode).toBe(1);
  });
});

describe("CLI: audit", () => {
  it("formats an operator transition", () => {
    const line = formatRecord({
      id: 7,
      timestamp: 0,
      decisionId: DecisionId.make("d-1"),
      conversationId: null,
      action: "sent",
      actor: "operator",
      operator: "pat",
      fromState: "PENDING_APPROVAL",
      toState: "SENT",
      reason: null,
      detail: null,
    });
    expect(line).toBe("1970-01-01T00:00:00.000Z #7 sent d-1 PENDING_APPROVAL -> SENT by operator:pat");
  });

  it("formats a system record without states", () => {
    const line = formatRecord({
      id: 1,
      timestamp: 0,
      decisionId: null,
      conversationId: null,
      action: "consent_changed",
      actor: "system",
      operator: null,
      fromState: null,
      toState: null,
      reason: "unknown -> granted",
      detail: null,
    });
    expect(line).toBe("1970-01-01T00:00:00.000Z #1 consent_changed by system (unknown -> granted)");
  });

  it("prints records as JSON lines", async () => {
    const db = new TwinDB(tempDir);
    const audit = new AuditLog(db);
    audit.append({ action: "consent_changed", actor: "operator", operator: "pat", reason: "unknown -> granted" });
    audit.append({ action: "consent_changed", actor: "operator", operator: "pat", reason: "granted -> revoked" });
    db.close();

    const cmd = new AuditCommand();
    cmd.json = true;
    cmd.limit = 1;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    const lines = output().trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({ id: 1, operator: "pat", reason: "unknown -> granted" });
  });
});

describe("CLI: approvals", () => {
  it("says so when nothing is pending", async () => {
    const cmd = new ApprovalsListCommand();
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("No pending approvals\n");
  });

  it("lists pending requests with their draft", async () => {
    const db = new TwinDB(tempDir);
    const seeded = seedDecision(db);
    new DecisionStore(db, new AuditLog(db)).transition(
      seeded.decisionId,
      "RECEIVED",
      "PENDING_APPROVAL",
      {},
      { action: "queued_for_approval", reason: "strict mode" },
    );
    const queue = new ApprovalQueue(db);
    const request = queue.enqueue(seeded.decisionId, Date.UTC(2100, 0, 1), "strict mode");
    queue.enqueue(seedDecision(db, "bob", "m-bob").decisionId, 0, "strict mode");
    db.close();

    const cmd = new ApprovalsListCommand();
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe(
      `${request.id}  due 2100-01-01T00:00:00.000Z  [strict mode]\n    (no draft; edit required)\n`,
    );
  });

  it("approves through the gateway", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      new Response(JSON.stringify({ requestId: "r1", decisionId: "d1", state: "SENT" }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const cmd = new ApprovalsApproveCommand();
    cmd.requestId = "r1";
    cmd.operator = "pat";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("r1: approve -> SENT\n");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://127.0.0.1:19876/approvals/r1/approve");
    expect(init?.body).toBe(JSON.stringify({ operator: "pat" }));
  });

  it("reports a rejected edit", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () =>
        new Response(JSON.stringify({ error: "already_resolved", message: "Approval request r1 is already denied" }), {
          status: 409,
        }),
      ),
    );

    const cmd = new ApprovalsEditCommand();
    cmd.requestId = "r1";
    cmd.text = "see you at 8";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("Could not edit r1: Approval request r1 is already denied (HTTP 409)\n");
    expect(process.exitCode).toBe(1);
  });

  it("reports an unreachable gateway", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const cmd = new ApprovalsApproveCommand();
    cmd.requestId = "r1";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    await cmd.execute();

    expect(output()).toBe("Gateway unreachable: fetch failed\n");
  });
});
