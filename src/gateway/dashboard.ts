import { Hono, type Context } from "hono";
import { bearerAuth } from "hono/bearer-auth";
import { HTTPException } from "hono/http-exception";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { DecisionEngine } from "../engine/decision-engine.js";
import type { DecisionStore } from "../engine/store.js";
import type { ApprovalQueue } from "../approval/queue.js";
import type { ConversationTracker } from "../conversation/tracker.js";
import type { ConsentRegistry } from "../profile/consent.js";
import type { SettingsStore } from "../storage/settings.js";
import type { AuditLog } from "../audit/log.js";
import type { ChannelRegistry } from "../channels/registry.js";
import type { Logger } from "../logging/logger.js";
import type { Severity } from "../safety/types.js";
import type { ApprovalRequest } from "../approval/types.js";
import type { ProfileStore } from "../profile/store.js";
import { ProfileUnavailableError } from "../profile/types.js";
import { redlineRuleSchema } from "../profile/schema.js";
import { safetyModeSchema } from "../config/schema.js";
import { AlreadyResolvedError } from "../approval/types.js";
import { InvalidTransitionError, NothingToSendError, UnknownMoodError } from "../engine/types.js";
import { NotFoundError, TwinError } from "../utils/errors.js";
import { ApprovalRequestId, ContactId, ConversationId, DecisionId } from "../utils/types.js";

const DEFAULT_OPERATOR = "dashboard";

const resolveSchema = z.object({ operator: z.string().min(1).optional() });
const editSchema = resolveSchema.extend({ text: z.string().trim().min(1) });
const moodSchema = z.object({ mood: z.string().min(1).nullable() });
const conversationModeSchema = z.object({ mode: safetyModeSchema.nullable() });
const globalModeSchema = z.object({ mode: safetyModeSchema });
const consentSchema = z.object({
  status: z.enum(["unknown", "granted", "denied", "revoked"]),
  operator: z.string().min(1).optional(),
});
const auditQuerySchema = z.object({
  conversationId: z.string().min(1).optional(),
  decisionId: z.string().min(1).optional(),
  from: z.coerce.number().int().nonnegative().optional(),
  to: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});
const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});
const topicSchema = z.object({ topic: z.string().trim().min(1) });

/** The profile operations the dashboard exposes. `ProfileStore` in production. */
export type ProfileEditor = Pick<ProfileStore, "load" | "addRedline" | "removeRedline" | "addSensitiveTopic">;

export interface DashboardDeps {
  engine: DecisionEngine;
  decisions: DecisionStore;
  approvals: ApprovalQueue;
  tracker: ConversationTracker;
  consent: ConsentRegistry;
  settings: SettingsStore;
  audit: AuditLog;
  registry: ChannelRegistry;
  profiles: ProfileEditor;
  logger: Logger;
  blockThreshold: Severity;
  token?: string;
  now?: () => number;
}

type ErrorStatus = 400 | 404 | 409 | 422 | 500;

interface PendingApprovalView extends ApprovalRequest {
  readonly conversationId: ConversationId | null;
  readonly candidateText: string | null;
  readonly finalText: string | null;
  readonly mood: string | null;
  readonly verdict: string | null;
}

/** Operator-facing HTTP API. Every route but /health sits behind the bearer token when one is set. */
export function createDashboardApp(deps: DashboardDeps): Hono {
  const app = new Hono();
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const log = deps.logger.child({ component: "dashboard" });

  if (deps.token) {
    const auth = bearerAuth({ token: deps.token });
    app.use("*", async (c, next) => {
      if (c.req.path === "/health") return next();
      return auth(c, next);
    });
  }

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    const status = statusFor(err);
    if (status === 500) log.error({ err }, "Dashboard request failed");
    const code = err instanceof TwinError ? err.code : "internal_error";
    return c.json({ error: code, message: err.message }, status);
  });

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      uptime: now() - startedAt,
      channels: deps.registry.list().map((a) => ({ id: a.id, label: a.label })),
      pendingApprovals: deps.approvals.countPending(),
      decisions: deps.decisions.countByState(),
    });
  });

  app.get("/approvals", (c) => {
    const query = listQuerySchema.safeParse(c.req.query());
    if (!query.success) return invalid(c, query.error);
    const limit = query.data.limit ?? 100;

    const approvals: PendingApprovalView[] = [];
    for (const request of deps.approvals.listPending(now())) {
      if (approvals.length >= limit) break;
      const decision = deps.decisions.get(request.decisionId);
      approvals.push({
        ...request,
        conversationId: decision?.conversationId ?? null,
        candidateText: decision?.candidateText ?? null,
        finalText: decision?.finalText ?? null,
        mood: decision?.mood ?? null,
        verdict: decision?.verdict ?? null,
      });
    }
    return c.json({ approvals });
  });

  app.post("/approvals/:id/approve", async (c) => {
    const parsed = resolveSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const outcome = await deps.engine.resolveApproval(
      ApprovalRequestId.make(c.req.param("id")),
      { kind: "approve" },
      parsed.data.operator ?? DEFAULT_OPERATOR,
    );
    return c.json(outcome);
  });

  app.post("/approvals/:id/edit", async (c) => {
    const parsed = editSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const outcome = await deps.engine.resolveApproval(
      ApprovalRequestId.make(c.req.param("id")),
      { kind: "edit", text: parsed.data.text },
      parsed.data.operator ?? DEFAULT_OPERATOR,
    );
    return c.json(outcome);
  });

  app.post("/approvals/:id/deny", async (c) => {
    const parsed = resolveSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const outcome = await deps.engine.resolveApproval(
      ApprovalRequestId.make(c.req.param("id")),
      { kind: "deny" },
      parsed.data.operator ?? DEFAULT_OPERATOR,
    );
    return c.json(outcome);
  });

  app.get("/conversations", (c) => {
    const query = listQuerySchema.safeParse(c.req.query());
    if (!query.success) return invalid(c, query.error);
    return c.json({ conversations: deps.tracker.list(query.data.limit) });
  });

  app.get("/conversations/:id/decisions", (c) => {
    const query = listQuerySchema.safeParse(c.req.query());
    if (!query.success) return invalid(c, query.error);
    const id = ConversationId.make(c.req.param("id"));
    deps.tracker.require(id);
    return c.json({ decisions: deps.decisions.listForConversation(id, query.data.limit) });
  });

  app.put("/conversations/:id/mood", async (c) => {
    const parsed = moodSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const id = ConversationId.make(c.req.param("id"));
    await deps.engine.setMood(id, parsed.data.mood);
    return c.json({ conversation: deps.tracker.require(id) });
  });

  app.put("/conversations/:id/safety-mode", async (c) => {
    const parsed = conversationModeSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const id = ConversationId.make(c.req.param("id"));
    deps.tracker.require(id);
    deps.engine.setSafetyMode(parsed.data.mode, id);
    return c.json({ conversation: deps.tracker.require(id) });
  });

  app.get("/settings", (c) => {
    return c.json({ safetyMode: deps.settings.getSafetyMode(), blockThreshold: deps.blockThreshold });
  });

  app.put("/settings/safety-mode", async (c) => {
    const parsed = globalModeSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    deps.engine.setSafetyMode(parsed.data.mode);
    return c.json({ safetyMode: deps.settings.getSafetyMode() });
  });

  app.get("/contacts/:id/consent", (c) => {
    const id = ContactId.make(c.req.param("id"));
    const contact = deps.consent.require(id);
    return c.json({ contactId: contact.id, consent: contact.consent, history: deps.consent.history(id) });
  });

  app.put("/contacts/:id/consent", async (c) => {
    const parsed = consentSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const contact = deps.consent.setConsent(
      ContactId.make(c.req.param("id")),
      parsed.data.status,
      parsed.data.operator ?? DEFAULT_OPERATOR,
    );
    return c.json({ contactId: contact.id, consent: contact.consent });
  });

  app.get("/profiles/:id", async (c) => {
    return c.json({ profile: await deps.profiles.load(c.req.param("id")) });
  });

  app.post("/profiles/:id/redlines", async (c) => {
    const parsed = redlineRuleSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const profile = await deps.profiles.addRedline(c.req.param("id"), parsed.data);
    log.info({ profile: profile.id, rule: parsed.data.id }, "Redline added");
    return c.json({ profile }, 201);
  });

  app.delete("/profiles/:id/redlines/:ruleId", async (c) => {
    const ruleId = c.req.param("ruleId");
    const profile = await deps.profiles.removeRedline(c.req.param("id"), ruleId);
    log.info({ profile: profile.id, rule: ruleId }, "Redline removed");
    return c.json({ profile });
  });

  app.post("/profiles/:id/sensitive-topics", async (c) => {
    const parsed = topicSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);
    const profile = await deps.profiles.addSensitiveTopic(c.req.param("id"), parsed.data.topic);
    log.info({ profile: profile.id, topic: parsed.data.topic }, "Sensitive topic added");
    return c.json({ profile }, 201);
  });

  app.get("/audit", (c) => {
    const query = auditQuerySchema.safeParse(c.req.query());
    if (!query.success) return invalid(c, query.error);
    const { conversationId, decisionId, from, to, limit } = query.data;
    const records = deps.audit.query({
      conversationId: conversationId === undefined ? undefined : ConversationId.make(conversationId),
      decisionId: decisionId === undefined ? undefined : DecisionId.make(decisionId),
      from,
      to,
      limit,
    });
    return c.json({ records });
  });

  return app;
}

function statusFor(err: Error): ErrorStatus {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ProfileUnavailableError) return err.reason === "missing" ? 404 : 422;
  if (err instanceof AlreadyResolvedError || err instanceof InvalidTransitionError) return 409;
  if (err instanceof NothingToSendError || err instanceof UnknownMoodError) return 422;
  if (err instanceof TwinError && err.code === "invalid_safety_mode") return 400;
  return 500;
}

function invalid(c: Context, error: z.ZodError) {
  return c.json({ error: "Invalid request", details: error.flatten() }, 400);
}

/** An empty body reads as `{}`; a malformed one as null, which every schema rejects. */
async function readJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim().length === 0) return {};
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class DashboardServer {
  private readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;

  constructor(
    deps: DashboardDeps,
    private readonly port: number,
    private readonly hostname: string,
  ) {
    this.app = createDashboardApp(deps);
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
