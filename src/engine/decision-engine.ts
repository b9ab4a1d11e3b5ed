import type { TwinDB } from "../storage/db.js";
import type { SettingsStore } from "../storage/settings.js";
import type { AuditLog } from "../audit/log.js";
import type { ConversationTracker } from "../conversation/tracker.js";
import type { ConsentRegistry } from "../profile/consent.js";
import type { Contact, PersonalityProfile } from "../profile/types.js";
import { ProfileUnavailableError } from "../profile/types.js";
import type { ApprovalQueue } from "../approval/queue.js";
import { AlreadyResolvedError, type ApprovalRequest } from "../approval/types.js";
import type { InboundMessage } from "../channels/adapter.js";
import type { ContextTurn, GenerationService, GenerationRequest } from "../generation/types.js";
import { GenerationError } from "../generation/types.js";
import type {
  ApprovalConfig,
  EngineConfig,
  GenerationConfig,
  SafetyConfig,
} from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { SafetyMode, SafetyPolicy } from "../safety/types.js";
import { screen } from "../safety/screen.js";
import { retry } from "../utils/retry.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { TwinError, errorMessage } from "../utils/errors.js";
import type { ApprovalRequestId, ConversationId, DecisionId } from "../utils/types.js";
import type { MessageEvent } from "../conversation/types.js";
import type { DecisionStore, TransitionAudit } from "./store.js";
import type { Dispatcher } from "./dispatcher.js";
import { buildContext } from "./context.js";
import {
  isPreGenerated,
  isTerminal,
  NothingToSendError,
  UnknownMoodError,
  type ApprovalAction,
  type ApprovalOutcome,
  type Decision,
  type DecisionPatch,
  type DecisionState,
  type InboundOutcome,
  type TerminalState,
} from "./types.js";

/** Where a profile comes from. `ProfileStore` in production. */
export interface ProfileSource {
  load(id: string): Promise<PersonalityProfile>;
}

export interface EngineEvents {
  transition: (decision: Decision, from: DecisionState) => void;
  "approval-requested": (request: ApprovalRequest, decision: Decision) => void;
  "operational-error": (err: Error, conversationId: ConversationId | null) => void;
}

export interface DecisionEngineConfig {
  readonly engine: EngineConfig;
  readonly generation: Pick<GenerationConfig, "timeoutMs" | "maxAttempts" | "baseDelayMs" | "maxDelayMs">;
  readonly safety: SafetyConfig;
  readonly approval: Pick<ApprovalConfig, "timeoutMs">;
}

export interface DecisionEngineDeps {
  db: TwinDB;
  tracker: ConversationTracker;
  consent: ConsentRegistry;
  profiles: ProfileSource;
  decisions: DecisionStore;
  approvals: ApprovalQueue;
  settings: SettingsStore;
  audit: AuditLog;
  generator: GenerationService;
  dispatcher: Dispatcher;
  config: DecisionEngineConfig;
  logger: Logger;
  now?: () => number;
}

/** Everything a decision fixed at its start; later operator changes do not reach it. */
interface DecisionSnapshot {
  readonly profile: PersonalityProfile;
  readonly mood: string;
  readonly policy: SafetyPolicy;
}

class SupersededError extends TwinError {
  constructor(decisionId: DecisionId) {
    super("superseded", `Decision ${decisionId} superseded by a newer message`);
  }
}

const GENERATION_UNAVAILABLE = "generation unavailable";

/**
 * Runs one decision per inbound message through
 * RECEIVED -> CONTEXT_BUILT -> GENERATED -> SCREENED and on to a terminal
 * state or the approval queue. Every transition is a compare-and-swap plus
 * one audit record in a single transaction.
 */
export class DecisionEngine {
  readonly events = new TypedEventEmitter<EngineEvents>({
    onListenerError: (err, event) => {
      this.logger.error({ err, event }, "Engine event listener threw");
    },
  });

  private readonly db: TwinDB;
  private readonly tracker: ConversationTracker;
  private readonly consent: ConsentRegistry;
  private readonly profiles: ProfileSource;
  private readonly decisions: DecisionStore;
  private readonly approvals: ApprovalQueue;
  private readonly settings: SettingsStore;
  private readonly audit: AuditLog;
  private readonly generator: GenerationService;
  private readonly dispatcher: Dispatcher;
  private readonly config: DecisionEngineConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  /** Abort handles for decisions still before GENERATED, keyed by decision. */
  private readonly generating = new Map<DecisionId, AbortController>();
  private readonly running = new Set<Promise<unknown>>();
  private disposed = false;

  constructor(deps: DecisionEngineDeps) {
    this.db = deps.db;
    this.tracker = deps.tracker;
    this.consent = deps.consent;
    this.profiles = deps.profiles;
    this.decisions = deps.decisions;
    this.approvals = deps.approvals;
    this.settings = deps.settings;
    this.audit = deps.audit;
    this.generator = deps.generator;
    this.dispatcher = deps.dispatcher;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: "engine" });
    this.now = deps.now ?? Date.now;
  }

  handleInbound(message: InboundMessage): Promise<InboundOutcome> {
    if (this.disposed) {
      return Promise.reject(new TwinError("engine_disposed", "Decision engine has been disposed"));
    }
    return this.track(this.processInbound(message));
  }

  private async processInbound(message: InboundMessage): Promise<InboundOutcome> {
    const contact = this.consent.ensureContact({
      channelId: message.channelId,
      senderId: message.senderId,
      displayName: message.senderName,
      profileId: this.config.engine.defaultProfileId,
    });
    const conversation = this.tracker.resolve(contact.id, message.channelId);
    const log = this.logger.child({ conversation: conversation.id, channel: message.channelId });

    const seen = this.tracker.findEvent(conversation.id, message.id);
    if (seen) {
      log.debug({ messageId: message.id }, "Duplicate inbound message ignored");
      return { kind: "duplicate", messageEventId: seen.id };
    }

    // A refused message is not recorded, so a redelivery after the profile is fixed gets a decision.
    let profile: PersonalityProfile;
    try {
      profile = await this.profiles.load(contact.profileId);
    } catch (err) {
      if (!(err instanceof ProfileUnavailableError)) throw err;
      log.error({ err, profileId: contact.profileId }, "Profile unavailable, no decision started");
      this.events.emit("operational-error", err, conversation.id);
      return { kind: "refused", reason: err.message };
    }

    const recorded = this.tracker.recordEvent(conversation.id, {
      channelMessageId: message.id,
      content: message.text,
      receivedAt: message.timestamp,
    });
    if (recorded.kind === "duplicate") {
      log.debug({ messageId: message.id }, "Duplicate inbound message ignored");
      return { kind: "duplicate", messageEventId: recorded.event.id };
    }
    const event = recorded.event;

    const begun = this.tracker.tryBeginDecision(conversation.id, event.id);
    if (!begun.ok) {
      return this.onBusy(begun.busy, log);
    }

    const decisionId = begun.decisionId;
    this.generating.set(decisionId, new AbortController());
    const snapshot = this.snapshot(profile, conversation.id, log);
    this.audit.append({
      decisionId,
      conversationId: conversation.id,
      action: "received",
      toState: "RECEIVED",
      detail: { messageEventId: event.id, channelMessageId: event.channelMessageId },
    });

    const state = await this.runDecision(decisionId, contact, event, snapshot, log.child({ decision: decisionId }));
    return { kind: "decided", decisionId, state };
  }

  private onBusy(busy: DecisionId, log: Logger): InboundOutcome {
    const current = this.decisions.get(busy);
    const controller = this.generating.get(busy);
    if (current && isPreGenerated(current.state) && controller) {
      log.info({ decision: busy }, "Newer message supersedes in-flight generation");
      controller.abort(new SupersededError(busy));
      return { kind: "superseded", decisionId: busy };
    }
    log.debug({ decision: busy }, "Conversation busy, message kept as context");
    return { kind: "queued-as-context", decisionId: busy };
  }

  private snapshot(profile: PersonalityProfile, conversationId: ConversationId, log: Logger): DecisionSnapshot {
    const conversation = this.tracker.require(conversationId);
    let mood = conversation.moodOverride ?? this.config.engine.defaultMood ?? profile.defaultMood;
    if (!Object.hasOwn(profile.moodPresets, mood)) {
      log.warn({ mood, profileId: profile.id }, "Mood not defined by profile, using its default");
      mood = profile.defaultMood;
    }
    const mode: SafetyMode = conversation.safetyModeOverride ?? this.settings.getSafetyMode();
    return {
      profile,
      mood,
      policy: { mode, blockThreshold: this.config.safety.blockThreshold },
    };
  }

  private async runDecision(
    decisionId: DecisionId,
    contact: Contact,
    event: MessageEvent,
    snapshot: DecisionSnapshot,
    log: Logger,
  ): Promise<DecisionState> {
    try {
      return await this.pipeline(decisionId, contact, event, snapshot, log);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error({ err: error }, "Decision pipeline failed");
      this.events.emit("operational-error", error, event.conversationId);
      this.parkAfterFailure(decisionId, log);
      throw error;
    } finally {
      this.generating.delete(decisionId);
    }
  }

  private async pipeline(
    decisionId: DecisionId,
    contact: Contact,
    event: MessageEvent,
    snapshot: DecisionSnapshot,
    log: Logger,
  ): Promise<DecisionState> {
    const { profile, mood, policy } = snapshot;
    const built = this.move(decisionId, "RECEIVED", "CONTEXT_BUILT",
      { profileId: profile.id, mood, safetyMode: policy.mode },
      { action: "context_built" });

    const generated = await this.generateCandidate(built, snapshot, log);
    if (generated.kind === "stopped") return generated.state;
    const candidate = generated.text;

    this.move(decisionId, "CONTEXT_BUILT", "GENERATED", { candidateText: candidate }, { action: "generated" });

    // Consent is read fresh: a revocation must reach decisions already under way.
    const current = this.consent.require(contact.id);
    const verdict = screen({ profile, contact: current, candidateText: candidate, mood, policy });
    const reason = verdict.kind === "ALLOW" ? undefined : verdict.reason;
    this.move(decisionId, "GENERATED", "SCREENED",
      { verdict: verdict.kind, verdictReason: reason },
      { action: "screened", reason, detail: { verdict: verdict.kind, mode: policy.mode, mood } });
    log.info({ verdict: verdict.kind, reason }, "Candidate screened");

    switch (verdict.kind) {
      case "BLOCK":
        return this.finish(decisionId, "SCREENED", "BLOCKED", {}, { action: "blocked", reason: verdict.reason }).state;
      case "REQUIRE_APPROVAL":
        return this.toApproval(decisionId, "SCREENED", verdict.reason, {}).state;
      case "ALLOW":
        break;
    }

    this.move(decisionId, "SCREENED", "AUTO_DISPATCHED", { finalText: candidate }, { action: "auto_dispatched" });
    const outcome = await this.dispatcher.dispatch(contact.channelId, {
      to: contact.senderId,
      text: candidate,
      replyToId: event.channelMessageId,
    });

    if (outcome.ok) {
      return this.finish(decisionId, "AUTO_DISPATCHED", "SENT",
        { outboundMessageId: outcome.messageId },
        { action: "sent", detail: { attempts: outcome.attempts } }).state;
    }
    log.warn({ reason: outcome.reason, retryable: outcome.retryable }, "Auto dispatch failed");
    if (outcome.retryable) {
      return this.toApproval(decisionId, "AUTO_DISPATCHED", `dispatch failed: ${outcome.reason}`, {}).state;
    }
    return this.finish(decisionId, "AUTO_DISPATCHED", "DISCARDED", {}, {
      action: "discarded",
      reason: `dispatch failed: ${outcome.reason}`,
    }).state;
  }

  /**
   * Generate until a candidate survives without being superseded. A
   * supersede aborts the attempt and rebuilds context from everything the
   * conversation now holds.
   */
  private async generateCandidate(
    built: Decision,
    snapshot: DecisionSnapshot,
    log: Logger,
  ): Promise<{ kind: "text"; text: string } | { kind: "stopped"; state: DecisionState }> {
    const { profile, mood } = snapshot;
    let decision = built;

    for (;;) {
      const controller = this.generating.get(decision.id) ?? new AbortController();
      this.generating.set(decision.id, controller);
      const request: GenerationRequest = { profile, mood, context: this.contextFor(decision.conversationId) };

      try {
        const text = await this.generate(request, controller.signal, log);
        if (controller.signal.aborted) throw controller.signal.reason;
        this.generating.delete(decision.id);
        return { kind: "text", text };
      } catch (err) {
        if (controller.signal.reason instanceof SupersededError && !this.disposed) {
          this.generating.set(decision.id, new AbortController());
          decision = this.move(decision.id, "CONTEXT_BUILT", "CONTEXT_BUILT", {}, {
            action: "context_rebuilt",
            reason: "superseded by newer message",
          });
          continue;
        }
        if (this.disposed) {
          log.info("Engine disposed mid-generation; decision left for restart recovery");
          return { kind: "stopped", state: decision.state };
        }
        log.warn({ err: errorMessage(err) }, "Generation exhausted, routing to approval");
        this.decisions.note(decision, {
          action: "generation_failed",
          reason: errorMessage(err),
          detail: { retryable: err instanceof GenerationError ? err.retryable : false },
        });
        const parked = this.toApproval(decision.id, "CONTEXT_BUILT", GENERATION_UNAVAILABLE, {});
        return { kind: "stopped", state: parked.state };
      }
    }
  }

  private contextFor(conversationId: ConversationId): ContextTurn[] {
    const window = this.config.engine.contextWindow;
    return buildContext(
      this.tracker.recentEvents(conversationId, window),
      this.decisions.sentReplies(conversationId, window),
      window,
    );
  }

  /** One generation call per attempt, each bounded by the configured timeout. */
  private generate(request: GenerationRequest, signal: AbortSignal, log: Logger): Promise<string> {
    const cfg = this.config.generation;
    return retry(
      async () => {
        const attemptSignal = AbortSignal.any([signal, AbortSignal.timeout(cfg.timeoutMs)]);
        try {
          return await this.generator.generate(request, attemptSignal);
        } catch (err) {
          if (signal.aborted) throw err;
          if (attemptSignal.aborted) {
            throw new GenerationError(`generation timed out after ${cfg.timeoutMs}ms`, true, { cause: err });
          }
          if (err instanceof GenerationError) throw err;
          throw new GenerationError(errorMessage(err), true, { cause: err });
        }
      },
      {
        maxAttempts: cfg.maxAttempts,
        baseDelayMs: cfg.baseDelayMs,
        maxDelayMs: cfg.maxDelayMs,
        signal,
        shouldRetry: (err) => err instanceof GenerationError && err.retryable,
        onRetry: (err, attempt, delayMs) => {
          log.warn({ attempt: attempt + 1, delayMs, err: errorMessage(err) }, "Generation failed, retrying");
        },
      },
    );
  }

  async resolveApproval(
    requestId: ApprovalRequestId,
    action: ApprovalAction,
    operator: string,
  ): Promise<ApprovalOutcome> {
    const now = this.now();
    const request = this.approvals.require(requestId);
    if (request.status === "pending" && request.deadline <= now) {
      await this.expireOverdue(now);
      throw new AlreadyResolvedError(requestId, "expired");
    }
    const decision = this.decisions.require(request.decisionId);

    const resolved: ApprovalAction = action.kind === "edit" ? { kind: "edit", text: action.text.trim() } : action;
    let text: string | null = null;
    if (resolved.kind === "edit") {
      text = resolved.text;
      if (text.length === 0) throw new NothingToSendError(decision.id);
    } else if (resolved.kind === "approve") {
      text = decision.finalText ?? decision.candidateText;
      if (text === null) throw new NothingToSendError(decision.id);
    }

    this.db.transaction(() => {
      this.approvals.resolve(requestId, { action: resolved, operator }, now);
      if (resolved.kind === "edit") this.decisions.setFinalText(decision.id, resolved.text);
      this.decisions.note(decision, {
        action: resolved.kind === "approve" ? "approved" : resolved.kind === "edit" ? "edited" : "denied",
        actor: "operator",
        operator,
        reason: request.reason,
        detail: { requestId, ...(resolved.kind === "edit" ? { text: resolved.text } : {}) },
      });
    });

    const log = this.logger.child({ conversation: decision.conversationId, decision: decision.id });
    log.info({ requestId, action: action.kind, operator }, "Approval resolved");

    if (text === null) {
      const denied = this.finish(decision.id, "PENDING_APPROVAL", "DISCARDED", {}, {
        action: "discarded",
        actor: "operator",
        operator,
        reason: "denied by operator",
      });
      return { requestId, decisionId: decision.id, state: denied.state };
    }

    const state = await this.track(this.dispatchApproved(decision, text, operator, log));
    return { requestId, decisionId: decision.id, state };
  }

  private async dispatchApproved(
    decision: Decision,
    text: string,
    operator: string,
    log: Logger,
  ): Promise<DecisionState> {
    const conversation = this.tracker.require(decision.conversationId);
    const contact = this.consent.require(conversation.contactId);
    const event = this.tracker.getEvent(decision.messageEventId);

    const outcome = await this.dispatcher.dispatch(contact.channelId, {
      to: contact.senderId,
      text,
      replyToId: event?.channelMessageId,
    });

    if (outcome.ok) {
      return this.finish(decision.id, "PENDING_APPROVAL", "SENT",
        { finalText: text, outboundMessageId: outcome.messageId },
        { action: "sent", actor: "operator", operator, detail: { attempts: outcome.attempts } }).state;
    }

    log.warn({ reason: outcome.reason, retryable: outcome.retryable }, "Approved dispatch failed");
    if (outcome.retryable) {
      const reason = `dispatch failed: ${outcome.reason}`;
      const { request, current } = this.db.transaction(() => {
        const queued = this.approvals.enqueue(decision.id, this.now() + this.config.approval.timeoutMs, reason);
        const pending = this.decisions.require(decision.id);
        this.decisions.note(pending, { action: "queued_for_approval", reason, detail: { requestId: queued.id } });
        return { request: queued, current: pending };
      });
      this.events.emit("approval-requested", request, current);
      return current.state;
    }
    return this.finish(decision.id, "PENDING_APPROVAL", "DISCARDED", {}, {
      action: "discarded",
      actor: "operator",
      operator,
      reason: `dispatch failed: ${outcome.reason}`,
    }).state;
  }

  /** Expire overdue approval requests. Expired decisions are discarded, never sent. */
  async expireOverdue(now: number = this.now()): Promise<ApprovalRequest[]> {
    return this.approvals.expire(now, (request) => {
      const decision = this.decisions.get(request.decisionId);
      if (decision?.state !== "PENDING_APPROVAL") {
        this.logger.warn(
          { requestId: request.id, decision: request.decisionId, state: decision?.state },
          "Expired request's decision is not pending approval",
        );
        return;
      }
      this.finish(decision.id, "PENDING_APPROVAL", "EXPIRED", {}, {
        action: "expired",
        reason: "timeout",
        detail: { requestId: request.id, fallback: request.fallbackAction },
      });
    });
  }

  /**
   * Route decisions a previous process left mid-pipeline to a human. Call
   * once at startup, before any inbound traffic.
   */
  recover(): number {
    let recovered = 0;
    const stranded = this.decisions.listByState([
      "RECEIVED",
      "CONTEXT_BUILT",
      "GENERATED",
      "SCREENED",
      "AUTO_DISPATCHED",
    ]);
    for (const decision of stranded) {
      const reason = decision.state === "AUTO_DISPATCHED" ? "dispatch outcome unknown" : "interrupted by restart";
      this.toApproval(decision.id, decision.state, reason, {}, "recovered");
      recovered++;
    }

    // Approved or edited but the process died before dispatch finished.
    for (const decision of this.decisions.listByState(["PENDING_APPROVAL"])) {
      if (this.approvals.pendingForDecision(decision.id)) continue;
      this.db.transaction(() => {
        const request = this.approvals.enqueue(
          decision.id,
          this.now() + this.config.approval.timeoutMs,
          "dispatch outcome unknown",
        );
        this.decisions.note(decision, {
          action: "recovered",
          reason: "dispatch outcome unknown",
          detail: { requestId: request.id },
        });
      });
      recovered++;
    }

    if (recovered > 0) {
      this.logger.warn({ count: recovered }, "Recovered interrupted decisions into the approval queue");
    }
    return recovered;
  }

  /** Set or clear a conversation's mood. Applies from the next decision on. */
  async setMood(conversationId: ConversationId, mood: string | null): Promise<void> {
    const conversation = this.tracker.require(conversationId);
    if (mood !== null) {
      const contact = this.consent.require(conversation.contactId);
      const profile = await this.profiles.load(contact.profileId);
      if (!Object.hasOwn(profile.moodPresets, mood)) {
        throw new UnknownMoodError(mood, Object.keys(profile.moodPresets));
      }
    }
    this.tracker.setMood(conversationId, mood);
    this.logger.info({ conversation: conversationId, mood }, "Conversation mood changed");
  }

  /** Global safety mode, or a per-conversation override when `conversationId` is given. */
  setSafetyMode(mode: SafetyMode | null, conversationId?: ConversationId): void {
    if (conversationId !== undefined) {
      this.tracker.setSafetyMode(conversationId, mode);
    } else if (mode === null) {
      throw new TwinError("invalid_safety_mode", "The global safety mode cannot be cleared");
    } else {
      this.settings.setSafetyMode(mode);
    }
    this.logger.info({ conversation: conversationId ?? null, mode }, "Safety mode changed");
  }

  /** Cancel in-flight generation and wait for running work to settle. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    const reason = new TwinError("engine_disposed", "Decision engine is shutting down");
    for (const controller of this.generating.values()) controller.abort(reason);
    await Promise.allSettled([...this.running]);
    this.events.removeAllListeners();
  }

  private track<T>(work: Promise<T>): Promise<T> {
    this.running.add(work);
    const done = () => {
      this.running.delete(work);
    };
    work.then(done, done);
    return work;
  }

  private move(
    decisionId: DecisionId,
    from: DecisionState,
    to: DecisionState,
    patch: DecisionPatch,
    audit: TransitionAudit,
  ): Decision {
    const decision = this.decisions.transition(decisionId, from, to, patch, audit);
    this.events.emit("transition", decision, from);
    return decision;
  }

  /** Terminal transition and release of the conversation, atomically. */
  private finish(
    decisionId: DecisionId,
    from: DecisionState,
    to: TerminalState,
    patch: DecisionPatch,
    audit: TransitionAudit,
  ): Decision {
    const decision = this.db.transaction(() => {
      const moved = this.decisions.transition(decisionId, from, to, patch, audit);
      this.tracker.completeDecision(decisionId, to);
      return moved;
    });
    this.events.emit("transition", decision, from);
    return decision;
  }

  private toApproval(
    decisionId: DecisionId,
    from: DecisionState,
    reason: string,
    patch: DecisionPatch,
    action: "queued_for_approval" | "recovered" = "queued_for_approval",
  ): Decision {
    const { decision, request } = this.db.transaction(() => {
      const moved = this.decisions.transition(decisionId, from, "PENDING_APPROVAL", patch, { action, reason });
      const queued = this.approvals.enqueue(decisionId, this.now() + this.config.approval.timeoutMs, reason);
      return { decision: moved, request: queued };
    });
    this.events.emit("transition", decision, from);
    this.events.emit("approval-requested", request, decision);
    return decision;
  }

  /** After an unexpected failure, put the decision in front of a human if it can still get there. */
  private parkAfterFailure(decisionId: DecisionId, log: Logger): void {
    const decision = this.decisions.get(decisionId);
    if (!decision || isTerminal(decision.state) || decision.state === "PENDING_APPROVAL") return;
    try {
      this.toApproval(decisionId, decision.state, "internal error", {});
    } catch (err) {
      log.error({ err }, "Could not park failed decision; restart recovery will pick it up");
    }
  }
}
