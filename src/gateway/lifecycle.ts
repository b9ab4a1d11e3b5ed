import { loadConfig } from "../config/loader.js";
import { getStateDir, getProfilesDir, ensureDir } from "../config/paths.js";
import type { TwinConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { TwinDB } from "../storage/db.js";
import { SettingsStore } from "../storage/settings.js";
import { AuditLog } from "../audit/log.js";
import { ConversationTracker } from "../conversation/tracker.js";
import { ConsentRegistry } from "../profile/consent.js";
import { ProfileStore } from "../profile/store.js";
import { ApprovalQueue } from "../approval/queue.js";
import { ApprovalSweeper } from "../approval/sweeper.js";
import { DecisionStore } from "../engine/store.js";
import { Dispatcher } from "../engine/dispatcher.js";
import { DecisionEngine } from "../engine/decision-engine.js";
import { OpenAICompatGenerator } from "../generation/openai-compat.js";
import { ChannelRegistry } from "../channels/registry.js";
import { WebhookAdapter } from "../channels/webhook/index.js";
import type { ChannelAdapter } from "../channels/adapter.js";
import type { ChannelAccountConfig } from "../config/types.js";
import { DashboardServer } from "./dashboard.js";

export interface GatewayContext {
  config: TwinConfig;
  logger: Logger;
  db: TwinDB;
  engine: DecisionEngine;
  registry: ChannelRegistry;
  dashboard: DashboardServer;
  sweeper: ApprovalSweeper;
  abortController: AbortController;
  shutdown: () => Promise<void>;
}

const ADAPTER_FACTORIES: Record<
  ChannelAccountConfig["type"],
  (id: string, logger: Logger) => ChannelAdapter
> = {
  webhook: (id, logger) => new WebhookAdapter({ id, logger }),
};

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startGateway(configPath?: string): Promise<GatewayContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting twin gateway...");

  // 3. Ensure state directory and open the database
  const stateDir = ensureDir(getStateDir());
  const db = new TwinDB(stateDir);

  // 4. Stores
  const audit = new AuditLog(db);
  const settings = new SettingsStore(db, { safetyMode: config.safety.defaultMode });
  const tracker = new ConversationTracker(db);
  const consent = new ConsentRegistry(db, audit);
  const profiles = new ProfileStore(getProfilesDir(stateDir));
  const decisions = new DecisionStore(db, audit);
  const approvals = new ApprovalQueue(db);

  if (!(await profiles.exists(config.engine.defaultProfileId))) {
    logger.warn(
      { profileId: config.engine.defaultProfileId },
      "Default profile not found; inbound messages will be refused until `twin profile init` is run",
    );
  }

  // 5. Generation, channels and dispatch
  const generator = new OpenAICompatGenerator({ config: config.generation, logger });
  const registry = new ChannelRegistry();
  const dispatcher = new Dispatcher({ registry, config: config.dispatch, logger });

  // 6. Decision engine, then recover whatever a previous run left mid-pipeline
  const engine = new DecisionEngine({
    db,
    tracker,
    consent,
    profiles,
    decisions,
    approvals,
    settings,
    audit,
    generator,
    dispatcher,
    config,
    logger,
  });
  engine.events.on("operational-error", (err, conversationId) => {
    logger.error({ err, conversation: conversationId }, "Engine operational error");
  });
  engine.events.on("approval-requested", (request, decision) => {
    logger.info(
      { requestId: request.id, decision: decision.id, reason: request.reason },
      "Decision awaiting approval",
    );
  });
  engine.recover();

  // 7. Register and start channel adapters
  const abortController = new AbortController();
  for (const [id, channelConfig] of Object.entries(config.channels)) {
    if (!channelConfig.enabled) {
      logger.info({ channel: id }, "Channel disabled, skipping");
      continue;
    }

    const adapter = ADAPTER_FACTORIES[channelConfig.type](id, logger);

    adapter.events.on("connected", () => {
      logger.info({ channel: id }, "Channel connected");
    });
    adapter.events.on("disconnected", (reason) => {
      logger.warn({ channel: id, reason }, "Channel disconnected");
    });
    adapter.events.on("error", (err) => {
      logger.error({ err, channel: id }, "Channel error");
    });

    try {
      await adapter.start(channelConfig, abortController.signal);
      // Register AFTER successful start
      registry.register(adapter);
      logger.info({ channel: id }, "Channel started");
    } catch (err) {
      logger.error({ err, channel: id }, "Failed to start channel");
      continue;
    }

    consumeInbound(adapter, engine, logger).catch((err) => {
      logger.error({ err, channel: id }, "Inbound stream failed");
    });
  }

  // 8. Dashboard API
  const dashboard = new DashboardServer(
    {
      engine,
      decisions,
      approvals,
      tracker,
      consent,
      settings,
      audit,
      registry,
      profiles,
      logger,
      blockThreshold: config.safety.blockThreshold,
      token: config.dashboard.token,
    },
    config.gateway.port,
    config.gateway.hostname,
  );
  await dashboard.start();
  logger.info({ port: config.gateway.port }, "Dashboard API started");

  // 9. Approval expiry
  const sweeper = new ApprovalSweeper({
    target: engine,
    intervalMs: config.approval.sweepIntervalMs,
    logger,
  });
  sweeper.start();

  // 10. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;

  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    // Set a hard timeout to force exit
    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    abortController.abort();

    // Stop accepting new messages first
    for (const adapter of registry.list()) {
      try {
        await adapter.stop();
      } catch (err) {
        logger.error({ err, channel: adapter.id }, "Error stopping channel");
      }
    }

    sweeper.stop();
    await dashboard.stop();
    await engine.dispose();
    db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err }, "Shutdown failed");
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("Twin gateway started");
  return { config, logger, db, engine, registry, dashboard, sweeper, abortController, shutdown };
}

/** One task per inbound message; a failure in one never stops the stream. */
async function consumeInbound(adapter: ChannelAdapter, engine: DecisionEngine, logger: Logger): Promise<void> {
  for await (const msg of adapter.receive()) {
    engine
      .handleInbound(msg)
      .then((outcome) => {
        logger.debug({ channel: adapter.id, messageId: msg.id, outcome }, "Inbound handled");
      })
      .catch((err) => {
        logger.error({ err, channel: adapter.id, messageId: msg.id }, "Failed to handle message");
      });
  }
}
