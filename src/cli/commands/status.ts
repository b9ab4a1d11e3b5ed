import { Command } from "clipanion";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { TwinDB } from "../../storage/db.js";
import { SettingsStore } from "../../storage/settings.js";
import { ApprovalQueue } from "../../approval/queue.js";
import { AuditLog } from "../../audit/log.js";
import { DecisionStore } from "../../engine/store.js";
import { errorMessage } from "../../utils/errors.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show gateway configuration and decision counts",
    examples: [["Show status", "twin status"]],
  });

  async execute(): Promise<void> {
    const configPath = getConfigPath();
    const stateDir = getStateDir();

    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(`  Error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const out = this.context.stdout;
    out.write(`Twin Gateway Status\n`);
    out.write(`-------------------\n`);
    out.write(`Config path: ${configPath}\n`);
    out.write(`State dir:   ${stateDir}\n`);
    out.write(`Dashboard:   ${config.gateway.hostname}:${config.gateway.port}\n`);
    out.write(`Generation:  ${config.generation.model}${config.generation.baseUrl ? ` @ ${config.generation.baseUrl}` : ""}\n`);

    const channelEntries = Object.entries(config.channels);
    if (channelEntries.length === 0) {
      out.write(`Channels:    (none configured)\n`);
    } else {
      out.write(`Channels:\n`);
      for (const [id, ch] of channelEntries) {
        const status = ch.enabled ? "enabled" : "disabled";
        out.write(`  ${id}: ${ch.type} (${status})\n`);
      }
    }

    if (!existsSync(join(stateDir, "twin.db"))) {
      out.write(`Database:    (not created yet)\n`);
      return;
    }

    const db = new TwinDB(stateDir);
    try {
      const settings = new SettingsStore(db, { safetyMode: config.safety.defaultMode });
      const decisions = new DecisionStore(db, new AuditLog(db));
      const approvals = new ApprovalQueue(db);
      out.write(`Safety:      mode=${settings.getSafetyMode()} blockThreshold=${config.safety.blockThreshold}\n`);
      out.write(`Pending:     ${approvals.countPending()} approval request(s)\n`);
      const counts = Object.entries(decisions.countByState());
      if (counts.length > 0) {
        out.write(`Decisions:\n`);
        for (const [state, count] of counts) {
          out.write(`  ${state}: ${count}\n`);
        }
      }
    } finally {
      db.close();
    }
  }
}
