import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { ConfigError, loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { TwinConfig } from "../../config/types.js";
import { errorMessage } from "../../utils/errors.js";

const REDACTED = "***REDACTED***";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (secrets redacted)",
    examples: [["Show config", "twin config show"]],
  });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redact(config), null, 2) + "\n");
  }
}

export function redact(config: TwinConfig): TwinConfig {
  const channels: TwinConfig["channels"] = {};
  for (const [id, ch] of Object.entries(config.channels)) {
    channels[id] = ch.token ? { ...ch, token: REDACTED } : ch;
  }
  return {
    ...config,
    dashboard: config.dashboard.token ? { ...config.dashboard, token: REDACTED } : config.dashboard,
    generation: config.generation.apiKey ? { ...config.generation, apiKey: REDACTED } : config.generation,
    channels,
  };
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "twin config validate"],
      ["Validate specific file", "twin config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigText(content, configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      const problems = err instanceof ConfigError ? err.problems : [errorMessage(err)];
      this.context.stdout.write(`Config is INVALID: ${configPath}\n`);
      for (const problem of problems) this.context.stdout.write(`  - ${problem}\n`);
      process.exitCode = 1;
    }
  }
}
