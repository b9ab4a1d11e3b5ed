import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { z } from "zod";
import type { TwinConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { twinConfigSchema } from "./schema.js";
import { TwinError, errorMessage } from "../utils/errors.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** A config file that could not be read as JSON or failed validation. */
export class ConfigError extends TwinError {
  constructor(
    readonly source: string,
    readonly problems: readonly string[],
    options?: ErrorOptions,
  ) {
    super("config_invalid", `${source}: ${problems.join("; ")}`, options);
  }
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/**
 * Load the config file at `path` (or `TWIN_CONFIG_PATH`, or ./twin.config.json).
 * A missing file means all defaults.
 */
export function loadConfig(path?: string): TwinConfig {
  const configPath = resolve(path ?? getConfigPath());
  const content = readIfPresent(configPath);
  return content === null ? twinConfigSchema.parse({}) : parseConfigText(content, configPath);
}

/** Substitute `${env:NAME}` references, parse and validate. */
export function parseConfigText(content: string, source: string): TwinConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    throw new ConfigError(source, [errorMessage(err)], { cause: err });
  }

  const result = twinConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(source, describeIssues(result.error));
  }
  return result.data;
}

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${at}: ${issue.message}`;
  });
}

function readIfPresent(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}
