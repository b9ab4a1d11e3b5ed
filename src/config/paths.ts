import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["TWIN_STATE_DIR"] ?? join(homedir(), ".twin");
}

export function getConfigPath(): string {
  return process.env["TWIN_CONFIG_PATH"] ?? "twin.config.json";
}

export function getProfilesDir(stateDir: string): string {
  return join(stateDir, "profiles");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
