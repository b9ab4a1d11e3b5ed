import { readFile, readdir, writeFile, rename } from "node:fs/promises";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { withFileLock } from "../utils/file-lock.js";
import { ensureDir } from "../config/paths.js";
import type { RedlineRule } from "../safety/types.js";
import { profileSchema, redlineRuleSchema } from "./schema.js";
import { ProfileUnavailableError, type PersonalityProfile } from "./types.js";

const DEFAULT_PROFILE_PATH = fileURLToPath(
  new URL("../../data/default-profile.json", import.meta.url),
);

/**
 * Profiles live as one JSON file each. Every load re-validates the file, so
 * an operator edit that breaks the schema surfaces as `corrupt` on the next
 * decision instead of being silently patched over.
 */
export class ProfileStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = ensureDir(dir);
  }

  async load(id: string): Promise<PersonalityProfile> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new ProfileUnavailableError(id, "missing");
      }
      throw new ProfileUnavailableError(id, "corrupt", String(err));
    }
    return parseProfile(id, raw);
  }

  async exists(id: string): Promise<boolean> {
    try {
      await this.load(id);
      return true;
    } catch (err) {
      if (err instanceof ProfileUnavailableError && err.reason === "missing") return false;
      throw err;
    }
  }

  async list(): Promise<string[]> {
    const entries = await readdir(this.dir);
    return entries
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .sort();
  }

  async save(profile: PersonalityProfile): Promise<PersonalityProfile> {
    const validated = profileSchema.parse(profile);
    const path = this.pathFor(validated.id);
    await withFileLock(path, async () => {
      const tmp = `${path}.tmp`;
      await writeFile(tmp, JSON.stringify(validated, null, 2));
      await rename(tmp, path);
    });
    return deepFreeze(validated);
  }

  async addRedline(profileId: string, rule: RedlineRule): Promise<PersonalityProfile> {
    const parsed = redlineRuleSchema.parse(rule);
    return this.update(profileId, (p) => ({
      ...p,
      redlines: [...p.redlines.filter((r) => r.id !== parsed.id), parsed],
    }));
  }

  async removeRedline(profileId: string, ruleId: string): Promise<PersonalityProfile> {
    return this.update(profileId, (p) => ({
      ...p,
      redlines: p.redlines.filter((r) => r.id !== ruleId),
    }));
  }

  /** Topics are stored lower-cased; adding one that is already listed is a no-op. */
  async addSensitiveTopic(profileId: string, topic: string): Promise<PersonalityProfile> {
    const normalized = topic.trim().toLowerCase();
    return this.update(profileId, (p) => ({
      ...p,
      sensitiveTopics: p.sensitiveTopics.some((t) => t.toLowerCase() === normalized)
        ? p.sensitiveTopics
        : [...p.sensitiveTopics, normalized],
    }));
  }

  private async update(
    id: string,
    fn: (profile: PersonalityProfile) => PersonalityProfile,
  ): Promise<PersonalityProfile> {
    const path = this.pathFor(id);
    // Surfaces a missing or corrupt profile as ProfileUnavailableError.
    await this.load(id);
    return withFileLock(path, async () => {
      const current = parseProfile(id, await readFile(path, "utf-8"));
      const next = profileSchema.parse(fn(current));
      const tmp = `${path}.tmp`;
      await writeFile(tmp, JSON.stringify(next, null, 2));
      await rename(tmp, path);
      return deepFreeze(next);
    });
  }

  private pathFor(id: string): string {
    if (!/^[a-z0-9][a-z0-9_-]*$/i.test(id)) {
      throw new ProfileUnavailableError(id, "missing", "invalid profile id");
    }
    return join(this.dir, `${id}.json`);
  }
}

export function parseProfile(id: string, raw: string): PersonalityProfile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProfileUnavailableError(id, "corrupt", `invalid JSON (${String(err)})`);
  }
  const result = profileSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    const detail = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "schema mismatch";
    throw new ProfileUnavailableError(id, "corrupt", detail);
  }
  if (result.data.id !== id) {
    throw new ProfileUnavailableError(id, "corrupt", `file declares id "${result.data.id}"`);
  }
  return deepFreeze(result.data);
}

/** The starter profile written by `twin profile init`, renamed to `id`. */
export function defaultProfile(id = "default"): PersonalityProfile {
  const base = parseProfile("default", readFileSync(DEFAULT_PROFILE_PATH, "utf-8"));
  return { ...base, id };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
