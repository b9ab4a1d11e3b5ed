import type { TwinDB } from "./db.js";
import { safetyModeSchema } from "../config/schema.js";
import type { SafetyMode } from "../safety/types.js";

const SAFETY_MODE_KEY = "safety.mode";

/**
 * Operator settings that outlive a restart. Readers snapshot these at the
 * start of a decision; nothing reads them again mid-decision.
 */
export class SettingsStore {
  private readonly db;

  constructor(
    twinDb: TwinDB,
    private readonly defaults: { readonly safetyMode: SafetyMode },
  ) {
    this.db = twinDb.raw();
  }

  getSafetyMode(): SafetyMode {
    const parsed = safetyModeSchema.safeParse(this.get(SAFETY_MODE_KEY));
    return parsed.success ? parsed.data : this.defaults.safetyMode;
  }

  setSafetyMode(mode: SafetyMode): void {
    this.set(SAFETY_MODE_KEY, safetyModeSchema.parse(mode));
  }

  snapshot(): { readonly safetyMode: SafetyMode } {
    return { safetyMode: this.getSafetyMode() };
  }

  private get(key: string): string | undefined {
    const row = this.db
      .prepare("SELECT value FROM settings WHERE key = ?")
      .get(key) as { value: string } | undefined;
    return row?.value;
  }

  private set(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, value, Date.now());
  }
}
