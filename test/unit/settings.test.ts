import { describe, it, expect, afterAll, afterEach } from "vitest";
import { TwinDB } from "../../src/storage/db.js";
import { SettingsStore } from "../../src/storage/settings.js";

describe("SettingsStore", () => {
  const db = new TwinDB(":memory:");

  afterEach(() => {
    db.raw().prepare("DELETE FROM settings").run();
  });

  afterAll(() => {
    db.close();
  });

  it("falls back to the configured default", () => {
    const settings = new SettingsStore(db, { safetyMode: "strict" });
    expect(settings.getSafetyMode()).toBe("strict");
  });

  it("persists the safety mode across instances", () => {
    new SettingsStore(db, { safetyMode: "strict" }).setSafetyMode("lenient");
    expect(new SettingsStore(db, { safetyMode: "strict" }).snapshot()).toEqual({ safetyMode: "lenient" });
  });

  it("ignores a stored value that is not a safety mode", () => {
    db.raw()
      .prepare("INSERT INTO settings (key, value, updated_at) VALUES ('safety.mode', 'chaotic', 0)")
      .run();
    expect(new SettingsStore(db, { safetyMode: "moderate" }).getSafetyMode()).toBe("moderate");
  });
});
