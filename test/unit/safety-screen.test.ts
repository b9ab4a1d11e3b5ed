import { describe, it, expect } from "vitest";
import { findSensitiveTopic, isAggressive, screen, type ScreenInput } from "../../src/safety/screen.js";
import type { SafetyPolicy } from "../../src/safety/types.js";
import { defaultProfile } from "../../src/profile/store.js";
import { makeProfile } from "../helpers/fixtures.js";

const profile = makeProfile();

function input(overrides: Omit<Partial<ScreenInput>, "policy"> & { policy?: Partial<SafetyPolicy> } = {}): ScreenInput {
  return {
    profile,
    contact: { consent: "granted" },
    candidateText: "sure, see you at eight",
    mood: "default",
    ...overrides,
    policy: { mode: "lenient", blockThreshold: "high", ...overrides.policy },
  };
}

describe("screen", () => {
  it("requires approval for an unknown contact in every mode and mood", () => {
    for (const mode of ["strict", "moderate", "lenient"] as const) {
      for (const mood of ["default", "savage"]) {
        expect(screen(input({ contact: { consent: "unknown" }, mood, policy: { mode } }))).toEqual({
          kind: "REQUIRE_APPROVAL",
          reason: "unknown contact",
        });
      }
    }
  });

  it("blocks when consent is denied or revoked", () => {
    expect(screen(input({ contact: { consent: "denied" } }))).toEqual({ kind: "BLOCK", reason: "consent withdrawn" });
    expect(screen(input({ contact: { consent: "revoked" } }))).toEqual({ kind: "BLOCK", reason: "consent withdrawn" });
  });

  it("unknown consent outranks a redline", () => {
    const verdict = screen(input({ contact: { consent: "unknown" }, candidateText: "the password is x" }));
    expect(verdict.kind).toBe("REQUIRE_APPROVAL");
  });

  it("blocks a redline at or above the threshold regardless of mood", () => {
    const verdict = screen(input({ candidateText: "my password is swordfish", mood: "savage" }));
    expect(verdict).toEqual({ kind: "BLOCK", reason: "redline: passwords" });
  });

  it("does not block a redline below the threshold in lenient mode", () => {
    expect(screen(input({ candidateText: "call me on 555-123-4567" }))).toEqual({ kind: "ALLOW" });
  });

  it("blocks a medium redline once the threshold is lowered", () => {
    const verdict = screen(input({ candidateText: "call me on 555-123-4567", policy: { blockThreshold: "medium" } }));
    expect(verdict).toEqual({ kind: "BLOCK", reason: "redline: phone-number" });
  });

  it("requires approval for everything else in strict mode", () => {
    expect(screen(input({ policy: { mode: "strict" } }))).toEqual({ kind: "REQUIRE_APPROVAL", reason: "strict mode" });
  });

  it("allows a clean candidate in lenient mode", () => {
    expect(screen(input())).toEqual({ kind: "ALLOW" });
  });

  describe("moderate mode", () => {
    const moderate = { mode: "moderate" } as const;

    it("holds a redline below the threshold", () => {
      expect(screen(input({ candidateText: "ring 555-123-4567", policy: moderate }))).toEqual({
        kind: "REQUIRE_APPROVAL",
        reason: "redline below threshold: phone-number",
      });
    });

    it("holds a sensitive topic", () => {
      expect(screen(input({ candidateText: "let's not talk Politics tonight", policy: moderate }))).toEqual({
        kind: "REQUIRE_APPROVAL",
        reason: "sensitive topic: politics",
      });
    });

    it("holds a shouted reply when the mood does not allow intensity", () => {
      expect(screen(input({ candidateText: "that is AMAZING", policy: moderate }))).toEqual({
        kind: "REQUIRE_APPROVAL",
        reason: "tone inconsistent with mood default",
      });
    });

    it("lets an intense mood shout", () => {
      expect(screen(input({ candidateText: "that is AMAZING", mood: "savage", policy: moderate }))).toEqual({
        kind: "ALLOW",
      });
    });

    it("allows a clean candidate", () => {
      expect(screen(input({ policy: moderate }))).toEqual({ kind: "ALLOW" });
    });
  });
});

describe("screen with the starter profile", () => {
  const starter = defaultProfile();

  it("blocks phrases that would damage the relationship", () => {
    expect(screen(input({ profile: starter, candidateText: "Honestly? Leave me alone." }))).toEqual({
      kind: "BLOCK",
      reason: "redline: relationship-risk",
    });
    expect(screen(input({ profile: starter, candidateText: "ugh, you’re annoying" }))).toEqual({
      kind: "BLOCK",
      reason: "redline: relationship-risk",
    });
  });

  it("blocks harmful content", () => {
    expect(screen(input({ profile: starter, candidateText: "you're worthless" }))).toEqual({
      kind: "BLOCK",
      reason: "redline: harmful-content",
    });
  });

  it("lets an ordinary reply through", () => {
    expect(screen(input({ profile: starter, candidateText: "I hate Mondays, see you at 8" }))).toEqual({ kind: "ALLOW" });
  });
});

describe("findSensitiveTopic", () => {
  it("matches whole words only", () => {
    expect(findSensitiveTopic(["money"], "moneyball is a film")).toBeNull();
    expect(findSensitiveTopic(["legal issues"], "some Legal Issues came up")).toBe("legal issues");
  });
});

describe("isAggressive", () => {
  it("counts more than three exclamation marks", () => {
    expect(isAggressive("wow!!!")).toBe(false);
    expect(isAggressive("wow!!!!")).toBe(true);
  });

  it("flags words of three or more capitals", () => {
    expect(isAggressive("OK then")).toBe(false);
    expect(isAggressive("NOPE")).toBe(true);
  });
});
