export type SafetyMode = "strict" | "moderate" | "lenient";

export type Severity = "low" | "medium" | "high" | "critical";

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export type PatternDetector = "ssn" | "credit-card" | "phone" | "email";

export type RedlineMatcher =
  | { readonly kind: "keyword"; readonly value: string }
  | { readonly kind: "regex"; readonly value: string }
  | { readonly kind: "pattern"; readonly value: PatternDetector };

export interface RedlineRule {
  readonly id: string;
  readonly description?: string;
  readonly category: string;
  readonly match: RedlineMatcher;
  readonly severity: Severity;
}

export interface RedlineHit {
  readonly rule: RedlineRule;
  readonly excerpt: string;
}

export type Verdict =
  | { readonly kind: "ALLOW" }
  | { readonly kind: "BLOCK"; readonly reason: string }
  | { readonly kind: "REQUIRE_APPROVAL"; readonly reason: string };

export type VerdictKind = Verdict["kind"];

/** Operator policy, snapshotted per decision and passed explicitly into every screen. */
export interface SafetyPolicy {
  readonly mode: SafetyMode;
  readonly blockThreshold: Severity;
}
