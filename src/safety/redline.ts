import type { PatternDetector, RedlineHit, RedlineRule } from "./types.js";

const DETECTORS: Readonly<Record<PatternDetector, RegExp>> = {
  ssn: /\b\d{3}-\d{2}-\d{4}\b/,
  "credit-card": /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/,
  phone: /\b\d{3}[\s.-]?\d{3}[\s.-]?\d{4}\b/,
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/,
};

const regexCache = new Map<string, RegExp>();

function compile(source: string): RegExp {
  let re = regexCache.get(source);
  if (!re) {
    re = new RegExp(source, "i");
    regexCache.set(source, re);
  }
  return re;
}

/** The matched fragment, or null. Keyword rules are case-insensitive substring matches. */
export function matchRule(rule: RedlineRule, text: string): string | null {
  switch (rule.match.kind) {
    case "keyword": {
      const idx = text.toLowerCase().indexOf(rule.match.value.toLowerCase());
      return idx === -1 ? null : text.slice(idx, idx + rule.match.value.length);
    }
    case "regex":
      return compile(rule.match.value).exec(text)?.[0] ?? null;
    case "pattern":
      return DETECTORS[rule.match.value].exec(text)?.[0] ?? null;
  }
}

/** Every rule `text` trips, in rule order. */
export function evaluateRedlines(rules: readonly RedlineRule[], text: string): RedlineHit[] {
  const hits: RedlineHit[] = [];
  for (const rule of rules) {
    const excerpt = matchRule(rule, text);
    if (excerpt !== null) hits.push({ rule, excerpt });
  }
  return hits;
}
