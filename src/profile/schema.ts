import { z } from "zod";
import { severitySchema } from "../config/schema.js";

const redlineMatcherSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("keyword"), value: z.string().min(1) }),
  z.object({
    kind: z.literal("regex"),
    value: z.string().min(1).refine(isCompilableRegex, "invalid regular expression"),
  }),
  z.object({ kind: z.literal("pattern"), value: z.enum(["ssn", "credit-card", "phone", "email"]) }),
]);

export const redlineRuleSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  category: z.string().min(1).default("custom"),
  match: redlineMatcherSchema,
  severity: severitySchema.default("high"),
});

const moodPresetSchema = z.object({
  instruction: z.string().default(""),
  temperature: z.number().min(0).max(2).optional(),
  allowsIntensity: z.boolean().default(false),
});

export const profileSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, "profile id must be a simple file name"),
    displayName: z.string().min(1),
    defaultMood: z.string().min(1),
    moodPresets: z.record(z.string(), moodPresetSchema),
    redlines: z.array(redlineRuleSchema).default([]),
    sensitiveTopics: z.array(z.string().min(1)).default([]),
    style: z.record(z.string(), z.unknown()).default({}),
    examples: z.array(z.string()).default([]),
  })
  .refine((p) => Object.hasOwn(p.moodPresets, p.defaultMood), {
    message: "defaultMood must name one of the mood presets",
    path: ["defaultMood"],
  })
  .refine((p) => new Set(p.redlines.map((r) => r.id)).size === p.redlines.length, {
    message: "redline ids must be unique",
    path: ["redlines"],
  });

function isCompilableRegex(source: string): boolean {
  try {
    new RegExp(source, "i");
    return true;
  } catch {
    return false;
  }
}
