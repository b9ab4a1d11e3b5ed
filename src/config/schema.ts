import { z } from "zod";
import type { TwinConfig } from "./types.js";

export const safetyModeSchema = z.enum(["strict", "moderate", "lenient"]);
export const severitySchema = z.enum(["low", "medium", "high", "critical"]);

const channelAccountSchema = z.object({
  type: z.literal("webhook"),
  enabled: z.boolean().default(false),
  port: z.number().int().positive(),
  hostname: z.string().default("127.0.0.1"),
  path: z.string().startsWith("/").default("/inbound"),
  callbackUrl: z.string().url().optional(),
  token: z.string().optional(),
  maxTextLength: z.number().int().positive().optional(),
});

const gatewaySchema = z.object({
  port: z.number().int().positive().default(19876),
  hostname: z.string().default("127.0.0.1"),
});

const dashboardSchema = z.object({
  token: z.string().min(8).optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const engineSchema = z.object({
  defaultProfileId: z.string().min(1).default("default"),
  contextWindow: z.number().int().min(1).max(200).default(20),
  defaultMood: z.string().min(1).optional(),
});

const generationSchema = z.object({
  provider: z.literal("openai-compat").default("openai-compat"),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  model: z.string().min(1).default("gpt-4o-mini"),
  maxTokens: z.number().int().positive().default(300),
  timeoutMs: z.number().int().positive().default(20_000),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().positive().default(8_000),
});

const dispatchSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().positive().default(15_000),
});

const safetySchema = z.object({
  defaultMode: safetyModeSchema.default("strict"),
  blockThreshold: severitySchema.default("low"),
});

const approvalSchema = z.object({
  timeoutMs: z.number().int().positive().default(600_000),
  sweepIntervalMs: z.number().int().positive().default(30_000),
});

export const twinConfigSchema = z.object({
  gateway: gatewaySchema.default({}),
  dashboard: dashboardSchema.default({}),
  channels: z.record(z.string(), channelAccountSchema).default({}),
  logging: loggingSchema.default({}),
  engine: engineSchema.default({}),
  generation: generationSchema.default({}),
  dispatch: dispatchSchema.default({}),
  safety: safetySchema.default({}),
  approval: approvalSchema.default({}),
});

export function parseConfig(raw: unknown): TwinConfig {
  return twinConfigSchema.parse(raw);
}
