import type { SafetyMode, Severity } from "../safety/types.js";

export interface TwinConfig {
  readonly gateway: GatewayConfig;
  readonly dashboard: DashboardConfig;
  readonly channels: Record<string, ChannelAccountConfig>;
  readonly logging?: LoggingConfig;
  readonly engine: EngineConfig;
  readonly generation: GenerationConfig;
  readonly dispatch: DispatchConfig;
  readonly safety: SafetyConfig;
  readonly approval: ApprovalConfig;
}

export interface GatewayConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface DashboardConfig {
  /** When set, every route except /health requires this bearer token. */
  readonly token?: string;
}

export interface ChannelAccountConfig {
  readonly type: "webhook";
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
  readonly path: string;
  readonly callbackUrl?: string;
  readonly token?: string;
  readonly maxTextLength?: number;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface EngineConfig {
  readonly defaultProfileId: string;
  /** Number of recent messages folded into the generation context. */
  readonly contextWindow: number;
  readonly defaultMood?: string;
}

export interface GenerationConfig {
  readonly provider: "openai-compat";
  readonly baseUrl?: string;
  readonly apiKey?: string;
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface DispatchConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface SafetyConfig {
  readonly defaultMode: SafetyMode;
  readonly blockThreshold: Severity;
}

export interface ApprovalConfig {
  readonly timeoutMs: number;
  readonly sweepIntervalMs: number;
}
