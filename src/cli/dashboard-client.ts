import type { TwinConfig } from "../config/types.js";

const REQUEST_TIMEOUT_MS = 10_000;

export interface DashboardResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Talks to a running gateway's dashboard API. Commands that resolve
 * approvals go through here because sending needs the live channel adapters.
 */
export class DashboardClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: Pick<TwinConfig, "gateway" | "dashboard">,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.baseUrl = `http://${config.gateway.hostname}:${config.gateway.port}`;
  }

  async request(method: "GET" | "POST" | "PUT", path: string, body?: unknown): Promise<DashboardResponse> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.config.dashboard.token) headers["Authorization"] = `Bearer ${this.config.dashboard.token}`;

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    const text = await res.text();
    return { status: res.status, body: text.length > 0 ? parseJson(text) : null };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** The `message` field of an error body, or a generic description. */
export function describeFailure(res: DashboardResponse): string {
  const body = res.body;
  if (body !== null && typeof body === "object" && "message" in body && typeof body.message === "string") {
    return `${body.message} (HTTP ${res.status})`;
  }
  if (body !== null && typeof body === "object" && "error" in body && typeof body.error === "string") {
    return `${body.error} (HTTP ${res.status})`;
  }
  return `HTTP ${res.status}`;
}
