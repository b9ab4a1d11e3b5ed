import type { Logger } from "../logging/logger.js";

export interface OverdueExpirer {
  expireOverdue(now: number): Promise<readonly unknown[]>;
}

export interface ApprovalSweeperDeps {
  target: OverdueExpirer;
  intervalMs: number;
  logger: Logger;
  now?: () => number;
}

/** Periodically expires approval requests whose deadline has passed. */
export class ApprovalSweeper {
  private readonly target: OverdueExpirer;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(deps: ApprovalSweeperDeps) {
    this.target = deps.target;
    this.intervalMs = deps.intervalMs;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err) => {
        this.logger.error({ err }, "Approval sweep error");
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.intervalMs }, "Approval sweeper started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info("Approval sweeper stopped");
  }

  /** One pass. Overlapping ticks are skipped rather than queued. */
  async sweep(): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    try {
      const expired = await this.target.expireOverdue(this.now());
      if (expired.length > 0) {
        this.logger.info({ count: expired.length }, "Expired overdue approval requests");
      }
      return expired.length;
    } finally {
      this.running = false;
    }
  }
}
