import { describe, it, expect, vi, afterEach } from "vitest";
import { ApprovalSweeper, type OverdueExpirer } from "../../src/approval/sweeper.js";
import { silentLogger } from "../helpers/logger.js";

describe("ApprovalSweeper", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("passes the current time to the target and returns the count", async () => {
    const target: OverdueExpirer = { expireOverdue: vi.fn(async () => ["r1", "r2"]) };
    const sweeper = new ApprovalSweeper({ target, intervalMs: 1_000, logger: silentLogger(), now: () => 42 });
    expect(await sweeper.sweep()).toBe(2);
    expect(target.expireOverdue).toHaveBeenCalledWith(42);
  });

  it("skips a tick while the previous sweep is still running", async () => {
    let release: () => void = () => {};
    const target: OverdueExpirer = {
      expireOverdue: vi.fn(
        () =>
          new Promise<string[]>((resolve) => {
            release = () => resolve([]);
          }),
      ),
    };
    const sweeper = new ApprovalSweeper({ target, intervalMs: 1_000, logger: silentLogger() });
    const first = sweeper.sweep();
    expect(await sweeper.sweep()).toBe(0);
    release();
    await first;
    expect(target.expireOverdue).toHaveBeenCalledTimes(1);
  });

  it("sweeps on its interval until stopped", async () => {
    vi.useFakeTimers();
    const target: OverdueExpirer = { expireOverdue: vi.fn(async () => []) };
    const sweeper = new ApprovalSweeper({ target, intervalMs: 1_000, logger: silentLogger() });

    sweeper.start();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(target.expireOverdue).toHaveBeenCalledTimes(3);

    sweeper.stop();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(target.expireOverdue).toHaveBeenCalledTimes(3);
  });

  it("keeps running after a failed sweep", async () => {
    vi.useFakeTimers();
    const target: OverdueExpirer = {
      expireOverdue: vi.fn().mockRejectedValueOnce(new Error("db locked")).mockResolvedValue([]),
    };
    const sweeper = new ApprovalSweeper({ target, intervalMs: 500, logger: silentLogger() });
    sweeper.start();
    await vi.advanceTimersByTimeAsync(1_000);
    sweeper.stop();
    expect(target.expireOverdue).toHaveBeenCalledTimes(2);
  });
});
