import { afterEach, describe, expect, it, vi } from "vitest";
import {
  cancelJob,
  clear,
  defaultScheduler,
  every,
  getJobs,
  idleSeconds,
  nextRun,
  runAll,
  runPending,
} from "../default-scheduler";

afterEach(() => {
  clear();
});

describe("default scheduler shortcuts", () => {
  it("should register jobs on the default scheduler", () => {
    const job = every().minute().tag("shortcut").do(() => undefined);

    expect(defaultScheduler.isRealtime).toBe(true);
    expect(getJobs()).toEqual([job]);
    expect(getJobs("shortcut")).toEqual([job]);
    expect(nextRun()?.valueOf()).toBe(job.nextRun?.valueOf());
  });

  it("should report idle time against the system clock", () => {
    expect(idleSeconds()).toBeNull();

    every().minute().do(() => undefined);

    expect(idleSeconds()).toBeGreaterThan(59);
    expect(idleSeconds()).toBeLessThanOrEqual(60);
  });

  it("should run and cancel jobs", async () => {
    const fn = vi.fn();
    const job = every().hour().do(fn);

    await runPending();
    expect(fn).not.toHaveBeenCalled();

    await runAll();
    expect(fn).toHaveBeenCalledTimes(1);

    cancelJob(job);
    expect(getJobs()).toEqual([]);
  });

  it("should clear jobs by tag", () => {
    every().minute().tag("a").do(() => undefined);
    const kept = every().minute().tag("b").do(() => undefined);

    clear("a");

    expect(getJobs()).toEqual([kept]);
  });
});
