import type { Dayjs } from "dayjs";
import type { Job } from "./job";
import { Scheduler } from "./scheduler";
import type { Tag } from "./types";

/**
 * Default scheduler instance for simple use cases
 *
 * The core classes never touch it; it only backs the shortcut functions below.
 *
 * @example
 * ```typescript
 * import { every, runPending } from "recurrent";
 *
 * every(10).minutes().do(refreshCache);
 * const poll = (): void => {
 *   runPending()
 *     .catch((error) => console.error(error))
 *     .finally(() => setTimeout(poll, 1000));
 * };
 *
 * poll();
 * ```
 */
export const defaultScheduler = new Scheduler();

/** Start configuring a job on the default scheduler */
export function every(interval = 1): Job {
  return defaultScheduler.every(interval);
}

/** Run the default scheduler's due jobs */
export function runPending(): Promise<void> {
  return defaultScheduler.runPending();
}

/** Run every job of the default scheduler, due or not */
export function runAll(delaySeconds = 0): Promise<void> {
  return defaultScheduler.runAll(delaySeconds);
}

/** Jobs of the default scheduler, optionally filtered by tag */
export function getJobs(tag?: Tag): Job[] {
  return defaultScheduler.getJobs(tag);
}

/** Remove jobs from the default scheduler, optionally only those with the tag */
export function clear(tag?: Tag): void {
  defaultScheduler.clear(tag);
}

/** Remove a job from the default scheduler */
export function cancelJob(job: Job): void {
  defaultScheduler.cancelJob(job);
}

/** When the default scheduler's next job is due */
export function nextRun(tag?: Tag): Dayjs | null {
  return defaultScheduler.getNextRun(tag);
}

/** Seconds until the default scheduler's next job is due */
export function idleSeconds(): number | null {
  return defaultScheduler.idleSeconds;
}
