/**
 * recurrent
 *
 * An in-process scheduler for periodic jobs, configured with a human-friendly
 * fluent API and driven by the caller's own loop.
 *
 * @example
 * ```typescript
 * import { Scheduler, CancelJob } from "recurrent";
 *
 * const scheduler = new Scheduler();
 *
 * scheduler.every(10).minutes().do(refreshCache);
 * scheduler.every(5).to(10).seconds().do(poll, "queue");
 * scheduler.every().hour().at(":15").tag("reports").do(hourlyReport);
 * scheduler.every().day().at("10:30", "Europe/Amsterdam").do(sendDigest);
 * scheduler.every().monday().at("09:00").until("2030-01-01").do(weeklyPlanning);
 * scheduler.every().minute().do(() => (queue.isEmpty() ? CancelJob : queue.drain()));
 *
 * // Observability
 * scheduler.on("job:cancel", (job) => console.debug(`Unscheduled ${job}`));
 *
 * // Poll again only once the previous round has finished
 * const tick = (): void => {
 *   scheduler
 *     .runPending()
 *     .catch((error) => console.error(error))
 *     .finally(() => setTimeout(tick, 1000));
 * };
 *
 * tick();
 * ```
 *
 * @packageDocumentation
 */

// Core classes
export { CancelJob, Job } from "./job";
export { Scheduler } from "./scheduler";
export { IntervalError, ScheduleError, ScheduleValueError } from "./errors";
export { repeat } from "./repeat";
export { DEADLINE_FORMATS, parseAtTime, parseDeadline } from "./time-parser";

// Default instance shortcuts
export {
  cancelJob,
  clear,
  defaultScheduler,
  every,
  getJobs,
  idleSeconds,
  nextRun,
  runAll,
  runPending,
} from "./default-scheduler";

// Types
export type {
  AtTime,
  CancelReason,
  Day,
  DeadlineInput,
  JobConfig,
  JobRunResult,
  SchedulerEvents,
  SchedulerOptions,
  Tag,
  TimeOffset,
  TimeUnit,
} from "./types";
