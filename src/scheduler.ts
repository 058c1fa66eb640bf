import { EventEmitter } from "events";
import dayjs, { type Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc";
import { ScheduleError } from "./errors";
import { Job } from "./job";
import type { JobRunResult, SchedulerEvents, SchedulerOptions, Tag } from "./types";
import { sleep, toDayjs } from "./utils";

dayjs.extend(utc);

/**
 * Type-safe event emitter interface for Scheduler events
 */
interface TypedEventEmitter<TEvents extends Record<string, unknown[]>> {
  on<K extends keyof TEvents>(event: K, listener: (...args: TEvents[K]) => void): this;
  once<K extends keyof TEvents>(event: K, listener: (...args: TEvents[K]) => void): this;
  off<K extends keyof TEvents>(event: K, listener: (...args: TEvents[K]) => void): this;
  emit<K extends keyof TEvents>(event: K, ...args: TEvents[K]): boolean;
}

/**
 * Scheduler keeps track of jobs and runs the ones that are due.
 *
 * It has no timer of its own: the caller drives it by calling `runPending()`
 * in a loop. Time comes either from the system clock (UTC) or, for simulations
 * and tests, from a timestamp the caller moves forward with `setTimestamp()`.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler();
 *
 * scheduler.on("job:start", (job) => console.debug(`Running ${job}`));
 *
 * scheduler.every(10).minutes().do(refreshCache);
 * scheduler.every().day().at("10:30").do(sendDigest);
 *
 * const poll = async (): Promise<void> => {
 *   try {
 *     await scheduler.runPending();
 *   } catch (error) {
 *     console.error(error);
 *   }
 *
 *   setTimeout(poll, 1000);
 * };
 *
 * void poll();
 * ```
 */
export class Scheduler
  extends (EventEmitter as new () => TypedEventEmitter<SchedulerEvents>)
  implements TypedEventEmitter<SchedulerEvents>
{
  // ─────────────────────────────────────────────────────────────────────────────
  // Private Properties
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * List of registered jobs
   */
  private _jobs: Job[] = [];

  /**
   * Whether the current time is read from the system clock
   */
  private readonly _realtime: boolean;

  /**
   * Simulated current time, only used when not in realtime mode
   */
  private _timestamp: Dayjs | null;

  // ─────────────────────────────────────────────────────────────────────────────
  // Constructor
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @throws ScheduleError when realtime mode is combined with a start timestamp,
   *   or simulated mode is missing one
   *
   * @example
   * ```typescript
   * new Scheduler();                                                   // system clock
   * new Scheduler({ realtime: false, startTimestamp: dayjs.utc("2024-01-01") });
   * ```
   */
  public constructor({ realtime = true, startTimestamp }: SchedulerOptions = {}) {
    super();

    if (realtime && startTimestamp !== undefined) {
      throw new ScheduleError(
        "Scheduler is configured for realtime operation, but a start timestamp was provided",
      );
    }

    if (!realtime && startTimestamp === undefined) {
      throw new ScheduleError(
        "Scheduler is configured for non-realtime operation, but no start timestamp was provided",
      );
    }

    this._realtime = realtime;
    this._timestamp = startTimestamp === undefined ? null : toDayjs(startTimestamp);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Public Getters
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Whether the current time is read from the system clock
   */
  public get isRealtime(): boolean {
    return this._realtime;
  }

  /**
   * The current time: the system clock in UTC, or the simulated timestamp
   */
  public get timestamp(): Dayjs {
    if (this._realtime || this._timestamp === null) {
      return dayjs.utc();
    }

    return this._timestamp;
  }

  /**
   * Returns the number of registered jobs
   */
  public get jobCount(): number {
    return this._jobs.length;
  }

  /**
   * Alias for getNextRun()
   */
  public get nextRun(): Dayjs | null {
    return this.getNextRun();
  }

  /**
   * Seconds until the next job is due (negative when a job is overdue), or null
   * without jobs
   */
  public get idleSeconds(): number | null {
    const nextRun = this.getNextRun();

    if (!nextRun) return null;

    return nextRun.diff(this.timestamp) / 1000;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Clock Control
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Move the simulated clock forward
   *
   * @throws ScheduleError in realtime mode, or when the timestamp is earlier than the current one
   */
  public setTimestamp(timestamp: Dayjs | Date): this {
    if (this._realtime || this._timestamp === null) {
      throw new ScheduleError(
        "Cannot update the current time when scheduler is configured for realtime operation",
      );
    }

    const next = toDayjs(timestamp);

    if (next.isBefore(this._timestamp)) {
      throw new ScheduleError("Cannot set the current time to a time in the past");
    }

    this._timestamp = next;
    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Job Management
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Start configuring a new periodic job
   *
   * @param interval - Number of units between runs
   * @returns an unconfigured Job; it registers itself once `do()` is called
   */
  public every(interval = 1): Job {
    return new Job(interval, this);
  }

  /**
   * Add a configured job to the scheduler
   *
   * @throws ScheduleError if the job has not been configured with `do()`
   */
  public addJob(job: Job): this {
    if (job.nextRun === null) {
      throw new ScheduleError("Unable to add job to scheduler: job is not configured with do()");
    }

    this._jobs.push(job);
    this.emit("job:added", job);
    return this;
  }

  /**
   * Get scheduled jobs, optionally only those with the given tag
   */
  public getJobs(tag?: Tag): Job[] {
    if (tag === undefined) {
      return [...this._jobs];
    }

    return this._jobs.filter((job) => job.tags.has(tag));
  }

  /**
   * Remove scheduled jobs, optionally only those with the given tag
   */
  public clear(tag?: Tag): void {
    this.emit("jobs:clear", tag);

    if (tag === undefined) {
      this._jobs = [];
      return;
    }

    this._jobs = this._jobs.filter((job) => !job.tags.has(tag));
  }

  /**
   * Remove a job from the scheduler; removing a job that is not scheduled is a no-op
   */
  public cancelJob(job: Job): void {
    const index = this._jobs.indexOf(job);

    if (index !== -1) {
      this._jobs.splice(index, 1);
    }

    this.emit("job:cancel", job, index !== -1);
  }

  /**
   * When the next job is due, optionally among jobs with the given tag
   */
  public getNextRun(tag?: Tag): Dayjs | null {
    const [first] = this.getJobs(tag).sort(Job.compareByNextRun);

    return first?.nextRun ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Execution
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run every job that is due, earliest first, one after the other
   *
   * Missed runs are not made up for: a minutely job polled once an hour runs once.
   */
  public async runPending(): Promise<void> {
    this.emit("scheduler:tick", this.timestamp);

    const dueJobs = this._jobs.filter((job) => job.shouldRun()).sort(Job.compareByNextRun);

    for (const job of dueJobs) {
      await this._runJob(job);
    }
  }

  /**
   * Run all jobs regardless of whether they are due
   *
   * @param delaySeconds - Pause between consecutive jobs, to spread the load
   */
  public async runAll(delaySeconds = 0): Promise<void> {
    const jobs = [...this._jobs];

    this.emit("scheduler:run-all", jobs.length, delaySeconds);

    for (const [index, job] of jobs.entries()) {
      if (index > 0) {
        await sleep(delaySeconds * 1000);
      }

      await this._runJob(job);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run a single job, unscheduling it when it asks to be cancelled
   */
  private async _runJob(job: Job): Promise<JobRunResult> {
    const result = await job.run();

    this.emit("job:complete", job, result);

    if (result.status === "cancelled") {
      this.cancelJob(job);
    }

    return result;
  }
}
