import dayjs, { type Dayjs } from "dayjs";
import { IntervalError, ScheduleError, ScheduleValueError } from "./errors";
import type { Scheduler } from "./scheduler";
import { formatAtTime, parseAtTime, parseDeadline } from "./time-parser";
import { addInZone, assertTimeZone, fromWallClock, toWallClock } from "./timezone";
import type {
  Day,
  DeadlineInput,
  JobConfig,
  JobRunResult,
  Tag,
  TimeUnit,
} from "./types";
import {
  DAYS_OF_WEEK,
  TIME_UNITS,
  millisecondOfDay,
  parseWeekDayNumber,
  pluralUnit,
  randomInteger,
} from "./utils";

/**
 * Return this from a job function to remove the job from its scheduler
 *
 * @example
 * ```typescript
 * scheduler.every().second().do(() => {
 *   if (queue.isEmpty()) return CancelJob;
 *   queue.drain();
 * });
 * ```
 */
export const CancelJob: unique symbol = Symbol("CancelJob");

/**
 * Units a clock anchor can be combined with, besides weekday-anchored weekly jobs
 */
const AT_TIME_UNITS: readonly TimeUnit[] = ["day", "hour", "minute"];

type BoundFunction = {
  name: string;
  args: unknown[];
  call: () => unknown;
};

/**
 * A periodic job, created through `Scheduler.every()` and registered with that
 * scheduler once `do()` binds the function to run.
 *
 * @example
 * ```typescript
 * scheduler.every(10).minutes().do(refreshCache);
 * scheduler.every().day().at("10:30", "Europe/Amsterdam").do(sendDigest, "daily");
 * scheduler.every().monday().at("09:00").tag("reports").do(weeklyReport);
 * scheduler.every(5).to(10).seconds().until("18:00").do(poll);
 * ```
 */
export class Job {
  // ─────────────────────────────────────────────────────────────────────────────
  // Private Properties
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Recurrence configuration
   */
  private _config: JobConfig;

  /**
   * Last execution timestamp
   */
  private _lastRun: Dayjs | null = null;

  /**
   * Next scheduled execution time, null until `do()` is called
   */
  private _nextRun: Dayjs | null = null;

  private readonly _tags = new Set<Tag>();

  private _boundFunction: BoundFunction | null = null;

  // ─────────────────────────────────────────────────────────────────────────────
  // Constructor
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Creates a new, unconfigured Job
   *
   * @param interval - Number of units between runs
   * @param _scheduler - Scheduler the job reads the time from and registers with
   */
  public constructor(
    interval: number,
    private readonly _scheduler: Scheduler,
  ) {
    if (!Number.isInteger(interval) || interval < 1) {
      throw new IntervalError(`Invalid interval ${interval} (must be a positive integer)`);
    }

    this._config = { interval };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Public Getters
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Returns the current recurrence configuration (readonly)
   */
  public get config(): Readonly<JobConfig> {
    return this._config;
  }

  /**
   * Returns the tags the job was labelled with
   */
  public get tags(): ReadonlySet<Tag> {
    return this._tags;
  }

  /**
   * Returns the last execution timestamp
   */
  public get lastRun(): Dayjs | null {
    return this._lastRun;
  }

  /**
   * Returns the next scheduled execution time, null until `do()` is called
   */
  public get nextRun(): Dayjs | null {
    return this._nextRun;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Unit Configuration Methods (Fluent API)
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run the job every second; only valid for `every()` / `every(1)`
   */
  public second(): this {
    this._assertSingleInterval("Use seconds() instead of second()");
    return this.seconds();
  }

  /**
   * Run the job every N seconds
   */
  public seconds(): this {
    return this._setUnit("second");
  }

  /**
   * Run the job every minute; only valid for `every()` / `every(1)`
   */
  public minute(): this {
    this._assertSingleInterval("Use minutes() instead of minute()");
    return this.minutes();
  }

  /**
   * Run the job every N minutes
   */
  public minutes(): this {
    return this._setUnit("minute");
  }

  /**
   * Run the job every hour; only valid for `every()` / `every(1)`
   */
  public hour(): this {
    this._assertSingleInterval("Use hours() instead of hour()");
    return this.hours();
  }

  /**
   * Run the job every N hours
   */
  public hours(): this {
    return this._setUnit("hour");
  }

  /**
   * Run the job every day; only valid for `every()` / `every(1)`
   */
  public day(): this {
    this._assertSingleInterval("Use days() instead of day()");
    return this.days();
  }

  /**
   * Run the job every N days
   */
  public days(): this {
    return this._setUnit("day");
  }

  /**
   * Run the job every week; only valid for `every()` / `every(1)`
   */
  public week(): this {
    this._assertSingleInterval("Use weeks() instead of week()");
    return this.weeks();
  }

  /**
   * Run the job every N weeks
   */
  public weeks(): this {
    return this._setUnit("week");
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Weekday Configuration
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run the job weekly on the given day
   *
   * @param day - Day of the week
   * @returns this for chaining
   * @throws IntervalError for jobs repeating every 2 or more weeks
   *
   * @example
   * ```typescript
   * scheduler.every().on("friday").at("17:00").do(deploy);
   * ```
   */
  public on(day: Day): this {
    if (!DAYS_OF_WEEK.includes(day)) {
      throw new ScheduleValueError(
        `Invalid start day (valid start days are ${DAYS_OF_WEEK.join(", ")})`,
      );
    }

    this._assertSingleInterval(
      `Scheduling .${day}() jobs is only allowed for weekly jobs. ` +
        `Using .${day}() on a job scheduled to run every 2 or more weeks is not supported.`,
    );

    this._config.startDay = day;
    return this.weeks();
  }

  /**
   * Run the job every Monday
   */
  public monday(): this {
    return this.on("monday");
  }

  /**
   * Run the job every Tuesday
   */
  public tuesday(): this {
    return this.on("tuesday");
  }

  /**
   * Run the job every Wednesday
   */
  public wednesday(): this {
    return this.on("wednesday");
  }

  /**
   * Run the job every Thursday
   */
  public thursday(): this {
    return this.on("thursday");
  }

  /**
   * Run the job every Friday
   */
  public friday(): this {
    return this.on("friday");
  }

  /**
   * Run the job every Saturday
   */
  public saturday(): this {
    return this.on("saturday");
  }

  /**
   * Run the job every Sunday
   */
  public sunday(): this {
    return this.on("sunday");
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Time, Range & Deadline Configuration
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Pin the job to a time within its period
   *
   * The format depends on the unit: `HH:MM(:SS)` for daily and weekday jobs,
   * `MM:SS` or `:MM` for hourly jobs, `:SS` for minute jobs.
   *
   * @param time - Clock anchor
   * @param zone - IANA time zone the anchor refers to
   * @returns this for chaining
   *
   * @example
   * ```typescript
   * scheduler.every().day().at("10:30").do(job);
   * scheduler.every().hour().at(":15").do(job);
   * scheduler.every().minute().at(":05").do(job);
   * scheduler.every().wednesday().at("13:15", "America/New_York").do(job);
   * ```
   */
  public at(time: string, zone?: string): this {
    const atTime = parseAtTime(time, this._config.unit, this._config.startDay !== undefined);

    if (zone !== undefined) {
      assertTimeZone(zone);
      this._config.atTimeZone = zone;
    }

    this._config.atTime = atTime;
    return this;
  }

  /**
   * Randomize the interval between runs: `every(A).to(B)` waits N units with A <= N <= B,
   * drawn again after every run
   *
   * @param latest - Maximum interval between runs
   * @returns this for chaining
   */
  public to(latest: number): this {
    if (!Number.isInteger(latest)) {
      throw new IntervalError(`Invalid latest interval ${latest} (must be an integer)`);
    }

    this._config.latest = latest;
    return this;
  }

  /**
   * Stop running the job after the given moment
   *
   * The job is cancelled as soon as its next run falls after the deadline, and
   * right before a run that happens after it.
   *
   * @param deadline - An instant, an offset from now, or a string in one of the
   *   formats "YYYY-MM-DD HH:mm:ss", "YYYY-MM-DD HH:mm", "YYYY-MM-DD",
   *   "HH:mm:ss", "HH:mm" (date-less forms mean today)
   * @returns this for chaining
   * @throws ScheduleValueError if the deadline is unparseable or in the past
   */
  public until(deadline: DeadlineInput): this {
    const now = this._scheduler.timestamp;
    let cancelAfter: Dayjs;

    if (dayjs.isDayjs(deadline)) {
      cancelAfter = deadline;
    } else if (deadline instanceof Date) {
      cancelAfter = dayjs(deadline);
    } else if (typeof deadline === "string") {
      const parsed = parseDeadline(deadline, now);

      if (!parsed) {
        throw new ScheduleValueError("Invalid string format for until()");
      }

      cancelAfter = parsed;
    } else if (typeof deadline === "object" && deadline !== null) {
      const { weeks = 0, days = 0, hours = 0, minutes = 0, seconds = 0 } = deadline;
      cancelAfter = now
        .add(weeks, "week")
        .add(days, "day")
        .add(hours, "hour")
        .add(minutes, "minute")
        .add(seconds, "second");
    } else {
      throw new TypeError("until() takes a string, Date, Dayjs or time offset parameter");
    }

    if (cancelAfter.isBefore(now)) {
      throw new ScheduleValueError("Cannot schedule a job to run until a time in the past");
    }

    this._config.cancelAfter = cancelAfter;
    return this;
  }

  /**
   * Tag the job for grouped retrieval and cancellation; duplicates are ignored
   *
   * @example
   * ```typescript
   * scheduler.every().hour().tag("sync", "remote").do(sync);
   * scheduler.clear("sync");
   * ```
   */
  public tag(...tags: Tag[]): this {
    for (const tag of tags) {
      if (!["string", "number", "symbol"].includes(typeof tag)) {
        throw new TypeError("Tags must be strings, numbers or symbols");
      }
    }

    for (const tag of tags) {
      this._tags.add(tag);
    }

    return this;
  }

  /**
   * Bind the function to run, compute the first run and register the job with
   * its scheduler
   *
   * @param fn - Function to call on every run
   * @param args - Arguments passed to `fn` on every run
   * @returns this for chaining
   */
  public do<TArgs extends unknown[]>(fn: (...args: TArgs) => unknown, ...args: TArgs): this {
    if (typeof fn !== "function") {
      throw new TypeError("do() should be passed a function");
    }

    this._boundFunction = {
      name: fn.name || "anonymous",
      args,
      call: () => fn(...args),
    };

    this._nextRun = this._determineNextRun();
    this._scheduler.addJob(this);
    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Execution Control
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Determine if the job should run now
   *
   * @throws ScheduleError if the job was never configured with `do()`
   */
  public shouldRun(): boolean {
    if (this._nextRun === null) {
      throw new ScheduleError("Job must be configured with do() before checking if it should run");
    }

    return !this._scheduler.timestamp.isBefore(this._nextRun);
  }

  /**
   * Whether the instant lies past the job's deadline
   */
  public isOverdue(instant: Dayjs): boolean {
    return this._config.cancelAfter !== undefined && instant.isAfter(this._config.cancelAfter);
  }

  /**
   * Execute the job and reschedule it
   *
   * A job past its deadline does not run and reports a cancellation. When the
   * rescheduled run falls past the deadline the run still happens, but the
   * cancellation takes priority over the function's return value. Errors thrown
   * by the job function propagate and leave the schedule untouched.
   */
  public async run(): Promise<JobRunResult> {
    if (this.isOverdue(this._scheduler.timestamp)) {
      this._scheduler.emit("job:overdue", this);
      return { status: "cancelled", reason: "deadline" };
    }

    if (this._boundFunction === null) {
      throw new ScheduleError("Job must be configured with do() before it can run");
    }

    this._scheduler.emit("job:start", this);

    const value = await this._boundFunction.call();

    this._lastRun = this._scheduler.timestamp;
    const nextRun = this._determineNextRun();
    this._nextRun = nextRun;

    if (this.isOverdue(nextRun)) {
      this._scheduler.emit("job:overdue", this);
      return { status: "cancelled", reason: "deadline" };
    }

    if (value === CancelJob) {
      return { status: "cancelled", reason: "requested" };
    }

    return { status: "completed", value };
  }

  /**
   * Order jobs by their next run; jobs without one sort last
   */
  public static compareByNextRun(a: Job, b: Job): number {
    if (a._nextRun === null || b._nextRun === null) {
      return Number(a._nextRun === null) - Number(b._nextRun === null);
    }

    return a._nextRun.valueOf() - b._nextRun.valueOf();
  }

  /**
   * Human readable description of the job
   *
   * @example
   * ```
   * Every 1 day at 10:30:00 do backup() (last run: [never], next run: 2024-05-02 10:30:00)
   * Every 5 to 10 seconds do poll("queue") (last run: [never], next run: 2024-05-01 12:00:07)
   * ```
   */
  public toString(): string {
    const { interval, latest, unit, atTime } = this._config;
    const unitName = unit === undefined ? "[no unit]" : interval === 1 ? unit : pluralUnit(unit);
    const range = latest !== undefined && atTime === undefined ? `${interval} to ${latest}` : `${interval}`;
    const anchor = atTime !== undefined ? ` at ${formatAtTime(atTime)}` : "";

    const call = this._boundFunction
      ? `${this._boundFunction.name}(${this._boundFunction.args.map(describeArgument).join(", ")})`
      : "[None]";

    const format = (date: Dayjs | null) => (date ? date.format("YYYY-MM-DD HH:mm:ss") : "[never]");

    return (
      `Every ${range} ${unitName}${anchor} do ${call} ` +
      `(last run: ${format(this._lastRun)}, next run: ${format(this._nextRun)})`
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────────

  private _assertSingleInterval(message: string): void {
    if (this._config.interval !== 1) {
      throw new IntervalError(message);
    }
  }

  private _setUnit(unit: TimeUnit): this {
    this._config.unit = unit;
    return this;
  }

  /**
   * Pick the interval for the upcoming period, drawing a random one for ranged jobs
   */
  private _resolveInterval(): number {
    const { interval, latest } = this._config;

    if (latest === undefined) return interval;

    if (latest < interval) {
      throw new ScheduleError("`latest` must be greater than or equal to `interval`");
    }

    return randomInteger(interval, latest);
  }

  /**
   * Calculate the next run time from the scheduler's current time.
   *
   * With a time zone the computation runs on the zone's wall clock (see
   * `./timezone`) and is resolved back into an instant at the end; a repeated
   * wall time resolves to its first occurrence after the current time.
   */
  private _determineNextRun(): Dayjs {
    const { unit, atTime, atTimeZone: zone, startDay } = this._config;

    if (unit === undefined || !TIME_UNITS.includes(unit)) {
      throw new ScheduleValueError(
        "Invalid unit (valid units are `seconds`, `minutes`, `hours`, `days`, and `weeks`)",
      );
    }

    const interval = this._resolveInterval();
    const timestamp = this._scheduler.timestamp;
    const now = zone ? toWallClock(timestamp, zone) : timestamp;

    let date = zone ? addInZone(timestamp, interval, unit, zone) : timestamp.add(interval, unit);

    // Move onto the next occurrence of the weekday, keeping the N-week cadence
    if (startDay !== undefined) {
      if (unit !== "week") {
        throw new ScheduleValueError("`unit` should be 'weeks'");
      }

      const weekday = parseWeekDayNumber(startDay);

      if (weekday === -1) {
        throw new ScheduleValueError(
          `Invalid start day (valid start days are ${DAYS_OF_WEEK.join(", ")})`,
        );
      }

      let daysAhead = weekday - date.day();

      // Target day already happened this week
      if (daysAhead <= 0) {
        daysAhead += 7;
      }

      date = date.add(daysAhead, "day").subtract(interval, unit);
    }

    if (atTime !== undefined) {
      if (!AT_TIME_UNITS.includes(unit) && startDay === undefined) {
        throw new ScheduleValueError("Invalid unit without specifying start day");
      }

      date = date.second(atTime.second).millisecond(0);

      if (unit === "day" || unit === "hour" || startDay !== undefined) {
        date = date.minute(atTime.minute);
      }

      if (unit === "day" || startDay !== undefined) {
        date = date.hour(atTime.hour);
      }

      // Run at the anchor of the current period too, unless the last run
      // already happened within it
      const lastRun = this._lastRun && zone ? toWallClock(this._lastRun, zone) : this._lastRun;

      if (lastRun === null || date.isAfter(lastRun.add(interval, unit))) {
        if (unit === "day") {
          if (millisecondOfDay(date) > millisecondOfDay(now) && this._config.interval === 1) {
            date = date.subtract(1, "day");
          }
        } else if (unit === "hour") {
          if (
            atTime.minute > now.minute() ||
            (atTime.minute === now.minute() && atTime.second > now.second())
          ) {
            date = date.subtract(1, "hour");
          }
        } else if (unit === "minute") {
          if (atTime.second > now.second()) {
            date = date.subtract(1, "minute");
          }
        }
      }

      // The weekday jump above overshoots by a week when today's anchor is still ahead
      if (startDay !== undefined && date.diff(now, "day") >= 7) {
        date = date.subtract(interval, unit);
      }
    }

    if (!zone) return date;

    const epochMs = fromWallClock(date, zone, timestamp.valueOf());
    return timestamp.isUTC() ? dayjs.utc(epochMs) : dayjs(epochMs);
  }
}

function describeArgument(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "function") return value.name || "anonymous";

  return String(value);
}
