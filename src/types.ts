import type { Dayjs } from "dayjs";
import type { Job } from "./job";

/**
 * Time units a job can recur on
 */
export type TimeUnit = "second" | "minute" | "hour" | "day" | "week";

/**
 * Days of the week (lowercase for consistency)
 */
export type Day =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * Identifier used to group jobs for retrieval and cancellation
 */
export type Tag = string | number | symbol;

/**
 * Clock-of-day anchor without a date component
 */
export type AtTime = {
  hour: number;
  minute: number;
  second: number;
};

/**
 * Relative offset, used for deadlines given as "from now"
 */
export type TimeOffset = {
  weeks?: number;
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
};

/**
 * Anything `Job.until()` accepts as a deadline
 */
export type DeadlineInput = Dayjs | Date | string | TimeOffset;

/**
 * Recurrence configuration of a job
 */
export type JobConfig = {
  /** Number of units between runs */
  interval: number;
  /** Upper bound of a randomized interval */
  latest?: number;
  /** Recurrence unit */
  unit?: TimeUnit;
  /** Time of day the job is pinned to */
  atTime?: AtTime;
  /** IANA time zone `atTime` refers to */
  atTimeZone?: string;
  /** Weekday anchor for weekly jobs */
  startDay?: Day;
  /** The job never runs after this instant */
  cancelAfter?: Dayjs;
};

/**
 * Why a run asked to remove its job from the scheduler
 *
 * - `deadline`: the job passed its `until()` deadline
 * - `requested`: the job function returned `CancelJob`
 */
export type CancelReason = "deadline" | "requested";

/**
 * Result of a single job run
 */
export type JobRunResult =
  | { status: "completed"; value: unknown }
  | { status: "cancelled"; reason: CancelReason };

/**
 * Scheduler construction options
 */
export type SchedulerOptions = {
  /** Read the current time from the system clock (default: true) */
  realtime?: boolean;
  /** Initial simulated time, required when `realtime` is false */
  startTimestamp?: Dayjs | Date;
};

/**
 * Scheduler event types for observability
 */
export type SchedulerEvents = {
  "job:added": [job: Job];
  "job:start": [job: Job];
  "job:complete": [job: Job, result: JobRunResult];
  "job:overdue": [job: Job];
  "job:cancel": [job: Job, wasScheduled: boolean];
  "jobs:clear": [tag: Tag | undefined];
  "scheduler:tick": [timestamp: Dayjs];
  "scheduler:run-all": [jobCount: number, delaySeconds: number];
};
