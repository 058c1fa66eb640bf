/**
 * Base error class for scheduling errors.
 *
 * Thrown directly for temporal-consistency problems (clock mode mismatch,
 * simulated clock moving backward) and for jobs used before they are configured.
 */
export class ScheduleError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ScheduleError";
  }
}

/**
 * Thrown when a job or scheduler receives an invalid value.
 */
export class ScheduleValueError extends ScheduleError {
  public constructor(message: string) {
    super(message);
    this.name = "ScheduleValueError";
  }
}

/**
 * Thrown when an interval does not fit the unit or weekday it is combined with,
 * e.g. `every(2).minute()` instead of `every(2).minutes()`.
 */
export class IntervalError extends ScheduleValueError {
  public constructor(message: string) {
    super(message);
    this.name = "IntervalError";
  }
}
