import dayjs, { type Dayjs } from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import utc from "dayjs/plugin/utc";
import { ScheduleValueError } from "./errors";
import type { AtTime, TimeUnit } from "./types";

dayjs.extend(customParseFormat);
dayjs.extend(utc);

/**
 * Formats accepted by `Job.until()`, tried in order; the first strict match wins
 */
export const DEADLINE_FORMATS = [
  "YYYY-MM-DD HH:mm:ss",
  "YYYY-MM-DD HH:mm",
  "YYYY-MM-DD",
  "HH:mm:ss",
  "HH:mm",
] as const;

const DAILY_PATTERN = /^[0-2]\d:[0-5]\d(:[0-5]\d)?$/;
const HOURLY_PATTERN = /^([0-5]\d)?:[0-5]\d$/;
const MINUTELY_PATTERN = /^:[0-5]\d$/;

// A lone digit between separators, as in "2024-6-1" or "9:05"
const SINGLE_DIGIT_FIELD = /\b(\d)\b/g;

/**
 * Parse the clock anchor given to `Job.at()`.
 *
 * Accepted granularity depends on the job:
 * ```
 * daily or weekday jobs  HH:MM:SS | HH:MM
 * hourly jobs            MM:SS    | :MM
 * minute jobs            :SS
 * ```
 *
 * @param time - Anchor string
 * @param unit - Recurrence unit of the job
 * @param weekdayAnchored - Whether the job runs on a specific weekday
 * @throws ScheduleValueError if the unit takes no anchor or the format does not fit it
 */
export function parseAtTime(time: string, unit: TimeUnit | undefined, weekdayAnchored: boolean): AtTime {
  const daily = unit === "day" || weekdayAnchored;

  if (!daily && unit !== "hour" && unit !== "minute") {
    throw new ScheduleValueError("Invalid unit (valid units are `days`, `hours`, and `minutes`)");
  }

  if (typeof time !== "string") {
    throw new TypeError("at() should be passed a string");
  }

  if (daily && !DAILY_PATTERN.test(time)) {
    throw new ScheduleValueError("Invalid time format for a daily job (valid format is HH:MM(:SS)?)");
  }

  if (unit === "hour" && !HOURLY_PATTERN.test(time)) {
    throw new ScheduleValueError("Invalid time format for an hourly job (valid format is (MM)?:SS)");
  }

  if (unit === "minute" && !MINUTELY_PATTERN.test(time)) {
    throw new ScheduleValueError("Invalid time format for a minutely job (valid format is :SS)");
  }

  const parts = time.split(":");
  let hour = 0;
  let minute = 0;
  let second = 0;

  if (parts.length === 3) {
    [hour, minute, second] = parts.map(Number);
  } else if (unit === "minute") {
    second = Number(parts[1]);
  } else if (unit === "hour" && parts[0].length > 0) {
    [minute, second] = parts.map(Number);
  } else {
    hour = Number(parts[0]);
    minute = Number(parts[1]);
  }

  if (daily) {
    if (hour > 23) {
      throw new ScheduleValueError(`Invalid number of hours (${hour} is not between 0 and 23)`);
    }
  } else if (unit === "hour") {
    hour = 0;
  } else {
    hour = 0;
    minute = 0;
  }

  return { hour, minute, second };
}

/**
 * Parse a deadline string in the time domain of `now`.
 *
 * Date-less formats take the date of `now`. Fields may be written without their
 * leading zero.
 *
 * @returns the deadline, or null when no format matches
 */
export function parseDeadline(value: string, now: Dayjs): Dayjs | null {
  const padded = value.replace(SINGLE_DIGIT_FIELD, "0$1");

  for (const format of DEADLINE_FORMATS) {
    const parsed = now.isUTC() ? dayjs.utc(padded, format, true) : dayjs(padded, format, true);

    if (!parsed.isValid()) continue;

    if (format.startsWith("YYYY")) {
      return parsed;
    }

    return now.hour(parsed.hour()).minute(parsed.minute()).second(parsed.second()).millisecond(0);
  }

  return null;
}

/**
 * Format a clock anchor as HH:mm:ss
 */
export function formatAtTime({ hour, minute, second }: AtTime): string {
  return [hour, minute, second].map((value) => String(value).padStart(2, "0")).join(":");
}
