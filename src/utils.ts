import dayjs, { type Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc";
import type { Day, TimeUnit } from "./types";

dayjs.extend(utc);

/**
 * Days of week, indexed the way `Dayjs.day()` numbers them (Sunday = 0)
 */
export const DAYS_OF_WEEK: readonly Day[] = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

export const TIME_UNITS: readonly TimeUnit[] = ["second", "minute", "hour", "day", "week"];

export function parseWeekDayNumber(day: Day): number {
  return DAYS_OF_WEEK.indexOf(day);
}

/**
 * Plural unit name, as used in job descriptions and error messages
 */
export function pluralUnit(unit: TimeUnit): string {
  return `${unit}s`;
}

/**
 * Uniform random integer in `[min, max]`, both ends included
 */
export function randomInteger(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

/**
 * Milliseconds elapsed since midnight of the date's own day
 */
export function millisecondOfDay(date: Dayjs): number {
  return ((date.hour() * 60 + date.minute()) * 60 + date.second()) * 1000 + date.millisecond();
}

/**
 * Accept either a Dayjs or a native Date; native dates become UTC-mode Dayjs values
 */
export function toDayjs(value: Dayjs | Date): Dayjs {
  return dayjs.isDayjs(value) ? value : dayjs.utc(value);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
