import dayjs, { type Dayjs } from "dayjs";
import timezone from "dayjs/plugin/timezone";
import utc from "dayjs/plugin/utc";
import { ScheduleValueError } from "./errors";
import type { TimeUnit } from "./types";

// Enable timezone support
dayjs.extend(utc);
dayjs.extend(timezone);

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

/*
 * Zone-anchored scheduling works on "wall clock" values: UTC-mode Dayjs objects
 * whose fields hold the local reading of a zone. Arithmetic on them is plain UTC
 * arithmetic and ignores the host's time zone.
 */

/**
 * Throw unless the zone is a time zone identifier the runtime knows
 */
export function assertTimeZone(zone: string): void {
  try {
    dayjs().tz(zone);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScheduleValueError(`Unknown time zone "${zone}": ${reason}`);
  }
}

/**
 * UTC offset of the zone, in minutes, at the given epoch milliseconds
 */
export function zoneOffsetAt(epochMs: number, zone: string): number {
  return dayjs(epochMs).tz(zone).utcOffset();
}

/**
 * Read an instant as the wall clock of the given zone
 */
export function toWallClock(instant: Dayjs, zone: string): Dayjs {
  const epochMs = instant.valueOf();
  return dayjs.utc(epochMs + zoneOffsetAt(epochMs, zone) * MS_PER_MINUTE);
}

/**
 * Resolve a wall clock reading of the zone into an instant.
 *
 * A reading that happens twice (fall-back) resolves to its earliest occurrence
 * later than `after`, or to the last one when both are not. A reading that never
 * happens (spring-forward gap) is taken with the offset in force before the gap,
 * which moves it forward by the gap length.
 */
export function fromWallClock(wallClock: Dayjs, zone: string, after = -Infinity): number {
  const localMs = wallClock.valueOf();
  const offsetBefore = zoneOffsetAt(localMs - MS_PER_DAY, zone);
  const offsetAfter = zoneOffsetAt(localMs + MS_PER_DAY, zone);

  const matches = [localMs - offsetBefore * MS_PER_MINUTE, localMs - offsetAfter * MS_PER_MINUTE]
    .filter((epochMs) => epochMs + zoneOffsetAt(epochMs, zone) * MS_PER_MINUTE === localMs)
    .sort((a, b) => a - b);

  if (matches.length === 0) {
    return localMs - offsetBefore * MS_PER_MINUTE;
  }

  return matches.find((epochMs) => epochMs > after) ?? Math.max(...matches);
}

/**
 * Add a period to `instant` and return the result as a wall clock of the zone.
 *
 * Sub-day units are elapsed time, so they are added to the instant itself; days
 * and weeks follow the zone's calendar.
 */
export function addInZone(instant: Dayjs, amount: number, unit: TimeUnit, zone: string): Dayjs {
  if (unit === "day" || unit === "week") {
    return toWallClock(instant, zone).add(amount, unit);
  }

  return toWallClock(instant.add(amount, unit), zone);
}
