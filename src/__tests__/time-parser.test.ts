import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import { describe, expect, it } from "vitest";
import { ScheduleValueError } from "../errors";
import { formatAtTime, parseAtTime, parseDeadline } from "../time-parser";
import type { AtTime, TimeUnit } from "../types";

dayjs.extend(utc);

describe("parseAtTime", () => {
  it.each<[string, TimeUnit, boolean, AtTime]>([
    ["10:30", "day", false, { hour: 10, minute: 30, second: 0 }],
    ["10:30:15", "day", false, { hour: 10, minute: 30, second: 15 }],
    ["00:00", "day", false, { hour: 0, minute: 0, second: 0 }],
    ["23:59:59", "day", false, { hour: 23, minute: 59, second: 59 }],
    [":15", "hour", false, { hour: 0, minute: 15, second: 0 }],
    ["15:20", "hour", false, { hour: 0, minute: 15, second: 20 }],
    [":20", "minute", false, { hour: 0, minute: 0, second: 20 }],
    ["09:00", "week", true, { hour: 9, minute: 0, second: 0 }],
  ])("should parse %s for a %s job", (time, unit, weekdayAnchored, expected) => {
    expect(parseAtTime(time, unit, weekdayAnchored)).toEqual(expected);
  });

  it("should only accept units that take an anchor", () => {
    expect(() => parseAtTime("10:30", "second", false)).toThrow(
      "Invalid unit (valid units are `days`, `hours`, and `minutes`)",
    );
    expect(() => parseAtTime("10:30", "week", false)).toThrow(ScheduleValueError);
    expect(() => parseAtTime("10:30", undefined, false)).toThrow(ScheduleValueError);
  });

  it("should enforce the format of each unit", () => {
    expect(() => parseAtTime("9:30", "day", false)).toThrow(
      "Invalid time format for a daily job (valid format is HH:MM(:SS)?)",
    );
    expect(() => parseAtTime("1:30", "hour", false)).toThrow(
      "Invalid time format for an hourly job (valid format is (MM)?:SS)",
    );
    expect(() => parseAtTime("00:30", "minute", false)).toThrow(
      "Invalid time format for a minutely job (valid format is :SS)",
    );
  });

  it("should reject hours past 23", () => {
    expect(() => parseAtTime("24:00", "day", false)).toThrow(ScheduleValueError);
  });
});

describe("parseDeadline", () => {
  const now = dayjs.utc("2024-05-01 09:00:00");

  it.each([
    ["2024-06-01 12:30:45", "2024-06-01T12:30:45.000Z"],
    ["2024-06-01 12:30", "2024-06-01T12:30:00.000Z"],
    ["2024-06-01", "2024-06-01T00:00:00.000Z"],
    ["18:45:10", "2024-05-01T18:45:10.000Z"],
    ["18:45", "2024-05-01T18:45:00.000Z"],
  ])("should parse %s", (value, expected) => {
    expect(parseDeadline(value, now)?.toISOString()).toBe(expected);
  });

  it.each([
    ["2024-6-1", "2024-06-01T00:00:00.000Z"],
    ["9:05", "2024-05-01T09:05:00.000Z"],
    ["9:5:7", "2024-05-01T09:05:07.000Z"],
    ["2024-06-01 9:05", "2024-06-01T09:05:00.000Z"],
  ])("should accept fields without a leading zero in %s", (value, expected) => {
    expect(parseDeadline(value, now)?.toISOString()).toBe(expected);
  });

  it("should return null for unknown formats", () => {
    expect(parseDeadline("tomorrow", now)).toBeNull();
    expect(parseDeadline("2024-13-01", now)).toBeNull();
    expect(parseDeadline("2024/06/01", now)).toBeNull();
    expect(parseDeadline("2024-6-1x", now)).toBeNull();
  });
});

describe("formatAtTime", () => {
  it("should pad every field", () => {
    expect(formatAtTime({ hour: 9, minute: 5, second: 0 })).toBe("09:05:00");
  });
});
