import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import { describe, expect, it } from "vitest";
import { ScheduleValueError } from "../errors";
import { addInZone, assertTimeZone, fromWallClock, toWallClock, zoneOffsetAt } from "../timezone";

dayjs.extend(utc);

const NEW_YORK = "America/New_York";

describe("timezone helpers", () => {
  it("should read the offset in force at an instant", () => {
    expect(zoneOffsetAt(Date.UTC(2024, 0, 15, 12), NEW_YORK)).toBe(-300);
    expect(zoneOffsetAt(Date.UTC(2024, 6, 15, 12), NEW_YORK)).toBe(-240);
    expect(zoneOffsetAt(Date.UTC(2024, 6, 15, 12), "Asia/Kolkata")).toBe(330);
  });

  it("should read an instant as the zone's wall clock", () => {
    const wallClock = toWallClock(dayjs.utc("2024-07-01 16:00:00"), "Europe/Amsterdam");

    expect(wallClock.format("YYYY-MM-DD HH:mm")).toBe("2024-07-01 18:00");
  });

  it("should resolve a wall clock back into an instant", () => {
    expect(fromWallClock(dayjs.utc("2024-07-01 18:00"), "Europe/Amsterdam")).toBe(Date.UTC(2024, 6, 1, 16));
  });

  it("should move times inside a spring-forward gap forward by the gap", () => {
    // 02:30 does not exist on 2024-03-10 in New York; 03:30 EDT does
    expect(fromWallClock(dayjs.utc("2024-03-10 02:30"), NEW_YORK)).toBe(Date.UTC(2024, 2, 10, 7, 30));
  });

  it("should pick the first occurrence of a repeated fall-back time", () => {
    // 01:30 happens at 05:30Z (EDT) and again at 06:30Z (EST)
    expect(fromWallClock(dayjs.utc("2024-11-03 01:30"), NEW_YORK)).toBe(Date.UTC(2024, 10, 3, 5, 30));
  });

  it("should pick the first occurrence after a given instant", () => {
    const wallClock = dayjs.utc("2024-11-03 01:30");

    expect(fromWallClock(wallClock, NEW_YORK, Date.UTC(2024, 10, 3, 5, 10))).toBe(Date.UTC(2024, 10, 3, 5, 30));
    expect(fromWallClock(wallClock, NEW_YORK, Date.UTC(2024, 10, 3, 5, 30))).toBe(Date.UTC(2024, 10, 3, 6, 30));
    expect(fromWallClock(wallClock, NEW_YORK, Date.UTC(2024, 10, 3, 6, 10))).toBe(Date.UTC(2024, 10, 3, 6, 30));
    // Both occurrences passed
    expect(fromWallClock(wallClock, NEW_YORK, Date.UTC(2024, 10, 3, 7))).toBe(Date.UTC(2024, 10, 3, 6, 30));
  });

  it("should add days on the zone's calendar", () => {
    // 10:00 EST the day before the switch to daylight saving time
    const next = addInZone(dayjs.utc("2024-03-09 15:00"), 1, "day", NEW_YORK);

    expect(next.format("YYYY-MM-DD HH:mm")).toBe("2024-03-10 10:00");
  });

  it("should add hours as elapsed time", () => {
    // 01:30 EST plus one hour is 03:30 EDT
    const next = addInZone(dayjs.utc("2024-03-10 06:30"), 1, "hour", NEW_YORK);

    expect(next.format("YYYY-MM-DD HH:mm")).toBe("2024-03-10 03:30");
  });

  it("should reject unknown zones", () => {
    expect(() => assertTimeZone("Not/A_Zone")).toThrow(ScheduleValueError);
    expect(() => assertTimeZone(NEW_YORK)).not.toThrow();
  });
});
