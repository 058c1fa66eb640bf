import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import { describe, expect, it, vi } from "vitest";
import { repeat } from "../repeat";
import { Scheduler } from "../scheduler";

dayjs.extend(utc);

describe("repeat", () => {
  it("should register the function and hand it back unchanged", async () => {
    const scheduler = new Scheduler({ realtime: false, startTimestamp: dayjs.utc("2024-05-01 09:00:00") });
    const greet = vi.fn((name: string) => `hello ${name}`);

    const registered = repeat(scheduler.every(30).seconds(), "team")(greet);

    expect(registered).toBe(greet);
    expect(scheduler.jobCount).toBe(1);
    expect(scheduler.getNextRun()?.toISOString()).toBe("2024-05-01T09:00:30.000Z");

    scheduler.setTimestamp(dayjs.utc("2024-05-01 09:00:30"));
    await scheduler.runPending();

    expect(greet).toHaveBeenCalledWith("team");
  });
});
