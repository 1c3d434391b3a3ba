import { describe, expect, it } from "vitest";
import { createTimeFilter, formatTimeOfDay, parseTimeOfDay, passesTimeFilter, timestampTimeOfDay } from "../timeFilter.js";

describe("time filter", () => {
  it("parses HH:MM and HH:MM:SS", () => {
    expect(parseTimeOfDay("7:05")).toEqual({ hours: 7, minutes: 5, seconds: 0 });
    expect(parseTimeOfDay("23:59:59")).toEqual({ hours: 23, minutes: 59, seconds: 59 });
    expect(parseTimeOfDay("24:00")).toBeNull();
    expect(parseTimeOfDay("12:60")).toBeNull();
    expect(parseTimeOfDay("noon")).toBeNull();
    expect(formatTimeOfDay({ hours: 7, minutes: 5, seconds: 0 })).toBe("07:05:00");
  });

  it("reads the time of day from log timestamps", () => {
    expect(timestampTimeOfDay("2024-05-01 10:11:12.345")).toEqual({ hours: 10, minutes: 11, seconds: 12 });
    expect(timestampTimeOfDay("2024-05-01T10:11:12")).toEqual({ hours: 10, minutes: 11, seconds: 12 });
    expect(timestampTimeOfDay("10:11:12")).toBeNull();
  });

  it("is inactive without bounds", () => {
    expect(createTimeFilter("", "")).toBeNull();
    expect(passesTimeFilter("whatever", null)).toBe(true);
  });

  it("checks either bound inclusively and rejects unreadable timestamps", () => {
    const endOnly = createTimeFilter("", "12:00");
    expect(passesTimeFilter("2024-05-01 12:00:00.999", endOnly)).toBe(true);
    expect(passesTimeFilter("2024-05-01 12:00:01", endOnly)).toBe(false);
    const startOnly = createTimeFilter("08:30");
    expect(passesTimeFilter("2024-05-01 08:29:59", startOnly)).toBe(false);
    expect(passesTimeFilter("2024-05-01 08:30:00", startOnly)).toBe(true);
    expect(passesTimeFilter("garbage", startOnly)).toBe(false);
  });
});
