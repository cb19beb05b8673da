import { describe, expect, it } from "vitest";
import {
  isDayString,
  lastOpdays,
  localTime,
  opdayBounds,
  opdayForInstant,
  opdayForLocal,
  opdayRange,
} from "./opday";

const TZ = "Africa/Tripoli"; // UTC+2 all year

describe("opdayForLocal", () => {
  it("assigns early-morning times to the previous day", () => {
    expect(opdayForLocal("2025-01-05 06:59:00")).toBe("2025-01-04");
    expect(opdayForLocal("2025-01-05 07:00:00")).toBe("2025-01-05");
  });

  it("returns null for unparseable input", () => {
    expect(opdayForLocal("ayer por la tarde")).toBeNull();
  });
});

describe("opdayBounds", () => {
  it("runs from 07:00 local to 07:00 the next day", () => {
    const { start, end } = opdayBounds(TZ, "2025-01-04");
    expect(start.toISOString()).toBe("2025-01-04T05:00:00.000Z");
    expect(end.toISOString()).toBe("2025-01-05T05:00:00.000Z");
  });

  it("rejects malformed days", () => {
    expect(() => opdayBounds(TZ, "04/01/2025")).toThrow('Invalid day "04/01/2025"');
  });
});

describe("opdayForInstant", () => {
  it("reads the hour in the given zone", () => {
    expect(opdayForInstant(TZ, new Date("2025-01-05T04:30:00Z"))).toBe("2025-01-04");
    expect(opdayForInstant(TZ, new Date("2025-01-05T05:00:00Z"))).toBe("2025-01-05");
  });
});

describe("opdayRange", () => {
  it("is inclusive and order-independent", () => {
    expect(opdayRange("2025-01-03", "2025-01-01")).toEqual(["2025-01-01", "2025-01-02", "2025-01-03"]);
    expect(opdayRange("2025-01-01", "2025-01-01")).toEqual(["2025-01-01"]);
  });

  it("is empty for invalid input", () => {
    expect(opdayRange("nope", "2025-01-01")).toEqual([]);
  });
});

describe("lastOpdays", () => {
  it("lists the current op-day and the ones before it, newest first", () => {
    const now = new Date("2025-03-01T04:00:00Z"); // 06:00 local
    expect(lastOpdays(TZ, 3, now)).toEqual(["2025-02-28", "2025-02-27", "2025-02-26"]);
    expect(lastOpdays(TZ, 0, now)).toEqual(["2025-02-28"]);
  });
});

describe("helpers", () => {
  it("validates day strings", () => {
    expect(isDayString("2025-01-04")).toBe(true);
    expect(isDayString("2025-1-4")).toBe(false);
  });

  it("formats local wall-clock time", () => {
    expect(localTime(TZ, new Date("2025-01-04T10:05:00Z"))).toBe("12:05");
  });
});
