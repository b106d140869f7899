import { describe, expect, it } from "vitest";
import { dayNumber, monthOf, parseDateKey, yearOf } from "./dates.js";

describe("parseDateKey", () => {
  it("normalizes Goodreads slash dates", () => {
    expect(parseDateKey("2025/12/06")).toBe("2025-12-06");
    expect(parseDateKey("2024/3/5")).toBe("2024-03-05");
  });

  it("accepts ISO dates with a time part", () => {
    expect(parseDateKey("2024-03-05")).toBe("2024-03-05");
    expect(parseDateKey("2024-03-05 10:22:00")).toBe("2024-03-05");
    expect(parseDateKey("2024-03-05T10:22:00Z")).toBe("2024-03-05");
  });

  it("rejects impossible or unparseable values", () => {
    expect(parseDateKey("2024/02/30")).toBeUndefined();
    expect(parseDateKey("2023/02/29")).toBeUndefined();
    expect(parseDateKey("March 5, 2024")).toBeUndefined();
    expect(parseDateKey("")).toBeUndefined();
    expect(parseDateKey(undefined)).toBeUndefined();
  });

  it("keeps leap days", () => {
    expect(parseDateKey("2024/02/29")).toBe("2024-02-29");
  });
});

describe("date key helpers", () => {
  it("counts calendar days across month and year boundaries", () => {
    expect(dayNumber("2024-03-01") - dayNumber("2024-02-29")).toBe(1);
    expect(dayNumber("2025-01-01") - dayNumber("2024-12-31")).toBe(1);
    expect(dayNumber("2024-01-10") - dayNumber("2024-01-01")).toBe(9);
  });

  it("extracts year and month", () => {
    expect(yearOf("2023-07-14")).toBe(2023);
    expect(monthOf("2023-07-14")).toBe("2023-07");
  });
});
