/**
 * Unit tests for the date template resolver
 *
 * No DB, no network. A fixed reference date keeps results deterministic.
 */

import { describe, it, expect, afterEach } from "vitest";
import {
  DateTemplateError,
  currentDate,
  resolveDate,
  resolveDateRange,
  resolveTimeZone,
} from "@/dates";

// Wednesday
const reference = new Date("2026-03-18T00:00:00Z");

describe("resolveDate", () => {
  it.each([
    ["today", "2026-03-18"],
    ["today-7d", "2026-03-11"],
    ["today-30d", "2026-02-16"],
    ["today+3d", "2026-03-21"],
    ["month-start", "2026-03-01"],
    ["month-end", "2026-03-31"],
    ["year-start", "2026-01-01"],
    ["year-end", "2026-12-31"],
    ["prev-month-start", "2026-02-01"],
    ["prev-month-end", "2026-02-28"],
    ["week-start", "2026-03-16"],
  ])("resolves %s", (expr, expected) => {
    expect(resolveDate(expr, { reference })).toBe(expected);
  });

  it("is deterministic for a fixed reference", () => {
    const first = ["today-7d", "prev-month-end", "week-start"].map((e) => resolveDate(e, { reference }));
    const second = ["today-7d", "prev-month-end", "week-start"].map((e) => resolveDate(e, { reference }));
    expect(second).toEqual(first);
  });

  it("crosses the year boundary for the previous month", () => {
    const jan = new Date("2026-01-15T00:00:00Z");
    expect(resolveDate("prev-month-start", { reference: jan })).toBe("2025-12-01");
    expect(resolveDate("prev-month-end", { reference: jan })).toBe("2025-12-31");
  });

  it("handles leap years", () => {
    const march = new Date("2024-03-10T00:00:00Z");
    expect(resolveDate("prev-month-end", { reference: march })).toBe("2024-02-29");
  });

  it("treats Sunday as the end of the week", () => {
    const sunday = new Date("2026-03-22T00:00:00Z");
    expect(resolveDate("week-start", { reference: sunday })).toBe("2026-03-16");
  });

  it("passes absolute dates through unchanged", () => {
    expect(resolveDate("2025-12-01", { reference })).toBe("2025-12-01");
    expect(resolveDate("2024-02-29", { reference })).toBe("2024-02-29");
  });

  it("normalizes YYYYMMDD", () => {
    expect(resolveDate("20260105", { reference })).toBe("2026-01-05");
  });

  it("trims surrounding whitespace", () => {
    expect(resolveDate("  today  ", { reference })).toBe("2026-03-18");
  });

  it.each(["yesterday", "today-7", "today - 7d", "2026-02-30", "20261301", "last-month"])(
    "rejects %s",
    (expr) => {
      expect(() => resolveDate(expr, { reference })).toThrow(DateTemplateError);
    },
  );

  it.each(["today-999999999d", "today+3000000d"])("rejects the out-of-range offset %s", (expr) => {
    expect(() => resolveDate(expr, { reference })).toThrow(
      new DateTemplateError(`Date offset out of range: '${expr}'`, expr),
    );
  });

  it("names the offending expression", () => {
    try {
      resolveDate("next-week", { reference });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DateTemplateError);
      if (err instanceof DateTemplateError) {
        expect(err.expression).toBe("next-week");
        expect(err.message).toContain("Unknown date template: 'next-week'");
      }
    }
  });
});

describe("resolveDateRange", () => {
  it("returns a new range and leaves the input untouched", () => {
    const input = { start: "today-7d", end: "today" };
    const resolved = resolveDateRange(input, { reference });

    expect(resolved).toEqual({ start: "2026-03-11", end: "2026-03-18" });
    expect(input).toEqual({ start: "today-7d", end: "today" });
    expect(resolved).not.toBe(input);
  });
});

describe("current date time zone", () => {
  const original = process.env.DATE_TEMPLATE_TZ;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.DATE_TEMPLATE_TZ;
    } else {
      process.env.DATE_TEMPLATE_TZ = original;
    }
  });

  it("defaults to Asia/Tokyo", () => {
    delete process.env.DATE_TEMPLATE_TZ;
    expect(resolveTimeZone()).toBe("Asia/Tokyo");
    // 20:00 UTC is already the next day in Tokyo
    expect(currentDate(new Date("2026-03-18T20:00:00Z")).toISOString().slice(0, 10)).toBe("2026-03-19");
  });

  it("uses DATE_TEMPLATE_TZ when set", () => {
    process.env.DATE_TEMPLATE_TZ = "UTC";
    expect(currentDate(new Date("2026-03-18T20:00:00Z")).toISOString().slice(0, 10)).toBe("2026-03-18");
  });

  it("falls back to the default for an invalid zone", () => {
    process.env.DATE_TEMPLATE_TZ = "Not/AZone";
    expect(resolveTimeZone()).toBe("Asia/Tokyo");
  });
});
