/**
 * Date template resolver
 *
 * Resolves relative date expressions in date_range.start/end to absolute
 * YYYY-MM-DD dates. Resolution happens once, at validation time.
 *
 * Supported expressions:
 *   today             execution date
 *   today-Nd          N days before
 *   today+Nd          N days after
 *   month-start       first day of the current month
 *   month-end         last day of the current month
 *   year-start        Jan 1 of the current year
 *   year-end          Dec 31 of the current year
 *   prev-month-start  first day of the previous month
 *   prev-month-end    last day of the previous month
 *   week-start        Monday of the current week
 *   YYYY-MM-DD        validated, passed through
 *   YYYYMMDD          normalized to YYYY-MM-DD
 *
 * Calendar dates are handled as UTC-midnight Date values so that day
 * arithmetic never crosses a DST boundary.
 */

import type { DateRange } from "@/types";
import { DEFAULT_DATE_TEMPLATE_TZ, MS_PER_DAY } from "@/constants";

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;
const RELATIVE_RE = /^today([+-])(\d+)d$/;

export class DateTemplateError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
  ) {
    super(message);
    this.name = "DateTemplateError";
  }
}

export type ResolveDateOptions = {
  /** Reference date; only its UTC calendar fields are used */
  reference?: Date;
};

function utcDate(year: number, monthIndex: number, day: number): Date {
  return new Date(Date.UTC(year, monthIndex, day));
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Build a date from parts, returning null when the parts do not form a real
 * calendar date (2026-02-30, month 13, ...)
 */
function realDate(year: number, month: number, day: number): Date | null {
  const date = utcDate(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Resolve DATE_TEMPLATE_TZ, falling back to the default on an invalid zone
 */
export function resolveTimeZone(): string {
  const tzName = (process.env.DATE_TEMPLATE_TZ ?? "").trim() || DEFAULT_DATE_TEMPLATE_TZ;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tzName });
    return tzName;
  } catch {
    return DEFAULT_DATE_TEMPLATE_TZ;
  }
}

/**
 * Today's calendar date in the configured time zone
 */
export function currentDate(now: Date = new Date()): Date {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: resolveTimeZone(),
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);

  return utcDate(part("year"), part("month") - 1, part("day"));
}

function toCalendarDate(reference: Date): Date {
  return utcDate(
    reference.getUTCFullYear(),
    reference.getUTCMonth(),
    reference.getUTCDate(),
  );
}

/**
 * Resolve one date expression to YYYY-MM-DD
 *
 * @throws DateTemplateError for unknown syntax, an impossible absolute date
 *   or an offset outside the representable range
 */
export function resolveDate(expr: string, options: ResolveDateOptions = {}): string {
  const trimmed = expr.trim();

  const iso = ISO_DATE_RE.exec(trimmed);
  if (iso) {
    if (!realDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))) {
      throw new DateTemplateError(`Invalid absolute date: '${trimmed}'`, expr);
    }
    return trimmed;
  }

  const compact = COMPACT_DATE_RE.exec(trimmed);
  if (compact) {
    const date = realDate(Number(compact[1]), Number(compact[2]), Number(compact[3]));
    if (!date) {
      throw new DateTemplateError(`Invalid absolute date: '${trimmed}'`, expr);
    }
    return formatDate(date);
  }

  const ref = options.reference ? toCalendarDate(options.reference) : currentDate();
  const year = ref.getUTCFullYear();
  const month = ref.getUTCMonth();

  if (trimmed === "today") {
    return formatDate(ref);
  }

  const relative = RELATIVE_RE.exec(trimmed);
  if (relative) {
    const days = Number(relative[2]) * (relative[1] === "+" ? 1 : -1);
    const shifted = new Date(ref.getTime() + days * MS_PER_DAY);
    // YYYY-MM-DD needs a four-digit year
    if (Number.isNaN(shifted.getTime()) || shifted.getUTCFullYear() < 1 || shifted.getUTCFullYear() > 9999) {
      throw new DateTemplateError(`Date offset out of range: '${trimmed}'`, expr);
    }
    return formatDate(shifted);
  }

  switch (trimmed) {
    case "month-start":
      return formatDate(utcDate(year, month, 1));
    case "month-end":
      // Day 0 of the next month is the last day of this one
      return formatDate(utcDate(year, month + 1, 0));
    case "year-start":
      return formatDate(utcDate(year, 0, 1));
    case "year-end":
      return formatDate(utcDate(year, 11, 31));
    case "prev-month-start":
      return formatDate(utcDate(year, month - 1, 1));
    case "prev-month-end":
      return formatDate(utcDate(year, month, 0));
    case "week-start": {
      // getUTCDay: Sunday = 0
      const offset = (ref.getUTCDay() + 6) % 7;
      return formatDate(new Date(ref.getTime() - offset * MS_PER_DAY));
    }
  }

  throw new DateTemplateError(
    `Unknown date template: '${trimmed}'. Use today, today±Nd, month-start, ` +
      "month-end, year-start, year-end, prev-month-start, prev-month-end, " +
      "week-start, YYYY-MM-DD or YYYYMMDD.",
    expr,
  );
}

/**
 * Resolve both ends of a date range. Returns a new object.
 */
export function resolveDateRange(
  range: DateRange,
  options: ResolveDateOptions = {},
): DateRange {
  return {
    start: resolveDate(range.start, options),
    end: resolveDate(range.end, options),
  };
}
