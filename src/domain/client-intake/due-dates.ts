// src/domain/client-intake/due-dates.ts
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import type { DueDateOffsets } from "../../types.js";
import { billingPeriodFor, CUSTOM_DUE_DATE } from "./catalog.js";

dayjs.extend(utc);
dayjs.extend(timezone);

export const DUE_DATE_FORMAT = "DD/MM/YYYY";

export const DEFAULT_TIMEZONE = "America/Sao_Paulo";

export const DEFAULT_DUE_DATE_OFFSETS: DueDateOffsets = {
  monthly: [30, 60, 90],
  quarterly: [90, 180, 270],
  semiannual: [180, 360, 540],
  yearly: [365, 730, 1095]
};

export interface DueDatePolicy {
  offsets: DueDateOffsets;
  timezone: string;
}

export const DEFAULT_DUE_DATE_POLICY: DueDatePolicy = {
  offsets: DEFAULT_DUE_DATE_OFFSETS,
  timezone: DEFAULT_TIMEZONE
};

/**
 * Candidate due dates for a package, counted in whole days from the calendar
 * date `today` falls on in the policy's time zone. The custom-date sentinel
 * is always last.
 */
export function suggestDueDates(pkg: string, today: Date, policy: DueDatePolicy = DEFAULT_DUE_DATE_POLICY): string[] {
  const offsets = [...new Set(policy.offsets[billingPeriodFor(pkg)])]
    .filter((d) => Number.isInteger(d) && d > 0)
    .sort((a, b) => a - b);
  // Day arithmetic runs on a UTC midnight so DST never shifts the date.
  const base = dayjs.utc(dayjs(today).tz(policy.timezone).format("YYYY-MM-DD"));
  return [...offsets.map((d) => base.add(d, "day").format(DUE_DATE_FORMAT)), CUSTOM_DUE_DATE];
}

/** Reads a `YYYY-MM-DD` calendar date as midnight in the given zone. */
export function localDate(text: string, zone: string = DEFAULT_TIMEZONE): Date {
  const d = /^\d{4}-\d{2}-\d{2}$/.test(text) ? dayjs.tz(text, zone) : null;
  // dayjs rolls impossible days over into the next month.
  if (!d || !d.isValid() || d.format("YYYY-MM-DD") !== text) throw new Error(`Invalid date "${text}". Use YYYY-MM-DD.`);
  return d.toDate();
}
