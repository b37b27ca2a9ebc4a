// Calendar-day arithmetic on YYYY-MM-DD strings (UTC day numbers).

import { ISO_DATE_RE } from "@cropwatch/contracts";

const DAY_MS = 86_400_000;

export function toDayNumber(date: string): number {
  if (!ISO_DATE_RE.test(date)) throw new Error(`invalid date: ${date}`);
  const t = Date.parse(`${date}T00:00:00Z`);
  const day = Math.round(t / DAY_MS);
  // Rejects calendar overflow such as 2024-02-30.
  if (!Number.isFinite(t) || fromDayNumber(day) !== date) throw new Error(`invalid date: ${date}`);
  return day;
}

export function fromDayNumber(day: number): string {
  return new Date(day * DAY_MS).toISOString().slice(0, 10);
}

export function isValidDate(date: string): boolean {
  try {
    toDayNumber(date);
    return true;
  } catch {
    return false;
  }
}

export function monthOf(date: string): number {
  return Number(date.slice(5, 7));
}

export function inRange(date: string, range: { start: string; end: string }): boolean {
  return date >= range.start && date <= range.end;
}
