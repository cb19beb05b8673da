import dayjs, { type Dayjs } from "dayjs";
import timezone from "dayjs/plugin/timezone.js";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(utc);
dayjs.extend(timezone);

// An operational day runs from 07:00 local to 06:59 the next morning.
export const OPDAY_START_HOUR = 7;

const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isDayString(day: string): boolean {
  return DAY_RE.test(day) && dayjs(day).isValid();
}

/** [start, end) of the op-day that starts on `day` at 07:00 in `tz`. */
export function opdayBounds(tz: string, day: string): { start: Dayjs; end: Dayjs } {
  if (!isDayString(day)) throw new Error(`Invalid day "${day}", expected YYYY-MM-DD`);
  const hour = String(OPDAY_START_HOUR).padStart(2, "0");
  const start = dayjs.tz(`${day} ${hour}:00:00`, tz);
  return { start, end: start.add(1, "day") };
}

/** Op-day (YYYY-MM-DD) of a wall-clock time already expressed in local time. */
export function opdayForLocal(local: string): string | null {
  const d = dayjs(local.replace(" ", "T"));
  if (!d.isValid()) return null;
  const shifted = d.hour() < OPDAY_START_HOUR ? d.subtract(1, "day") : d;
  return shifted.format("YYYY-MM-DD");
}

/** Op-day of an instant, seen from `tz`. */
export function opdayForInstant(tz: string, instant: Date): string {
  const local = dayjs(instant).tz(tz);
  const shifted = local.hour() < OPDAY_START_HOUR ? local.subtract(1, "day") : local;
  return shifted.format("YYYY-MM-DD");
}

export function opdayToday(tz: string, now: Date = new Date()): string {
  return opdayForInstant(tz, now);
}

/** Inclusive list of days between two dates, in either order. */
export function opdayRange(from: string, to: string): string[] {
  let a = dayjs(from);
  let b = dayjs(to);
  if (!a.isValid() || !b.isValid()) return [];
  if (b.isBefore(a)) [a, b] = [b, a];
  const out: string[] = [];
  for (let d = a; !d.isAfter(b, "day"); d = d.add(1, "day")) {
    out.push(d.format("YYYY-MM-DD"));
  }
  return out;
}

export function lastOpdays(tz: string, n: number, now: Date = new Date()): string[] {
  const today = dayjs(opdayToday(tz, now));
  return Array.from({ length: Math.max(1, n) }, (_, i) => today.subtract(i, "day").format("YYYY-MM-DD"));
}

/** Wall-clock "HH:mm" of an instant in `tz`. */
export function localTime(tz: string, now: Date = new Date()): string {
  return dayjs(now).tz(tz).format("HH:mm");
}
