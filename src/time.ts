import { MICROS_PER_MINUTE } from "./types.js";

/** Current wall-clock time as integer UTC epoch microseconds. */
export function nowMicros(): number {
  return Math.round((performance.timeOrigin + performance.now()) * 1000);
}

export function dateToMicros(date: Date): number {
  return date.getTime() * 1000;
}

export function microsToDate(micros: number): Date {
  return new Date(Math.floor(micros / 1000));
}

export function minutesToMicros(minutes: number): number {
  return Math.round(minutes * MICROS_PER_MINUTE);
}
