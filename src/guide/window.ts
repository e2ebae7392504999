import { DateTime } from 'luxon';
import type { DayWindow } from './types';

const API_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS'Z'";

// Broadcast day: 04:00Z to 03:59Z of the next UTC date, whatever zone the guide is rendered in.
export function dayWindow(now: DateTime, dayOffset: number): DayWindow {
  const day = now.toUTC().startOf('day').plus({ days: dayOffset });
  return {
    dayOffset,
    start: day.set({ hour: 4 }).toFormat(API_FORMAT),
    end: day.plus({ days: 1 }).set({ hour: 3, minute: 59 }).toFormat(API_FORMAT),
  };
}

export function dayWindows(now: DateTime, days: number): DayWindow[] {
  const out: DayWindow[] = [];
  for (let d = 0; d < days; d++) out.push(dayWindow(now, d));
  return out;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}
