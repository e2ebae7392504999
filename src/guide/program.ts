import { DateTime } from 'luxon';
import { isRecord, str } from './records';
import type { ProgramEntry, RawProgram } from './types';

export const XMLTV_TIME_FORMAT = 'yyyyMMddHHmmss ZZZ';

const TYPE_CATEGORIES = new Map<string, string>([
  ['M', 'movie'],
  ['N', 'news'],
  ['S', 'sports'],
]);

export class ProgramRecordError extends Error {
  constructor(message: string, public readonly record: RawProgram) {
    super(message);
    this.name = 'ProgramRecordError';
  }
}

function parseRunTime(raw: RawProgram, v: unknown): number {
  if (v === undefined || v === null) return 0;
  const n = typeof v === 'number' ? v : typeof v === 'string' && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) throw new ProgramRecordError(`invalid runTime ${JSON.stringify(v)}`, raw);
  const minutes = Math.trunc(n);
  if (minutes < 0) throw new ProgramRecordError(`negative runTime ${minutes}`, raw);
  return minutes;
}

export function parseProgram(raw: RawProgram): ProgramEntry {
  if (!isRecord(raw)) throw new ProgramRecordError('program is not an object', raw);
  if (typeof raw.startTime !== 'string') throw new ProgramRecordError('missing startTime', raw);
  const startTime = DateTime.fromISO(raw.startTime, { zone: 'utc' });
  if (!startTime.isValid) throw new ProgramRecordError(`invalid startTime '${raw.startTime}'`, raw);

  let flags: string[] = [];
  if (raw.flags !== undefined && raw.flags !== null) {
    if (!Array.isArray(raw.flags)) throw new ProgramRecordError('flags is not an array', raw);
    flags = raw.flags.map((f: unknown) => String(f));
  }

  const subtitle = str(raw.subtitle);
  return {
    title: str(raw.title),
    subtitle: subtitle || undefined,
    type: str(raw.type),
    flags,
    startTime,
    runTimeMinutes: parseRunTime(raw, raw.runTime),
  };
}

export function categoriesFor(type: string, flags: string[]): string[] {
  const out: string[] = [];
  const byType = TYPE_CATEGORIES.get(type);
  if (byType) out.push(byType);
  if (flags.includes('EI')) out.push('kids');
  return out;
}

export function programTimes(entry: ProgramEntry, timezone: string): { start: string; stop: string } {
  const start = entry.startTime.setZone(timezone);
  const stop = start.plus({ minutes: entry.runTimeMinutes });
  return { start: start.toFormat(XMLTV_TIME_FORMAT), stop: stop.toFormat(XMLTV_TIME_FORMAT) };
}
