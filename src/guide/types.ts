import type { DateTime } from 'luxon';

export interface Channel {
  stationId: string; // batching key, never rendered
  channelNumber: string; // channel element id and first display-name
  callSign: string;
  logoPath?: string; // relative to the site origin
}

// Program object as the grid endpoint sends it; fields are checked when rendered.
export type RawProgram = unknown;

// Programs of one channel within one day window.
export type GridSlice = RawProgram[];

export interface ProgramEntry {
  title: string;
  subtitle?: string;
  type: string; // M movie, N news, S sports, anything else uncategorized
  flags: string[];
  startTime: DateTime; // UTC
  runTimeMinutes: number;
}

export interface DayWindow {
  dayOffset: number;
  start: string; // e.g. 2026-10-18T04:00:00.000Z
  end: string; // e.g. 2026-10-19T03:59:00.000Z
}

export interface GridDay {
  window: DayWindow;
  slices: GridSlice[];
  batches: number;
  failedBatches: number;
}

export interface ChannelSchedule {
  channel: Channel;
  programs: GridSlice;
}

export interface DaySchedule {
  window: DayWindow;
  channels: ChannelSchedule[];
  // channels without a grid slice because the response came back short
  unpaired: number;
}

export type RunStatus = 'ok' | 'lineup-failed' | 'write-failed';

export interface GuideRunResult {
  status: RunStatus;
  exitCode: 0 | 1;
  outputFile: string;
  channels: number;
  programmes: number;
  skippedPrograms: number;
  failedBatches: number;
}
