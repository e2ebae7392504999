import type { Channel, ChannelSchedule, DaySchedule, DayWindow, GridSlice } from './types';
import { gwarn } from '../log';

// Lineup order and grid order are the same list of stations; pair them by index.
export function assembleDay(window: DayWindow, channels: Channel[], slices: GridSlice[]): DaySchedule {
  const count = Math.min(channels.length, slices.length);
  const paired: ChannelSchedule[] = [];
  for (let i = 0; i < count; i++) {
    const slice = slices[i];
    paired.push({ channel: channels[i], programs: Array.isArray(slice) ? slice : [] });
  }
  const unpaired = channels.length - count;
  if (unpaired > 0) {
    gwarn(`day ${window.dayOffset + 1}: grid has ${slices.length} slices for ${channels.length} channels; last ${unpaired} channel(s) get no programmes`);
  } else if (slices.length > channels.length) {
    gwarn(`day ${window.dayOffset + 1}: grid has ${slices.length - channels.length} extra slice(s), ignored`);
  }
  return { window, channels: paired, unpaired };
}

export function countPrograms(day: DaySchedule): number {
  return day.channels.reduce((n, c) => n + c.programs.length, 0);
}
