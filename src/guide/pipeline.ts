import { DateTime } from 'luxon';
import { clampDays, GuideConfig } from '../config';
import { ListingsClient } from '../listings/client';
import type { FetchLike } from '../listings/http';
import { appendChannel, appendPrograms, createGuideDocument, serializeGuide } from './render';
import { assembleDay, countPrograms } from './schedule';
import { dayWindows } from './window';
import { writeGuide } from './writer';
import type { GuideRunResult } from './types';
import { gdbg, gerr, glog } from '../log';

export type GuideDeps = {
  fetchImpl?: FetchLike;
  now?: () => DateTime;
};

export async function runGuide(config: GuideConfig, deps: GuideDeps = {}): Promise<GuideRunResult> {
  // one instant for the whole run, so day windows cannot drift past midnight
  const now = (deps.now || (() => DateTime.utc()))();
  const client = new ListingsClient({
    baseUrl: config.baseUrl,
    lineupId: config.lineupId,
    userAgent: config.userAgent,
    fetchImpl: deps.fetchImpl,
  });
  const result: GuideRunResult = {
    status: 'ok',
    exitCode: 0,
    outputFile: config.outputFile,
    channels: 0,
    programmes: 0,
    skippedPrograms: 0,
    failedBatches: 0,
  };

  const tv = createGuideDocument({ now, sourceUrl: config.baseUrl, sourceName: config.sourceName });

  const lineup = await client.fetchLineup();
  if (!lineup.ok || lineup.value.length === 0) {
    gerr('Failed to fetch lineup data. Exiting.');
    // still leave a file behind for whatever reads it
    const partial = writeGuide(config.outputFile, serializeGuide(tv));
    if (!partial.ok) gerr('Partial file could not be written either');
    return { ...result, status: 'lineup-failed', exitCode: 1 };
  }

  const channels = lineup.value;
  result.channels = channels.length;
  for (const channel of channels) appendChannel(tv, channel, config.baseUrl);

  const stationIds = channels.map((c) => c.stationId);
  const windows = dayWindows(now, clampDays(config.days));
  for (const window of windows) {
    glog(`Fetching guide data for day ${window.dayOffset + 1}/${windows.length}...`);
    const grid = await client.fetchGridDay(window, stationIds);
    result.failedBatches += grid.failedBatches;
    const day = assembleDay(window, channels, grid.slices);
    gdbg(`  day ${window.dayOffset + 1}: ${countPrograms(day)} program records`);
    for (const { channel, programs } of day.channels) {
      const counts = appendPrograms(tv, programs, channel, config.timezone);
      result.programmes += counts.rendered;
      result.skippedPrograms += counts.skipped;
    }
  }

  const written = writeGuide(config.outputFile, serializeGuide(tv));
  if (!written.ok) return { ...result, status: 'write-failed', exitCode: 1 };
  glog(`Successfully wrote guide to ${config.outputFile} (${result.channels} channels, ${result.programmes} programmes)`);
  return result;
}
