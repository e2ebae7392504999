import type { DateTime } from 'luxon';
import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces';
import { categoriesFor, parseProgram, programTimes, ProgramRecordError } from './program';
import type { Channel, RawProgram } from './types';
import { gerr } from '../log';

export type DocumentHeader = {
  now: DateTime;
  sourceUrl: string;
  sourceName: string;
};

// Returns the <tv> root; channels and programmes are appended to it in document order.
export function createGuideDocument(h: DocumentHeader): XMLBuilder {
  const date = h.now.toUTC().toFormat("yyyy-MM-dd'T00:00:00.000Z'");
  return create({ version: '1.0', encoding: 'UTF-8' })
    .ele('tv')
    .att('date', date)
    .att('source-info-url', h.sourceUrl)
    .att('source-info-name', h.sourceName);
}

export function serializeGuide(tv: XMLBuilder): string {
  return tv.end({ prettyPrint: true });
}

export function appendChannel(tv: XMLBuilder, channel: Channel, siteOrigin: string): XMLBuilder {
  const el = tv.ele('channel').att('id', channel.channelNumber);
  el.ele('display-name').txt(channel.channelNumber);
  el.ele('display-name').txt(channel.callSign);
  if (channel.logoPath) el.ele('icon').att('src', siteOrigin + channel.logoPath);
  return el;
}

// Throws ProgramRecordError before anything is appended for a record that cannot be rendered.
export function appendProgram(tv: XMLBuilder, raw: RawProgram, channel: Channel, timezone: string): XMLBuilder {
  const entry = parseProgram(raw);
  const { start, stop } = programTimes(entry, timezone);
  const el = tv.ele('programme')
    .att('start', start)
    .att('stop', stop)
    .att('channel', channel.channelNumber);
  el.ele('title').att('lang', 'en').txt(entry.title);
  if (entry.subtitle) el.ele('sub-title').att('lang', 'en').txt(entry.subtitle);
  for (const category of categoriesFor(entry.type, entry.flags)) {
    el.ele('category').att('lang', 'en').txt(category);
  }
  if (entry.flags.includes('HD')) el.ele('video').ele('quality').txt('HDTV');
  if (entry.flags.includes('Stereo')) el.ele('audio').ele('stereo').txt('stereo');
  if (entry.flags.includes('New')) el.ele('new');
  return el;
}

export type ProgramCounts = { rendered: number; skipped: number };

// A bad record is logged and dropped; its siblings still render.
export function appendPrograms(tv: XMLBuilder, programs: RawProgram[], channel: Channel, timezone: string): ProgramCounts {
  let rendered = 0;
  let skipped = 0;
  for (const raw of programs) {
    try {
      appendProgram(tv, raw, channel, timezone);
      rendered++;
    } catch (e) {
      if (!(e instanceof ProgramRecordError)) throw e;
      skipped++;
      gerr(`processing program data: ${e.message}. Program: ${JSON.stringify(raw)}`);
    }
  }
  return { rendered, skipped };
}
