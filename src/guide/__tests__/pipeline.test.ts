/**
 * @fileoverview End-to-end runs of the guide pipeline against an in-process listing service.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { Response } from 'node-fetch';
import { runGuide } from '../pipeline';
import { DEFAULT_CONFIG, GuideConfig } from '../../config';
import { fakeListings, makeLineup } from '../../__tests__/mocks/listings';
import { named, parseElements } from '../../__tests__/mocks/xml';

const NOW = DateTime.fromISO('2026-10-18T12:00:00Z', { zone: 'utc' });

describe('runGuide', () => {
  let dir: string;
  let config: GuideConfig;

  const now = () => NOW;
  const readOutput = () => fs.readFileSync(config.outputFile, 'utf8');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'guide-run-'));
    config = {
      ...DEFAULT_CONFIG,
      baseUrl: 'http://listings.test',
      lineupId: 'USA-TEST01',
      outputFile: path.join(dir, 'guide.xml'),
      days: 1,
    };
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('renders two channels with one movie each', async () => {
    const fake = fakeListings(makeLineup(2), (_start, _end, ids) =>
      ids.map(() => [{ title: 'Feature', type: 'M', flags: [], startTime: '2026-10-18T16:00:00Z', runTime: 30 }])
    );

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res).toEqual({
      status: 'ok',
      exitCode: 0,
      outputFile: config.outputFile,
      channels: 2,
      programmes: 2,
      skippedPrograms: 0,
      failedBatches: 0,
    });
    const els = parseElements(readOutput());
    const channels = named(els, 'channel');
    const programmes = named(els, 'programme');
    expect(channels.map((c) => c.attributes.id)).toEqual(['1.1', '2.1']);
    expect(programmes.map((p) => p.attributes.channel)).toEqual(['1.1', '2.1']);
    for (const p of programmes) {
      expect(p.attributes.start).toBe('20261018120000 -0400');
      expect(p.attributes.stop).toBe('20261018123000 -0400');
    }
    expect(named(els, 'category').map((c) => c.text)).toEqual(['movie', 'movie']);
    expect(named(els, 'icon').map((i) => i.attributes.src)).toEqual([
      'http://listings.test/logo/1.png',
      'http://listings.test/logo/2.png',
    ]);
  });

  it('writes channels before programmes, day by day', async () => {
    config.days = 2;
    const fake = fakeListings(makeLineup(2), (start, _end, ids) =>
      ids.map((id) => [{ title: `${id}@${start.slice(0, 10)}`, startTime: start, runTime: 60 }])
    );

    await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    const els = parseElements(readOutput());
    expect(els.map((e) => e.name).filter((n) => n === 'channel' || n === 'programme')).toEqual([
      'channel',
      'channel',
      'programme',
      'programme',
      'programme',
      'programme',
    ]);
    expect(named(els, 'title').map((t) => t.text)).toEqual([
      'st1@2026-10-18',
      'st2@2026-10-18',
      'st1@2026-10-19',
      'st2@2026-10-19',
    ]);
  });

  it('writes an empty document and fails when the lineup cannot be fetched', async () => {
    const fake = fakeListings(new Response('unavailable', { status: 503 }), () => []);

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res.status).toBe('lineup-failed');
    expect(res.exitCode).toBe(1);
    expect(fake.gridCalls).toHaveLength(0);
    const output = readOutput();
    expect(output.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(parseElements(output)).toEqual([
      {
        name: 'tv',
        attributes: {
          date: '2026-10-18T00:00:00.000Z',
          'source-info-url': 'http://listings.test',
          'source-info-name': 'tvtv2xmltv',
        },
        text: '',
      },
    ]);
  });

  it('treats an empty lineup like a failed one', async () => {
    const fake = fakeListings([], () => []);

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res.exitCode).toBe(1);
    expect(named(parseElements(readOutput()), 'channel')).toHaveLength(0);
  });

  it('keeps the other days when one day fails', async () => {
    config.days = 3;
    const fake = fakeListings(makeLineup(1), (start, _end, ids) => {
      if (start === '2026-10-19T04:00:00.000Z') return new Response('boom', { status: 500 });
      return ids.map(() => [{ title: start, startTime: start, runTime: 30 }]);
    });

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res.status).toBe('ok');
    expect(res.exitCode).toBe(0);
    expect(res.failedBatches).toBe(1);
    expect(named(parseElements(readOutput()), 'title').map((t) => t.text)).toEqual([
      '2026-10-18T04:00:00.000Z',
      '2026-10-20T04:00:00.000Z',
    ]);
  });

  it('issues three grid requests per day for 45 channels', async () => {
    config.days = 2;
    const fake = fakeListings(makeLineup(45), (_s, _e, ids) => ids.map(() => []));

    await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(fake.gridCalls.map((c) => c.ids.length)).toEqual([20, 20, 5, 20, 20, 5]);
  });

  it('keeps programmes on their own channel when a batch comes back short', async () => {
    const fake = fakeListings(makeLineup(21), (_s, _e, ids) => {
      const slices = ids.map((id) => [{ title: id, startTime: '2026-10-18T16:00:00Z', runTime: 30 }]);
      return ids.length === 20 ? slices.slice(0, 19) : slices;
    });

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res.programmes).toBe(20);
    const els = parseElements(readOutput());
    const byChannel = new Map<string, string>();
    els.forEach((el, i) => {
      if (el.name === 'programme') byChannel.set(el.attributes.channel, els[i + 1].text);
    });
    expect(byChannel.get('19.1')).toBe('st19');
    expect(byChannel.has('20.1')).toBe(false);
    expect(byChannel.get('21.1')).toBe('st21');
  });

  it('caps the number of days at eight', async () => {
    config.days = 12;
    const fake = fakeListings(makeLineup(1), () => [[]]);

    await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(fake.gridCalls).toHaveLength(8);
    expect(fake.gridCalls[7].start).toBe('2026-10-25T04:00:00.000Z');
  });

  it('counts skipped records without failing the run', async () => {
    const fake = fakeListings(makeLineup(1), () => [
      [
        { title: 'ok', startTime: '2026-10-18T16:00:00Z', runTime: 30 },
        { title: 'bad', startTime: 'later', runTime: 30 },
      ],
    ]);

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res.exitCode).toBe(0);
    expect(res.programmes).toBe(1);
    expect(res.skippedPrograms).toBe(1);
  });

  it('fails when the output cannot be written', async () => {
    config.outputFile = dir;
    const fake = fakeListings(makeLineup(1), () => [[]]);

    const res = await runGuide(config, { fetchImpl: fake.fetchImpl, now });

    expect(res.status).toBe('write-failed');
    expect(res.exitCode).toBe(1);
  });
});
