import { getJson, FetchLike, FetchResult } from './http';
import { chunk } from '../guide/window';
import { isRecord, str } from '../guide/records';
import type { Channel, DayWindow, GridDay, GridSlice } from '../guide/types';
import { gdbg, gerr, gwarn } from '../log';

// The grid endpoint refuses more station ids than this per request.
export const GRID_BATCH_SIZE = 20;

export type ListingsClientOptions = {
  baseUrl: string;
  lineupId: string;
  userAgent: string;
  fetchImpl?: FetchLike;
};

export function toChannel(raw: unknown): Channel | null {
  if (!isRecord(raw)) return null;
  const logo = str(raw.logo);
  return {
    stationId: str(raw.stationId),
    channelNumber: str(raw.channelNumber),
    callSign: str(raw.stationCallSign),
    logoPath: logo || undefined,
  };
}

export class ListingsClient {
  private baseUrl: string;
  private lineupId: string;
  private userAgent: string;
  private fetchImpl?: FetchLike;

  constructor(opts: ListingsClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.lineupId = opts.lineupId;
    this.userAgent = opts.userAgent;
    this.fetchImpl = opts.fetchImpl;
  }

  public lineupUrl(): string {
    return `${this.baseUrl}/api/v1/lineup/${encodeURIComponent(this.lineupId)}/channels`;
  }

  public gridUrl(window: DayWindow, stationIds: string[]): string {
    return `${this.baseUrl}/api/v1/lineup/${encodeURIComponent(this.lineupId)}/grid/${window.start}/${window.end}/${stationIds.join(',')}`;
  }

  public async fetchLineup(): Promise<FetchResult<Channel[]>> {
    const url = this.lineupUrl();
    gdbg(`Fetching lineup from: ${url}`);
    const res = await getJson(url, { userAgent: this.userAgent, fetchImpl: this.fetchImpl });
    if (!res.ok) return res;
    if (!Array.isArray(res.value)) {
      const message = 'lineup response is not an array';
      gerr(`${url}: ${message}`);
      return { ok: false, reason: 'decode', message };
    }
    const channels: Channel[] = [];
    for (const raw of res.value) {
      const ch = toChannel(raw);
      if (ch) channels.push(ch);
      else gwarn('Skipping lineup entry that is not an object:', JSON.stringify(raw));
    }
    return { ok: true, value: channels };
  }

  // Batches are fetched one after another; slices come back in request order.
  public async fetchGridDay(window: DayWindow, stationIds: string[]): Promise<GridDay> {
    const batches = chunk(stationIds, GRID_BATCH_SIZE);
    const slices: GridSlice[] = [];
    let failedBatches = 0;
    for (let i = 0; i < batches.length; i++) {
      const ids = batches[i];
      gdbg(`  Fetching batch ${i + 1}/${batches.length}`);
      const batch = await this.fetchBatch(window, ids);
      if (batch) {
        slices.push(...batch);
      } else {
        failedBatches++;
        // keep later batches aligned with the lineup
        for (let k = 0; k < ids.length; k++) slices.push([]);
      }
    }
    return { window, slices, batches: batches.length, failedBatches };
  }

  private async fetchBatch(window: DayWindow, ids: string[]): Promise<GridSlice[] | null> {
    const url = this.gridUrl(window, ids);
    const res = await getJson(url, { userAgent: this.userAgent, fetchImpl: this.fetchImpl });
    if (!res.ok) return null;
    if (!Array.isArray(res.value)) {
      gerr(`${url}: grid response is not an array`);
      return null;
    }
    if (res.value.length !== ids.length) {
      gwarn(`grid batch returned ${res.value.length} slices for ${ids.length} channels (${window.start})`);
    }
    // exactly one slice per requested id, so the next batch starts at the right channel
    const slices: GridSlice[] = res.value.slice(0, ids.length).map((entry: unknown) => (Array.isArray(entry) ? entry : []));
    while (slices.length < ids.length) slices.push([]);
    return slices;
  }
}
