import { IANAZone } from 'luxon';
import cron from 'node-cron';

export const MAX_DAYS = 8;

export type GuideConfig = {
  timezone: string; // IANA zone used for programme start/stop, e.g. America/New_York
  lineupId: string;
  days: number; // 1..MAX_DAYS
  outputFile: string;
  baseUrl: string; // service origin, no trailing slash
  sourceName: string; // source-info-name on the <tv> root
  userAgent: string;
  cron?: string; // scheduled mode when set
  runOnStart: boolean;
};

export const DEFAULT_CONFIG: GuideConfig = {
  timezone: 'America/New_York',
  lineupId: 'USA-OTA10001',
  days: MAX_DAYS,
  outputFile: '/data/guide.xml',
  baseUrl: 'https://www.tvtv.us',
  sourceName: 'tvtv2xmltv',
  userAgent: 'lineup2xmltv/1.0',
  runOnStart: false,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function envBool(val?: string): boolean {
  if (!val) return false;
  const v = val.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

function envStr(env: Env, key: string, fallback: string): string {
  const v = (env[key] || '').trim();
  return v || fallback;
}

export function clampDays(days: number): number {
  return Math.min(MAX_DAYS, Math.max(1, Math.floor(days)));
}

export function loadConfig(env: Env = process.env): GuideConfig {
  const timezone = envStr(env, 'GUIDE_TIMEZONE', DEFAULT_CONFIG.timezone);
  if (!IANAZone.isValidZone(timezone)) throw new ConfigError(`Timezone '${timezone}' not found`);

  const rawDays = (env.GUIDE_DAYS || '').trim();
  let days = DEFAULT_CONFIG.days;
  if (rawDays) {
    const n = Number(rawDays);
    if (!Number.isFinite(n)) throw new ConfigError(`GUIDE_DAYS must be a number, got '${rawDays}'`);
    days = clampDays(n);
  }

  const schedule = (env.GUIDE_CRON || '').trim() || undefined;
  if (schedule && !cron.validate(schedule)) throw new ConfigError(`GUIDE_CRON is not a valid cron expression: '${schedule}'`);

  return {
    timezone,
    lineupId: envStr(env, 'GUIDE_LINEUP_ID', DEFAULT_CONFIG.lineupId),
    days,
    outputFile: envStr(env, 'GUIDE_OUTPUT_FILE', DEFAULT_CONFIG.outputFile),
    baseUrl: envStr(env, 'GUIDE_BASE_URL', DEFAULT_CONFIG.baseUrl).replace(/\/+$/, ''),
    sourceName: envStr(env, 'GUIDE_SOURCE_NAME', DEFAULT_CONFIG.sourceName),
    userAgent: envStr(env, 'GUIDE_USER_AGENT', DEFAULT_CONFIG.userAgent),
    cron: schedule,
    runOnStart: envBool(env.GUIDE_RUN_ON_START),
  };
}
