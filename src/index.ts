#!/usr/bin/env node
import cron from 'node-cron';
import { ConfigError, GuideConfig, loadConfig } from './config';
import { runGuide } from './guide/pipeline';
import { gerr, glog } from './log';

process.on('uncaughtException', (err: unknown) => { gerr('uncaughtException', err); process.exitCode = 1; });
process.on('unhandledRejection', (reason: unknown) => { gerr('unhandledRejection', reason); process.exitCode = 1; });

function readConfig(): GuideConfig | null {
  try {
    return loadConfig(process.env);
  } catch (e) {
    if (e instanceof ConfigError) {
      gerr(e.message);
      return null;
    }
    throw e;
  }
}

function startScheduled(config: GuideConfig, schedule: string): void {
  let running = false;
  const tick = async (): Promise<void> => {
    if (running) {
      glog('Previous run still in progress, skipping this tick');
      return;
    }
    running = true;
    try {
      const res = await runGuide(config);
      glog(`Run finished: ${res.status}`);
    } finally {
      running = false;
    }
  };
  cron.schedule(schedule, () => {
    tick().catch((e: unknown) => gerr('scheduled run failed', e));
  }, { timezone: config.timezone });
  glog(`Scheduled guide refresh '${schedule}' (${config.timezone})`);
  if (config.runOnStart) tick().catch((e: unknown) => gerr('initial run failed', e));
}

async function main(): Promise<void> {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }
  if (config.cron) {
    startScheduled(config, config.cron);
    return;
  }
  const res = await runGuide(config);
  if (res.exitCode === 0) glog('Done.');
  process.exitCode = res.exitCode;
}

main().catch((e: unknown) => {
  gerr('fatal', e);
  process.exitCode = 1;
});
