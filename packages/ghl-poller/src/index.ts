/**
 * GHL Commission Poller
 * Every cycle: list opportunities, compute loan amount * commission rate,
 * write it to the opportunity value where it differs.
 * Load .env first so LOG_LEVEL/LOG_FILE are set before the logger is created.
 */
import path from 'path';
import { existsSync } from 'fs';
// eslint-disable-next-line import/order
import { config as loadEnv } from 'dotenv';

// Load .env from repo root or cwd so it works regardless of run directory
const envPaths = [path.resolve(__dirname, '../../../.env'), path.resolve(process.cwd(), '.env')];
const envPath = envPaths.find((p) => existsSync(p));
if (envPath) loadEnv({ path: envPath });

import { ConfigError, createLogger, isFatal } from '@commission-sync/shared';
import { loadConfig, type CommissionConfig } from './config';
import { runCycle } from './cycle';
import { createGhlApi } from './ghl-client';
import { closeServer, createHealthServer } from './health-server';
import { PollLoop } from './poll-loop';
import { reconcileById, type UpdaterDeps } from './reconcile';

const log = createLogger('ghl-poller', 'ghl');

async function runOnce(deps: UpdaterDeps): Promise<number> {
  log.info('Starting (one-shot: poll then exit)');
  try {
    const summary = await runCycle(deps);
    log.info(summary, 'Exiting after poll complete');
    return 0;
  } catch (err) {
    if (isFatal(err)) log.fatal({ err }, 'Poll failed, exiting');
    else log.error({ err }, 'Poll failed, exiting');
    return 1;
  }
}

async function runForever(config: Readonly<CommissionConfig>, deps: UpdaterDeps): Promise<number> {
  const loop = new PollLoop({
    runCycle: () => runCycle(deps),
    intervalMs: config.pollIntervalSeconds * 1000,
    cron: config.pollCron,
  });

  const server = createHealthServer({
    loop,
    reconcileById: (input) => loop.exclusive(() => reconcileById(deps, input)),
  });
  server.on('error', (err) => {
    log.error({ err }, 'Health server error');
  });
  server.listen(config.port, config.host, () => {
    log.info({ url: `http://${config.host}:${config.port}` }, 'Health server listening');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Shutdown requested');
    loop.stop().catch((err) => log.error({ err }, 'Error while stopping poll loop'));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  loop.start();
  const exit = await loop.done;
  await closeServer(server);

  if (exit.reason === 'fatal') {
    log.fatal('Poll loop halted on a fatal error');
    return 1;
  }
  log.info('Poll loop stopped');
  return 0;
}

async function main(): Promise<number> {
  let config: Readonly<CommissionConfig>;
  try {
    config = loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ issues: err.issues }, err.message);
      return 1;
    }
    throw err;
  }

  log.info(
    {
      commissionRate: config.commissionRate,
      pollIntervalSeconds: config.pollIntervalSeconds,
      pollCron: config.pollCron,
      loanAmountField: config.loanAmountFieldKey,
      locationId: config.locationId,
      status: config.opportunityStatus,
    },
    'Configuration loaded'
  );

  const deps: UpdaterDeps = { api: createGhlApi(config), config };
  return config.runOnce ? runOnce(deps) : runForever(config, deps);
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log.fatal({ err }, 'Fatal error');
    process.exit(1);
  });
