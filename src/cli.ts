#!/usr/bin/env node
import { parseArgs } from 'util';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { DashboardConfig } from './schemas/config.schema';
import { createHttpClient, destroyHttpAgent } from './modules/httpClient';
import { createTerminalConsent, GoogleOAuthClient } from './modules/googleCalendar';
import { generateOnce, RefreshScheduler } from './modules/runner';
import { writeTokenCache } from './modules/tokenCache';
import { ConfigError, errorMessage } from './utils/errors';
import { logger } from './logger';

const USAGE = `Usage: kiosk-dashboard [generate] [--loop] [--config <path>]
       kiosk-dashboard authorize [--config <path>]`;

function generate(config: DashboardConfig): Promise<string> {
  return generateOnce(config, {
    axiosClient: createHttpClient(config.httpTimeoutSeconds),
    // consent needs a person at the terminal
    consent: process.stdin.isTTY ? createTerminalConsent : undefined,
  });
}

async function authorize(config: DashboardConfig): Promise<void> {
  const oauth = GoogleOAuthClient.fromConfig(config.calendar);
  const token = await createTerminalConsent(oauth)();
  await writeTokenCache(config.calendar.tokenPath, token);
  logger.info({ tokenPath: config.calendar.tokenPath }, 'Calendar authorized');
}

function runLoop(config: DashboardConfig): void {
  const scheduler = new RefreshScheduler(config.refreshInterval, () => generate(config));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Shutting down...`);
    scheduler.stop();
    destroyHttpAgent();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  scheduler.start();
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c', default: DEFAULT_CONFIG_PATH },
      loop: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const command = positionals[0] ?? 'generate';
  if (values.help || positionals.length > 1 || !['generate', 'authorize'].includes(command)) {
    process.stdout.write(`${USAGE}\n`);
    return values.help ? 0 : 1;
  }

  const config = loadConfig(values.config);

  if (command === 'authorize') {
    await authorize(config);
    return 0;
  }

  if (values.loop) {
    runLoop(config);
    return 0;
  }

  const target = await generate(config);
  logger.info({ target }, 'Dashboard generated');
  destroyHttpAgent();
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, err.message);
    } else {
      logger.fatal({ err }, `Dashboard generation failed: ${errorMessage(err)}`);
    }
    destroyHttpAgent();
    process.exitCode = 1;
  });
