// Process entry point
//
// Usage:
//   TCEC_CONFIG_URL=... TCEC_NOTIFY_WEBHOOK=... npm start

import { consoleLogger, describeCause } from '@engine-watch/runtime';
import { loadConfig, type NotifierConfig } from './config.js';
import { createNotifierLogger, startNotifier, type NotifierHandle } from './app.js';

async function main(): Promise<number> {
  let config: NotifierConfig;
  try {
    config = loadConfig();
  } catch (error) {
    consoleLogger.error(describeCause(error));
    return 1;
  }

  const logger = createNotifierLogger(config);

  let notifier: NotifierHandle;
  try {
    notifier = await startNotifier(config, { logger });
  } catch (error) {
    logger.error(`Startup failed: ${describeCause(error)}`);
    await logger.flush();
    return 1;
  }

  await new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  }).then((signal) => logger.info(`Received ${signal}, shutting down`));

  await notifier.stop();
  await logger.flush();
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    consoleLogger.error(`Fatal: ${describeCause(error)}`);
    process.exitCode = 1;
  }
);
