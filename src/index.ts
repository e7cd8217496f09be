import pino from 'pino';
import { loadDaemonConfig } from './infrastructure/index.js';
import { createDaemon } from './daemon.js';

/**
 * Daemon entry point.
 *
 * Configuration comes from `LOGSHIP_*` environment variables; an invalid
 * configuration exits with status 1 before any socket is bound.
 */
async function main(): Promise<void> {
  const config = loadDaemonConfig();
  const log = pino({ level: config.logLevel });

  const daemon = createDaemon(config, log);
  await daemon.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Signal received');

    daemon.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Daemon failed to start');
  process.exit(1);
});
