/**
 * picstore server entry point
 *
 * Loads configuration, opens the local deployment, serves HTTP and
 * periodically clears transient pictures nobody claimed.
 */

import { LocalDeployment } from '@picstore/local-deployment';
import { ConfigService } from '@picstore/services';
import { startServer } from './app.js';

const TRANSIENT_SWEEP_INTERVAL_MS = 60 * 60 * 1000;
const TRANSIENT_MAX_AGE_MS = 3 * 60 * 60 * 1000;

async function main(): Promise<void> {
  const config = ConfigService.load();
  const deployment = new LocalDeployment(config);
  await deployment.initialize();

  const app = await startServer({ deployment });

  const sweep = setInterval(() => {
    const olderThan = new Date(Date.now() - TRANSIENT_MAX_AGE_MS);
    deployment
      .pictures()
      .clearTransientPictures(olderThan)
      .catch((err: unknown) => app.log.error({ err }, 'Transient picture cleanup failed'));
  }, TRANSIENT_SWEEP_INTERVAL_MS);
  sweep.unref();

  const shutdown = (signal: string): void => {
    app.log.info(`Received ${signal}, shutting down`);
    clearInterval(sweep);
    app
      .close()
      .then(() => deployment.cleanup())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Failed to start picstore:', err);
  process.exit(1);
});
