import 'dotenv/config';
import { serve } from '@hono/node-server';
import { formatError } from '@streamvault/shared';
import { ArchiveService } from './ArchiveService';
import { createAPIServer } from './api/server';

// running downloads get a moment to stop their child processes
const SHUTDOWN_TIMEOUT_MS = 10000;

type HttpServer = ReturnType<typeof serve>;

/**
 * Stops the HTTP server and the service once. A second signal while stopping
 * warns, a third exits immediately.
 */
function createShutdown(service: ArchiveService, getServer: () => HttpServer | null) {
  let stopping = false;
  let repeatedSignals = 0;

  return async (reason: string): Promise<void> => {
    if (stopping) {
      repeatedSignals++;
      if (repeatedSignals >= 2) {
        console.log('\nExiting without waiting for jobs');
        process.exit(1);
      }
      console.log('\nStill stopping jobs... signal again to exit immediately');
      return;
    }

    stopping = true;
    console.log(`\nReceived ${reason}, stopping archiver...`);

    const hardStop = setTimeout(() => {
      console.log('\nJobs did not stop in time, exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      getServer()?.close();
      await service.stop();
      clearTimeout(hardStop);
      process.exit(0);
    } catch (error) {
      console.error('Error while stopping archiver:', formatError(error));
      clearTimeout(hardStop);
      process.exit(1);
    }
  };
}

async function main() {
  const configPath = process.env.CONFIG_PATH || './config';
  console.log('🚀 Starting streamvault archiver');
  console.log(`📁 Config path: ${configPath}`);
  const service = new ArchiveService({ configPath });

  let server: HttpServer | null = null;
  const shutdown = createShutdown(service, () => server);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => void shutdown(signal));
  }
  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    void shutdown('uncaughtException');
  });
  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    void shutdown('unhandledRejection');
  });

  await service.start();

  const app = createAPIServer(service);
  const port = Number(process.env.PORT || service.config.getConfig().server.port);
  server = serve({ fetch: app.fetch, port });

  console.log(`Archiver listening on http://localhost:${port}`);
  console.log(`Health check: http://localhost:${port}/health`);
}

export { ArchiveService, type ArchiveServiceOptions, type TempFileResult } from './ArchiveService';
export * from './api/index';
export * from './config/index';
export * from './database/index';
export * from './engine/index';
export * from './feeds/index';
export * from './jobs/index';
export * from './notifications/index';
export * from './upstream/index';

if (require.main === module) {
  main().catch((error) => {
    console.error('Failed to start archiver:', error);
    process.exit(1);
  });
}
