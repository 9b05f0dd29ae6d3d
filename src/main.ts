#!/usr/bin/env node
/**
 * Entry point.
 *
 *   intelligence-pipeline [serve]            HTTP API + worker pool (default)
 *   intelligence-pipeline drain              process every claimable item, then exit
 *   intelligence-pipeline rebuild-index [--force]
 */

import { createServer } from 'node:http';
import { loadConfig } from './config.js';
import { getProductionContainer } from './container.production.js';
import { createRouter } from './api/router.js';
import { createApp } from './server.js';

async function main(argv: string[]): Promise<number> {
  const [command = 'serve', ...flags] = argv;
  const config = loadConfig();
  const container = getProductionContainer(config);
  const { logProvider: logger, workerPool } = container;

  switch (command) {
    case 'drain': {
      const summary = await workerPool.drain();
      logger.info('Drain complete', { ...summary });
      await logger.flush();
      return 0;
    }

    case 'rebuild-index': {
      await container.embeddingIndexer.rebuild({ force: flags.includes('--force') });
      await logger.flush();
      return 0;
    }

    case 'serve': {
      const router = createRouter(container);
      const server = createServer(createApp(router.handle, logger));
      server.keepAliveTimeout = 120_000;
      server.headersTimeout = 120_000;

      await new Promise<void>((resolve) => server.listen(config.PORT, resolve));
      logger.info('Intelligence pipeline started', {
        port: config.PORT,
        concurrency: config.WORKER_CONCURRENCY,
        promptVersion: config.PROMPT_VERSION,
        model: config.AI_MODEL,
      });
      workerPool.start();

      const shutdown = async (): Promise<void> => {
        logger.info('Shutting down gracefully...');
        await workerPool.stop();
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
      };

      const signalled = new Promise<string>((resolve) => {
        process.once('SIGTERM', () => resolve('SIGTERM'));
        process.once('SIGINT', () => resolve('SIGINT'));
      });

      try {
        const signal = await Promise.race([signalled, workerPool.wait().then(() => null)]);
        if (signal) logger.info('Signal received', { signal });
        await shutdown();
        return 0;
      } catch (err) {
        // The pool stopped on a fatal storage error.
        await shutdown();
        throw err;
      }
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      return 2;
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    process.stderr.write(
      `${err instanceof Error ? err.stack ?? err.message : String(err)}\n`
    );
    process.exit(1);
  });
