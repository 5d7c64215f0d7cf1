/**
 * Controller Entrypoint
 *
 * Wires the score store, membership strategy, epoch manager, status-file
 * publisher and HTTP API. Graceful shutdown on SIGTERM/SIGINT.
 */

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { EpochManager } from '../epoch/manager.js';
import { meshLog, setLogLevel } from '../logger.js';
import { ThresholdStrategy } from '../membership/engine.js';
import { ScoreStore } from '../membership/scoreStore.js';
import { FileSnapshotPublisher } from '../publish/snapshotPublisher.js';
import { ControllerHttpServer } from './httpServer.js';

process.on('uncaughtException', (err) => {
  meshLog.error('controller', 'Uncaught exception', { error: String(err), stack: err.stack });
});

process.on('unhandledRejection', (reason) => {
  meshLog.error('controller', 'Unhandled rejection', { reason: String(reason) });
});

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const store = new ScoreStore();
  const epochs = new EpochManager(
    {
      epochDurationMs: config.epochSeconds * 1000,
      participants: config.participants,
      secretLength: config.secretLength,
      keyLength: config.keyLength,
    },
    {
      store,
      strategy: new ThresholdStrategy({
        threshold: config.threshold,
        maxAgeMs: config.maxBenchmarkAgeSeconds * 1000,
      }),
      publisher: new FileSnapshotPublisher(config.statusFile),
    },
  );
  const server = new ControllerHttpServer({ store, epochs });

  epochs.on('fatal', (err) => {
    meshLog.error('controller', 'Fatal configuration error', { error: err.message });
    process.exit(1);
  });

  const shutdown = async (signal: string) => {
    meshLog.info('controller', 'Received shutdown signal', { signal });
    epochs.stop();
    await server.stop();
    meshLog.info('controller', 'Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  epochs.start();
  const address = await server.start(config.port);

  meshLog.info('controller', 'Controller listening', {
    port: address.port,
    threshold: config.threshold,
    maxBenchmarkAgeSeconds: config.maxBenchmarkAgeSeconds,
    epochSeconds: config.epochSeconds,
    participants: config.participants,
  });
}

main().catch((err: unknown) => {
  meshLog.error('controller', 'Fatal error', {
    error: String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
