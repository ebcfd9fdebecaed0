import 'dotenv/config';

import logger, { redirectConsole } from './server/logger.js';
import { buildSeriesList, describeConfig, loadConfig, type AppConfig } from './server/config.js';
import { runMigrations } from './server/db/migrate.js';
import {
  ConnectionSupervisor,
  connectForStartup,
  type ConnectionState,
  type ManagedConnection,
} from './server/lib/connectionSupervisor.js';
import { errorMessage } from './server/lib/errors.js';
import { HttpBridgeSource } from './server/services/bridgeSource.js';
import { EventLogger } from './server/services/eventLog.js';
import { PostgresBarStore } from './server/services/postgresBarStore.js';
import { runInitialSync, runLiveCollection } from './server/services/schedulerService.js';
import { SourceGateway } from './server/services/sourceGateway.js';
import { SyncEngine } from './server/services/syncEngine.js';

redirectConsole(logger);

const SHUTDOWN_TIMEOUT_MS = 15_000;
const shutdownController = new AbortController();
let isShuttingDown = false;

function createSupervisor(
  connection: ManagedConnection,
  config: AppConfig,
  events: EventLogger,
): ConnectionSupervisor {
  return new ConnectionSupervisor(connection, {
    maxAttempts: config.sync.maxReconnectAttempts,
    retryDelayMs: config.sync.reconnectDelaySeconds * 1000,
    log: (message) => events.info(message),
    warn: (message) => events.warning(message),
    error: (message) => events.error(message),
    onStateChange: (from: ConnectionState, to: ConnectionState) => {
      events.debug(`[${connection.name}] ${from} -> ${to}`);
    },
  });
}

async function run(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;
  const signal = shutdownController.signal;
  const events = new EventLogger(logger);

  const store = new PostgresBarStore({
    connectionString: config.database.url,
    ssl: config.database.ssl,
    sslRejectUnauthorized: config.database.sslRejectUnauthorized,
    slowQueryThresholdMs: config.database.slowQueryThresholdMs,
  });
  const storeSupervisor = createSupervisor(store, config, events);

  const source = new HttpBridgeSource(config.source);
  const gateway = new SourceGateway(source, {
    log: (message) => events.info(message),
    warn: (message) => events.warning(message),
  });
  const sourceSupervisor = createSupervisor(gateway, config, events);

  try {
    if (!(await connectForStartup(storeSupervisor, signal, 'Could not connect to the database'))) return;
    await runMigrations(store.getDb());
    events.attach(store);

    if (!(await connectForStartup(sourceSupervisor, signal, 'Could not connect to the market-data source'))) return;
    const { terminal, account } = await gateway.describe();
    events.info(`Connected to ${terminal.name}${terminal.company ? ` (${terminal.company})` : ''}`, {
      details: { terminal: terminal.name, account: account.login, server: account.server ?? null },
    });
    events.info('Configuration loaded', { details: describeConfig(config) });

    const seriesList = buildSeriesList(config.sync);
    const engine = new SyncEngine(
      { gateway, store, sourceSupervisor, storeSupervisor, events },
      {
        backfillOverlapDays: config.sync.backfillOverlapDays,
        gapRepairWindowDays: config.sync.gapRepairWindowDays,
        liveCollectCount: config.sync.liveCollectCount,
        maxBarsPerCall: config.sync.maxBarsPerCall,
        signal,
      },
    );
    const deps = { engine, sourceSupervisor, storeSupervisor, events };

    await runInitialSync(seriesList, deps, {
      lookbackDays: config.sync.historicalLookbackDays,
      concurrency: config.sync.syncConcurrency,
      signal,
    });

    if (!signal.aborted) {
      await runLiveCollection(seriesList, deps, {
        intervalMs: config.sync.collectionIntervalSeconds * 1000,
        reconnectDelayMs: config.sync.reconnectDelaySeconds * 1000,
        gapRepairEveryCycles: config.sync.gapRepairEveryCycles,
        concurrency: config.sync.syncConcurrency,
        maxCycles: config.sync.collectionMaxCycles,
        signal,
      });
    }
  } finally {
    await events.flush();
    events.detach();
    await sourceSupervisor.close();
    await storeSupervisor.close();
  }
}

function requestShutdown(signalName: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`Received ${signalName}; shutting down gracefully...`);
  shutdownController.abort();

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  if (typeof forceExitTimer.unref === 'function') {
    forceExitTimer.unref();
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled promise rejection: ${errorMessage(reason)}`);
});
process.on('SIGINT', () => requestShutdown('SIGINT'));
process.on('SIGTERM', () => requestShutdown('SIGTERM'));

run().then(
  () => {
    logger.info('Shutdown complete');
    process.exit(0);
  },
  (err: unknown) => {
    logger.fatal(`Fatal: ${errorMessage(err)}`);
    process.exit(1);
  },
);
