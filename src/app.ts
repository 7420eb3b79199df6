import Fastify, { type FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { type LiveFeed, registerWebSocket } from './api/websocket.js';
import type { AppConfig } from './config.js';
import { loadCreditPolicy } from './domain/lending/creditPolicy.js';
import { InMemoryPriceFeed, type WritablePriceFeed } from './domain/lending/priceFeed.js';
import { type AssetCustody, InMemoryCustody } from './infra/custody.js';
import { type EventBus, eventBus as defaultEventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { LedgerStore } from './infra/storage/ledgerStore.js';
import { LendingService } from './services/lendingService.js';
import { LiquidationMonitorService } from './services/liquidationMonitorService.js';

export interface AppOverrides {
  /** Unix seconds. */
  clock?: () => number;
  priceFeed?: WritablePriceFeed;
  custody?: AssetCustody;
  bus?: EventBus;
}

export interface AppContext {
  app: FastifyInstance;
  lending: LendingService;
  monitor: LiquidationMonitorService;
  ledgerStore: LedgerStore;
  logger: EventLogger;
  liveFeed: LiveFeed;
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const bus = overrides.bus ?? defaultEventBus;

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const ledgerStore = new LedgerStore(
    config.paths.stateFile,
    overrides.custody ?? new InMemoryCustody(),
    bus,
    logger,
  );
  await ledgerStore.init();

  const policy = await loadCreditPolicy(config.paths.creditPolicyFile);

  const lending = new LendingService({
    store: ledgerStore,
    prices: overrides.priceFeed ?? new InMemoryPriceFeed(),
    policy,
    logger,
    clock: overrides.clock,
  }, config);

  const monitor = new LiquidationMonitorService(lending, bus, logger, config);

  const unsubscribeLog = bus.on('*', (event, data) => {
    logger.log('info', event, { payload: data }).catch((error: unknown) => {
      console.error('event log write failed', error);
    });
  });

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    lending,
    monitor,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      processPid: process.pid,
    }),
  });

  // Register WebSocket live event feed endpoint.
  const liveFeed = await registerWebSocket(app, bus);

  app.addHook('onClose', async () => {
    monitor.stop();
    unsubscribeLog();
    await ledgerStore.flush();
    await logger.flush();
  });

  return {
    app,
    lending,
    monitor,
    ledgerStore,
    logger,
    liveFeed,
  };
}
