import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { type AppConfig, config as baseConfig } from '../src/config.js';
import { DEFAULT_CREDIT_POLICY } from '../src/domain/lending/creditPolicy.js';
import type { Loan } from '../src/domain/lending/lendingTypes.js';
import { InMemoryPriceFeed } from '../src/domain/lending/priceFeed.js';
import { InMemoryCustody } from '../src/infra/custody.js';
import { EventBus } from '../src/infra/eventBus.js';
import { EventLogger } from '../src/infra/logger.js';
import { LedgerStore } from '../src/infra/storage/ledgerStore.js';
import { LendingService } from '../src/services/lendingService.js';

export const T0 = 1_700_000_000;

export const createTempDir = async (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'lending-test-'));

export const buildTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0, adminKey: 'test-admin-key' },
  paths: {
    dataDir: dir,
    stateFile: path.join(dir, 'ledger.json'),
    logFile: path.join(dir, 'events.ndjson'),
    creditPolicyFile: path.join(dir, 'credit-policy.json'),
  },
  protocol: {
    maxLoanToValue: 0.75,
    liquidationThreshold: 0.8,
    maxLiquidationThreshold: 0.95,
    liquidationBonus: 0.05,
    fullLiquidationHealthFactor: 0.5,
    partialCloseFactor: 0.5,
    defaultReserveFactor: 0.1,
  },
  interestRate: { baseRate: 0.02, optimalUtilization: 0.8, rateAtOptimal: 0.1, maxRate: 1 },
  credit: { maxCreditScore: 1000 },
  monitor: { enabled: false, scanIntervalMs: 60_000 },
});

/** Manually advanced clock in unix seconds. */
export class TestClock {
  constructor(public now: number = T0) {}

  read = (): number => this.now;

  advance(seconds: number): void {
    this.now += seconds;
  }
}

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
};

export const makeLoan = (overrides: Partial<Loan> = {}): Loan => ({
  loanId: 'loan-1',
  borrowerId: 'borrower-1',
  holderId: 'borrower-1',
  collateralAssetId: 'ETH',
  collateralAmount: 10_000,
  debtAssetId: 'USDC',
  principal: 5_000,
  accruedInterest: 0,
  originalPrincipal: 5_000,
  interestRateAtOrigination: 0.05,
  borrowIndexSnapshot: 1,
  lastUpdateTimestamp: T0,
  creditTiersAwarded: [],
  status: 'Open',
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

export interface ServiceHarness {
  config: AppConfig;
  clock: TestClock;
  prices: InMemoryPriceFeed;
  custody: InMemoryCustody;
  bus: EventBus;
  store: LedgerStore;
  logger: EventLogger;
  lending: LendingService;
}

/** A LendingService on an in-memory ledger with its own bus, clock and custody. */
export const buildServiceHarness = async (
  dir: string,
  options: { custody?: InMemoryCustody; prices?: Record<string, number> } = {},
): Promise<ServiceHarness> => {
  const config = buildTestConfig(dir);
  const clock = new TestClock();
  const prices = new InMemoryPriceFeed(options.prices ?? { USDC: 1, ETH: 1 });
  const custody = options.custody ?? new InMemoryCustody();
  const bus = new EventBus();
  const store = new LedgerStore(null, custody, bus);
  await store.init();
  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const lending = new LendingService({
    store,
    prices,
    policy: DEFAULT_CREDIT_POLICY,
    logger,
    clock: clock.read,
  }, config);

  return { config, clock, prices, custody, bus, store, logger, lending };
};
