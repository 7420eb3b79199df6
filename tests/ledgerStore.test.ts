import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CreditRecord, Pool } from '../src/domain/lending/lendingTypes.js';
import { InMemoryCustody } from '../src/infra/custody.js';
import { EventBus } from '../src/infra/eventBus.js';
import { EventLogger } from '../src/infra/logger.js';
import { LedgerStore, loanKey, poolKey, userKey } from '../src/infra/storage/ledgerStore.js';
import { T0, createTempDir } from './helpers.js';

const makePool = (assetId: string): Pool => ({
  assetId,
  totalSupply: 0,
  totalBorrowed: 0,
  totalReserves: 0,
  totalCollateral: 0,
  reserveFactor: 0.1,
  liquidityIndex: 1,
  borrowIndex: 1,
  lastUpdateTimestamp: T0,
  createdAt: '2024-01-01T00:00:00.000Z',
});

const makeUser = (userId: string): CreditRecord => ({
  userId,
  deposits: {},
  collateral: {},
  loanIds: [],
  creditScore: 0,
  repaymentHistory: [],
  paidOff: 0,
  defaults: 0,
  createdAt: '2024-01-01T00:00:00.000Z',
});

describe('LedgerStore', () => {
  let tmpDir: string;
  let bus: EventBus;

  beforeEach(async () => {
    tmpDir = await createTempDir();
    bus = new EventBus();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const seeded = async (custody = new InMemoryCustody()): Promise<LedgerStore> => {
    const store = new LedgerStore(null, custody, bus);
    await store.init();
    await store.transaction([poolKey('USDC'), userKey('alice')], (tx) => {
      tx.insertPool(makePool('USDC'));
      tx.insertUser(makeUser('alice'), 'test-api-key');
    });
    return store;
  };

  it('commits drafts and resolves api keys', async () => {
    const store = await seeded();

    expect(store.getPool('USDC')?.totalSupply).toBe(0);
    expect(store.hasUser('alice')).toBe(true);
    expect(store.userIdForApiKey('test-api-key')).toBe('alice');
  });

  it('hands out copies that do not alias committed state', async () => {
    const store = await seeded();
    const copy = store.getPool('USDC');
    if (copy) copy.totalSupply = 1_000;

    expect(store.getPool('USDC')?.totalSupply).toBe(0);
  });

  it('leaves state untouched when the work throws', async () => {
    const store = await seeded();

    await expect(store.transaction([poolKey('USDC'), userKey('alice')], (tx) => {
      tx.pool('USDC').totalSupply = 500;
      tx.user('alice').deposits.USDC = 500;
      throw new Error('halfway');
    })).rejects.toThrow('halfway');

    expect(store.getPool('USDC')?.totalSupply).toBe(0);
    expect(store.getUser('alice')?.deposits).toEqual({});
  });

  it('rolls back everything when custody vetoes the transfers', async () => {
    const custody = new InMemoryCustody({ enforceBalances: true });
    const store = await seeded(custody);
    const events: unknown[] = [];
    bus.on('*', (_event, data) => events.push(data));

    await expect(store.transaction([poolKey('USDC'), userKey('alice')], (tx) => {
      tx.pool('USDC').totalSupply = 500;
      tx.transfer({ assetId: 'USDC', amount: 500, from: 'alice', to: 'pool:USDC:supply', reason: 'deposit' });
      tx.publish('supply.deposited', { amount: 500 });
    })).rejects.toMatchObject({ code: 'custody_rejected' });

    expect(store.getPool('USDC')?.totalSupply).toBe(0);
    expect(events).toEqual([]);
    expect(custody.executed()).toEqual([]);
  });

  it('publishes events only after the commit', async () => {
    const store = await seeded();
    const seen: number[] = [];
    bus.on('supply.deposited', () => {
      seen.push(store.getPool('USDC')?.totalSupply ?? -1);
    });

    await store.transaction([poolKey('USDC')], (tx) => {
      tx.pool('USDC').totalSupply = 500;
      tx.publish('supply.deposited', {});
      expect(seen).toEqual([]);
    });

    expect(seen).toEqual([500]);
  });

  it('skips transfers of nothing', async () => {
    const custody = new InMemoryCustody();
    const store = await seeded(custody);

    await store.transaction([poolKey('USDC')], (tx) => {
      tx.transfer({ assetId: 'USDC', amount: 0, from: 'alice', to: 'pool:USDC:supply', reason: 'deposit' });
    });

    expect(custody.executed()).toEqual([]);
  });

  it('refuses to touch an entity outside the locked scope', async () => {
    const store = await seeded();

    await expect(store.transaction([poolKey('USDC')], (tx) => tx.user('alice')))
      .rejects.toThrow("Entity 'user:alice' is not locked by this transaction.");
    await expect(store.transaction([loanKey('missing')], (tx) => tx.loan('missing')))
      .rejects.toMatchObject({ code: 'unknown_loan', statusCode: 404 });
  });

  it('serializes transactions on the same entity and runs disjoint ones alongside', async () => {
    const store = await seeded();
    await store.transaction([poolKey('ETH')], (tx) => tx.insertPool(makePool('ETH')));

    let openGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const order: string[] = [];

    const first = store.transaction([poolKey('USDC')], async (tx) => {
      order.push('first:start');
      await gate;
      tx.pool('USDC').totalSupply += 1;
      order.push('first:end');
    });
    const second = store.transaction([poolKey('USDC')], (tx) => {
      order.push('second');
      tx.pool('USDC').totalSupply += 1;
    });
    const disjoint = store.transaction([poolKey('ETH')], () => {
      order.push('disjoint');
    });

    await disjoint;
    expect(order).toContain('disjoint');
    expect(order).not.toContain('second');

    openGate();
    await Promise.all([first, second]);

    expect(order.slice(-2)).toEqual(['first:end', 'second']);
    expect(store.getPool('USDC')?.totalSupply).toBe(2);
  });

  it('persists committed state and reloads it', async () => {
    const file = path.join(tmpDir, 'ledger.json');
    const store = new LedgerStore(file, new InMemoryCustody(), bus);
    await store.init();
    await store.transaction([poolKey('USDC'), userKey('alice')], (tx) => {
      tx.insertPool(makePool('USDC'));
      tx.insertUser(makeUser('alice'), 'test-api-key');
    });
    await store.flush();

    const reloaded = new LedgerStore(file, new InMemoryCustody(), bus);
    await reloaded.init();

    expect(reloaded.getPool('USDC')).toEqual(makePool('USDC'));
    expect(reloaded.userIdForApiKey('test-api-key')).toBe('alice');
  });

  it('keeps a committed transaction and logs the error when the state file cannot be written', async () => {
    const stateDir = path.join(tmpDir, 'state');
    const logFile = path.join(tmpDir, 'events.ndjson');
    const logger = new EventLogger(logFile);
    const store = new LedgerStore(path.join(stateDir, 'ledger.json'), new InMemoryCustody(), bus, logger);
    await store.init();
    await fs.rm(stateDir, { recursive: true, force: true });
    await fs.writeFile(stateDir, 'not a directory');
    const events: unknown[] = [];
    bus.on('pool.created', (_event, data) => events.push(data));

    const result = await store.transaction([poolKey('USDC')], (tx) => {
      tx.insertPool(makePool('USDC'));
      tx.publish('pool.created', { assetId: 'USDC' });
      return 'created';
    });

    expect(result).toBe('created');
    expect(store.getPool('USDC')).toEqual(makePool('USDC'));
    expect(events).toEqual([{ assetId: 'USDC' }]);

    const lines = (await fs.readFile(logFile, 'utf-8')).trim().split('\n').map((line) => JSON.parse(line));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'error', event: 'ledger.persist.failed', data: { scope: ['pool:USDC'] } });
  });

  it('starts empty and writes the file when none exists', async () => {
    const file = path.join(tmpDir, 'nested', 'ledger.json');
    const store = new LedgerStore(file, new InMemoryCustody(), bus);
    await store.init();

    expect(store.snapshot()).toEqual({ pools: {}, users: {}, loans: {}, apiKeys: {} });
    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({ pools: {}, users: {}, loans: {}, apiKeys: {} });
  });
});
