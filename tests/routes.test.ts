import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type AppContext, buildApp } from '../src/app.js';
import { InMemoryPriceFeed } from '../src/domain/lending/priceFeed.js';
import { EventBus } from '../src/infra/eventBus.js';
import { T0, TestClock, buildTestConfig, createTempDir } from './helpers.js';

const ADMIN = { 'x-admin-key': 'test-admin-key' };

describe('HTTP routes', () => {
  let dir: string;
  let ctx: AppContext;

  beforeEach(async () => {
    dir = await createTempDir();
    ctx = await buildApp(buildTestConfig(dir), {
      clock: new TestClock().read,
      priceFeed: new InMemoryPriceFeed(),
      bus: new EventBus(),
    });
  });

  afterEach(async () => {
    await ctx.app.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const register = async (): Promise<{ userId: string; apiKey: string }> => {
    const res = await ctx.app.inject({ method: 'POST', url: '/users/register' });
    expect(res.statusCode).toBe(201);
    return res.json();
  };

  const bearer = (apiKey: string) => ({ authorization: `Bearer ${apiKey}` });

  const seedMarket = async (): Promise<void> => {
    for (const assetId of ['USDC', 'ETH']) {
      const pool = await ctx.app.inject({ method: 'POST', url: '/pools', headers: ADMIN, payload: { assetId } });
      expect(pool.statusCode).toBe(201);
      const price = await ctx.app.inject({ method: 'POST', url: '/prices', headers: ADMIN, payload: { assetId, price: 1 } });
      expect(price.statusCode).toBe(200);
    }
  };

  it('reports health', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', env: 'test', pools: 0, monitorRunning: false });
  });

  it('guards admin routes with the admin key', async () => {
    const denied = await ctx.app.inject({ method: 'POST', url: '/pools', payload: { assetId: 'USDC' } });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toEqual({ error: { code: 'unauthorized', message: 'Admin key required.' } });

    const invalid = await ctx.app.inject({ method: 'POST', url: '/pools', headers: ADMIN, payload: { assetId: 'USDC', reserveFactor: 1 } });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json().error.code).toBe('invalid_payload');

    const created = await ctx.app.inject({ method: 'POST', url: '/pools', headers: ADMIN, payload: { assetId: 'USDC', reserveFactor: 0.2 } });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toMatchObject({ assetId: 'USDC', reserveFactor: 0.2, totalSupply: 0 });

    const duplicate = await ctx.app.inject({ method: 'POST', url: '/pools', headers: ADMIN, payload: { assetId: 'USDC' } });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json().error.code).toBe('pool_exists');

    const accrued = await ctx.app.inject({ method: 'POST', url: '/pools/USDC/accrue', headers: ADMIN });
    expect(accrued.statusCode).toBe(200);
    expect(accrued.json()).toMatchObject({ assetId: 'USDC', lastUpdateTimestamp: T0 });
  });

  it('requires an api key for account operations', async () => {
    await seedMarket();

    const missing = await ctx.app.inject({ method: 'POST', url: '/supply/deposit', payload: { assetId: 'USDC', amount: 10 } });
    expect(missing.statusCode).toBe(401);

    const wrong = await ctx.app.inject({
      method: 'POST',
      url: '/supply/deposit',
      headers: bearer('test-wrong-key'),
      payload: { assetId: 'USDC', amount: 10 },
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json().error.code).toBe('unauthorized');
  });

  it('runs a loan from deposit to liquidation', async () => {
    await seedMarket();
    const lender = await register();
    const borrower = await register();

    const deposit = await ctx.app.inject({
      method: 'POST',
      url: '/supply/deposit',
      headers: bearer(lender.apiKey),
      payload: { assetId: 'USDC', amount: 10_000 },
    });
    expect(deposit.json()).toEqual({ userId: lender.userId, assetId: 'USDC', amount: 10_000, balance: 10_000 });

    const collateral = await ctx.app.inject({
      method: 'POST',
      url: '/collateral/deposit',
      headers: { 'x-api-key': borrower.apiKey },
      payload: { assetId: 'ETH', amount: 10_000 },
    });
    expect(collateral.statusCode).toBe(200);

    const loanPayload = { collateralAssetId: 'ETH', collateralAmount: 10_000, debtAssetId: 'USDC', amount: 7_501 };
    const refused = await ctx.app.inject({ method: 'POST', url: '/loans', headers: bearer(borrower.apiKey), payload: loanPayload });
    expect(refused.statusCode).toBe(422);
    expect(refused.json().error.code).toBe('exceeds_max_borrow');

    const opened = await ctx.app.inject({
      method: 'POST',
      url: '/loans',
      headers: bearer(borrower.apiKey),
      payload: { ...loanPayload, amount: 7_500 },
    });
    expect(opened.statusCode).toBe(201);
    const loanId: string = opened.json().loanId;

    const health = await ctx.app.inject({ method: 'GET', url: `/loans/${loanId}/health` });
    expect(health.json()).toMatchObject({
      healthFactor: 1.06666667,
      severity: 'SAFE',
      liquidatable: false,
      liquidationBlock: 'healthy',
      borrowCapacity: 0,
    });

    await ctx.app.inject({ method: 'POST', url: '/prices', headers: ADMIN, payload: { assetId: 'ETH', price: 0.9 } });

    const bad = await ctx.app.inject({ method: 'GET', url: '/loans/bad' });
    expect(bad.json()).toEqual({ loanIds: [loanId] });

    const scan = await ctx.app.inject({ method: 'POST', url: '/monitor/scan', headers: ADMIN });
    expect(scan.json().alerts).toHaveLength(1);
    const alerts = await ctx.app.inject({ method: 'GET', url: '/monitor/alerts' });
    expect(alerts.json().alerts[0]).toMatchObject({ loanId, severity: 'WARNING' });

    const liquidated = await ctx.app.inject({
      method: 'POST',
      url: `/loans/${loanId}/liquidate`,
      headers: bearer(lender.apiKey),
      payload: { repayAmount: 3_750 },
    });
    expect(liquidated.statusCode).toBe(200);
    expect(liquidated.json()).toMatchObject({
      liquidatorId: lender.userId,
      collateralSeized: 4_375,
      healthFactorAfter: 1.08,
      status: 'PartiallyLiquidated',
    });

    const pool = await ctx.app.inject({ method: 'GET', url: '/pools/USDC' });
    expect(pool.json()).toMatchObject({ totalBorrowed: 3_750, availableLiquidity: 6_250 });

    const record = await ctx.app.inject({ method: 'GET', url: `/users/${borrower.userId}` });
    expect(record.json()).toMatchObject({ defaults: 1, creditScore: 10 });
  });

  it('rejects malformed payloads and maps domain errors to status codes', async () => {
    await seedMarket();
    const user = await register();

    const negative = await ctx.app.inject({
      method: 'POST',
      url: '/loans/any/repay',
      headers: bearer(user.apiKey),
      payload: { amount: -1 },
    });
    expect(negative.statusCode).toBe(400);
    expect(negative.json().error.code).toBe('invalid_payload');

    const unknownLoan = await ctx.app.inject({
      method: 'POST',
      url: '/loans/any/repay',
      headers: bearer(user.apiKey),
      payload: { amount: 1 },
    });
    expect(unknownLoan.statusCode).toBe(404);
    expect(unknownLoan.json().error.code).toBe('unknown_loan');

    const unknownAsset = await ctx.app.inject({ method: 'GET', url: '/pools/DOGE' });
    expect(unknownAsset.statusCode).toBe(404);

    const overdrawn = await ctx.app.inject({
      method: 'POST',
      url: '/supply/withdraw',
      headers: bearer(user.apiKey),
      payload: { assetId: 'USDC', amount: 1 },
    });
    expect(overdrawn.statusCode).toBe(409);
    expect(overdrawn.json().error.code).toBe('insufficient_balance');
  });

  it('converts between supply and collateral', async () => {
    await seedMarket();
    const user = await register();
    await ctx.app.inject({
      method: 'POST',
      url: '/supply/deposit',
      headers: bearer(user.apiKey),
      payload: { assetId: 'USDC', amount: 500 },
    });

    const convert = await ctx.app.inject({
      method: 'POST',
      url: '/collateral/convert',
      headers: bearer(user.apiKey),
      payload: { assetId: 'USDC', amount: 200, direction: 'to_collateral' },
    });
    expect(convert.json()).toMatchObject({ balance: 200 });

    const balance = await ctx.app.inject({ method: 'GET', url: `/users/${user.userId}/deposits/USDC` });
    expect(balance.json()).toEqual({ userId: user.userId, assetId: 'USDC', balance: 300 });
  });

  it('persists the ledger to the state file', async () => {
    await seedMarket();
    await ctx.ledgerStore.flush();

    const saved = JSON.parse(await fs.readFile(path.join(dir, 'ledger.json'), 'utf-8'));
    expect(Object.keys(saved.pools)).toEqual(['USDC', 'ETH']);
  });
});
