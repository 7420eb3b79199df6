import { beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CREDIT_POLICY } from '../src/domain/lending/creditPolicy.js';
import { InterestRateModel } from '../src/domain/lending/interestRateModel.js';
import type { Loan, Pool } from '../src/domain/lending/lendingTypes.js';
import { LiquidationEngine } from '../src/domain/lending/liquidationEngine.js';
import { PoolLedger } from '../src/domain/lending/poolLedger.js';
import { InMemoryPriceFeed } from '../src/domain/lending/priceFeed.js';
import { RiskEngine } from '../src/domain/lending/riskEngine.js';
import { T0, captureError, makeLoan } from './helpers.js';

describe('LiquidationEngine', () => {
  const model = new InterestRateModel({ baseRate: 0.02, optimalUtilization: 0.8, rateAtOptimal: 0.1, maxRate: 1 });
  const ledger = new PoolLedger(model);
  const prices = new InMemoryPriceFeed({ USDC: 1, ETH: 1 });
  const risk = new RiskEngine({
    maxLoanToValue: 0.75,
    liquidationThreshold: 0.8,
    maxLiquidationThreshold: 0.95,
    fullLiquidationHealthFactor: 0.5,
    partialCloseFactor: 0.5,
    liquidationBonus: 0.05,
  }, DEFAULT_CREDIT_POLICY, prices);
  const engine = new LiquidationEngine(risk, prices, ledger);

  let debtPool: Pool;
  let collateralPool: Pool;

  const setup = (loan: Loan): { loan: Loan; run: (repayAmount: number) => ReturnType<LiquidationEngine['execute']> } => {
    debtPool = ledger.create('USDC', 0.1, T0);
    ledger.deposit(debtPool, 10_000, T0);
    ledger.borrow(debtPool, loan.principal + loan.accruedInterest, T0);
    collateralPool = ledger.create('ETH', 0.1, T0);
    if (loan.collateralAmount > 0) ledger.lockCollateral(collateralPool, loan.collateralAmount, T0);

    return {
      loan,
      run: (repayAmount) => engine.execute({ loan, debtPool, collateralPool, creditScore: 0, repayAmount, now: T0 }),
    };
  };

  beforeEach(() => {
    prices.setPrice('ETH', 1);
  });

  it('closes a loan at health factor 0.4 in one go and reports the seizure shortfall', () => {
    const { loan, run } = setup(makeLoan({ collateralAmount: 500, principal: 1_000, originalPrincipal: 1_000 }));

    expect(captureError(() => run(1_001))).toMatchObject({
      code: 'exceeds_liquidation_limit',
      details: { maxLiquidatable: 1_000, closeFactor: 1 },
    });
    expect(loan.principal).toBe(1_000);

    const outcome = run(1_000);

    expect(outcome).toMatchObject({
      repayAmount: 1_000,
      collateralSeized: 500,
      healthFactorBefore: 0.4,
      healthFactorAfter: Number.POSITIVE_INFINITY,
      remainingDebt: 0,
      status: 'Closed',
      shortfall: { code: 'partial_seizure_shortfall', missingCollateral: 550, uncoveredDebt: 0 },
    });
    expect(loan.collateralAmount).toBe(0);
    expect(debtPool.totalBorrowed).toBe(0);
    expect(collateralPool.totalCollateral).toBe(0);
  });

  it('limits a loan between 0.5 and 1 to half its debt and improves its health', () => {
    const { loan, run } = setup(makeLoan({ collateralAmount: 1_100, principal: 1_000, originalPrincipal: 1_000 }));

    expect(captureError(() => run(501))).toMatchObject({ code: 'exceeds_liquidation_limit' });

    const outcome = run(500);

    expect(outcome.collateralSeized).toBe(525);
    expect(outcome.healthFactorBefore).toBe(0.88);
    expect(outcome.healthFactorAfter).toBe(0.92);
    expect(outcome.healthFactorAfter).toBeGreaterThan(outcome.healthFactorBefore);
    expect(outcome.shortfall).toBeNull();
    expect(loan).toMatchObject({ principal: 500, collateralAmount: 575, status: 'PartiallyLiquidated' });
    expect(debtPool.totalBorrowed).toBe(500);
    expect(collateralPool.totalCollateral).toBe(575);
  });

  it('applies the repayment to interest before principal', () => {
    const { loan, run } = setup(makeLoan({
      collateralAmount: 1_100,
      principal: 900,
      accruedInterest: 100,
      originalPrincipal: 900,
    }));

    const outcome = run(300);

    expect(outcome.interestRepaid).toBe(100);
    expect(outcome.principalRepaid).toBe(200);
    expect(loan.accruedInterest).toBe(0);
    expect(loan.principal).toBe(700);
  });

  it('refuses any partial liquidation when the collateral cannot cover the bonus', () => {
    const { loan, run } = setup(makeLoan({ collateralAmount: 1_040, principal: 1_000, originalPrincipal: 1_000 }));

    for (const amount of [1, 100, 500]) {
      expect(captureError(() => run(amount))).toMatchObject({
        code: 'liquidation_not_improving',
        statusCode: 422,
        details: { healthFactorBefore: 0.832, collateralValue: 1_040, debtValue: 1_000, liquidationBonus: 0.05 },
      });
    }
    expect(loan).toMatchObject({ principal: 1_000, collateralAmount: 1_040, status: 'Open' });
  });

  it('seizes what is left and keeps the uncovered debt visible when collateral runs out', () => {
    const { loan, run } = setup(makeLoan({ collateralAmount: 400, principal: 1_000, originalPrincipal: 1_000 }));

    const outcome = run(500);

    expect(outcome.collateralSeized).toBe(400);
    expect(outcome.shortfall).toEqual({ code: 'partial_seizure_shortfall', missingCollateral: 125, uncoveredDebt: 500 });
    expect(loan).toMatchObject({ principal: 500, collateralAmount: 0, status: 'PartiallyLiquidated' });
    expect(captureError(() => run(100))).toMatchObject({ code: 'not_liquidatable' });
  });

  it('converts across prices and adds the bonus to the seizure', () => {
    prices.setPrice('ETH', 2);
    const { run } = setup(makeLoan({ collateralAmount: 550, principal: 1_000, originalPrincipal: 1_000 }));

    const outcome = run(500);

    expect(outcome.collateralSeized).toBe(262.5);
    expect(outcome.healthFactorBefore).toBe(0.88);
  });

  it('refuses healthy and closed loans and non-positive amounts', () => {
    const healthy = setup(makeLoan({ collateralAmount: 2_000, principal: 1_000 }));
    expect(captureError(() => healthy.run(100))).toMatchObject({ code: 'not_liquidatable', statusCode: 422 });

    const closed = setup(makeLoan({ collateralAmount: 500, principal: 1_000, status: 'Closed' }));
    expect(captureError(() => closed.run(100))).toMatchObject({ code: 'not_liquidatable', statusCode: 409 });

    const unhealthy = setup(makeLoan({ collateralAmount: 500, principal: 1_000 }));
    expect(captureError(() => unhealthy.run(0))).toMatchObject({ code: 'invalid_amount' });
  });
});
