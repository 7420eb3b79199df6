import { DomainError, ErrorCode, invalidAmount } from '../../errors/taxonomy.js';
import { isoNow } from '../../utils/time.js';
import { roundAmount } from '../../utils/math.js';
import { type InterestRateModel, type RateQuote, compoundFactor } from './interestRateModel.js';
import type { AssetId, Pool } from './lendingTypes.js';

export const utilization = (pool: Pool): number => (
  pool.totalSupply > 0 ? pool.totalBorrowed / pool.totalSupply : 0
);

export const availableLiquidity = (pool: Pool): number => (
  roundAmount(Math.max(0, pool.totalSupply - pool.totalBorrowed))
);

const assertPositive = (amount: number): void => {
  if (!Number.isFinite(amount) || amount <= 0) throw invalidAmount(amount);
};

const insufficientLiquidity = (pool: Pool, requested: number): DomainError => new DomainError(
  ErrorCode.InsufficientLiquidity,
  409,
  `Pool '${pool.assetId}' has ${availableLiquidity(pool)} available, ${requested} requested.`,
  { assetId: pool.assetId, requested, available: availableLiquidity(pool) },
);

/**
 * Mutating operations on a single pool. Every mutation accrues the pool up to
 * `now` before touching balances, so no caller can act on a stale rate.
 */
export class PoolLedger {
  constructor(private readonly model: InterestRateModel) {}

  create(assetId: AssetId, reserveFactor: number, now: number): Pool {
    if (!(reserveFactor >= 0 && reserveFactor < 1)) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'reserveFactor must be in [0, 1).', { reserveFactor });
    }

    return {
      assetId,
      totalSupply: 0,
      totalBorrowed: 0,
      totalReserves: 0,
      totalCollateral: 0,
      reserveFactor,
      liquidityIndex: 1,
      borrowIndex: 1,
      lastUpdateTimestamp: now,
      createdAt: isoNow(),
    };
  }

  rates(pool: Pool): RateQuote {
    return this.model.quote(utilization(pool), pool.reserveFactor);
  }

  /**
   * Compounds the pool's current borrow rate over the time since the last
   * update. Interest is added to both borrowed and supplied totals; the
   * reserve-factor share goes to reserves and the rest raises the liquidity
   * index. Returns the interest accrued; a repeat call at the same timestamp
   * returns 0 and changes nothing.
   */
  accrueIndices(pool: Pool, now: number): number {
    const elapsed = now - pool.lastUpdateTimestamp;
    if (elapsed <= 0) return 0;

    const rate = this.model.borrowRate(utilization(pool));
    const growth = compoundFactor(rate, elapsed);
    const interest = roundAmount(pool.totalBorrowed * (growth - 1));

    const lenderSupply = pool.totalSupply - pool.totalReserves;
    const reserveShare = lenderSupply > 0 ? roundAmount(interest * pool.reserveFactor) : interest;
    const lenderShare = interest - reserveShare;
    if (lenderSupply > 0 && lenderShare > 0) {
      pool.liquidityIndex *= 1 + lenderShare / lenderSupply;
    }

    pool.borrowIndex *= growth;
    pool.totalBorrowed = roundAmount(pool.totalBorrowed + interest);
    pool.totalSupply = roundAmount(pool.totalSupply + interest);
    pool.totalReserves = roundAmount(pool.totalReserves + reserveShare);
    pool.lastUpdateTimestamp = now;

    return interest;
  }

  deposit(pool: Pool, amount: number, now: number): void {
    assertPositive(amount);
    this.accrueIndices(pool, now);
    pool.totalSupply = roundAmount(pool.totalSupply + amount);
  }

  withdraw(pool: Pool, amount: number, now: number): void {
    assertPositive(amount);
    this.accrueIndices(pool, now);
    if (amount > availableLiquidity(pool)) throw insufficientLiquidity(pool, amount);
    pool.totalSupply = roundAmount(pool.totalSupply - amount);
  }

  borrow(pool: Pool, amount: number, now: number): void {
    assertPositive(amount);
    this.accrueIndices(pool, now);
    if (amount > availableLiquidity(pool)) throw insufficientLiquidity(pool, amount);
    pool.totalBorrowed = roundAmount(pool.totalBorrowed + amount);
  }

  /** Returns the amount actually applied, `min(amount, totalBorrowed)`. */
  repay(pool: Pool, amount: number, now: number): number {
    assertPositive(amount);
    this.accrueIndices(pool, now);
    const applied = Math.min(amount, pool.totalBorrowed);
    pool.totalBorrowed = roundAmount(pool.totalBorrowed - applied);
    return applied;
  }

  lockCollateral(pool: Pool, amount: number, now: number): void {
    assertPositive(amount);
    this.accrueIndices(pool, now);
    pool.totalCollateral = roundAmount(pool.totalCollateral + amount);
  }

  releaseCollateral(pool: Pool, amount: number, now: number): void {
    assertPositive(amount);
    this.accrueIndices(pool, now);
    if (amount > pool.totalCollateral) {
      throw new DomainError(
        ErrorCode.InsufficientCollateral,
        409,
        `Pool '${pool.assetId}' holds ${pool.totalCollateral} collateral, ${amount} requested.`,
        { assetId: pool.assetId, requested: amount, available: pool.totalCollateral },
      );
    }
    pool.totalCollateral = roundAmount(pool.totalCollateral - amount);
  }

  /**
   * Writes back interest the pool booked at its full rate but a borrower owes
   * at a discounted one. Reserves cover it first; any remainder is taken from
   * lenders by scaling down the liquidity index.
   */
  absorbRebate(pool: Pool, amount: number): void {
    if (amount <= 0) return;
    const rebate = Math.min(amount, pool.totalBorrowed);
    const lenderSupply = pool.totalSupply - pool.totalReserves;
    const fromReserves = Math.min(rebate, pool.totalReserves);
    const fromLenders = rebate - fromReserves;

    if (fromLenders > 0 && lenderSupply > 0) {
      pool.liquidityIndex *= Math.max(0, lenderSupply - fromLenders) / lenderSupply;
    }

    pool.totalBorrowed = roundAmount(pool.totalBorrowed - rebate);
    pool.totalSupply = roundAmount(pool.totalSupply - rebate);
    pool.totalReserves = roundAmount(pool.totalReserves - fromReserves);
  }
}
