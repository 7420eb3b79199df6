/**
 * Risk decisions for loans: valuation, health factor, borrow gating and
 * liquidation sizing. Everything here is a pure read of the loan, the price
 * feed and the borrower's credit score.
 *
 *   collateralValue = collateralAmount × price(collateral)
 *   debtValue       = (principal + accruedInterest) × price(debt)
 *   healthFactor    = collateralValue × liquidationThreshold / debtValue
 *
 * A loan with no debt has an infinite health factor.
 *
 * Repaying R of debt value seizes R × (1 + bonus) of collateral value, so a
 * partial liquidation raises the health factor only while
 * collateralValue > debtValue × (1 + bonus).
 */

import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { AMOUNT_EPSILON, roundAmount } from '../../utils/math.js';
import { type CreditPolicy, creditAdjustment } from './creditPolicy.js';
import type { AssetId, HealthSeverity, Loan, LoanId, UserId } from './lendingTypes.js';
import { classifyHealth, isActive, totalDebt } from './lendingTypes.js';
import type { PriceFeed } from './priceFeed.js';

export interface RiskParams {
  maxLoanToValue: number;
  liquidationThreshold: number;
  maxLiquidationThreshold: number;
  fullLiquidationHealthFactor: number;
  partialCloseFactor: number;
  liquidationBonus: number;
}

/** Why no liquidation can be submitted against a loan right now. */
export type LiquidationBlock = 'closed' | 'healthy' | 'no_collateral' | 'not_improving';

export interface LoanValuation {
  collateralValue: number;
  debtValue: number;
}

export interface RiskAssessment extends LoanValuation {
  loanId: LoanId;
  healthFactor: number;
  liquidationThreshold: number;
  maxLoanToValue: number;
  /** True when some repay amount would be accepted now. */
  liquidatable: boolean;
  liquidationBlock: LiquidationBlock | null;
  /** Share of the debt the health band allows, whether or not it is blocked. */
  closeFactor: number;
  /** Largest repay amount, in debt-asset units, a liquidator may submit now. */
  maxLiquidatable: number;
  /** Further debt-asset units the loan could borrow at its max loan-to-value. */
  borrowCapacity: number;
  severity: HealthSeverity;
}

/** Collateral and debt sides of a position, before or after a proposed change. */
export interface PositionShape {
  collateralAssetId: AssetId;
  collateralAmount: number;
  debtAssetId: AssetId;
  debt: number;
}

export const computeHealthFactor = (valuation: LoanValuation, liquidationThreshold: number): number => {
  if (valuation.debtValue <= 0) return Number.POSITIVE_INFINITY;
  return Number(((valuation.collateralValue * liquidationThreshold) / valuation.debtValue).toFixed(8));
};

export const partialLiquidationImproves = (valuation: LoanValuation, liquidationBonus: number): boolean =>
  valuation.collateralValue > valuation.debtValue * (1 + liquidationBonus);

export class RiskEngine {
  constructor(
    private readonly params: RiskParams,
    private readonly policy: CreditPolicy,
    private readonly prices: PriceFeed,
  ) {
    if (!(params.maxLoanToValue > 0 && params.maxLoanToValue <= params.liquidationThreshold)) {
      throw new Error('maxLoanToValue must be positive and no greater than liquidationThreshold.');
    }
    if (!(params.liquidationThreshold < 1 && params.maxLiquidationThreshold < 1)) {
      throw new Error('Liquidation thresholds must be below 1.');
    }
    if (!(params.liquidationBonus >= 0 && params.liquidationBonus < 1)) {
      throw new Error(`liquidationBonus must be in [0, 1), got ${params.liquidationBonus}`);
    }
  }

  get liquidationBonus(): number {
    return this.params.liquidationBonus;
  }

  liquidationThreshold(creditScore: number): number {
    const { thresholdBonus } = creditAdjustment(this.policy, creditScore);
    const base = this.params.liquidationThreshold;
    return Math.min(roundAmount(base + thresholdBonus), Math.max(base, this.params.maxLiquidationThreshold));
  }

  maxLoanToValue(creditScore: number): number {
    const { thresholdBonus } = creditAdjustment(this.policy, creditScore);
    return Math.min(roundAmount(this.params.maxLoanToValue + thresholdBonus), this.liquidationThreshold(creditScore));
  }

  interestDiscount(creditScore: number): number {
    return creditAdjustment(this.policy, creditScore).interestDiscount;
  }

  value(position: PositionShape): LoanValuation {
    return {
      collateralValue: position.collateralAmount * this.prices.getPrice(position.collateralAssetId),
      debtValue: position.debt * this.prices.getPrice(position.debtAssetId),
    };
  }

  valuation(loan: Loan): LoanValuation {
    return this.value(shapeOf(loan));
  }

  healthFactor(loan: Loan, creditScore: number): number {
    return computeHealthFactor(this.valuation(loan), this.liquidationThreshold(creditScore));
  }

  /** 0 when healthy, the partial close factor in (fullLiquidationHF, 1], 1 at or below it. */
  closeFactor(healthFactor: number): number {
    if (healthFactor > 1) return 0;
    if (healthFactor > this.params.fullLiquidationHealthFactor) return this.params.partialCloseFactor;
    return 1;
  }

  assess(loan: Loan, creditScore: number): RiskAssessment {
    const valuation = this.valuation(loan);
    const liquidationThreshold = this.liquidationThreshold(creditScore);
    const healthFactor = computeHealthFactor(valuation, liquidationThreshold);
    const closeFactor = isActive(loan) ? this.closeFactor(healthFactor) : 0;
    const liquidationBlock = this.liquidationBlock(loan, valuation, closeFactor);

    return {
      loanId: loan.loanId,
      ...valuation,
      healthFactor,
      liquidationThreshold,
      maxLoanToValue: this.maxLoanToValue(creditScore),
      liquidatable: liquidationBlock === null,
      liquidationBlock,
      closeFactor,
      maxLiquidatable: liquidationBlock === null ? roundAmount(totalDebt(loan) * closeFactor) : 0,
      borrowCapacity: isActive(loan) ? this.borrowCapacity(shapeOf(loan), creditScore) : 0,
      severity: classifyHealth(healthFactor),
    };
  }

  /**
   * Gate for opening or growing a loan: the resulting debt value may not
   * exceed the credit-adjusted max loan-to-value of the collateral value.
   */
  assertBorrowAllowed(position: PositionShape, creditScore: number): void {
    const { collateralValue, debtValue } = this.value(position);
    const maxLtv = this.maxLoanToValue(creditScore);

    if (collateralValue <= 0 || debtValue - collateralValue * maxLtv > AMOUNT_EPSILON) {
      throw new DomainError(
        ErrorCode.ExceedsMaxBorrow,
        422,
        `Borrow would raise loan-to-value above ${maxLtv}.`,
        {
          collateralValue,
          debtValue,
          loanToValue: collateralValue > 0 ? debtValue / collateralValue : null,
          maxLoanToValue: maxLtv,
        },
      );
    }
  }

  /** Additional debt-asset units the position could take on right now. */
  borrowCapacity(position: PositionShape, creditScore: number): number {
    const { collateralValue, debtValue } = this.value(position);
    const headroom = collateralValue * this.maxLoanToValue(creditScore) - debtValue;
    if (headroom <= 0) return 0;
    return roundAmount(headroom / this.prices.getPrice(position.debtAssetId));
  }

  private liquidationBlock(loan: Loan, valuation: LoanValuation, closeFactor: number): LiquidationBlock | null {
    if (!isActive(loan)) return 'closed';
    if (closeFactor === 0) return 'healthy';
    if (loan.collateralAmount <= 0) return 'no_collateral';
    // A full close ends the loan, which counts as an improvement.
    if (closeFactor < 1 && !partialLiquidationImproves(valuation, this.params.liquidationBonus)) {
      return 'not_improving';
    }
    return null;
  }

  /**
   * Lazily yields the ids of active loans whose health factor is at or below 1.
   * Nothing is cached: each call starts a fresh pass over `loans`.
   */
  *findBadLoans(loans: Iterable<Loan>, scoreOf: (userId: UserId) => number): Generator<LoanId, void, undefined> {
    for (const loan of loans) {
      if (!isActive(loan)) continue;
      if (this.healthFactor(loan, scoreOf(loan.borrowerId)) <= 1) {
        yield loan.loanId;
      }
    }
  }
}

export const shapeOf = (loan: Loan): PositionShape => ({
  collateralAssetId: loan.collateralAssetId,
  collateralAmount: loan.collateralAmount,
  debtAssetId: loan.debtAssetId,
  debt: totalDebt(loan),
});
