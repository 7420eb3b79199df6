import { DomainError, ErrorCode, invalidAmount } from '../../errors/taxonomy.js';
import { AMOUNT_EPSILON, isDust, roundAmount } from '../../utils/math.js';
import type { Loan, LoanStatus, Pool } from './lendingTypes.js';
import { totalDebt } from './lendingTypes.js';
import { applyRepayment } from './loanAccounting.js';
import type { PoolLedger } from './poolLedger.js';
import type { PriceFeed } from './priceFeed.js';
import { type RiskEngine, computeHealthFactor } from './riskEngine.js';

export interface LiquidationRequest {
  /** Accrued to `now` by the caller. */
  loan: Loan;
  debtPool: Pool;
  collateralPool: Pool;
  creditScore: number;
  repayAmount: number;
  now: number;
}

export interface SeizureShortfall {
  code: typeof ErrorCode.PartialSeizureShortfall;
  /** Collateral the bonus formula called for but the loan did not hold. */
  missingCollateral: number;
  /** Debt left on the loan with no collateral behind it. */
  uncoveredDebt: number;
}

export interface LiquidationOutcome {
  loanId: string;
  repayAmount: number;
  interestRepaid: number;
  principalRepaid: number;
  collateralSeized: number;
  healthFactorBefore: number;
  healthFactorAfter: number;
  remainingDebt: number;
  status: LoanStatus;
  shortfall: SeizureShortfall | null;
}

/**
 * Applies a liquidator's repayment to an unhealthy loan and seizes
 * collateral worth the repaid value plus the liquidation bonus.
 */
export class LiquidationEngine {
  constructor(
    private readonly risk: RiskEngine,
    private readonly prices: PriceFeed,
    private readonly ledger: PoolLedger,
  ) {}

  execute(request: LiquidationRequest): LiquidationOutcome {
    const { loan, debtPool, collateralPool, creditScore, repayAmount, now } = request;

    if (!Number.isFinite(repayAmount) || repayAmount <= 0) throw invalidAmount(repayAmount);

    const before = this.risk.assess(loan, creditScore);
    switch (before.liquidationBlock) {
      case 'closed':
        throw new DomainError(ErrorCode.NotLiquidatable, 409, `Loan '${loan.loanId}' is closed.`, { loanId: loan.loanId });
      case 'healthy':
        throw new DomainError(
          ErrorCode.NotLiquidatable,
          422,
          `Loan '${loan.loanId}' has health factor ${before.healthFactor}; only loans at or below 1 can be liquidated.`,
          { loanId: loan.loanId, healthFactor: before.healthFactor },
        );
      case 'no_collateral':
        throw new DomainError(
          ErrorCode.NotLiquidatable,
          422,
          `Loan '${loan.loanId}' has no collateral left to seize.`,
          { loanId: loan.loanId, remainingDebt: totalDebt(loan) },
        );
      case 'not_improving':
        throw new DomainError(
          ErrorCode.LiquidationNotImproving,
          422,
          `Loan '${loan.loanId}' at health factor ${before.healthFactor} holds too little collateral to pay the `
            + 'liquidation bonus, so no partial liquidation can raise its health factor.',
          {
            loanId: loan.loanId,
            healthFactorBefore: before.healthFactor,
            collateralValue: before.collateralValue,
            debtValue: before.debtValue,
            liquidationBonus: this.risk.liquidationBonus,
          },
        );
      case null:
        break;
    }
    if (repayAmount - before.maxLiquidatable > AMOUNT_EPSILON) {
      throw new DomainError(
        ErrorCode.ExceedsLiquidationLimit,
        422,
        `Repay amount ${repayAmount} exceeds the ${before.closeFactor * 100}% limit of ${before.maxLiquidatable}.`,
        {
          loanId: loan.loanId,
          repayAmount,
          maxLiquidatable: before.maxLiquidatable,
          closeFactor: before.closeFactor,
          healthFactor: before.healthFactor,
        },
      );
    }

    const repay = Math.min(repayAmount, totalDebt(loan));
    const priceDebt = this.prices.getPrice(loan.debtAssetId);
    const priceCollateral = this.prices.getPrice(loan.collateralAssetId);
    const computedSeizure = roundAmount(((repay * priceDebt) / priceCollateral) * (1 + this.risk.liquidationBonus));
    const collateralSeized = Math.min(computedSeizure, loan.collateralAmount);
    const missingCollateral = roundAmount(computedSeizure - collateralSeized);

    const remainingDebt = roundAmount(totalDebt(loan) - repay);
    const remainingCollateral = roundAmount(loan.collateralAmount - collateralSeized);
    const healthFactorAfter = isDust(remainingDebt)
      ? Number.POSITIVE_INFINITY
      : computeHealthFactor(
        { collateralValue: remainingCollateral * priceCollateral, debtValue: remainingDebt * priceDebt },
        before.liquidationThreshold,
      );

    if (missingCollateral <= 0 && !(healthFactorAfter > before.healthFactor)) {
      throw new DomainError(
        ErrorCode.LiquidationNotImproving,
        422,
        `Liquidating ${repay} would leave loan '${loan.loanId}' at health factor ${healthFactorAfter}, `
          + `not above ${before.healthFactor}.`,
        {
          loanId: loan.loanId,
          healthFactorBefore: before.healthFactor,
          healthFactorAfter,
        },
      );
    }

    const { interestPaid, principalPaid } = applyRepayment(loan, repay);
    if (isDust(totalDebt(loan))) {
      loan.principal = 0;
      loan.accruedInterest = 0;
    }
    loan.collateralAmount = remainingCollateral;
    loan.status = totalDebt(loan) === 0 ? 'Closed' : 'PartiallyLiquidated';

    this.ledger.repay(debtPool, repay, now);
    if (collateralSeized > 0) {
      this.ledger.releaseCollateral(collateralPool, collateralSeized, now);
    }

    return {
      loanId: loan.loanId,
      repayAmount: repay,
      interestRepaid: interestPaid,
      principalRepaid: principalPaid,
      collateralSeized,
      healthFactorBefore: before.healthFactor,
      healthFactorAfter,
      remainingDebt: totalDebt(loan),
      status: loan.status,
      shortfall: missingCollateral > 0
        ? {
          code: ErrorCode.PartialSeizureShortfall,
          missingCollateral,
          uncoveredDebt: remainingCollateral <= 0 ? totalDebt(loan) : 0,
        }
        : null,
    };
  }
}
