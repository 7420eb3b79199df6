import { compoundFactor } from './interestRateModel.js';
import type { Loan, Pool } from './lendingTypes.js';
import { totalDebt } from './lendingTypes.js';
import type { PoolLedger } from './poolLedger.js';
import { roundAmount } from '../../utils/math.js';

export interface RepaymentSplit {
  interestPaid: number;
  principalPaid: number;
}

/**
 * Brings a loan's interest up to `now`. The debt pool is accrued first; the
 * loan then grows by the pool's borrow-index ratio since its last touch, less
 * the borrower's credit discount. The part of the pool's booked interest the
 * discount forgives is handed back to the pool as a rebate.
 */
export function accrueLoan(
  loan: Loan,
  debtPool: Pool,
  ledger: PoolLedger,
  interestDiscount: number,
  now: number,
): number {
  ledger.accrueIndices(debtPool, now);

  const owed = totalDebt(loan);
  const elapsed = Math.max(0, now - loan.lastUpdateTimestamp);
  let interest = 0;

  if (loan.status !== 'Closed' && owed > 0 && debtPool.borrowIndex > loan.borrowIndexSnapshot) {
    const growth = debtPool.borrowIndex / loan.borrowIndexSnapshot;
    const discounted = Math.max(1, growth * compoundFactor(-interestDiscount, elapsed));
    interest = roundAmount(owed * (discounted - 1));
    const booked = roundAmount(owed * (growth - 1));
    ledger.absorbRebate(debtPool, booked - interest);
    loan.accruedInterest = roundAmount(loan.accruedInterest + interest);
  }

  loan.borrowIndexSnapshot = debtPool.borrowIndex;
  loan.lastUpdateTimestamp = Math.max(loan.lastUpdateTimestamp, now);
  return interest;
}

/** Interest first, then principal. `amount` must not exceed the debt. */
export function applyRepayment(loan: Loan, amount: number): RepaymentSplit {
  const interestPaid = Math.min(amount, loan.accruedInterest);
  const principalPaid = Math.min(amount - interestPaid, loan.principal);

  loan.accruedInterest = roundAmount(loan.accruedInterest - interestPaid);
  loan.principal = roundAmount(loan.principal - principalPaid);

  return { interestPaid: roundAmount(interestPaid), principalPaid: roundAmount(principalPaid) };
}
