import { AMOUNT_EPSILON, roundAmount } from '../../utils/math.js';
import type { CreditPolicy } from './creditPolicy.js';
import type { AssetId, CreditRecord, Loan, RepaymentEvent, RepaymentSource } from './lendingTypes.js';
import { totalDebt } from './lendingTypes.js';

export interface RepaymentInput {
  assetId: AssetId;
  amount: number;
  source: RepaymentSource;
  now: number;
}

/**
 * Raises a borrower's score as a loan is paid down. Each tier of the
 * repayment table pays out at most once per loan, so splitting one repayment
 * into many small ones earns nothing extra. Scores never go down.
 */
export class CreditScorer {
  constructor(
    private readonly policy: CreditPolicy,
    private readonly maxCreditScore: number,
  ) {}

  remainingFraction(loan: Loan): number {
    if (loan.originalPrincipal <= 0) return 0;
    return totalDebt(loan) / loan.originalPrincipal;
  }

  onRepayment(record: CreditRecord, loan: Loan, input: RepaymentInput): RepaymentEvent {
    const fraction = this.remainingFraction(loan);
    let points = 0;

    this.policy.repaymentTiers.forEach((tier, index) => {
      if (loan.creditTiersAwarded.includes(index)) return;
      if (fraction <= tier.maxRemainingFraction + AMOUNT_EPSILON) {
        loan.creditTiersAwarded.push(index);
        points += tier.points;
      }
    });

    const previous = record.creditScore;
    const next = Math.max(previous, Math.min(this.maxCreditScore, previous + points));
    record.creditScore = next;

    const event: RepaymentEvent = {
      loanId: loan.loanId,
      assetId: input.assetId,
      amount: roundAmount(input.amount),
      source: input.source,
      remainingDebt: totalDebt(loan),
      remainingFraction: Number(fraction.toFixed(8)),
      scoreAwarded: next - previous,
      timestamp: input.now,
    };
    record.repaymentHistory.push(event);

    return event;
  }
}
