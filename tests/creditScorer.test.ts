import { describe, expect, it } from 'vitest';
import { DEFAULT_CREDIT_POLICY } from '../src/domain/lending/creditPolicy.js';
import { CreditScorer } from '../src/domain/lending/creditScorer.js';
import type { CreditRecord, Loan } from '../src/domain/lending/lendingTypes.js';
import { T0, makeLoan } from './helpers.js';

const makeRecord = (creditScore = 0): CreditRecord => ({
  userId: 'borrower-1',
  deposits: {},
  collateral: {},
  loanIds: ['loan-1'],
  creditScore,
  repaymentHistory: [],
  paidOff: 0,
  defaults: 0,
  createdAt: '2024-01-01T00:00:00.000Z',
});

const payDownTo = (loan: Loan, principal: number): void => {
  loan.principal = principal;
  loan.accruedInterest = 0;
};

describe('CreditScorer', () => {
  const scorer = new CreditScorer(DEFAULT_CREDIT_POLICY, 1_000);

  it('awards nothing until the first tier is reached', () => {
    const record = makeRecord();
    const loan = makeLoan({ principal: 1_000, originalPrincipal: 1_000 });

    payDownTo(loan, 800);
    const event = scorer.onRepayment(record, loan, { assetId: 'USDC', amount: 200, source: 'repay', now: T0 });

    expect(event).toEqual({
      loanId: 'loan-1',
      assetId: 'USDC',
      amount: 200,
      source: 'repay',
      remainingDebt: 800,
      remainingFraction: 0.8,
      scoreAwarded: 0,
      timestamp: T0,
    });
    expect(record.creditScore).toBe(0);
    expect(record.repaymentHistory).toHaveLength(1);
  });

  it('pays every tier crossed by one repayment, each only once per loan', () => {
    const record = makeRecord();
    const loan = makeLoan({ principal: 1_000, originalPrincipal: 1_000 });

    payDownTo(loan, 500);
    expect(scorer.onRepayment(record, loan, { assetId: 'USDC', amount: 500, source: 'repay', now: T0 }).scoreAwarded).toBe(10);
    expect(loan.creditTiersAwarded).toEqual([0, 1]);

    expect(scorer.onRepayment(record, loan, { assetId: 'USDC', amount: 0.5, source: 'repay', now: T0 }).scoreAwarded).toBe(0);

    payDownTo(loan, 0);
    expect(scorer.onRepayment(record, loan, { assetId: 'USDC', amount: 500, source: 'liquidation', now: T0 }).scoreAwarded).toBe(10);
    expect(record.creditScore).toBe(20);
    expect(record.repaymentHistory.map((event) => event.source)).toEqual(['repay', 'repay', 'liquidation']);
  });

  it('counts tiers separately for each loan', () => {
    const record = makeRecord();
    const first = makeLoan({ loanId: 'loan-a', principal: 0, originalPrincipal: 100 });
    const second = makeLoan({ loanId: 'loan-b', principal: 0, originalPrincipal: 100 });

    scorer.onRepayment(record, first, { assetId: 'USDC', amount: 100, source: 'repay', now: T0 });
    scorer.onRepayment(record, second, { assetId: 'USDC', amount: 100, source: 'repay', now: T0 });

    expect(record.creditScore).toBe(40);
  });

  it('caps the score at the configured maximum', () => {
    const capped = new CreditScorer(DEFAULT_CREDIT_POLICY, 12);
    const record = makeRecord(10);
    const loan = makeLoan({ principal: 0, originalPrincipal: 100 });

    const event = capped.onRepayment(record, loan, { assetId: 'USDC', amount: 100, source: 'repay', now: T0 });

    expect(record.creditScore).toBe(12);
    expect(event.scoreAwarded).toBe(2);
  });

  it('never lowers a score that already sits above the cap', () => {
    const capped = new CreditScorer(DEFAULT_CREDIT_POLICY, 12);
    const record = makeRecord(50);
    const loan = makeLoan({ principal: 0, originalPrincipal: 100 });

    capped.onRepayment(record, loan, { assetId: 'USDC', amount: 100, source: 'repay', now: T0 });

    expect(record.creditScore).toBe(50);
  });

  it('measures remaining debt against the original principal', () => {
    expect(scorer.remainingFraction(makeLoan({ principal: 250, accruedInterest: 50, originalPrincipal: 1_000 }))).toBe(0.3);
    expect(scorer.remainingFraction(makeLoan({ originalPrincipal: 0 }))).toBe(0);
  });
});
