export type AssetId = string;
export type UserId = string;
export type LoanId = string;

export type LoanStatus = 'Open' | 'PartiallyLiquidated' | 'Closed';

export type HealthSeverity = 'SAFE' | 'WARNING' | 'CRITICAL';

/**
 * Aggregate ledger for one asset. `totalSupply` and `totalBorrowed` include
 * accrued interest; `totalReserves` is the protocol's share and is part of
 * `totalSupply`. Posted collateral sits in `totalCollateral` and is never lent out.
 */
export interface Pool {
  assetId: AssetId;
  totalSupply: number;
  totalBorrowed: number;
  totalReserves: number;
  totalCollateral: number;
  reserveFactor: number;
  liquidityIndex: number;
  borrowIndex: number;
  /** Unix seconds. */
  lastUpdateTimestamp: number;
  createdAt: string;
}

export type RepaymentSource = 'repay' | 'liquidation';

export interface RepaymentEvent {
  loanId: LoanId;
  assetId: AssetId;
  amount: number;
  source: RepaymentSource;
  remainingDebt: number;
  /** Remaining debt over the loan's original principal. */
  remainingFraction: number;
  scoreAwarded: number;
  timestamp: number;
}

/**
 * Permanent per-user record. `deposits` hold balances scaled by the pool's
 * liquidity index at the time of each deposit; `collateral` holds collateral
 * that is posted but not pledged to a loan.
 */
export interface CreditRecord {
  userId: UserId;
  deposits: Record<AssetId, number>;
  collateral: Record<AssetId, number>;
  loanIds: LoanId[];
  creditScore: number;
  repaymentHistory: RepaymentEvent[];
  paidOff: number;
  defaults: number;
  createdAt: string;
}

export interface Loan {
  loanId: LoanId;
  borrowerId: UserId;
  /** Current holder of the loan document; gates holder-only operations. */
  holderId: UserId;
  collateralAssetId: AssetId;
  collateralAmount: number;
  debtAssetId: AssetId;
  principal: number;
  accruedInterest: number;
  /** Principal at origination plus any later borrows against this loan. */
  originalPrincipal: number;
  interestRateAtOrigination: number;
  /** Debt pool borrow index when interest was last accrued. */
  borrowIndexSnapshot: number;
  /** Unix seconds. */
  lastUpdateTimestamp: number;
  /** Indexes into the repayment tier table that have already paid out. */
  creditTiersAwarded: number[];
  status: LoanStatus;
  createdAt: string;
  updatedAt: string;
}

export interface TransferInstruction {
  assetId: AssetId;
  amount: number;
  from: string;
  to: string;
  reason: string;
}

export interface LedgerState {
  pools: Record<AssetId, Pool>;
  users: Record<UserId, CreditRecord>;
  loans: Record<LoanId, Loan>;
  /** apiKey → userId */
  apiKeys: Record<string, UserId>;
}

export interface LiquidationAlert {
  id: string;
  loanId: LoanId;
  borrowerId: UserId;
  severity: HealthSeverity;
  healthFactor: number;
  suggestedAction: string;
  createdAt: string;
}

export const supplyVault = (assetId: AssetId): string => `pool:${assetId}:supply`;
export const collateralVault = (assetId: AssetId): string => `pool:${assetId}:collateral`;

export const totalDebt = (loan: Pick<Loan, 'principal' | 'accruedInterest'>): number => (
  loan.principal + loan.accruedInterest
);

export const isActive = (loan: Loan): boolean => loan.status !== 'Closed';

export const classifyHealth = (healthFactor: number): HealthSeverity => {
  if (healthFactor > 1) return 'SAFE';
  if (healthFactor > 0.5) return 'WARNING';
  return 'CRITICAL';
};
