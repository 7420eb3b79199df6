// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the lending API SDK.
// These mirror the API responses but are decoupled from internal server types.
// Health factors that are infinite on the server arrive as `null`.
// ────────────────────────────────────────────────────────────────────────────

export type LoanStatus = 'Open' | 'PartiallyLiquidated' | 'Closed';
export type HealthSeverity = 'SAFE' | 'WARNING' | 'CRITICAL';
export type LiquidationBlock = 'closed' | 'healthy' | 'no_collateral' | 'not_improving';
export type ConvertDirection = 'to_collateral' | 'to_deposit';

// ─── Pools & prices ────────────────────────────────────────────────────────

export interface Pool {
  assetId: string;
  totalSupply: number;
  totalBorrowed: number;
  totalReserves: number;
  totalCollateral: number;
  reserveFactor: number;
  liquidityIndex: number;
  borrowIndex: number;
  lastUpdateTimestamp: number;
  createdAt: string;
  utilization: number;
  borrowRate: number;
  supplyRate: number;
  availableLiquidity: number;
}

export interface CreatePoolOpts {
  assetId: string;
  reserveFactor?: number;
}

// ─── Users ─────────────────────────────────────────────────────────────────

export interface RegisterUserResponse {
  userId: string;
  apiKey: string;
}

export interface RepaymentEvent {
  loanId: string;
  assetId: string;
  amount: number;
  source: 'repay' | 'liquidation';
  remainingDebt: number;
  remainingFraction: number;
  scoreAwarded: number;
  timestamp: number;
}

export interface CreditRecord {
  userId: string;
  deposits: Record<string, number>;
  collateral: Record<string, number>;
  loanIds: string[];
  creditScore: number;
  repaymentHistory: RepaymentEvent[];
  paidOff: number;
  defaults: number;
  createdAt: string;
}

export interface BalanceChange {
  userId: string;
  assetId: string;
  amount: number;
  balance: number;
}

// ─── Loans ─────────────────────────────────────────────────────────────────

export interface OpenLoanInput {
  collateralAssetId: string;
  collateralAmount: number;
  debtAssetId: string;
  amount: number;
}

export interface Loan {
  loanId: string;
  borrowerId: string;
  holderId: string;
  collateralAssetId: string;
  collateralAmount: number;
  debtAssetId: string;
  principal: number;
  accruedInterest: number;
  originalPrincipal: number;
  interestRateAtOrigination: number;
  borrowIndexSnapshot: number;
  lastUpdateTimestamp: number;
  creditTiersAwarded: number[];
  status: LoanStatus;
  createdAt: string;
  updatedAt: string;
}

export interface LoanHealth {
  loanId: string;
  collateralValue: number;
  debtValue: number;
  healthFactor: number | null;
  liquidationThreshold: number;
  maxLoanToValue: number;
  liquidatable: boolean;
  liquidationBlock: LiquidationBlock | null;
  closeFactor: number;
  maxLiquidatable: number;
  borrowCapacity: number;
  severity: HealthSeverity;
}

export interface RepayResult {
  loan: Loan;
  repaid: number;
  interestPaid: number;
  principalPaid: number;
  closed: boolean;
  credit: RepaymentEvent;
}

export interface LiquidationResult {
  loanId: string;
  liquidatorId: string;
  repayAmount: number;
  interestRepaid: number;
  principalRepaid: number;
  collateralSeized: number;
  healthFactorBefore: number | null;
  healthFactorAfter: number | null;
  remainingDebt: number;
  status: LoanStatus;
  shortfall: { code: string; missingCollateral: number; uncoveredDebt: number } | null;
  credit: RepaymentEvent;
}

// ─── Monitor ───────────────────────────────────────────────────────────────

export interface LiquidationAlert {
  id: string;
  loanId: string;
  borrowerId: string;
  severity: HealthSeverity;
  healthFactor: number;
  suggestedAction: string;
  createdAt: string;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: string;
  env: string;
  pools: number;
  monitorRunning: boolean;
  uptimeSeconds: number;
  processPid: number;
}

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
