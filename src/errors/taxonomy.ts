export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidAmount: 'invalid_amount',
  Unauthorized: 'unauthorized',
  UnknownAsset: 'unknown_asset',
  UnknownLoan: 'unknown_loan',
  UnknownUser: 'unknown_user',
  PoolExists: 'pool_exists',
  InsufficientLiquidity: 'insufficient_liquidity',
  InsufficientBalance: 'insufficient_balance',
  InsufficientCollateral: 'insufficient_collateral',
  ExceedsMaxBorrow: 'exceeds_max_borrow',
  NotLoanHolder: 'not_loan_holder',
  LoanClosed: 'loan_closed',
  NotLiquidatable: 'not_liquidatable',
  ExceedsLiquidationLimit: 'exceeds_liquidation_limit',
  LiquidationNotImproving: 'liquidation_not_improving',
  PartialSeizureShortfall: 'partial_seizure_shortfall',
  CustodyRejected: 'custody_rejected',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const unknownAsset = (assetId: string): DomainError => (
  new DomainError(ErrorCode.UnknownAsset, 404, `Asset '${assetId}' has no pool or price.`, { assetId })
);

export const unknownLoan = (loanId: string): DomainError => (
  new DomainError(ErrorCode.UnknownLoan, 404, `Loan '${loanId}' not found.`, { loanId })
);

export const unknownUser = (userId: string): DomainError => (
  new DomainError(ErrorCode.UnknownUser, 404, `User '${userId}' not found.`, { userId })
);

export const invalidAmount = (amount: number): DomainError => (
  new DomainError(ErrorCode.InvalidAmount, 400, 'Amount must be a positive, finite number.', { amount })
);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
