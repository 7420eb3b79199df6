// Lending API SDK entry point
export { LendingAPIClient, LendingAPIError } from './client.js';
export type { LendingAPIClientOptions } from './client.js';
export type {
  // Core unions
  LoanStatus,
  HealthSeverity,
  LiquidationBlock,
  ConvertDirection,

  // Pools
  Pool,
  CreatePoolOpts,

  // Users
  RegisterUserResponse,
  RepaymentEvent,
  CreditRecord,
  BalanceChange,

  // Loans
  OpenLoanInput,
  Loan,
  LoanHealth,
  RepayResult,
  LiquidationResult,

  // Monitor
  LiquidationAlert,

  // System
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
