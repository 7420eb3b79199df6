import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

export const config = {
  app: {
    name: 'collateral-lending-core',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
    adminKey: process.env.ADMIN_KEY ?? 'change-me',
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'ledger.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
    creditPolicyFile: process.env.CREDIT_POLICY_FILE ?? path.resolve(process.cwd(), 'config', 'credit-policy.json'),
  },
  protocol: {
    maxLoanToValue: parseNumber(process.env.PROTOCOL_MAX_LTV, 0.75),
    liquidationThreshold: parseNumber(process.env.PROTOCOL_LIQUIDATION_THRESHOLD, 0.8),
    /** Upper bound on a credit-adjusted liquidation threshold. */
    maxLiquidationThreshold: parseNumber(process.env.PROTOCOL_MAX_LIQUIDATION_THRESHOLD, 0.95),
    liquidationBonus: parseNumber(process.env.PROTOCOL_LIQUIDATION_BONUS, 0.05),
    /** At or below this health factor a liquidator may repay the whole debt. */
    fullLiquidationHealthFactor: parseNumber(process.env.PROTOCOL_FULL_LIQUIDATION_HF, 0.5),
    partialCloseFactor: parseNumber(process.env.PROTOCOL_PARTIAL_CLOSE_FACTOR, 0.5),
    defaultReserveFactor: parseNumber(process.env.PROTOCOL_RESERVE_FACTOR, 0.1),
  },
  interestRate: {
    baseRate: parseNumber(process.env.IRM_BASE_RATE, 0.02),
    optimalUtilization: parseNumber(process.env.IRM_OPTIMAL_UTILIZATION, 0.8),
    rateAtOptimal: parseNumber(process.env.IRM_RATE_AT_OPTIMAL, 0.1),
    maxRate: parseNumber(process.env.IRM_MAX_RATE, 1),
  },
  credit: {
    maxCreditScore: parseNumber(process.env.CREDIT_MAX_SCORE, 1000),
  },
  monitor: {
    enabled: parseBool(process.env.LIQUIDATION_MONITOR_ENABLED, false),
    scanIntervalMs: parseNumber(process.env.LIQUIDATION_SCAN_INTERVAL_MS, 60000),
  },
};

export type AppConfig = typeof config;
