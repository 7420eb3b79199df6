/**
 * Kinked utilization curve.
 *
 *   rate
 *    │                      ╱ maxRate
 *    │                    ╱
 *    │          ________╱ rateAtOptimal
 *    │  ______╱
 *    │ baseRate
 *    └─────────────────┬──────── utilization
 *                      U*
 *
 * Continuous and piecewise-linear, so the rate never jumps as utilization moves.
 */

import { SECONDS_PER_YEAR } from '../../utils/time.js';
import { clamp } from '../../utils/math.js';

export interface InterestRateParams {
  baseRate: number;
  optimalUtilization: number;
  rateAtOptimal: number;
  maxRate: number;
}

export interface RateQuote {
  utilization: number;
  borrowRate: number;
  supplyRate: number;
}

export class InterestRateModel {
  constructor(private readonly params: InterestRateParams) {
    const { baseRate, optimalUtilization, rateAtOptimal, maxRate } = params;
    if (!(optimalUtilization > 0 && optimalUtilization < 1)) {
      throw new Error(`optimalUtilization must be in (0, 1), got ${optimalUtilization}`);
    }
    if (!(baseRate >= 0 && baseRate <= rateAtOptimal && rateAtOptimal <= maxRate)) {
      throw new Error('Interest curve must satisfy 0 <= baseRate <= rateAtOptimal <= maxRate.');
    }
  }

  get parameters(): InterestRateParams {
    return { ...this.params };
  }

  /** Annual borrow rate at the given utilization (clamped to [0, 1]). */
  borrowRate(utilization: number): number {
    const { baseRate, optimalUtilization, rateAtOptimal, maxRate } = this.params;
    const u = Number.isFinite(utilization) ? clamp(utilization, 0, 1) : 0;

    if (u <= optimalUtilization) {
      return baseRate + (rateAtOptimal - baseRate) * (u / optimalUtilization);
    }

    const excess = (u - optimalUtilization) / (1 - optimalUtilization);
    return rateAtOptimal + (maxRate - rateAtOptimal) * excess;
  }

  supplyRate(utilization: number, reserveFactor: number): number {
    const u = Number.isFinite(utilization) ? clamp(utilization, 0, 1) : 0;
    return this.borrowRate(u) * u * (1 - reserveFactor);
  }

  quote(utilization: number, reserveFactor: number): RateQuote {
    return {
      utilization,
      borrowRate: this.borrowRate(utilization),
      supplyRate: this.supplyRate(utilization, reserveFactor),
    };
  }
}

/**
 * Growth factor of an annual rate compounded every second over `elapsedSeconds`.
 * Negative rates shrink the factor, which is how rate discounts are applied.
 */
export const compoundFactor = (annualRate: number, elapsedSeconds: number): number => {
  if (elapsedSeconds <= 0 || annualRate === 0) return 1;
  return (1 + annualRate / SECONDS_PER_YEAR) ** elapsedSeconds;
};
