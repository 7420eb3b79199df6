/** Amounts are kept at 8 decimal places, like every other figure the ledger stores. */
export const AMOUNT_DECIMALS = 8;

/** Two amounts closer than this are the same amount. */
export const AMOUNT_EPSILON = 1e-8;

export const roundAmount = (value: number): number => Number(value.toFixed(AMOUNT_DECIMALS));

export const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

export const isDust = (value: number): boolean => Math.abs(value) < AMOUNT_EPSILON;
