export const isoNow = (): string => new Date().toISOString();

/** Unix time in whole seconds. */
export const unixNow = (): number => Math.floor(Date.now() / 1000);

export const SECONDS_PER_YEAR = 365 * 24 * 60 * 60;
