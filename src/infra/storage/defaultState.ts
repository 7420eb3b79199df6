import type { LedgerState } from '../../domain/lending/lendingTypes.js';

export const createDefaultState = (): LedgerState => ({
  pools: {},
  users: {},
  loans: {},
  apiKeys: {},
});
