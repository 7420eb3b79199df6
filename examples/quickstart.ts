#!/usr/bin/env npx tsx
// ─── Lending API — SDK Quick-Start ─────────────────────────────────────────
// Full flow: create pools → set prices → supply → post collateral → borrow → repay
//
// Usage:
//   npx tsx examples/quickstart.ts                          # uses localhost:8787
//   API_URL=http://host:8787 ADMIN_KEY=... npx tsx examples/quickstart.ts
// ────────────────────────────────────────────────────────────────────────────

import { LendingAPIClient, LendingAPIError } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';
const ADMIN_KEY = process.env.ADMIN_KEY ?? 'change-me';

async function main(): Promise<void> {
  console.log(`\nLending SDK quick-start against ${API_URL}\n`);

  const admin = new LendingAPIClient({ baseUrl: API_URL, adminKey: ADMIN_KEY });
  const health = await admin.health();
  console.log(`Health: ${health.status} | pools=${health.pools}`);

  // ── 1. Pools and prices ───────────────────────────────────────────────
  for (const assetId of ['USDC', 'ETH']) {
    try {
      await admin.createPool({ assetId });
    } catch (error) {
      if (!(error instanceof LendingAPIError && error.code === 'pool_exists')) throw error;
    }
  }
  await admin.setPrice('USDC', 1);
  await admin.setPrice('ETH', 2_000);
  console.log('Pools ready: USDC @ $1, ETH @ $2,000');

  // ── 2. A lender supplies USDC ─────────────────────────────────────────
  const lenderKeys = await admin.registerUser();
  const lender = admin.withApiKey(lenderKeys.apiKey);
  await lender.deposit('USDC', 50_000);
  console.log(`Lender ${lenderKeys.userId} supplied 50,000 USDC`);

  // ── 3. A borrower posts ETH and borrows USDC ──────────────────────────
  const borrowerKeys = await admin.registerUser();
  const borrower = admin.withApiKey(borrowerKeys.apiKey);
  await borrower.depositCollateral('ETH', 10);

  const loan = await borrower.borrow({
    collateralAssetId: 'ETH',
    collateralAmount: 10,
    debtAssetId: 'USDC',
    amount: 12_000,
  });
  const health1 = await borrower.getLoanHealth(loan.loanId);
  console.log(`Loan ${loan.loanId}: 12,000 USDC against 10 ETH, health factor ${health1.healthFactor}`);

  // ── 4. Going past max loan-to-value is refused ────────────────────────
  try {
    await borrower.borrowMore(loan.loanId, 5_000);
  } catch (error) {
    if (error instanceof LendingAPIError) {
      console.log(`Borrow refused as expected: ${error.code}`);
    } else {
      throw error;
    }
  }

  // ── 5. Repay in full ──────────────────────────────────────────────────
  const current = await borrower.getLoan(loan.loanId);
  const result = await borrower.repay(loan.loanId, current.principal + current.accruedInterest + 1);
  const record = await borrower.getCreditRecord(borrowerKeys.userId);
  console.log(`Repaid ${result.repaid}; loan ${result.loan.status}; credit score ${record.creditScore}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
