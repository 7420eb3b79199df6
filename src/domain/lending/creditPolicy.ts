import fs from 'node:fs/promises';
import { z } from 'zod';

const scoreTierSchema = z.object({
  minScore: z.number().int().nonnegative(),
  /** Added to both the liquidation threshold and the max loan-to-value. */
  thresholdBonus: z.number().min(0).max(0.5),
  /** Subtracted from the annual borrow rate. */
  interestDiscount: z.number().min(0).max(1),
});

const repaymentTierSchema = z.object({
  maxRemainingFraction: z.number().min(0).max(1),
  points: z.number().int().positive(),
});

export const creditPolicySchema = z.object({
  scoreTiers: z.array(scoreTierSchema),
  repaymentTiers: z.array(repaymentTierSchema).min(1),
});

export type CreditPolicy = z.infer<typeof creditPolicySchema>;
export type ScoreTier = z.infer<typeof scoreTierSchema>;
export type RepaymentTier = z.infer<typeof repaymentTierSchema>;

export interface CreditAdjustment {
  tier: number | null;
  thresholdBonus: number;
  interestDiscount: number;
}

export const DEFAULT_CREDIT_POLICY: CreditPolicy = {
  scoreTiers: [
    { minScore: 100, thresholdBonus: 0.05, interestDiscount: 0.01 },
    { minScore: 200, thresholdBonus: 0.1, interestDiscount: 0.02 },
    { minScore: 300, thresholdBonus: 0.15, interestDiscount: 0.03 },
  ],
  repaymentTiers: [
    { maxRemainingFraction: 0.75, points: 5 },
    { maxRemainingFraction: 0.5, points: 5 },
    { maxRemainingFraction: 0.25, points: 5 },
    { maxRemainingFraction: 0, points: 5 },
  ],
};

/** Highest score tier the user has reached; no tier below the first threshold. */
export const creditAdjustment = (policy: CreditPolicy, creditScore: number): CreditAdjustment => {
  let match: CreditAdjustment = { tier: null, thresholdBonus: 0, interestDiscount: 0 };
  for (const tier of policy.scoreTiers) {
    if (creditScore >= tier.minScore && (match.tier === null || tier.minScore >= match.tier)) {
      match = { tier: tier.minScore, thresholdBonus: tier.thresholdBonus, interestDiscount: tier.interestDiscount };
    }
  }
  return match;
};

export const parseCreditPolicy = (raw: unknown): CreditPolicy => {
  const parsed = creditPolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid credit policy: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
  }
  return parsed.data;
};

/** Reads the policy file; a missing file means the built-in defaults. */
export async function loadCreditPolicy(filePath: string): Promise<CreditPolicy> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return DEFAULT_CREDIT_POLICY;
    throw error;
  }
  return parseCreditPolicy(JSON.parse(raw));
}
