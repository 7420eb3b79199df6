import { v4 as uuid } from 'uuid';
import type { AppConfig } from '../config.js';
import type { CreditPolicy } from '../domain/lending/creditPolicy.js';
import { CreditScorer } from '../domain/lending/creditScorer.js';
import { InterestRateModel, type RateQuote } from '../domain/lending/interestRateModel.js';
import {
  type AssetId,
  type CreditRecord,
  type Loan,
  type LoanId,
  type Pool,
  type RepaymentEvent,
  type UserId,
  collateralVault,
  supplyVault,
  totalDebt,
} from '../domain/lending/lendingTypes.js';
import { LiquidationEngine, type LiquidationOutcome } from '../domain/lending/liquidationEngine.js';
import { accrueLoan, applyRepayment } from '../domain/lending/loanAccounting.js';
import { PoolLedger, availableLiquidity, utilization } from '../domain/lending/poolLedger.js';
import type { WritablePriceFeed } from '../domain/lending/priceFeed.js';
import { type RiskAssessment, RiskEngine, shapeOf } from '../domain/lending/riskEngine.js';
import { DomainError, ErrorCode, invalidAmount, unknownAsset, unknownLoan, unknownUser } from '../errors/taxonomy.js';
import type { EventLogger } from '../infra/logger.js';
import {
  type EntityKey,
  type LedgerStore,
  type LedgerTx,
  loanKey,
  poolKey,
  userKey,
} from '../infra/storage/ledgerStore.js';
import { AMOUNT_EPSILON, isDust, roundAmount } from '../utils/math.js';
import { isoNow, unixNow } from '../utils/time.js';

export interface LendingServiceDeps {
  store: LedgerStore;
  prices: WritablePriceFeed;
  policy: CreditPolicy;
  logger: EventLogger;
  /** Unix seconds. */
  clock?: () => number;
}

export interface RegisteredUser {
  userId: UserId;
  apiKey: string;
}

export interface BorrowInput {
  collateralAssetId: AssetId;
  collateralAmount: number;
  debtAssetId: AssetId;
  amount: number;
}

export interface BalanceChange {
  userId: UserId;
  assetId: AssetId;
  amount: number;
  /** Supply balance or free collateral after the change, whichever the operation touched. */
  balance: number;
}

export interface RepayResult {
  loan: Loan;
  repaid: number;
  interestPaid: number;
  principalPaid: number;
  closed: boolean;
  credit: RepaymentEvent;
}

export interface LiquidationResult extends LiquidationOutcome {
  liquidatorId: UserId;
  credit: RepaymentEvent;
}

export interface PoolView extends Pool, RateQuote {
  availableLiquidity: number;
}

const assertAmount = (amount: number): void => {
  if (!Number.isFinite(amount) || amount <= 0) throw invalidAmount(amount);
};

const notLoanHolder = (loan: Loan, userId: UserId): DomainError => new DomainError(
  ErrorCode.NotLoanHolder,
  403,
  `User '${userId}' does not hold loan '${loan.loanId}'.`,
  { loanId: loan.loanId, userId },
);

const loanClosed = (loan: Loan): DomainError => new DomainError(
  ErrorCode.LoanClosed,
  409,
  `Loan '${loan.loanId}' is closed.`,
  { loanId: loan.loanId },
);

const insufficientCollateral = (userId: UserId, assetId: AssetId, requested: number, available: number): DomainError => (
  new DomainError(
    ErrorCode.InsufficientCollateral,
    409,
    `User '${userId}' has ${available} free ${assetId} collateral, ${requested} requested.`,
    { userId, assetId, requested, available },
  )
);

const creditBalance = (record: CreditRecord, book: 'deposits' | 'collateral', assetId: AssetId): number => (
  record[book][assetId] ?? 0
);

export class LendingService {
  private readonly model: InterestRateModel;
  private readonly ledger: PoolLedger;
  private readonly risk: RiskEngine;
  private readonly liquidation: LiquidationEngine;
  private readonly scorer: CreditScorer;
  private readonly store: LedgerStore;
  private readonly prices: WritablePriceFeed;
  private readonly logger: EventLogger;
  private readonly clock: () => number;

  constructor(
    deps: LendingServiceDeps,
    private readonly config: AppConfig,
  ) {
    this.store = deps.store;
    this.prices = deps.prices;
    this.logger = deps.logger;
    this.clock = deps.clock ?? unixNow;

    this.model = new InterestRateModel(config.interestRate);
    this.ledger = new PoolLedger(this.model);
    this.risk = new RiskEngine(config.protocol, deps.policy, deps.prices);
    this.liquidation = new LiquidationEngine(this.risk, deps.prices, this.ledger);
    this.scorer = new CreditScorer(deps.policy, config.credit.maxCreditScore);
  }

  get riskEngine(): RiskEngine {
    return this.risk;
  }

  /* ── identity & admin ──────────────────────────────────────── */

  async registerUser(): Promise<RegisteredUser> {
    const userId = uuid();
    const apiKey = `lk_${uuid().replace(/-/g, '')}`;

    await this.store.transaction([userKey(userId)], (tx) => {
      const record: CreditRecord = {
        userId,
        deposits: {},
        collateral: {},
        loanIds: [],
        creditScore: 0,
        repaymentHistory: [],
        paidOff: 0,
        defaults: 0,
        createdAt: isoNow(),
      };
      tx.insertUser(record, apiKey);
      tx.publish('user.registered', { userId });
    });

    return { userId, apiKey };
  }

  async createPool(assetId: AssetId, reserveFactor = this.config.protocol.defaultReserveFactor): Promise<Pool> {
    return this.store.transaction([poolKey(assetId)], (tx) => {
      if (tx.hasPool(assetId)) {
        throw new DomainError(ErrorCode.PoolExists, 409, `Pool '${assetId}' already exists.`, { assetId });
      }
      const pool = this.ledger.create(assetId, reserveFactor, this.clock());
      tx.insertPool(pool);
      tx.publish('pool.created', { pool });
      return structuredClone(pool);
    });
  }

  async setPrice(assetId: AssetId, price: number): Promise<void> {
    await this.store.transaction([], (tx) => {
      this.prices.setPrice(assetId, price);
      tx.publish('price.updated', { assetId, price });
    });
  }

  /** Persists accrual for one pool without any other change. */
  async accruePool(assetId: AssetId): Promise<Pool> {
    return this.store.transaction([poolKey(assetId)], (tx) => {
      const pool = tx.pool(assetId);
      this.ledger.accrueIndices(pool, this.clock());
      return structuredClone(pool);
    });
  }

  /* ── supply ────────────────────────────────────────────────── */

  async deposit(userId: UserId, assetId: AssetId, amount: number): Promise<BalanceChange> {
    assertAmount(amount);
    return this.store.transaction([poolKey(assetId), userKey(userId)], (tx) => {
      const pool = tx.pool(assetId);
      const user = tx.user(userId);

      this.ledger.deposit(pool, amount, this.clock());
      this.creditDeposit(user, pool, amount);

      tx.transfer({ assetId, amount, from: userId, to: supplyVault(assetId), reason: 'deposit' });
      tx.publish('supply.deposited', { userId, assetId, amount });
      return { userId, assetId, amount, balance: this.depositBalance(user, pool) };
    });
  }

  async withdraw(userId: UserId, assetId: AssetId, amount: number): Promise<BalanceChange> {
    assertAmount(amount);
    return this.store.transaction([poolKey(assetId), userKey(userId)], (tx) => {
      const pool = tx.pool(assetId);
      const user = tx.user(userId);

      this.ledger.accrueIndices(pool, this.clock());
      this.debitDeposit(user, pool, amount);
      this.ledger.withdraw(pool, amount, this.clock());

      tx.transfer({ assetId, amount, from: supplyVault(assetId), to: userId, reason: 'withdraw' });
      tx.publish('supply.withdrawn', { userId, assetId, amount });
      return { userId, assetId, amount, balance: this.depositBalance(user, pool) };
    });
  }

  /* ── collateral ────────────────────────────────────────────── */

  async depositCollateral(userId: UserId, assetId: AssetId, amount: number): Promise<BalanceChange> {
    assertAmount(amount);
    return this.store.transaction([poolKey(assetId), userKey(userId)], (tx) => {
      const pool = tx.pool(assetId);
      const user = tx.user(userId);

      this.ledger.lockCollateral(pool, amount, this.clock());
      user.collateral[assetId] = roundAmount(creditBalance(user, 'collateral', assetId) + amount);

      tx.transfer({ assetId, amount, from: userId, to: collateralVault(assetId), reason: 'collateral.deposit' });
      tx.publish('collateral.deposited', { userId, assetId, amount });
      return { userId, assetId, amount, balance: creditBalance(user, 'collateral', assetId) };
    });
  }

  async withdrawCollateral(userId: UserId, assetId: AssetId, amount: number): Promise<BalanceChange> {
    assertAmount(amount);
    return this.store.transaction([poolKey(assetId), userKey(userId)], (tx) => {
      const pool = tx.pool(assetId);
      const user = tx.user(userId);

      this.debitCollateral(user, assetId, amount);
      this.ledger.releaseCollateral(pool, amount, this.clock());

      tx.transfer({ assetId, amount, from: collateralVault(assetId), to: userId, reason: 'collateral.withdraw' });
      tx.publish('collateral.withdrawn', { userId, assetId, amount });
      return { userId, assetId, amount, balance: creditBalance(user, 'collateral', assetId) };
    });
  }

  /** Moves part of a supply balance into free collateral of the same asset. */
  async convertDepositToCollateral(userId: UserId, assetId: AssetId, amount: number): Promise<BalanceChange> {
    assertAmount(amount);
    return this.store.transaction([poolKey(assetId), userKey(userId)], (tx) => {
      const pool = tx.pool(assetId);
      const user = tx.user(userId);
      const now = this.clock();

      this.ledger.accrueIndices(pool, now);
      this.debitDeposit(user, pool, amount);
      this.ledger.withdraw(pool, amount, now);
      this.ledger.lockCollateral(pool, amount, now);
      user.collateral[assetId] = roundAmount(creditBalance(user, 'collateral', assetId) + amount);

      tx.transfer({ assetId, amount, from: supplyVault(assetId), to: collateralVault(assetId), reason: 'convert.to_collateral' });
      tx.publish('collateral.converted', { userId, assetId, amount, direction: 'to_collateral' });
      return { userId, assetId, amount, balance: creditBalance(user, 'collateral', assetId) };
    });
  }

  async convertCollateralToDeposit(userId: UserId, assetId: AssetId, amount: number): Promise<BalanceChange> {
    assertAmount(amount);
    return this.store.transaction([poolKey(assetId), userKey(userId)], (tx) => {
      const pool = tx.pool(assetId);
      const user = tx.user(userId);
      const now = this.clock();

      this.debitCollateral(user, assetId, amount);
      this.ledger.releaseCollateral(pool, amount, now);
      this.ledger.deposit(pool, amount, now);
      this.creditDeposit(user, pool, amount);

      tx.transfer({ assetId, amount, from: collateralVault(assetId), to: supplyVault(assetId), reason: 'convert.to_deposit' });
      tx.publish('collateral.converted', { userId, assetId, amount, direction: 'to_deposit' });
      return { userId, assetId, amount, balance: this.depositBalance(user, pool) };
    });
  }

  /* ── loans ─────────────────────────────────────────────────── */

  /** Opens a loan, pledging free collateral the borrower already posted. */
  async borrow(userId: UserId, input: BorrowInput): Promise<Loan> {
    assertAmount(input.collateralAmount);
    assertAmount(input.amount);
    const loanId = uuid();
    const scope = [
      poolKey(input.collateralAssetId),
      poolKey(input.debtAssetId),
      userKey(userId),
      loanKey(loanId),
    ];

    return this.store.transaction(scope, (tx) => {
      const collateralPool = tx.pool(input.collateralAssetId);
      const debtPool = tx.pool(input.debtAssetId);
      const user = tx.user(userId);
      const now = this.clock();

      this.debitCollateral(user, input.collateralAssetId, input.collateralAmount);
      this.risk.assertBorrowAllowed({
        collateralAssetId: input.collateralAssetId,
        collateralAmount: input.collateralAmount,
        debtAssetId: input.debtAssetId,
        debt: input.amount,
      }, user.creditScore);

      this.ledger.accrueIndices(collateralPool, now);
      this.ledger.borrow(debtPool, input.amount, now);

      const { borrowRate } = this.ledger.rates(debtPool);
      const createdAt = isoNow();
      const loan: Loan = {
        loanId,
        borrowerId: userId,
        holderId: userId,
        collateralAssetId: input.collateralAssetId,
        collateralAmount: input.collateralAmount,
        debtAssetId: input.debtAssetId,
        principal: input.amount,
        accruedInterest: 0,
        originalPrincipal: input.amount,
        interestRateAtOrigination: Math.max(0, borrowRate - this.risk.interestDiscount(user.creditScore)),
        borrowIndexSnapshot: debtPool.borrowIndex,
        lastUpdateTimestamp: now,
        creditTiersAwarded: [],
        status: 'Open',
        createdAt,
        updatedAt: createdAt,
      };
      tx.insertLoan(loan);
      user.loanIds.push(loanId);

      tx.transfer({ assetId: input.debtAssetId, amount: input.amount, from: supplyVault(input.debtAssetId), to: userId, reason: 'borrow' });
      tx.publish('loan.opened', { loan });
      return structuredClone(loan);
    });
  }

  async borrowAdditional(userId: UserId, loanId: LoanId, amount: number): Promise<Loan> {
    assertAmount(amount);
    return this.onLoan(loanId, [], (tx, loan, borrower) => {
      this.assertHolder(loan, userId);
      this.assertOpen(loan);
      const debtPool = tx.pool(loan.debtAssetId);
      const now = this.clock();

      this.accrue(loan, debtPool, borrower, now);
      this.risk.assertBorrowAllowed({ ...shapeOf(loan), debt: totalDebt(loan) + amount }, borrower.creditScore);
      this.ledger.borrow(debtPool, amount, now);

      loan.principal = roundAmount(loan.principal + amount);
      loan.originalPrincipal = roundAmount(loan.originalPrincipal + amount);
      this.restoreIfHealthy(loan, borrower);
      loan.updatedAt = isoNow();

      tx.transfer({ assetId: loan.debtAssetId, amount, from: supplyVault(loan.debtAssetId), to: loan.holderId, reason: 'borrow' });
      tx.publish('loan.borrowed', { loanId, amount, principal: loan.principal });
      return structuredClone(loan);
    });
  }

  /** Pledges more of the caller's free collateral to a loan they hold. */
  async addCollateral(userId: UserId, loanId: LoanId, amount: number): Promise<Loan> {
    assertAmount(amount);
    return this.onLoan(loanId, [userKey(userId)], (tx, loan, borrower) => {
      this.assertHolder(loan, userId);
      this.assertOpen(loan);
      const holder = tx.user(userId);
      const debtPool = tx.pool(loan.debtAssetId);

      this.accrue(loan, debtPool, borrower, this.clock());
      this.debitCollateral(holder, loan.collateralAssetId, amount);
      loan.collateralAmount = roundAmount(loan.collateralAmount + amount);
      this.restoreIfHealthy(loan, borrower);
      loan.updatedAt = isoNow();

      tx.publish('loan.collateral.added', { loanId, amount, collateralAmount: loan.collateralAmount });
      return structuredClone(loan);
    });
  }

  /**
   * Repays up to the loan's debt, interest first. Anything above the debt is
   * not taken. Paying the debt off closes the loan and frees its collateral.
   */
  async repay(userId: UserId, loanId: LoanId, amount: number): Promise<RepayResult> {
    assertAmount(amount);
    return this.onLoan(loanId, [], (tx, loan, borrower) => {
      this.assertHolder(loan, userId);
      this.assertOpen(loan);
      const debtPool = tx.pool(loan.debtAssetId);
      const collateralPool = tx.pool(loan.collateralAssetId);
      const now = this.clock();

      this.accrue(loan, debtPool, borrower, now);
      const repaid = roundAmount(Math.min(amount, totalDebt(loan)));
      const split = applyRepayment(loan, repaid);
      this.ledger.repay(debtPool, repaid, now);
      tx.transfer({ assetId: loan.debtAssetId, amount: repaid, from: userId, to: supplyVault(loan.debtAssetId), reason: 'repay' });

      const closed = isDust(totalDebt(loan));
      if (closed) {
        loan.principal = 0;
        loan.accruedInterest = 0;
      }

      const scoreBefore = borrower.creditScore;
      const credit = this.scorer.onRepayment(borrower, loan, {
        assetId: loan.debtAssetId,
        amount: repaid,
        source: 'repay',
        now,
      });

      if (closed) {
        this.closeLoan(tx, loan, borrower, collateralPool, now);
        borrower.paidOff += 1;
      } else {
        this.restoreIfHealthy(loan, borrower);
      }
      loan.updatedAt = isoNow();

      tx.publish('loan.repaid', { loanId, repaid, ...split, remainingDebt: totalDebt(loan) });
      if (closed) tx.publish('loan.closed', { loanId, borrowerId: loan.borrowerId });
      this.publishScore(tx, borrower, scoreBefore);

      return { loan: structuredClone(loan), repaid, ...split, closed, credit };
    });
  }

  async liquidate(liquidatorId: UserId, loanId: LoanId, repayAmount: number): Promise<LiquidationResult> {
    assertAmount(repayAmount);
    const result = await this.onLoan(loanId, [userKey(liquidatorId)], (tx, loan, borrower) => {
      tx.user(liquidatorId);
      const debtPool = tx.pool(loan.debtAssetId);
      const collateralPool = tx.pool(loan.collateralAssetId);
      const now = this.clock();

      this.accrue(loan, debtPool, borrower, now);
      const outcome = this.liquidation.execute({
        loan,
        debtPool,
        collateralPool,
        creditScore: borrower.creditScore,
        repayAmount,
        now,
      });

      tx.transfer({
        assetId: loan.debtAssetId,
        amount: outcome.repayAmount,
        from: liquidatorId,
        to: supplyVault(loan.debtAssetId),
        reason: 'liquidation.repay',
      });
      tx.transfer({
        assetId: loan.collateralAssetId,
        amount: outcome.collateralSeized,
        from: collateralVault(loan.collateralAssetId),
        to: liquidatorId,
        reason: 'liquidation.seize',
      });

      const scoreBefore = borrower.creditScore;
      const credit = this.scorer.onRepayment(borrower, loan, {
        assetId: loan.debtAssetId,
        amount: outcome.repayAmount,
        source: 'liquidation',
        now,
      });
      borrower.defaults += 1;

      if (loan.status === 'Closed') this.closeLoan(tx, loan, borrower, collateralPool, now);
      loan.updatedAt = isoNow();

      tx.publish('loan.liquidated', { liquidatorId, ...outcome });
      if (loan.status === 'Closed') tx.publish('loan.closed', { loanId, borrowerId: loan.borrowerId });
      if (outcome.shortfall) tx.publish('liquidation.shortfall', { loanId, ...outcome.shortfall });
      this.publishScore(tx, borrower, scoreBefore);

      return { ...outcome, liquidatorId, credit };
    });

    if (result.shortfall) {
      await this.logger.log('warn', 'liquidation.shortfall', {
        loanId,
        liquidatorId,
        missingCollateral: result.shortfall.missingCollateral,
        uncoveredDebt: result.shortfall.uncoveredDebt,
      });
    }
    return result;
  }

  /** Hands the loan document to another registered user. */
  async transferLoan(userId: UserId, loanId: LoanId, toUserId: UserId): Promise<Loan> {
    return this.onLoan(loanId, [userKey(toUserId)], (tx, loan) => {
      this.assertHolder(loan, userId);
      this.assertOpen(loan);
      tx.user(toUserId);

      loan.holderId = toUserId;
      loan.updatedAt = isoNow();
      tx.publish('loan.transferred', { loanId, from: userId, to: toUserId });
      return structuredClone(loan);
    });
  }

  /* ── queries ───────────────────────────────────────────────── */

  resolveApiKey(apiKey: string): UserId | undefined {
    return this.store.userIdForApiKey(apiKey);
  }

  getPool(assetId: AssetId): PoolView {
    const pool = this.previewPool(assetId);
    return { ...pool, ...this.ledger.rates(pool), availableLiquidity: availableLiquidity(pool) };
  }

  listPools(): PoolView[] {
    return Object.keys(this.store.snapshot().pools).map((assetId) => this.getPool(assetId));
  }

  getPrices(): Record<AssetId, number> {
    return this.prices.all();
  }

  getLiquidity(assetId: AssetId): number {
    return availableLiquidity(this.previewPool(assetId));
  }

  getTotalSupply(assetId: AssetId): number {
    return this.previewPool(assetId).totalSupply;
  }

  getTotalBorrowed(assetId: AssetId): number {
    return this.previewPool(assetId).totalBorrowed;
  }

  getUtilization(assetId: AssetId): number {
    return utilization(this.previewPool(assetId));
  }

  getCreditRecord(userId: UserId): CreditRecord {
    const record = this.store.getUser(userId);
    if (!record) throw unknownUser(userId);
    return record;
  }

  getDepositBalance(userId: UserId, assetId: AssetId): number {
    const record = this.getCreditRecord(userId);
    return this.depositBalance(record, this.previewPool(assetId));
  }

  /** The loan with interest brought up to now; nothing is written back. */
  getLoan(loanId: LoanId): Loan {
    const loan = this.store.getLoan(loanId);
    if (!loan) throw unknownLoan(loanId);
    return this.previewLoan(loan);
  }

  getHealthFactor(loanId: LoanId): number {
    return this.assessLoan(loanId).healthFactor;
  }

  assessLoan(loanId: LoanId): RiskAssessment {
    const loan = this.getLoan(loanId);
    return this.risk.assess(loan, this.creditScoreOf(loan.borrowerId));
  }

  /** Lazy and restartable: each call re-reads the ledger and prices. */
  findBadLoans(): Generator<LoanId, void, undefined> {
    return this.risk.findBadLoans(this.previewedLoans(), (userId) => this.creditScoreOf(userId));
  }

  /* ── internals ─────────────────────────────────────────────── */

  /**
   * Locks the loan, both of its pools and the borrower's record, plus any
   * extra keys. Asset ids on a loan never change, so reading them before the
   * lock is taken is safe.
   */
  private async onLoan<T>(
    loanId: LoanId,
    extra: EntityKey[],
    work: (tx: LedgerTx, loan: Loan, borrower: CreditRecord) => T,
  ): Promise<T> {
    const peek = this.store.getLoan(loanId);
    if (!peek) throw unknownLoan(loanId);
    const scope = [
      loanKey(loanId),
      poolKey(peek.debtAssetId),
      poolKey(peek.collateralAssetId),
      userKey(peek.borrowerId),
      ...extra,
    ];

    return this.store.transaction(scope, (tx) => work(tx, tx.loan(loanId), tx.user(peek.borrowerId)));
  }

  private assertOpen(loan: Loan): void {
    if (loan.status === 'Closed') throw loanClosed(loan);
  }

  private accrue(loan: Loan, debtPool: Pool, borrower: CreditRecord, now: number): void {
    accrueLoan(loan, debtPool, this.ledger, this.risk.interestDiscount(borrower.creditScore), now);
  }

  private assertHolder(loan: Loan, userId: UserId): void {
    if (loan.holderId !== userId) throw notLoanHolder(loan, userId);
  }

  private restoreIfHealthy(loan: Loan, borrower: CreditRecord): void {
    if (loan.status === 'PartiallyLiquidated' && this.risk.healthFactor(loan, borrower.creditScore) > 1) {
      loan.status = 'Open';
    }
  }

  /** Returns pledged collateral to the borrower, or pays it out when someone else holds the loan. */
  private closeLoan(tx: LedgerTx, loan: Loan, borrower: CreditRecord, collateralPool: Pool, now: number): void {
    const amount = loan.collateralAmount;
    loan.status = 'Closed';
    loan.collateralAmount = 0;
    if (amount <= 0) return;

    if (loan.holderId === loan.borrowerId) {
      borrower.collateral[loan.collateralAssetId] = roundAmount(
        creditBalance(borrower, 'collateral', loan.collateralAssetId) + amount,
      );
      return;
    }

    this.ledger.releaseCollateral(collateralPool, amount, now);
    tx.transfer({
      assetId: loan.collateralAssetId,
      amount,
      from: collateralVault(loan.collateralAssetId),
      to: loan.holderId,
      reason: 'loan.close',
    });
  }

  private publishScore(tx: LedgerTx, record: CreditRecord, before: number): void {
    if (record.creditScore !== before) {
      tx.publish('credit.score.updated', { userId: record.userId, from: before, to: record.creditScore });
    }
  }

  private depositBalance(record: CreditRecord, pool: Pool): number {
    return roundAmount(creditBalance(record, 'deposits', pool.assetId) * pool.liquidityIndex);
  }

  private creditDeposit(record: CreditRecord, pool: Pool, amount: number): void {
    const scaled = amount / pool.liquidityIndex;
    record.deposits[pool.assetId] = creditBalance(record, 'deposits', pool.assetId) + scaled;
  }

  /** Pool must already be accrued to now. */
  private debitDeposit(record: CreditRecord, pool: Pool, amount: number): void {
    const balance = this.depositBalance(record, pool);
    if (amount - balance > AMOUNT_EPSILON) {
      throw new DomainError(
        ErrorCode.InsufficientBalance,
        409,
        `User '${record.userId}' has ${balance} ${pool.assetId} supplied, ${amount} requested.`,
        { userId: record.userId, assetId: pool.assetId, requested: amount, available: balance },
      );
    }
    const remaining = creditBalance(record, 'deposits', pool.assetId) - amount / pool.liquidityIndex;
    record.deposits[pool.assetId] = isDust(remaining * pool.liquidityIndex) ? 0 : remaining;
  }

  private debitCollateral(record: CreditRecord, assetId: AssetId, amount: number): void {
    const available = creditBalance(record, 'collateral', assetId);
    if (amount - available > AMOUNT_EPSILON) {
      throw insufficientCollateral(record.userId, assetId, amount, available);
    }
    record.collateral[assetId] = roundAmount(Math.max(0, available - amount));
  }

  private creditScoreOf(userId: UserId): number {
    return this.store.getUser(userId)?.creditScore ?? 0;
  }

  private previewPool(assetId: AssetId): Pool {
    const pool = this.store.getPool(assetId);
    if (!pool) throw unknownAsset(assetId);
    this.ledger.accrueIndices(pool, this.clock());
    return pool;
  }

  private *previewedLoans(): Generator<Loan, void, undefined> {
    for (const loan of this.store.loans()) {
      yield this.previewLoan(loan);
    }
  }

  private previewLoan(loan: Loan): Loan {
    if (loan.status === 'Closed') return loan;
    const debtPool = this.store.getPool(loan.debtAssetId);
    if (!debtPool) throw unknownAsset(loan.debtAssetId);
    accrueLoan(loan, debtPool, this.ledger, this.risk.interestDiscount(this.creditScoreOf(loan.borrowerId)), this.clock());
    return loan;
  }
}
