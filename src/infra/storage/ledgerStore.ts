import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  AssetId,
  CreditRecord,
  LedgerState,
  Loan,
  LoanId,
  Pool,
  TransferInstruction,
  UserId,
} from '../../domain/lending/lendingTypes.js';
import { unknownAsset, unknownLoan, unknownUser } from '../../errors/taxonomy.js';
import type { AssetCustody } from '../custody.js';
import { type EventBus, type EventType, eventBus as defaultEventBus } from '../eventBus.js';
import type { EventLogger } from '../logger.js';
import { createDefaultState } from './defaultState.js';

export type EntityKey = `pool:${string}` | `loan:${string}` | `user:${string}`;

export const poolKey = (assetId: AssetId): EntityKey => `pool:${assetId}`;
export const loanKey = (loanId: LoanId): EntityKey => `loan:${loanId}`;
export const userKey = (userId: UserId): EntityKey => `user:${userId}`;

/**
 * Exclusive locks per entity key. A transaction enqueues itself behind every
 * key it needs in one synchronous step, so two transactions can never hold
 * each other's keys in opposite order. Disjoint key sets never wait.
 */
export class KeyedLock {
  private readonly tails = new Map<EntityKey, Promise<void>>();

  async acquire(keys: EntityKey[]): Promise<() => void> {
    const unique = [...new Set(keys)];
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const waits = unique.map((key) => {
      const previous = this.tails.get(key) ?? Promise.resolve();
      this.tails.set(key, held);
      return previous;
    });

    await Promise.all(waits);

    return () => {
      release();
      for (const key of unique) {
        if (this.tails.get(key) === held) this.tails.delete(key);
      }
    };
  }
}

/**
 * The view a transaction works through. Reads hand out private copies of
 * committed entities; nothing reaches shared state until the work returns.
 * Touching an entity outside the locked scope is a programming error.
 */
export class LedgerTx {
  readonly transfers: TransferInstruction[] = [];
  readonly events: Array<{ event: EventType; data: unknown }> = [];
  private readonly pools = new Map<AssetId, Pool>();
  private readonly loans = new Map<LoanId, Loan>();
  private readonly users = new Map<UserId, CreditRecord>();
  private readonly apiKeys = new Map<string, UserId>();

  constructor(
    private readonly committed: LedgerState,
    private readonly scope: ReadonlySet<EntityKey>,
  ) {}

  pool(assetId: AssetId): Pool {
    this.assertScoped(poolKey(assetId));
    const draft = this.pools.get(assetId);
    if (draft) return draft;
    const current = this.committed.pools[assetId];
    if (!current) throw unknownAsset(assetId);
    const copy = structuredClone(current);
    this.pools.set(assetId, copy);
    return copy;
  }

  loan(loanId: LoanId): Loan {
    this.assertScoped(loanKey(loanId));
    const draft = this.loans.get(loanId);
    if (draft) return draft;
    const current = this.committed.loans[loanId];
    if (!current) throw unknownLoan(loanId);
    const copy = structuredClone(current);
    this.loans.set(loanId, copy);
    return copy;
  }

  user(userId: UserId): CreditRecord {
    this.assertScoped(userKey(userId));
    const draft = this.users.get(userId);
    if (draft) return draft;
    const current = this.committed.users[userId];
    if (!current) throw unknownUser(userId);
    const copy = structuredClone(current);
    this.users.set(userId, copy);
    return copy;
  }

  hasPool(assetId: AssetId): boolean {
    return this.pools.has(assetId) || assetId in this.committed.pools;
  }

  insertPool(pool: Pool): void {
    this.assertScoped(poolKey(pool.assetId));
    this.pools.set(pool.assetId, pool);
  }

  insertLoan(loan: Loan): void {
    this.assertScoped(loanKey(loan.loanId));
    this.loans.set(loan.loanId, loan);
  }

  insertUser(record: CreditRecord, apiKey: string): void {
    this.assertScoped(userKey(record.userId));
    this.users.set(record.userId, record);
    this.apiKeys.set(apiKey, record.userId);
  }

  transfer(instruction: TransferInstruction): void {
    if (instruction.amount > 0) this.transfers.push(instruction);
  }

  /** Published only if the transaction commits. */
  publish(event: EventType, data: unknown): void {
    this.events.push({ event, data });
  }

  applyTo(state: LedgerState): void {
    for (const [id, pool] of this.pools) state.pools[id] = pool;
    for (const [id, loan] of this.loans) state.loans[id] = loan;
    for (const [id, user] of this.users) state.users[id] = user;
    for (const [key, userId] of this.apiKeys) state.apiKeys[key] = userId;
  }

  private assertScoped(key: EntityKey): void {
    if (!this.scope.has(key)) {
      throw new Error(`Entity '${key}' is not locked by this transaction.`);
    }
  }
}

const normalizeState = (raw: unknown): LedgerState => {
  const defaults = createDefaultState();
  if (!raw || typeof raw !== 'object') return defaults;
  const parsed: Partial<LedgerState> = raw;

  const users = Object.fromEntries(
    Object.entries(parsed.users ?? {}).map(([id, user]) => [id, {
      ...user,
      deposits: user.deposits ?? {},
      collateral: user.collateral ?? {},
      loanIds: user.loanIds ?? [],
      repaymentHistory: user.repaymentHistory ?? [],
      paidOff: user.paidOff ?? 0,
      defaults: user.defaults ?? 0,
    } satisfies CreditRecord]),
  );

  const pools = Object.fromEntries(
    Object.entries(parsed.pools ?? {}).map(([id, pool]) => [id, {
      ...pool,
      totalReserves: pool.totalReserves ?? 0,
      totalCollateral: pool.totalCollateral ?? 0,
    } satisfies Pool]),
  );

  const loans = Object.fromEntries(
    Object.entries(parsed.loans ?? {}).map(([id, loan]) => [id, {
      ...loan,
      holderId: loan.holderId ?? loan.borrowerId,
      creditTiersAwarded: loan.creditTiersAwarded ?? [],
    } satisfies Loan]),
  );

  return {
    ...defaults,
    pools,
    users,
    loans,
    apiKeys: parsed.apiKeys ?? {},
  };
};

export class LedgerStore {
  private state: LedgerState = createDefaultState();
  private readonly locks = new KeyedLock();
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string | null,
    private readonly custody: AssetCustody,
    private readonly bus: EventBus = defaultEventBus,
    private readonly logger: EventLogger | null = null,
  ) {}

  async init(): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }

    if (raw === null) {
      this.state = createDefaultState();
      await this.persist();
    } else {
      this.state = normalizeState(JSON.parse(raw));
    }
  }

  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  getPool(assetId: AssetId): Pool | undefined {
    const pool = this.state.pools[assetId];
    return pool ? structuredClone(pool) : undefined;
  }

  getLoan(loanId: LoanId): Loan | undefined {
    const loan = this.state.loans[loanId];
    return loan ? structuredClone(loan) : undefined;
  }

  getUser(userId: UserId): CreditRecord | undefined {
    const user = this.state.users[userId];
    return user ? structuredClone(user) : undefined;
  }

  hasUser(userId: UserId): boolean {
    return userId in this.state.users;
  }

  userIdForApiKey(apiKey: string): UserId | undefined {
    return this.state.apiKeys[apiKey];
  }

  /** Committed loans, copied one at a time as the caller iterates. */
  *loans(): Generator<Loan, void, undefined> {
    for (const id of Object.keys(this.state.loans)) {
      const loan = this.state.loans[id];
      if (loan) yield structuredClone(loan);
    }
  }

  /**
   * Runs `work` with exclusive access to the entities in `scope`. Either
   * every draft, the custody transfers and the events commit together, or
   * nothing does and the error propagates. A failed state-file write after
   * commit is logged; the next successful write carries the change.
   */
  async transaction<T>(scope: EntityKey[], work: (tx: LedgerTx) => Promise<T> | T): Promise<T> {
    const release = await this.locks.acquire(scope);
    try {
      const tx = new LedgerTx(this.state, new Set(scope));
      const result = await work(tx);

      const ticket = await this.custody.prepare(tx.transfers);
      try {
        tx.applyTo(this.state);
      } catch (error) {
        await this.custody.abort(ticket);
        throw error;
      }
      await this.custody.commit(ticket);
      await this.persistCommitted(scope);

      for (const { event, data } of tx.events) {
        this.bus.emit(event, data);
      }
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.writes;
    await this.persist();
  }

  private async persistCommitted(scope: EntityKey[]): Promise<void> {
    try {
      await this.persist();
    } catch (error) {
      const data = { scope, error: error instanceof Error ? error.message : String(error) };
      if (!this.logger) {
        console.error('ledger.persist.failed', data);
        return;
      }
      await this.logger.log('error', 'ledger.persist.failed', data).catch((logError: unknown) => {
        console.error('ledger.persist.failed', data, logError);
      });
    }
  }

  private async persist(): Promise<void> {
    const target = this.stateFilePath;
    if (!target) return;
    const write = this.writes.then(() => fs.writeFile(target, JSON.stringify(this.state, null, 2)));
    this.writes = write.catch(() => undefined);
    await write;
  }
}
