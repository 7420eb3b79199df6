/**
 * Seam to the external asset ledger. The core never moves tokens itself; each
 * operation hands custody the transfers it needs and the two commit together:
 *
 *   prepare(transfers) → ticket   custody reserves the movements or vetoes
 *   <core state commits>
 *   commit(ticket)                custody executes; must not fail after prepare
 *
 * A veto from `prepare` aborts the whole operation with no state change.
 */

import { v4 as uuid } from 'uuid';
import type { AssetId, TransferInstruction } from '../domain/lending/lendingTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { roundAmount } from '../utils/math.js';

export interface CustodyTicket {
  id: string;
  transfers: TransferInstruction[];
}

export interface AssetCustody {
  prepare(transfers: TransferInstruction[]): Promise<CustodyTicket> | CustodyTicket;
  commit(ticket: CustodyTicket): Promise<void> | void;
  abort(ticket: CustodyTicket): Promise<void> | void;
}

export interface InMemoryCustodyOptions {
  /**
   * When set, accounts that are not pool vaults must hold what they send.
   * Off by default: wallets are treated as external and unbounded.
   */
  enforceBalances?: boolean;
}

const isVault = (account: string): boolean => account.startsWith('pool:');

/** Custody stand-in that keeps balances and a journal of executed transfers. */
export class InMemoryCustody implements AssetCustody {
  private readonly balances = new Map<string, Map<AssetId, number>>();
  private readonly pending = new Map<string, TransferInstruction[]>();
  private readonly journal: TransferInstruction[] = [];

  constructor(private readonly options: InMemoryCustodyOptions = {}) {}

  fund(account: string, assetId: AssetId, amount: number): void {
    this.adjust(account, assetId, amount);
  }

  balanceOf(account: string, assetId: AssetId): number {
    return this.balances.get(account)?.get(assetId) ?? 0;
  }

  executed(): TransferInstruction[] {
    return [...this.journal];
  }

  prepare(transfers: TransferInstruction[]): CustodyTicket {
    if (this.options.enforceBalances) {
      const outgoing = new Map<string, number>();
      for (const pendingTransfers of [...this.pending.values(), transfers]) {
        for (const t of pendingTransfers) {
          if (isVault(t.from)) continue;
          const key = `${t.from}\u0000${t.assetId}`;
          outgoing.set(key, (outgoing.get(key) ?? 0) + t.amount);
        }
      }

      for (const t of transfers) {
        if (isVault(t.from)) continue;
        const needed = outgoing.get(`${t.from}\u0000${t.assetId}`) ?? 0;
        const held = this.balanceOf(t.from, t.assetId);
        if (needed > held) {
          throw new DomainError(
            ErrorCode.CustodyRejected,
            409,
            `Account '${t.from}' holds ${held} ${t.assetId}, ${needed} required.`,
            { account: t.from, assetId: t.assetId, held, needed },
          );
        }
      }
    }

    const ticket: CustodyTicket = { id: uuid(), transfers: transfers.map((t) => ({ ...t })) };
    this.pending.set(ticket.id, ticket.transfers);
    return ticket;
  }

  commit(ticket: CustodyTicket): void {
    const transfers = this.pending.get(ticket.id);
    if (!transfers) throw new Error(`Unknown custody ticket '${ticket.id}'.`);
    this.pending.delete(ticket.id);

    for (const t of transfers) {
      this.adjust(t.from, t.assetId, -t.amount);
      this.adjust(t.to, t.assetId, t.amount);
      this.journal.push(t);
    }
  }

  abort(ticket: CustodyTicket): void {
    this.pending.delete(ticket.id);
  }

  private adjust(account: string, assetId: AssetId, delta: number): void {
    let byAsset = this.balances.get(account);
    if (!byAsset) {
      byAsset = new Map();
      this.balances.set(account, byAsset);
    }
    byAsset.set(assetId, roundAmount((byAsset.get(assetId) ?? 0) + delta));
  }
}
