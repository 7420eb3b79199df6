import { DomainError, ErrorCode, unknownAsset } from '../../errors/taxonomy.js';
import type { AssetId } from './lendingTypes.js';

/** Read side of the external price feed. Lookups are synchronous. */
export interface PriceFeed {
  getPrice(assetId: AssetId): number;
}

/** Trusted setter; only the admin surface writes through this. */
export interface WritablePriceFeed extends PriceFeed {
  setPrice(assetId: AssetId, price: number): void;
  all(): Record<AssetId, number>;
}

export class InMemoryPriceFeed implements WritablePriceFeed {
  private readonly prices = new Map<AssetId, number>();

  constructor(initial: Record<AssetId, number> = {}) {
    for (const [assetId, price] of Object.entries(initial)) {
      this.setPrice(assetId, price);
    }
  }

  getPrice(assetId: AssetId): number {
    const price = this.prices.get(assetId);
    if (price === undefined) throw unknownAsset(assetId);
    return price;
  }

  setPrice(assetId: AssetId, price: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Price must be a positive, finite number.', { assetId, price });
    }
    this.prices.set(assetId, price);
  }

  all(): Record<AssetId, number> {
    return Object.fromEntries(this.prices);
  }
}
