import { injectable } from 'inversify';
import { AppError } from '../../domain/errors/AppError';
import { IPriceFeed, IPriceFeedProvider, PriceFeedMode, PriceReading } from '../../domain/services/IPriceFeed';

export class InMemoryPriceFeed implements IPriceFeed {
  private reading?: PriceReading;
  private round = 0n;

  constructor(public readonly address: string) {}

  setPrice(price: bigint, updatedAt: number): PriceReading {
    this.round += 1n;
    this.reading = { price, updatedAt, roundId: this.round };
    return this.reading;
  }

  async latestPrice(): Promise<PriceReading> {
    if (!this.reading) {
      throw AppError.oracleError(`Price feed ${this.address} has no rounds yet`);
    }
    return { ...this.reading };
  }
}

/**
 * Feeds whose prices are set by hand, through the admin API or by tests.
 */
@injectable()
export class InMemoryPriceFeedProvider implements IPriceFeedProvider {
  readonly mode: PriceFeedMode = 'in-memory';
  private feeds: Map<string, InMemoryPriceFeed> = new Map();

  getFeed(address: string): InMemoryPriceFeed {
    const key = address.toLowerCase();
    let feed = this.feeds.get(key);
    if (!feed) {
      feed = new InMemoryPriceFeed(address);
      this.feeds.set(key, feed);
    }
    return feed;
  }

  setPrice(address: string, price: bigint, updatedAt: number): PriceReading {
    return this.getFeed(address).setPrice(price, updatedAt);
  }
}
