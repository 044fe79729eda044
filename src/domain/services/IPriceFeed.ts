export interface PriceReading {
  price: bigint;
  /** Unix seconds of the round the price belongs to. */
  updatedAt: number;
  roundId?: bigint;
}

export interface IPriceFeed {
  readonly address: string;
  latestPrice(): Promise<PriceReading>;
}

export type PriceFeedMode = 'chainlink' | 'in-memory';

export interface IPriceFeedProvider {
  readonly mode: PriceFeedMode;
  getFeed(address: string): IPriceFeed;
}
