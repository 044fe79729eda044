import { injectable, inject } from 'inversify';
import { AppError } from '../../domain/errors/AppError';
import { IClock } from '../../domain/services/IClock';
import { IPriceFeedProvider } from '../../domain/services/IPriceFeed';
import { InMemoryPriceFeedProvider } from '../../infrastructure/oracle/InMemoryPriceFeed';
import { logger } from '../../infrastructure/logging/Logger';

export interface SetFeedPriceInput {
  feedAddress: string;
  price: bigint;
  /** Defaults to the current time. */
  updatedAt?: number;
}

export interface FeedRoundView {
  feed: string;
  roundId: string;
  price: string;
  updatedAt: number;
}

@injectable()
export class SetFeedPriceUseCase {
  constructor(
    @inject('IPriceFeedProvider') private feeds: IPriceFeedProvider,
    @inject('IClock') private clock: IClock
  ) {}

  async execute(input: SetFeedPriceInput): Promise<FeedRoundView> {
    if (!(this.feeds instanceof InMemoryPriceFeedProvider)) {
      throw AppError.invalidState('Feed prices can only be set when the in-memory oracle is active');
    }
    const reading = this.feeds.setPrice(input.feedAddress, input.price, input.updatedAt ?? this.clock.now());
    logger.info('Feed price updated', { feed: input.feedAddress, price: reading.price.toString() });
    return {
      feed: input.feedAddress,
      roundId: (reading.roundId ?? 0n).toString(),
      price: reading.price.toString(),
      updatedAt: reading.updatedAt
    };
  }
}
