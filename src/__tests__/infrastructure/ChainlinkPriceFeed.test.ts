import { ContractRunner, Interface } from 'ethers';
import { ErrorCode } from '../../domain/errors/AppError';
import { AGGREGATOR_V3_ABI, ChainlinkPriceFeed } from '../../infrastructure/oracle/ChainlinkPriceFeed';
import { FEED, T0 } from '../helpers/fixtures';

const aggregator = new Interface(AGGREGATOR_V3_ABI);

function runnerAnswering(call: () => Promise<string>): ContractRunner {
  return { provider: null, call };
}

describe('ChainlinkPriceFeed', () => {
  it('should decode the latest round', async () => {
    const encoded = aggregator.encodeFunctionResult('latestRoundData', [7n, 95n, 0n, BigInt(T0), 7n]);
    const feed = new ChainlinkPriceFeed(FEED, runnerAnswering(async () => encoded));

    await expect(feed.latestPrice()).resolves.toEqual({ roundId: 7n, price: 95n, updatedAt: T0 });
  });

  it('should fail with an oracle error when the feed never answers', async () => {
    const feed = new ChainlinkPriceFeed(FEED, runnerAnswering(() => new Promise<string>(() => undefined)), 20);

    await expect(feed.latestPrice()).rejects.toMatchObject({
      code: ErrorCode.ORACLE_ERROR,
      message: `Price feed ${FEED} did not answer within 20ms`
    });
  });

  it('should pass read failures through', async () => {
    const feed = new ChainlinkPriceFeed(
      FEED,
      runnerAnswering(async () => {
        throw new Error('connection refused');
      })
    );

    await expect(feed.latestPrice()).rejects.toThrow('connection refused');
  });
});
