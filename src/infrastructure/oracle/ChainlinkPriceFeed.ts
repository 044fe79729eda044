import { injectable } from 'inversify';
import { ethers } from 'ethers';
import { AppError } from '../../domain/errors/AppError';
import { IPriceFeed, IPriceFeedProvider, PriceFeedMode, PriceReading } from '../../domain/services/IPriceFeed';
import { logger } from '../logging/Logger';

export const AGGREGATOR_V3_ABI = [
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)'
];

const DEFAULT_READ_TIMEOUT_MS = 5000;

/**
 * Reads an AggregatorV3 price feed over JSON-RPC. A read that gets no
 * answer within the timeout fails with an oracle error.
 */
export class ChainlinkPriceFeed implements IPriceFeed {
  private contract: ethers.Contract;

  constructor(
    public readonly address: string,
    runner: ethers.ContractRunner,
    private readonly timeoutMs: number = DEFAULT_READ_TIMEOUT_MS
  ) {
    this.contract = new ethers.Contract(address, AGGREGATOR_V3_ABI, runner);
  }

  async latestPrice(): Promise<PriceReading> {
    const round = await this.readLatestRound();
    if (!Array.isArray(round) || round.length < 4) {
      throw AppError.oracleError(`Unexpected latestRoundData result from ${this.address}`);
    }
    const [roundId, answer, , updatedAt] = round;
    if (typeof roundId !== 'bigint' || typeof answer !== 'bigint' || typeof updatedAt !== 'bigint') {
      throw AppError.oracleError(`Malformed round data from ${this.address}`);
    }
    return { roundId, price: answer, updatedAt: Number(updatedAt) };
  }

  private readLatestRound(): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (!settled) {
          settled = true;
          reject(AppError.oracleError(`Price feed ${this.address} did not answer within ${this.timeoutMs}ms`));
        }
      }, this.timeoutMs);

      this.contract.getFunction('latestRoundData').staticCall().then((round: unknown) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve(round);
        }
      }).catch((error: unknown) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(error);
        } else {
          logger.debug('Late price feed failure ignored', {
            feed: this.address,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      });
    });
  }
}

@injectable()
export class ChainlinkPriceFeedProvider implements IPriceFeedProvider {
  readonly mode: PriceFeedMode = 'chainlink';
  private provider: ethers.JsonRpcProvider;
  private feeds: Map<string, ChainlinkPriceFeed> = new Map();
  private readonly timeoutMs: number;

  constructor() {
    const rpcUrl = process.env.ETHEREUM_RPC_URL || 'http://localhost:8545';
    this.timeoutMs = parseInt(process.env.ORACLE_TIMEOUT_MS || String(DEFAULT_READ_TIMEOUT_MS), 10);
    this.provider = new ethers.JsonRpcProvider(rpcUrl);
    logger.info('Chainlink price feeds enabled', { rpcUrl, timeoutMs: this.timeoutMs });
  }

  getFeed(address: string): IPriceFeed {
    const key = address.toLowerCase();
    let feed = this.feeds.get(key);
    if (!feed) {
      feed = new ChainlinkPriceFeed(ethers.getAddress(address), this.provider, this.timeoutMs);
      this.feeds.set(key, feed);
    }
    return feed;
  }

  destroy(): void {
    this.provider.destroy();
  }
}
