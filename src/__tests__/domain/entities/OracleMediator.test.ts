import { BetEscrow } from '../../../domain/entities/BetEscrow';
import { OracleMediator } from '../../../domain/entities/OracleMediator';
import { MediatorTerms, OptionType, ResolutionReason } from '../../../domain/entities/OptionTerms';
import { AppError, ErrorCode } from '../../../domain/errors/AppError';
import { BetResolvedEvent, MediatorCreatedEvent } from '../../../domain/events/ContractEvent';
import { InMemoryPriceFeed } from '../../../infrastructure/oracle/InMemoryPriceFeed';
import { AUTHORITY, BETTOR_A, BETTOR_B, ESCROW, FEED, MEDIATOR, OUTSIDER, T0 } from '../../helpers/fixtures';

const BUYER = BETTOR_A;
const SELLER = BETTOR_B;
const EXPIRATION = T0 + 3600;

function terms(overrides: Partial<MediatorTerms> = {}): MediatorTerms {
  return {
    priceFeed: FEED,
    optionType: OptionType.PUT,
    buyer: BUYER,
    seller: SELLER,
    strikePrice: 100n,
    expiration: EXPIRATION,
    ...overrides
  };
}

async function codeOf(promise: Promise<unknown>): Promise<ErrorCode | undefined> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) return error.code;
    throw error;
  }
  return undefined;
}

function deploy(feed: InMemoryPriceFeed, overrides: Partial<MediatorTerms> = {}, timestamp = T0) {
  return OracleMediator.create(
    { address: MEDIATOR, creator: AUTHORITY, escrowAddress: ESCROW, terms: terms(overrides), timestamp },
    feed
  );
}

function lock(escrow: BetEscrow): void {
  escrow.deposit({ caller: BUYER, timestamp: T0 }, 1n);
  escrow.deposit({ caller: SELLER, timestamp: T0 }, 1n);
}

describe('OracleMediator Entity', () => {
  let feed: InMemoryPriceFeed;

  beforeEach(() => {
    feed = new InMemoryPriceFeed(FEED);
  });

  describe('create', () => {
    it('should create an escrow governed by the mediator', async () => {
      feed.setPrice(110n, T0);

      const { mediator, escrow } = await deploy(feed);

      expect(escrow.address).toBe(ESCROW);
      expect(escrow.authority).toBe(MEDIATOR);
      expect(escrow.bettorA).toBe(BUYER);
      expect(escrow.bettorB).toBe(SELLER);
      expect(mediator.escrowAddress).toBe(ESCROW);
      expect(mediator.isResolved()).toBe(false);

      const [event] = mediator.pullEvents();
      expect(event).toBeInstanceOf(MediatorCreatedEvent);
      expect(event.toJSON()).toMatchObject({ escrowAddress: ESCROW, strikePrice: '100', optionType: 'PUT' });
    });

    it('should accept a put whose strike equals the live price', async () => {
      feed.setPrice(100n, T0);
      await expect(deploy(feed)).resolves.toBeDefined();
    });

    it('should reject a put whose strike is above the live price', async () => {
      feed.setPrice(90n, T0);
      expect(await codeOf(deploy(feed))).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should accept a call below the strike and reject one above it', async () => {
      feed.setPrice(90n, T0);
      await expect(deploy(feed, { optionType: OptionType.CALL })).resolves.toBeDefined();

      feed.setPrice(110n, T0);
      expect(await codeOf(deploy(feed, { optionType: OptionType.CALL }))).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should reject an expiration that is not in the future', async () => {
      feed.setPrice(110n, T0);
      await expect(deploy(feed, { expiration: T0 })).rejects.toThrow('Expiration must be in the future');
    });

    it('should reject missing parties', async () => {
      feed.setPrice(110n, T0);
      await expect(deploy(feed, { buyer: '', seller: '' })).rejects.toThrow('Missing mediator fields: buyer, seller');
    });

    it('should reject identical buyer and seller', async () => {
      feed.setPrice(110n, T0);
      expect(await codeOf(deploy(feed, { seller: BUYER }))).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should fail closed on a stale feed when a heartbeat is set', async () => {
      feed.setPrice(110n, T0 - 60);
      expect(await codeOf(deploy(feed, { heartbeat: 60 }))).toBe(ErrorCode.STALE_PRICE);
      await expect(deploy(feed, { heartbeat: 61 })).resolves.toBeDefined();
    });

    it('should fail when the feed has no data', async () => {
      expect(await codeOf(deploy(feed))).toBe(ErrorCode.ORACLE_ERROR);
    });
  });

  describe('resolve', () => {
    it('should name the buyer of a put once the price is at or below the strike', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed);
      lock(escrow);
      feed.setPrice(95n, T0 + 100);

      const resolution = await mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 100 }, escrow, feed);

      expect(resolution).toEqual({
        winner: BUYER,
        reason: ResolutionReason.PRICE,
        resolvedAt: T0 + 100,
        price: 95n
      });
      expect(escrow.winner).toBe(BUYER);
    });

    it('should fail with no winner while a put is out of the money, then favor the seller after expiration', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed);
      lock(escrow);
      feed.setPrice(105n, T0 + 100);

      expect(await codeOf(mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 100 }, escrow, feed))).toBe(
        ErrorCode.NO_WINNER
      );
      expect(escrow.hasWinner()).toBe(false);
      expect(mediator.isResolved()).toBe(false);

      // at the expiration second itself price still decides
      expect(await codeOf(mediator.resolve({ caller: OUTSIDER, timestamp: EXPIRATION }, escrow, feed))).toBe(
        ErrorCode.NO_WINNER
      );

      const resolution = await mediator.resolve({ caller: OUTSIDER, timestamp: EXPIRATION + 1 }, escrow, feed);
      expect(resolution.winner).toBe(SELLER);
      expect(resolution.reason).toBe(ResolutionReason.EXPIRED);
      expect(escrow.winner).toBe(SELLER);
    });

    it('should not read the feed after expiration', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed, { heartbeat: 10 });
      lock(escrow);
      const spy = jest.spyOn(feed, 'latestPrice');

      const resolution = await mediator.resolve({ caller: OUTSIDER, timestamp: EXPIRATION + 1 }, escrow, feed);

      expect(spy).not.toHaveBeenCalled();
      expect(resolution.price).toBeUndefined();
    });

    it('should name the seller of a call once the price reaches the strike', async () => {
      feed.setPrice(90n, T0);
      const { mediator, escrow } = await deploy(feed, { optionType: OptionType.CALL });
      lock(escrow);
      feed.setPrice(100n, T0 + 10);

      const resolution = await mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 10 }, escrow, feed);
      expect(resolution.winner).toBe(SELLER);
    });

    it('should refuse stale prices before expiration', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed, { heartbeat: 300 });
      lock(escrow);
      feed.setPrice(50n, T0 + 100);

      expect(await codeOf(mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 400 }, escrow, feed))).toBe(
        ErrorCode.STALE_PRICE
      );
      expect(escrow.hasWinner()).toBe(false);
    });

    it('should fail when resolved twice', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed);
      lock(escrow);
      feed.setPrice(80n, T0 + 1);
      await mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 1 }, escrow, feed);

      await expect(
        mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 2 }, escrow, feed)
      ).rejects.toThrow('Winner already selected');
    });

    it('should fail when the escrow is not locked', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed);
      feed.setPrice(80n, T0 + 1);

      expect(await codeOf(mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 1 }, escrow, feed))).toBe(
        ErrorCode.INVALID_STATE
      );
      expect(mediator.isResolved()).toBe(false);
    });

    it('should emit a resolution event with the terms', async () => {
      feed.setPrice(110n, T0);
      const { mediator, escrow } = await deploy(feed);
      mediator.pullEvents();
      lock(escrow);

      await mediator.resolve({ caller: OUTSIDER, timestamp: EXPIRATION + 5 }, escrow, feed);

      const [event] = mediator.pullEvents();
      expect(event).toBeInstanceOf(BetResolvedEvent);
      expect(event.toJSON()).toEqual({
        type: 'BetResolvedEvent',
        contractAddress: MEDIATOR,
        timestamp: EXPIRATION + 5,
        escrowAddress: ESCROW,
        strikePrice: '100',
        expiration: EXPIRATION,
        optionType: 'PUT',
        winner: SELLER,
        reason: 'EXPIRED'
      });
    });
  });

  it('should survive a snapshot round trip with its resolution', async () => {
    feed.setPrice(110n, T0);
    const { mediator, escrow } = await deploy(feed, { heartbeat: 30 });
    lock(escrow);
    feed.setPrice(70n, T0 + 5);
    await mediator.resolve({ caller: OUTSIDER, timestamp: T0 + 5 }, escrow, feed);

    const restored = OracleMediator.fromSnapshot(mediator.toSnapshot());

    expect(restored.terms).toEqual(mediator.terms);
    expect(restored.resolution).toEqual({ winner: BUYER, reason: ResolutionReason.PRICE, resolvedAt: T0 + 5, price: 70n });
  });
});

