import { AppError } from '../errors/AppError';
import { BetResolvedEvent, ContractEvent, MediatorCreatedEvent } from '../events/ContractEvent';
import { IPriceFeed, PriceReading } from '../services/IPriceFeed';
import { CallContext } from '../valueObjects/CallContext';
import { Identity, isBlankIdentity, sameIdentity } from '../valueObjects/Identity';
import { BetEscrow } from './BetEscrow';
import { MediatorTerms, OptionType, ResolutionReason, isOptionType } from './OptionTerms';

export interface MediatorResolution {
  winner: Identity;
  reason: ResolutionReason;
  resolvedAt: number;
  /** Feed price the decision was based on; absent for expiry. */
  price?: bigint;
}

export interface MediatorSnapshot {
  address: string;
  creator: Identity;
  escrowAddress: string;
  priceFeed: string;
  heartbeat?: number;
  optionType: OptionType;
  buyer: Identity;
  seller: Identity;
  strikePrice: string;
  expiration: number;
  resolution?: {
    winner: Identity;
    reason: ResolutionReason;
    resolvedAt: number;
    price?: string;
  };
  createdAt: number;
}

export interface CreateMediatorParams {
  address: string;
  creator: Identity;
  escrowAddress: string;
  terms: MediatorTerms;
  timestamp: number;
}

/**
 * Oracle-driven decider. Creates its own escrow, becomes its authority,
 * and names the winner from a price feed reading against the strike.
 */
export class OracleMediator {
  private _resolution?: MediatorResolution;
  private pendingEvents: ContractEvent[] = [];

  private constructor(
    public readonly address: string,
    public readonly creator: Identity,
    public readonly escrowAddress: string,
    public readonly terms: MediatorTerms,
    public readonly createdAt: number,
    resolution?: MediatorResolution
  ) {
    this._resolution = resolution;
  }

  static async create(
    params: CreateMediatorParams,
    feed: IPriceFeed
  ): Promise<{ mediator: OracleMediator; escrow: BetEscrow }> {
    const { terms, timestamp } = params;
    OracleMediator.validateTerms(terms, timestamp);

    const reading = await readFeed(feed, terms.heartbeat, timestamp);
    if (terms.optionType === OptionType.PUT && reading.price < terms.strikePrice) {
      throw AppError.validationError('Put strike must not exceed the current price', {
        price: reading.price.toString(),
        strikePrice: terms.strikePrice.toString()
      });
    }
    if (terms.optionType === OptionType.CALL && reading.price > terms.strikePrice) {
      throw AppError.validationError('Call strike must not be below the current price', {
        price: reading.price.toString(),
        strikePrice: terms.strikePrice.toString()
      });
    }

    const escrow = BetEscrow.create({
      address: params.escrowAddress,
      authority: params.address,
      bettorA: terms.buyer,
      bettorB: terms.seller,
      timestamp
    });

    const mediator = new OracleMediator(params.address, params.creator, params.escrowAddress, { ...terms }, timestamp);
    mediator.record(
      new MediatorCreatedEvent(
        params.address,
        timestamp,
        params.escrowAddress,
        terms.priceFeed,
        terms.optionType,
        terms.buyer,
        terms.seller,
        terms.strikePrice,
        terms.expiration
      )
    );

    return { mediator, escrow };
  }

  private static validateTerms(terms: MediatorTerms, now: number): void {
    const missing: string[] = [];
    if (isBlankIdentity(terms.priceFeed)) missing.push('priceFeed');
    if (isBlankIdentity(terms.buyer)) missing.push('buyer');
    if (isBlankIdentity(terms.seller)) missing.push('seller');
    if (!isOptionType(terms.optionType)) missing.push('optionType');
    if (missing.length > 0) {
      throw AppError.validationError(`Missing mediator fields: ${missing.join(', ')}`, { missing });
    }
    if (terms.strikePrice <= 0n) {
      throw AppError.validationError('Strike price must be positive');
    }
    if (terms.heartbeat !== undefined && terms.heartbeat <= 0) {
      throw AppError.validationError('Heartbeat must be positive when set');
    }
    if (terms.expiration <= now) {
      throw AppError.validationError('Expiration must be in the future', {
        expiration: terms.expiration,
        now
      });
    }
  }

  static fromSnapshot(snapshot: MediatorSnapshot): OracleMediator {
    const resolution: MediatorResolution | undefined = snapshot.resolution
      ? {
          winner: snapshot.resolution.winner,
          reason: snapshot.resolution.reason,
          resolvedAt: snapshot.resolution.resolvedAt,
          price: snapshot.resolution.price === undefined ? undefined : BigInt(snapshot.resolution.price)
        }
      : undefined;

    return new OracleMediator(
      snapshot.address,
      snapshot.creator,
      snapshot.escrowAddress,
      {
        priceFeed: snapshot.priceFeed,
        heartbeat: snapshot.heartbeat,
        optionType: snapshot.optionType,
        buyer: snapshot.buyer,
        seller: snapshot.seller,
        strikePrice: BigInt(snapshot.strikePrice),
        expiration: snapshot.expiration
      },
      snapshot.createdAt,
      resolution
    );
  }

  get resolution(): MediatorResolution | undefined {
    return this._resolution;
  }

  isResolved(): boolean {
    return this._resolution !== undefined;
  }

  isExpired(now: number): boolean {
    return now > this.terms.expiration;
  }

  /**
   * Decides the winner and forwards it to the escrow. Open to any caller.
   * Past expiration the seller wins without consulting the feed.
   */
  async resolve(ctx: CallContext, escrow: BetEscrow, feed: IPriceFeed): Promise<MediatorResolution> {
    if (!sameIdentity(escrow.address, this.escrowAddress)) {
      throw AppError.invariantViolation('Escrow does not belong to this mediator');
    }
    if (escrow.hasWinner()) {
      throw AppError.invalidState('Winner already selected');
    }

    let winner: Identity;
    let reason: ResolutionReason;
    let price: bigint | undefined;

    if (this.isExpired(ctx.timestamp)) {
      winner = this.terms.seller;
      reason = ResolutionReason.EXPIRED;
    } else {
      const reading = await readFeed(feed, this.terms.heartbeat, ctx.timestamp);
      price = reading.price;
      winner = this.decideByPrice(reading.price);
      reason = ResolutionReason.PRICE;
    }

    escrow.selectWinner({ caller: this.address, timestamp: ctx.timestamp }, winner);

    const resolution: MediatorResolution = { winner, reason, resolvedAt: ctx.timestamp, price };
    this._resolution = resolution;
    this.record(
      new BetResolvedEvent(
        this.address,
        ctx.timestamp,
        this.escrowAddress,
        this.terms.strikePrice,
        this.terms.expiration,
        this.terms.optionType,
        winner,
        reason
      )
    );
    return resolution;
  }

  private decideByPrice(price: bigint): Identity {
    const { optionType, strikePrice } = this.terms;
    if (optionType === OptionType.PUT && price <= strikePrice) {
      return this.terms.buyer;
    }
    if (optionType === OptionType.CALL && price >= strikePrice) {
      return this.terms.seller;
    }
    throw AppError.noWinner(`Price ${price} has not crossed strike ${strikePrice}`);
  }

  pullEvents(): ContractEvent[] {
    const events = this.pendingEvents;
    this.pendingEvents = [];
    return events;
  }

  toSnapshot(): MediatorSnapshot {
    const resolution = this._resolution;
    return {
      address: this.address,
      creator: this.creator,
      escrowAddress: this.escrowAddress,
      priceFeed: this.terms.priceFeed,
      heartbeat: this.terms.heartbeat,
      optionType: this.terms.optionType,
      buyer: this.terms.buyer,
      seller: this.terms.seller,
      strikePrice: this.terms.strikePrice.toString(),
      expiration: this.terms.expiration,
      resolution: resolution
        ? {
            winner: resolution.winner,
            reason: resolution.reason,
            resolvedAt: resolution.resolvedAt,
            price: resolution.price?.toString()
          }
        : undefined,
      createdAt: this.createdAt
    };
  }

  private record(event: ContractEvent): void {
    this.pendingEvents.push(event);
  }
}

/**
 * Reads the feed and fails closed on unusable data.
 */
async function readFeed(feed: IPriceFeed, heartbeat: number | undefined, now: number): Promise<PriceReading> {
  let reading: PriceReading;
  try {
    reading = await feed.latestPrice();
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw AppError.oracleError(`Price feed ${feed.address} could not be read`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  if (reading.price <= 0n || reading.updatedAt <= 0) {
    throw AppError.oracleError(`Price feed ${feed.address} returned an invalid round`);
  }
  if (heartbeat !== undefined && reading.updatedAt + heartbeat <= now) {
    throw AppError.stalePrice(`Price feed ${feed.address} is stale`, {
      updatedAt: reading.updatedAt,
      heartbeat,
      now
    });
  }
  return reading;
}
