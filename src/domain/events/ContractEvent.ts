import { Identity } from '../valueObjects/Identity';
import { OptionType, ResolutionReason } from '../entities/OptionTerms';

export abstract class ContractEvent {
  constructor(
    public readonly contractAddress: string,
    public readonly timestamp: number
  ) {}

  get type(): string {
    return this.constructor.name;
  }

  /**
   * Plain representation with amounts rendered as decimal strings.
   */
  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = { type: this.type };
    for (const [key, value] of Object.entries(this)) {
      out[key] = typeof value === 'bigint' ? value.toString() : value;
    }
    return out;
  }
}

export class EscrowCreatedEvent extends ContractEvent {
  constructor(
    contractAddress: string,
    timestamp: number,
    public readonly authority: Identity,
    public readonly bettorA: Identity,
    public readonly bettorB: Identity
  ) {
    super(contractAddress, timestamp);
  }
}

export class DepositMadeEvent extends ContractEvent {
  constructor(
    contractAddress: string,
    timestamp: number,
    public readonly depositor: Identity,
    public readonly amount: bigint,
    public readonly totalStake: bigint,
    public readonly locked: boolean
  ) {
    super(contractAddress, timestamp);
  }
}

export class WinnerSelectedEvent extends ContractEvent {
  constructor(
    contractAddress: string,
    timestamp: number,
    public readonly winner: Identity,
    public readonly winnerStake: bigint
  ) {
    super(contractAddress, timestamp);
  }
}

export class FundsWithdrawnEvent extends ContractEvent {
  constructor(
    contractAddress: string,
    timestamp: number,
    public readonly winner: Identity,
    public readonly amount: bigint
  ) {
    super(contractAddress, timestamp);
  }
}

export class MediatorCreatedEvent extends ContractEvent {
  constructor(
    contractAddress: string,
    timestamp: number,
    public readonly escrowAddress: string,
    public readonly priceFeed: string,
    public readonly optionType: OptionType,
    public readonly buyer: Identity,
    public readonly seller: Identity,
    public readonly strikePrice: bigint,
    public readonly expiration: number
  ) {
    super(contractAddress, timestamp);
  }
}

export class BetResolvedEvent extends ContractEvent {
  constructor(
    contractAddress: string,
    timestamp: number,
    public readonly escrowAddress: string,
    public readonly strikePrice: bigint,
    public readonly expiration: number,
    public readonly optionType: OptionType,
    public readonly winner: Identity,
    public readonly reason: ResolutionReason
  ) {
    super(contractAddress, timestamp);
  }
}
