import { BetEscrow } from '../../domain/entities/BetEscrow';
import { EscrowStatus } from '../../domain/entities/EscrowStatus';
import { OracleMediator } from '../../domain/entities/OracleMediator';
import { OptionType, ResolutionReason } from '../../domain/entities/OptionTerms';
import { AccountInfo } from '../../domain/services/ILedger';
import { StoredContractEvent } from '../../domain/repositories/IContractEventRepository';

/** JSON-safe shapes returned by the use cases; amounts are decimal strings. */

export interface EscrowView {
  address: string;
  authority: string;
  bettorA: string;
  bettorB: string;
  stakes: Record<string, string>;
  totalStake: string;
  status: EscrowStatus;
  locked: boolean;
  winner: string | null;
  balance: string;
  createdAt: number;
  updatedAt: number;
}

export interface MediatorView {
  address: string;
  creator: string;
  escrowAddress: string;
  priceFeed: string;
  heartbeat: number | null;
  optionType: OptionType;
  buyer: string;
  seller: string;
  strikePrice: string;
  expiration: number;
  resolution: {
    winner: string;
    reason: ResolutionReason;
    resolvedAt: number;
    price: string | null;
  } | null;
  createdAt: number;
}

export interface AccountView {
  address: string;
  balance: string;
  nonce: number;
  isContract: boolean;
}

export interface ContractCallResult<T> {
  result: T;
  events: StoredContractEvent[];
}

export function toEscrowView(escrow: BetEscrow, balance: bigint): EscrowView {
  return {
    address: escrow.address,
    authority: escrow.authority,
    bettorA: escrow.bettorA,
    bettorB: escrow.bettorB,
    stakes: {
      [escrow.bettorA]: escrow.stakeOf(escrow.bettorA).toString(),
      [escrow.bettorB]: escrow.stakeOf(escrow.bettorB).toString()
    },
    totalStake: escrow.totalStake().toString(),
    status: escrow.status,
    locked: escrow.isLocked(),
    winner: escrow.winner ?? null,
    balance: balance.toString(),
    createdAt: escrow.createdAt,
    updatedAt: escrow.updatedAt
  };
}

export function toMediatorView(mediator: OracleMediator): MediatorView {
  const { terms, resolution } = mediator;
  return {
    address: mediator.address,
    creator: mediator.creator,
    escrowAddress: mediator.escrowAddress,
    priceFeed: terms.priceFeed,
    heartbeat: terms.heartbeat ?? null,
    optionType: terms.optionType,
    buyer: terms.buyer,
    seller: terms.seller,
    strikePrice: terms.strikePrice.toString(),
    expiration: terms.expiration,
    resolution: resolution
      ? {
          winner: resolution.winner,
          reason: resolution.reason,
          resolvedAt: resolution.resolvedAt,
          price: resolution.price?.toString() ?? null
        }
      : null,
    createdAt: mediator.createdAt
  };
}

export function toAccountView(account: AccountInfo): AccountView {
  return {
    address: account.address,
    balance: account.balance.toString(),
    nonce: account.nonce,
    isContract: account.isContract
  };
}
