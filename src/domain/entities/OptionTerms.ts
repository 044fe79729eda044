import { Identity } from '../valueObjects/Identity';

export enum OptionType {
  PUT = 'PUT',
  CALL = 'CALL'
}

export enum ResolutionReason {
  EXPIRED = 'EXPIRED',
  PRICE = 'PRICE'
}

export interface MediatorTerms {
  priceFeed: string;
  /** Maximum feed age in seconds; no staleness check when absent. */
  heartbeat?: number;
  optionType: OptionType;
  buyer: Identity;
  seller: Identity;
  strikePrice: bigint;
  /** Unix seconds. */
  expiration: number;
}

export function isOptionType(value: string): value is OptionType {
  return value === OptionType.PUT || value === OptionType.CALL;
}
