import { Identity } from '../valueObjects/Identity';
import { ICheckpointed } from './ITransactionScope';

export interface AccountInfo {
  address: string;
  balance: bigint;
  nonce: number;
  isContract: boolean;
}

/**
 * Native value accounting of the execution substrate. Every method either
 * applies completely or throws without changing anything.
 */
export interface ILedger extends ICheckpointed {
  getAccount(address: string): AccountInfo;
  balanceOf(address: string): bigint;

  /** Moves value between accounts. Contract recipients are rejected. */
  transfer(from: Identity, to: string, amount: bigint): void;

  /** Moves value into a contract through one of its payable operations. */
  payContract(from: Identity, contract: string, amount: bigint): void;

  /** Registers a new contract account and returns its derived address. */
  deployContract(creator: Identity): string;

  mint(to: string, amount: bigint): void;
}
