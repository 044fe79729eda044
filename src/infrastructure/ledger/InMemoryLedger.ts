import { injectable } from 'inversify';
import { getAddress, getCreateAddress, isAddress } from 'ethers';
import { AppError } from '../../domain/errors/AppError';
import { AccountInfo, ILedger } from '../../domain/services/ILedger';
import { Identity } from '../../domain/valueObjects/Identity';
import { logger } from '../logging/Logger';

interface AccountState {
  balance: bigint;
  nonce: number;
  isContract: boolean;
}

type LedgerState = Map<string, AccountState>;

/**
 * Native balance accounting for the in-process contracts. Keys are
 * lowercase addresses. Contract accounts start at nonce 1, like on chain.
 */
@injectable()
export class InMemoryLedger implements ILedger {
  private accounts: LedgerState = new Map();
  private checkpoints: LedgerState[] = [];

  getAccount(address: string): AccountInfo {
    const state = this.accounts.get(toKey(address));
    return {
      address: getAddress(address),
      balance: state?.balance ?? 0n,
      nonce: state?.nonce ?? 0,
      isContract: state?.isContract ?? false
    };
  }

  balanceOf(address: string): bigint {
    return this.accounts.get(toKey(address))?.balance ?? 0n;
  }

  transfer(from: Identity, to: string, amount: bigint): void {
    if (this.accounts.get(toKey(to))?.isContract) {
      throw AppError.validationError('Contract accounts do not accept plain transfers', { to });
    }
    this.move(from, to, amount);
  }

  payContract(from: Identity, contract: string, amount: bigint): void {
    if (!this.accounts.get(toKey(contract))?.isContract) {
      throw AppError.notFound(`No contract at ${contract}`);
    }
    this.move(from, contract, amount);
  }

  deployContract(creator: Identity): string {
    const creatorState = this.ensure(creator);
    const address = getCreateAddress({ from: getAddress(creator), nonce: creatorState.nonce });
    creatorState.nonce += 1;

    if (this.accounts.get(toKey(address))?.isContract) {
      throw AppError.invariantViolation(`Contract address ${address} is already taken`);
    }
    // value sent to the address before deployment stays with the contract
    const existing = this.accounts.get(toKey(address));
    this.accounts.set(toKey(address), {
      balance: existing?.balance ?? 0n,
      nonce: 1,
      isContract: true
    });
    logger.debug('Contract account registered', { creator, address });
    return address;
  }

  /**
   * Credits value out of thin air. Used by the faucet and by tests to fund
   * bettors.
   */
  mint(to: string, amount: bigint): void {
    if (amount <= 0n) {
      throw AppError.validationError('Mint amount must be positive');
    }
    this.ensure(to).balance += amount;
  }

  checkpoint(): void {
    this.checkpoints.push(cloneState(this.accounts));
  }

  commit(): void {
    if (this.checkpoints.pop() === undefined) {
      throw AppError.internalError('Ledger commit without checkpoint');
    }
  }

  rollback(): void {
    const saved = this.checkpoints.pop();
    if (saved === undefined) {
      throw AppError.internalError('Ledger rollback without checkpoint');
    }
    this.accounts = saved;
  }

  private move(from: string, to: string, amount: bigint): void {
    if (amount <= 0n) {
      throw AppError.validationError('Transfer amount must be positive');
    }
    const source = this.ensure(from);
    if (source.balance < amount) {
      throw AppError.insufficientFunds(`Balance of ${from} is below ${amount}`, {
        balance: source.balance.toString(),
        amount: amount.toString()
      });
    }
    const target = this.ensure(to);
    source.balance -= amount;
    target.balance += amount;
  }

  private ensure(address: string): AccountState {
    const key = toKey(address);
    let state = this.accounts.get(key);
    if (!state) {
      state = { balance: 0n, nonce: 0, isContract: false };
      this.accounts.set(key, state);
    }
    return state;
  }
}

function toKey(address: string): string {
  if (!isAddress(address)) {
    throw AppError.validationError(`Invalid address: ${address}`);
  }
  return address.toLowerCase();
}

function cloneState(state: LedgerState): LedgerState {
  const copy: LedgerState = new Map();
  for (const [key, account] of state) {
    copy.set(key, { ...account });
  }
  return copy;
}
