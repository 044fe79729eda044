import { AppError } from '../errors/AppError';
import {
  ContractEvent,
  DepositMadeEvent,
  EscrowCreatedEvent,
  FundsWithdrawnEvent,
  WinnerSelectedEvent
} from '../events/ContractEvent';
import { CallContext } from '../valueObjects/CallContext';
import { Identity, assertCaller, isBlankIdentity, sameIdentity } from '../valueObjects/Identity';
import { EscrowStatus, assertTransition, isEscrowStatus } from './EscrowStatus';

type EscrowState =
  | { status: EscrowStatus.OPEN }
  | { status: EscrowStatus.LOCKED }
  | { status: EscrowStatus.RESOLVED; winner: Identity }
  | { status: EscrowStatus.SETTLED; winner: Identity; payout: bigint };

export interface EscrowSnapshot {
  address: string;
  authority: Identity;
  bettorA: Identity;
  bettorB: Identity;
  stakeA: string;
  stakeB: string;
  status: EscrowStatus;
  winner?: Identity;
  payout?: string;
  createdAt: number;
  updatedAt: number;
}

export interface CreateEscrowParams {
  address: string;
  authority: Identity;
  bettorA: Identity;
  bettorB: Identity;
  timestamp: number;
}

export interface WithdrawalReceipt {
  winner: Identity;
  amount: bigint;
}

/**
 * Two-party wager escrow.
 *
 * Both bettors deposit until their totals match, which locks the escrow.
 * The authority then names one bettor as winner, and that bettor withdraws
 * the whole pool once.
 */
export class BetEscrow {
  private state: EscrowState;
  private stakeA: bigint;
  private stakeB: bigint;
  private pendingEvents: ContractEvent[] = [];

  private constructor(
    public readonly address: string,
    public readonly authority: Identity,
    public readonly bettorA: Identity,
    public readonly bettorB: Identity,
    state: EscrowState,
    stakeA: bigint,
    stakeB: bigint,
    public readonly createdAt: number,
    private _updatedAt: number
  ) {
    this.state = state;
    this.stakeA = stakeA;
    this.stakeB = stakeB;
  }

  static create(params: CreateEscrowParams): BetEscrow {
    if (isBlankIdentity(params.bettorA) || isBlankIdentity(params.bettorB)) {
      throw AppError.validationError('Both bettors are required');
    }
    if (isBlankIdentity(params.authority)) {
      throw AppError.validationError('Escrow authority is required');
    }
    if (sameIdentity(params.bettorA, params.bettorB)) {
      throw AppError.validationError('Bettors must be two distinct accounts');
    }

    const escrow = new BetEscrow(
      params.address,
      params.authority,
      params.bettorA,
      params.bettorB,
      { status: EscrowStatus.OPEN },
      0n,
      0n,
      params.timestamp,
      params.timestamp
    );
    escrow.record(
      new EscrowCreatedEvent(params.address, params.timestamp, params.authority, params.bettorA, params.bettorB)
    );
    return escrow;
  }

  static fromSnapshot(snapshot: EscrowSnapshot): BetEscrow {
    if (!isEscrowStatus(snapshot.status)) {
      throw AppError.internalError(`Escrow ${snapshot.address} has unknown status ${String(snapshot.status)}`);
    }
    const stakeA = BigInt(snapshot.stakeA);
    const stakeB = BigInt(snapshot.stakeB);
    return new BetEscrow(
      snapshot.address,
      snapshot.authority,
      snapshot.bettorA,
      snapshot.bettorB,
      BetEscrow.restoreState(snapshot, stakeA + stakeB),
      stakeA,
      stakeB,
      snapshot.createdAt,
      snapshot.updatedAt
    );
  }

  private static restoreState(snapshot: EscrowSnapshot, total: bigint): EscrowState {
    switch (snapshot.status) {
      case EscrowStatus.OPEN:
        return { status: EscrowStatus.OPEN };
      case EscrowStatus.LOCKED:
        return { status: EscrowStatus.LOCKED };
      case EscrowStatus.RESOLVED:
        if (!snapshot.winner) {
          throw AppError.internalError(`Resolved escrow ${snapshot.address} has no winner`);
        }
        return { status: EscrowStatus.RESOLVED, winner: snapshot.winner };
      case EscrowStatus.SETTLED:
        if (!snapshot.winner || snapshot.payout === undefined || total !== 0n) {
          throw AppError.internalError(`Settled escrow ${snapshot.address} is inconsistent`);
        }
        return { status: EscrowStatus.SETTLED, winner: snapshot.winner, payout: BigInt(snapshot.payout) };
    }
  }

  get status(): EscrowStatus {
    return this.state.status;
  }

  get updatedAt(): number {
    return this._updatedAt;
  }

  get winner(): Identity | undefined {
    return this.state.status === EscrowStatus.RESOLVED || this.state.status === EscrowStatus.SETTLED
      ? this.state.winner
      : undefined;
  }

  isLocked(): boolean {
    return this.state.status !== EscrowStatus.OPEN;
  }

  hasWinner(): boolean {
    return this.winner !== undefined;
  }

  isBettor(identity: Identity): boolean {
    return sameIdentity(identity, this.bettorA) || sameIdentity(identity, this.bettorB);
  }

  stakeOf(identity: Identity): bigint {
    if (sameIdentity(identity, this.bettorA)) return this.stakeA;
    if (sameIdentity(identity, this.bettorB)) return this.stakeB;
    return 0n;
  }

  totalStake(): bigint {
    return this.stakeA + this.stakeB;
  }

  deposit(ctx: CallContext, amount: bigint): void {
    if (amount <= 0n) {
      throw AppError.validationError('Deposit amount must be positive');
    }
    if (!this.isBettor(ctx.caller)) {
      throw AppError.forbidden('Only a bettor can deposit');
    }
    if (this.isLocked()) {
      throw AppError.invalidState('Bet is locked; deposits are closed');
    }

    if (sameIdentity(ctx.caller, this.bettorA)) {
      this.stakeA += amount;
    } else {
      this.stakeB += amount;
    }

    const locked = this.stakeA === this.stakeB && this.stakeA > 0n;
    if (locked) {
      this.moveTo({ status: EscrowStatus.LOCKED });
    }

    this.touch(ctx.timestamp);
    this.record(
      new DepositMadeEvent(this.address, ctx.timestamp, ctx.caller, amount, this.stakeOf(ctx.caller), locked)
    );
  }

  selectWinner(ctx: CallContext, candidate: Identity): void {
    assertCaller(ctx.caller, this.authority, 'Only the escrow authority can select the winner');
    if (this.state.status === EscrowStatus.OPEN) {
      throw AppError.invalidState('Bet is not locked yet');
    }
    if (this.hasWinner()) {
      throw AppError.invalidState('Winner already selected');
    }
    if (!this.isBettor(candidate)) {
      throw AppError.validationError('Winner must be one of the two bettors');
    }

    const winner = sameIdentity(candidate, this.bettorA) ? this.bettorA : this.bettorB;
    this.moveTo({ status: EscrowStatus.RESOLVED, winner });
    this.touch(ctx.timestamp);
    this.record(new WinnerSelectedEvent(this.address, ctx.timestamp, winner, this.stakeOf(winner)));
  }

  /**
   * Releases the pool to the winner. `heldBalance` is what the escrow
   * account currently holds on the ledger.
   */
  withdraw(ctx: CallContext, heldBalance: bigint): WithdrawalReceipt {
    const winner = this.winner;
    if (winner === undefined) {
      throw AppError.invalidState('Winner has not been selected');
    }
    assertCaller(ctx.caller, winner, 'Only the winner can withdraw');

    const total = this.totalStake();
    if (total === 0n) {
      throw AppError.invariantViolation('Nothing to withdraw');
    }
    if (heldBalance < total) {
      throw AppError.invariantViolation('Escrow balance is below the payout', {
        heldBalance: heldBalance.toString(),
        payout: total.toString()
      });
    }

    this.stakeA = 0n;
    this.stakeB = 0n;
    this.moveTo({ status: EscrowStatus.SETTLED, winner, payout: total });
    this.touch(ctx.timestamp);
    this.record(new FundsWithdrawnEvent(this.address, ctx.timestamp, winner, total));

    return { winner, amount: total };
  }

  /** Returns and clears the events recorded since the last call. */
  pullEvents(): ContractEvent[] {
    const events = this.pendingEvents;
    this.pendingEvents = [];
    return events;
  }

  toSnapshot(): EscrowSnapshot {
    return {
      address: this.address,
      authority: this.authority,
      bettorA: this.bettorA,
      bettorB: this.bettorB,
      stakeA: this.stakeA.toString(),
      stakeB: this.stakeB.toString(),
      status: this.state.status,
      winner: this.winner,
      payout: this.state.status === EscrowStatus.SETTLED ? this.state.payout.toString() : undefined,
      createdAt: this.createdAt,
      updatedAt: this._updatedAt
    };
  }

  private moveTo(next: EscrowState): void {
    assertTransition(this.state.status, next.status);
    this.state = next;
  }

  private touch(timestamp: number): void {
    this._updatedAt = timestamp;
  }

  private record(event: ContractEvent): void {
    this.pendingEvents.push(event);
  }
}
