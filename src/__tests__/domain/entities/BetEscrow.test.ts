import { BetEscrow } from '../../../domain/entities/BetEscrow';
import { EscrowStatus } from '../../../domain/entities/EscrowStatus';
import { AppError, ErrorCode } from '../../../domain/errors/AppError';
import {
  DepositMadeEvent,
  EscrowCreatedEvent,
  FundsWithdrawnEvent,
  WinnerSelectedEvent
} from '../../../domain/events/ContractEvent';
import { AUTHORITY, BETTOR_A, BETTOR_B, ESCROW, OUTSIDER, T0 } from '../../helpers/fixtures';

function codeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) return error.code;
    throw error;
  }
  return undefined;
}

const at = (caller: string, timestamp = T0) => ({ caller, timestamp });

describe('BetEscrow Entity', () => {
  let escrow: BetEscrow;

  beforeEach(() => {
    escrow = BetEscrow.create({
      address: ESCROW,
      authority: AUTHORITY,
      bettorA: BETTOR_A,
      bettorB: BETTOR_B,
      timestamp: T0
    });
  });

  describe('create', () => {
    it('should start open with zero stakes', () => {
      expect(escrow.status).toBe(EscrowStatus.OPEN);
      expect(escrow.isLocked()).toBe(false);
      expect(escrow.totalStake()).toBe(0n);
      expect(escrow.winner).toBeUndefined();
    });

    it('should record a creation event', () => {
      const events = escrow.pullEvents();
      expect(events).toHaveLength(1);
      expect(events[0]).toBeInstanceOf(EscrowCreatedEvent);
      expect(escrow.pullEvents()).toHaveLength(0);
    });

    it('should reject identical bettors regardless of case', () => {
      expect(
        codeOf(() =>
          BetEscrow.create({
            address: ESCROW,
            authority: AUTHORITY,
            bettorA: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd',
            bettorB: '0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD',
            timestamp: T0
          })
        )
      ).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should reject a missing bettor', () => {
      expect(() =>
        BetEscrow.create({ address: ESCROW, authority: AUTHORITY, bettorA: BETTOR_A, bettorB: '', timestamp: T0 })
      ).toThrow('Both bettors are required');
    });
  });

  describe('deposit', () => {
    it('should reject zero amounts', () => {
      expect(codeOf(() => escrow.deposit(at(BETTOR_A), 0n))).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should reject callers that are not bettors', () => {
      expect(codeOf(() => escrow.deposit(at(OUTSIDER), 1n))).toBe(ErrorCode.FORBIDDEN);
    });

    it('should accumulate partial deposits and lock only on equal totals', () => {
      escrow.deposit(at(BETTOR_A), 3n);
      escrow.deposit(at(BETTOR_B), 1n);
      expect(escrow.isLocked()).toBe(false);
      escrow.deposit(at(BETTOR_B), 1n);
      expect(escrow.isLocked()).toBe(false);
      escrow.deposit(at(BETTOR_B), 1n);

      expect(escrow.stakeOf(BETTOR_A)).toBe(3n);
      expect(escrow.stakeOf(BETTOR_B)).toBe(3n);
      expect(escrow.status).toBe(EscrowStatus.LOCKED);
    });

    it('should reject deposits from either bettor once locked', () => {
      escrow.deposit(at(BETTOR_A), 1n);
      escrow.deposit(at(BETTOR_B), 1n);

      expect(codeOf(() => escrow.deposit(at(BETTOR_A), 1n))).toBe(ErrorCode.INVALID_STATE);
      expect(codeOf(() => escrow.deposit(at(BETTOR_B), 1n))).toBe(ErrorCode.INVALID_STATE);
      expect(escrow.totalStake()).toBe(2n);
    });

    it('should match the caller case-insensitively', () => {
      escrow.deposit(at(BETTOR_A.toUpperCase().replace('0X', '0x')), 5n);
      expect(escrow.stakeOf(BETTOR_A)).toBe(5n);
    });

    it('should emit the amount, running stake and lock flag', () => {
      escrow.pullEvents();
      escrow.deposit(at(BETTOR_A, T0 + 5), 2n);
      escrow.deposit(at(BETTOR_B, T0 + 6), 2n);

      const events = escrow.pullEvents();
      expect(events).toHaveLength(2);
      const last = events[1];
      expect(last).toBeInstanceOf(DepositMadeEvent);
      expect(last.toJSON()).toEqual({
        type: 'DepositMadeEvent',
        contractAddress: ESCROW,
        timestamp: T0 + 6,
        depositor: BETTOR_B,
        amount: '2',
        totalStake: '2',
        locked: true
      });
    });
  });

  describe('selectWinner', () => {
    it('should fail with a state error while stakes differ', () => {
      escrow.deposit(at(BETTOR_A), 1n);
      escrow.deposit(at(BETTOR_B), 2n);

      expect(escrow.isLocked()).toBe(false);
      expect(codeOf(() => escrow.selectWinner(at(AUTHORITY), BETTOR_A))).toBe(ErrorCode.INVALID_STATE);
    });

    describe('when locked', () => {
      beforeEach(() => {
        escrow.deposit(at(BETTOR_A), 1n);
        escrow.deposit(at(BETTOR_B), 1n);
      });

      it('should only accept the authority', () => {
        expect(codeOf(() => escrow.selectWinner(at(BETTOR_A), BETTOR_A))).toBe(ErrorCode.FORBIDDEN);
      });

      it('should reject a candidate that is not a bettor', () => {
        expect(codeOf(() => escrow.selectWinner(at(AUTHORITY), OUTSIDER))).toBe(ErrorCode.VALIDATION_ERROR);
        expect(escrow.hasWinner()).toBe(false);
      });

      it('should store the winner and refuse a second selection', () => {
        escrow.selectWinner(at(AUTHORITY), BETTOR_B);

        expect(escrow.winner).toBe(BETTOR_B);
        expect(escrow.status).toBe(EscrowStatus.RESOLVED);
        expect(() => escrow.selectWinner(at(AUTHORITY), BETTOR_A)).toThrow('Winner already selected');
        expect(escrow.winner).toBe(BETTOR_B);
      });

      it('should report the winner stake in its event', () => {
        escrow.pullEvents();
        escrow.selectWinner(at(AUTHORITY), BETTOR_A);

        const [event] = escrow.pullEvents();
        expect(event).toBeInstanceOf(WinnerSelectedEvent);
        expect(event.toJSON()).toMatchObject({ winner: BETTOR_A, winnerStake: '1' });
      });
    });
  });

  describe('withdraw', () => {
    beforeEach(() => {
      escrow.deposit(at(BETTOR_A), 1n);
      escrow.deposit(at(BETTOR_B), 1n);
    });

    it('should fail before a winner is selected', () => {
      expect(codeOf(() => escrow.withdraw(at(BETTOR_A), 2n))).toBe(ErrorCode.INVALID_STATE);
    });

    it('should pay the whole pool once', () => {
      escrow.selectWinner(at(AUTHORITY), BETTOR_A);

      const receipt = escrow.withdraw(at(BETTOR_A), 2n);

      expect(receipt).toEqual({ winner: BETTOR_A, amount: 2n });
      expect(escrow.stakeOf(BETTOR_A)).toBe(0n);
      expect(escrow.stakeOf(BETTOR_B)).toBe(0n);
      expect(escrow.status).toBe(EscrowStatus.SETTLED);
      expect(escrow.winner).toBe(BETTOR_A);
      expect(codeOf(() => escrow.withdraw(at(BETTOR_A), 2n))).toBe(ErrorCode.INVARIANT_VIOLATION);
    });

    it('should refuse the losing bettor', () => {
      escrow.selectWinner(at(AUTHORITY), BETTOR_A);
      expect(codeOf(() => escrow.withdraw(at(BETTOR_B), 2n))).toBe(ErrorCode.FORBIDDEN);
    });

    it('should refuse when the held balance is below the pool', () => {
      escrow.selectWinner(at(AUTHORITY), BETTOR_A);

      expect(codeOf(() => escrow.withdraw(at(BETTOR_A), 1n))).toBe(ErrorCode.INVARIANT_VIOLATION);
      expect(escrow.totalStake()).toBe(2n);
      expect(escrow.status).toBe(EscrowStatus.RESOLVED);
    });

    it('should emit the paid amount', () => {
      escrow.selectWinner(at(AUTHORITY), BETTOR_A);
      escrow.pullEvents();
      escrow.withdraw(at(BETTOR_A), 2n);

      const [event] = escrow.pullEvents();
      expect(event).toBeInstanceOf(FundsWithdrawnEvent);
      expect(event.toJSON()).toMatchObject({ winner: BETTOR_A, amount: '2' });
    });
  });

  describe('snapshots', () => {
    it('should restore an equivalent escrow', () => {
      escrow.deposit(at(BETTOR_A), 4n);
      escrow.deposit(at(BETTOR_B), 4n);
      escrow.selectWinner(at(AUTHORITY, T0 + 10), BETTOR_B);

      const restored = BetEscrow.fromSnapshot(escrow.toSnapshot());

      expect(restored.toSnapshot()).toEqual(escrow.toSnapshot());
      expect(restored.winner).toBe(BETTOR_B);
      expect(restored.updatedAt).toBe(T0 + 10);
      expect(restored.pullEvents()).toHaveLength(0);
    });

    it('should reject a resolved snapshot without a winner', () => {
      const snapshot = { ...escrow.toSnapshot(), status: EscrowStatus.RESOLVED };
      expect(codeOf(() => BetEscrow.fromSnapshot(snapshot))).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });
});
