import { getAddress, getCreateAddress } from 'ethers';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { InMemoryLedger } from '../../infrastructure/ledger/InMemoryLedger';
import { AUTHORITY, BETTOR_A, BETTOR_B } from '../helpers/fixtures';

function codeOf(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) return error.code;
    throw error;
  }
  return undefined;
}

describe('InMemoryLedger', () => {
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ledger = new InMemoryLedger();
    ledger.mint(BETTOR_A, 10n);
  });

  it('should report unknown accounts as empty externally owned accounts', () => {
    expect(ledger.getAccount(BETTOR_B)).toEqual({
      address: getAddress(BETTOR_B),
      balance: 0n,
      nonce: 0,
      isContract: false
    });
  });

  it('should move value between accounts', () => {
    ledger.transfer(BETTOR_A, BETTOR_B, 4n);

    expect(ledger.balanceOf(BETTOR_A)).toBe(6n);
    expect(ledger.balanceOf(BETTOR_B)).toBe(4n);
  });

  it('should leave balances untouched when funds are short', () => {
    expect(codeOf(() => ledger.transfer(BETTOR_A, BETTOR_B, 11n))).toBe(ErrorCode.INSUFFICIENT_FUNDS);
    expect(ledger.balanceOf(BETTOR_A)).toBe(10n);
    expect(ledger.balanceOf(BETTOR_B)).toBe(0n);
  });

  it('should reject non-positive amounts and malformed addresses', () => {
    expect(codeOf(() => ledger.transfer(BETTOR_A, BETTOR_B, 0n))).toBe(ErrorCode.VALIDATION_ERROR);
    expect(codeOf(() => ledger.mint(BETTOR_A, -1n))).toBe(ErrorCode.VALIDATION_ERROR);
    expect(codeOf(() => ledger.balanceOf('not-an-address'))).toBe(ErrorCode.VALIDATION_ERROR);
  });

  describe('contracts', () => {
    it('should derive addresses from the creator nonce', () => {
      const first = ledger.deployContract(AUTHORITY);
      const second = ledger.deployContract(AUTHORITY);

      expect(first).toBe(getCreateAddress({ from: getAddress(AUTHORITY), nonce: 0 }));
      expect(second).toBe(getCreateAddress({ from: getAddress(AUTHORITY), nonce: 1 }));
      expect(ledger.getAccount(AUTHORITY).nonce).toBe(2);
      expect(ledger.getAccount(first)).toMatchObject({ isContract: true, nonce: 1, balance: 0n });
    });

    it('should start contract-created contracts at nonce one', () => {
      const parent = ledger.deployContract(AUTHORITY);
      const child = ledger.deployContract(parent);

      expect(child).toBe(getCreateAddress({ from: parent, nonce: 1 }));
      expect(ledger.getAccount(parent).nonce).toBe(2);
    });

    it('should accept value only through payable calls', () => {
      const contract = ledger.deployContract(AUTHORITY);

      expect(codeOf(() => ledger.transfer(BETTOR_A, contract, 1n))).toBe(ErrorCode.VALIDATION_ERROR);
      ledger.payContract(BETTOR_A, contract, 3n);

      expect(ledger.balanceOf(contract)).toBe(3n);
      expect(ledger.balanceOf(BETTOR_A)).toBe(7n);
    });

    it('should keep value sent to an address before a contract is deployed there', () => {
      const predicted = getCreateAddress({ from: getAddress(AUTHORITY), nonce: 0 });
      ledger.transfer(BETTOR_A, predicted, 2n);

      const contract = ledger.deployContract(AUTHORITY);

      expect(contract).toBe(predicted);
      expect(ledger.getAccount(contract)).toMatchObject({ isContract: true, nonce: 1, balance: 2n });
      expect(codeOf(() => ledger.transfer(BETTOR_A, contract, 1n))).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should refuse payable calls to plain accounts', () => {
      expect(codeOf(() => ledger.payContract(BETTOR_A, BETTOR_B, 1n))).toBe(ErrorCode.NOT_FOUND);
    });
  });

  describe('checkpoints', () => {
    it('should restore the state saved by the last checkpoint', () => {
      ledger.checkpoint();
      ledger.transfer(BETTOR_A, BETTOR_B, 5n);
      ledger.deployContract(BETTOR_B);
      ledger.rollback();

      expect(ledger.balanceOf(BETTOR_A)).toBe(10n);
      expect(ledger.balanceOf(BETTOR_B)).toBe(0n);
      expect(ledger.getAccount(BETTOR_B).nonce).toBe(0);
    });

    it('should keep changes on commit', () => {
      ledger.checkpoint();
      ledger.transfer(BETTOR_A, BETTOR_B, 5n);
      ledger.commit();

      expect(ledger.balanceOf(BETTOR_B)).toBe(5n);
      expect(codeOf(() => ledger.rollback())).toBe(ErrorCode.INTERNAL_ERROR);
    });

    it('should fail to commit without a checkpoint', () => {
      expect(codeOf(() => ledger.commit())).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });
});
