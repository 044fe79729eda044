import { AppError } from '../errors/AppError';

export enum EscrowStatus {
  OPEN = 'OPEN',
  LOCKED = 'LOCKED',
  RESOLVED = 'RESOLVED',
  SETTLED = 'SETTLED'
}

/**
 * Allowed forward moves of the escrow lifecycle. Nothing moves backwards.
 */
const TRANSITIONS: Record<EscrowStatus, readonly EscrowStatus[]> = {
  [EscrowStatus.OPEN]: [EscrowStatus.LOCKED],
  [EscrowStatus.LOCKED]: [EscrowStatus.RESOLVED],
  [EscrowStatus.RESOLVED]: [EscrowStatus.SETTLED],
  [EscrowStatus.SETTLED]: []
};

export function canTransition(from: EscrowStatus, to: EscrowStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: EscrowStatus, to: EscrowStatus): void {
  if (!canTransition(from, to)) {
    throw AppError.invalidState(`Escrow cannot move from ${from} to ${to}`, { from, to });
  }
}

export function isEscrowStatus(value: string): value is EscrowStatus {
  return Object.values<string>(EscrowStatus).includes(value);
}
