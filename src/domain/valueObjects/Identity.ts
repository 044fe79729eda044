import { AppError } from '../errors/AppError';

/**
 * An account address as supplied by the execution substrate. Addresses are
 * compared case-insensitively so checksummed and lowercase forms match.
 */
export type Identity = string;

export const ZERO_IDENTITY: Identity = '0x0000000000000000000000000000000000000000';

export function sameIdentity(a: Identity, b: Identity): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Guard evaluated at the start of every privileged operation.
 */
export function assertCaller(actual: Identity, expected: Identity, message: string): void {
  if (!sameIdentity(actual, expected)) {
    throw AppError.forbidden(message);
  }
}

export function isBlankIdentity(value: Identity | undefined | null): boolean {
  return !value || value.trim().length === 0;
}
