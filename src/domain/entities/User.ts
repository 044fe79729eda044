import { Identity, sameIdentity } from '../valueObjects/Identity';

export enum UserRole {
  ADMIN = 'ADMIN',
  PARTICIPANT = 'PARTICIPANT'
}

export function isUserRole(value: unknown): value is UserRole {
  return value === UserRole.ADMIN || value === UserRole.PARTICIPANT;
}

/**
 * An authenticated account. The address is the caller identity handed to
 * every contract call made on the user's behalf.
 */
export class User {
  constructor(
    public readonly address: Identity,
    public readonly role: UserRole
  ) {}

  static forAddress(address: Identity, adminAddresses: readonly Identity[]): User {
    const isAdmin = adminAddresses.some(admin => sameIdentity(admin, address));
    return new User(address, isAdmin ? UserRole.ADMIN : UserRole.PARTICIPANT);
  }
}
