import { injectable, inject } from 'inversify';
import { ethers } from 'ethers';
import { AppError } from '../../domain/errors/AppError';
import { User } from '../../domain/entities/User';
import { IClock } from '../../domain/services/IClock';
import { sameIdentity } from '../../domain/valueObjects/Identity';
import { logger } from '../logging/Logger';

const CHALLENGE_TTL_SECONDS = 300;

export interface AuthChallenge {
  address: string;
  message: string;
  expiresAt: number;
}

/**
 * Proves address ownership: the client signs a one-time challenge with
 * its key (personal_sign) and the recovered signer must match.
 */
@injectable()
export class SignatureAuthService {
  private challenges: Map<string, AuthChallenge> = new Map();

  constructor(
    @inject('IClock') private clock: IClock
  ) {}

  issueChallenge(address: string): AuthChallenge {
    const checksummed = ethers.getAddress(address);
    const now = this.clock.now();
    const nonce = ethers.hexlify(ethers.randomBytes(16));
    const challenge: AuthChallenge = {
      address: checksummed,
      message: `Sign in to BetMe escrow\nAddress: ${checksummed}\nNonce: ${nonce}\nIssued At: ${now}`,
      expiresAt: now + CHALLENGE_TTL_SECONDS
    };
    this.challenges.set(checksummed.toLowerCase(), challenge);
    this.pruneExpired(now);
    return challenge;
  }

  /**
   * Consumes the pending challenge for `address`. A challenge can be used
   * once, whether or not the signature matches.
   */
  verifyChallenge(address: string, signature: string): User {
    const key = address.toLowerCase();
    const challenge = this.challenges.get(key);
    this.challenges.delete(key);

    if (!challenge || challenge.expiresAt < this.clock.now()) {
      throw AppError.unauthorized('No pending challenge for this address');
    }

    let signer: string;
    try {
      signer = ethers.verifyMessage(challenge.message, signature);
    } catch (error) {
      logger.warn('Malformed login signature', {
        address,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      throw AppError.unauthorized('Invalid signature');
    }
    if (!sameIdentity(signer, challenge.address)) {
      throw AppError.unauthorized('Signature does not match address');
    }

    return User.forAddress(challenge.address, adminAddresses());
  }

  private pruneExpired(now: number): void {
    for (const [key, challenge] of this.challenges) {
      if (challenge.expiresAt < now) {
        this.challenges.delete(key);
      }
    }
  }
}

export function adminAddresses(): string[] {
  return (process.env.ADMIN_ADDRESSES || '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}
