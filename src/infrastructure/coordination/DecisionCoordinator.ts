import { injectable } from 'inversify';
import { logger } from '../logging/Logger';

/**
 * Keeps the poller from hammering one mediator: at most one resolution
 * attempt in flight per mediator, and a cooldown after each attempt.
 */
@injectable()
export class DecisionCoordinator {
  private inFlight: Set<string> = new Set();
  private cooldownUntil: Map<string, number> = new Map();
  private readonly defaultCooldownMs: number;

  constructor(defaultCooldownMs?: number) {
    this.defaultCooldownMs = defaultCooldownMs ?? parseInt(process.env.DECISION_COOLDOWN_MS || '15000', 10);
  }

  /**
   * Returns true if work started, false if an attempt is in flight or the
   * cooldown has not elapsed.
   */
  tryStart(mediatorAddress: string): boolean {
    const key = mediatorAddress.toLowerCase();
    const now = Date.now();
    const until = this.cooldownUntil.get(key) || 0;
    if (now < until) {
      logger.debug('DecisionCoordinator: cooldown active, skipping', { mediatorAddress, msRemaining: until - now });
      return false;
    }
    if (this.inFlight.has(key)) {
      logger.debug('DecisionCoordinator: attempt in flight, skipping', { mediatorAddress });
      return false;
    }
    this.inFlight.add(key);
    return true;
  }

  finish(mediatorAddress: string, cooldownMs?: number): void {
    const key = mediatorAddress.toLowerCase();
    this.inFlight.delete(key);
    this.cooldownUntil.set(key, Date.now() + (cooldownMs ?? this.defaultCooldownMs));
  }

  /** Drops all bookkeeping for a mediator that no longer needs polling. */
  forget(mediatorAddress: string): void {
    const key = mediatorAddress.toLowerCase();
    this.inFlight.delete(key);
    this.cooldownUntil.delete(key);
  }

  isInFlight(mediatorAddress: string): boolean {
    return this.inFlight.has(mediatorAddress.toLowerCase());
  }
}
