import { injectable } from 'inversify';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { BetEscrow, EscrowSnapshot } from '../../domain/entities/BetEscrow';
import { AppError } from '../../domain/errors/AppError';
import { ICheckpointed } from '../../domain/services/ITransactionScope';

/**
 * Stores snapshots rather than live entities so that an entity mutated by a
 * failed call never leaks into storage. Stored snapshots are replaced, never
 * mutated, so a checkpoint only copies the map.
 */
@injectable()
export class InMemoryEscrowRepository implements IEscrowRepository, ICheckpointed {
  private escrows: Map<string, EscrowSnapshot> = new Map();
  private checkpoints: Map<string, EscrowSnapshot>[] = [];

  async findByAddress(address: string): Promise<BetEscrow | null> {
    const snapshot = this.escrows.get(address.toLowerCase());
    return snapshot ? BetEscrow.fromSnapshot(structuredClone(snapshot)) : null;
  }

  async save(escrow: BetEscrow): Promise<void> {
    this.escrows.set(escrow.address.toLowerCase(), escrow.toSnapshot());
  }

  checkpoint(): void {
    this.checkpoints.push(new Map(this.escrows));
  }

  commit(): void {
    if (this.checkpoints.pop() === undefined) {
      throw AppError.internalError('Escrow repository commit without checkpoint');
    }
  }

  rollback(): void {
    const saved = this.checkpoints.pop();
    if (saved === undefined) {
      throw AppError.internalError('Escrow repository rollback without checkpoint');
    }
    this.escrows = saved;
  }
}
