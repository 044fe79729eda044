import { injectable } from 'inversify';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import { MediatorSnapshot, OracleMediator } from '../../domain/entities/OracleMediator';
import { AppError } from '../../domain/errors/AppError';
import { ICheckpointed } from '../../domain/services/ITransactionScope';

@injectable()
export class InMemoryMediatorRepository implements IMediatorRepository, ICheckpointed {
  private mediators: Map<string, MediatorSnapshot> = new Map();
  private checkpoints: Map<string, MediatorSnapshot>[] = [];

  async findByAddress(address: string): Promise<OracleMediator | null> {
    const snapshot = this.mediators.get(address.toLowerCase());
    return snapshot ? OracleMediator.fromSnapshot(structuredClone(snapshot)) : null;
  }

  async findUnresolved(): Promise<OracleMediator[]> {
    return Array.from(this.mediators.values())
      .filter(snapshot => !snapshot.resolution)
      .sort((a, b) => a.expiration - b.expiration)
      .map(snapshot => OracleMediator.fromSnapshot(structuredClone(snapshot)));
  }

  async save(mediator: OracleMediator): Promise<void> {
    this.mediators.set(mediator.address.toLowerCase(), mediator.toSnapshot());
  }

  checkpoint(): void {
    this.checkpoints.push(new Map(this.mediators));
  }

  commit(): void {
    if (this.checkpoints.pop() === undefined) {
      throw AppError.internalError('Mediator repository commit without checkpoint');
    }
  }

  rollback(): void {
    const saved = this.checkpoints.pop();
    if (saved === undefined) {
      throw AppError.internalError('Mediator repository rollback without checkpoint');
    }
    this.mediators = saved;
  }
}
