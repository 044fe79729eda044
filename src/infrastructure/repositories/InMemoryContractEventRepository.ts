import { injectable } from 'inversify';
import { ContractEvent } from '../../domain/events/ContractEvent';
import { AppError } from '../../domain/errors/AppError';
import {
  IContractEventRepository,
  StoredContractEvent
} from '../../domain/repositories/IContractEventRepository';
import { ICheckpointed } from '../../domain/services/ITransactionScope';

@injectable()
export class InMemoryContractEventRepository implements IContractEventRepository, ICheckpointed {
  private events: StoredContractEvent[] = [];
  // history is append-only, so a checkpoint is its length
  private checkpoints: number[] = [];

  async append(events: ContractEvent[]): Promise<StoredContractEvent[]> {
    const offset = this.events.length;
    const stored = events.map((event, index) => ({
      type: event.type,
      contractAddress: event.contractAddress,
      timestamp: event.timestamp,
      sequence: offset + index + 1,
      payload: event.toJSON()
    }));
    this.events.push(...stored);
    return stored;
  }

  async findByContract(address: string): Promise<StoredContractEvent[]> {
    const key = address.toLowerCase();
    return this.events.filter(event => event.contractAddress.toLowerCase() === key);
  }

  checkpoint(): void {
    this.checkpoints.push(this.events.length);
  }

  commit(): void {
    if (this.checkpoints.pop() === undefined) {
      throw AppError.internalError('Event repository commit without checkpoint');
    }
  }

  rollback(): void {
    const length = this.checkpoints.pop();
    if (length === undefined) {
      throw AppError.internalError('Event repository rollback without checkpoint');
    }
    this.events = this.events.slice(0, length);
  }
}
