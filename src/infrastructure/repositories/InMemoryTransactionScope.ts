import { injectable, multiInject } from 'inversify';
import { ICheckpointed, ITransactionScope } from '../../domain/services/ITransactionScope';

@injectable()
export class InMemoryTransactionScope implements ITransactionScope {
  constructor(
    @multiInject('ICheckpointedStore') private stores: ICheckpointed[]
  ) {}

  async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
    this.stores.forEach(store => store.checkpoint());
    try {
      const result = await work();
      this.stores.forEach(store => store.commit());
      return result;
    } catch (error) {
      this.stores.forEach(store => store.rollback());
      throw error;
    }
  }
}
