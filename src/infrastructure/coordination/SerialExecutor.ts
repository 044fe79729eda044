import { AsyncLocalStorage } from 'async_hooks';
import { injectable, inject } from 'inversify';
import { Mutex } from 'async-mutex';
import { AppError } from '../../domain/errors/AppError';
import { ILedger } from '../../domain/services/ILedger';
import { ITransactionScope } from '../../domain/services/ITransactionScope';
import { logger } from '../logging/Logger';

/**
 * Runs contract calls one at a time. Each unit checkpoints the ledger and
 * runs inside a repository transaction; when the unit or its commit throws,
 * both are rolled back and the call leaves no trace.
 * A call issued from inside a running unit is rejected rather than queued,
 * since queuing it behind its own parent would never finish.
 */
@injectable()
export class SerialExecutor {
  private readonly mutex = new Mutex();
  private readonly activeUnit = new AsyncLocalStorage<string>();

  constructor(
    @inject('ILedger') private ledger: ILedger,
    @inject('ITransactionScope') private transactions: ITransactionScope
  ) {}

  async run<T>(label: string, work: () => Promise<T>): Promise<T> {
    const parent = this.activeUnit.getStore();
    if (parent !== undefined) {
      throw AppError.reentrantCall(`Call "${label}" was issued while "${parent}" is still running`);
    }

    return this.mutex.runExclusive(() =>
      this.activeUnit.run(label, async () => {
        this.ledger.checkpoint();
        try {
          const result = await this.transactions.runInTransaction(work);
          this.ledger.commit();
          return result;
        } catch (error) {
          this.ledger.rollback();
          logger.debug('Unit of work reverted', {
            label,
            error: error instanceof Error ? error.message : String(error)
          });
          throw error;
        }
      })
    );
  }

  isBusy(): boolean {
    return this.mutex.isLocked();
  }
}
