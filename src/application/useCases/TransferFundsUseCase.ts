import { injectable, inject } from 'inversify';
import { ILedger } from '../../domain/services/ILedger';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { logger } from '../../infrastructure/logging/Logger';
import { AccountView, toAccountView } from '../dto/ContractViews';

export interface TransferFundsInput {
  caller: Identity;
  to: string;
  amount: bigint;
}

/**
 * Plain value transfer between accounts. Contract accounts reject it.
 */
@injectable()
export class TransferFundsUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger
  ) {}

  async execute(input: TransferFundsInput): Promise<{ from: AccountView; to: AccountView }> {
    const result = await this.executor.run('transfer', async () => {
      this.ledger.transfer(input.caller, input.to, input.amount);
      return {
        from: toAccountView(this.ledger.getAccount(input.caller)),
        to: toAccountView(this.ledger.getAccount(input.to))
      };
    });
    logger.info('Transfer completed', { from: input.caller, to: input.to, amount: input.amount.toString() });
    return result;
  }
}
