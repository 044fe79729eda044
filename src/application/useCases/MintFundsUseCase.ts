import { injectable, inject } from 'inversify';
import { AppError } from '../../domain/errors/AppError';
import { ILedger } from '../../domain/services/ILedger';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { logger } from '../../infrastructure/logging/Logger';
import { AccountView, toAccountView } from '../dto/ContractViews';

export interface MintFundsInput {
  to: string;
  amount: bigint;
}

/**
 * Faucet for the simulated ledger. Disabled unless LEDGER_FAUCET_ENABLED
 * is set.
 */
@injectable()
export class MintFundsUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger
  ) {}

  async execute(input: MintFundsInput): Promise<AccountView> {
    if (process.env.LEDGER_FAUCET_ENABLED !== 'true') {
      throw AppError.forbidden('Faucet is disabled');
    }
    if (this.ledger.getAccount(input.to).isContract) {
      throw AppError.validationError('Contract accounts cannot receive faucet funds');
    }

    const account = await this.executor.run('mint', async () => {
      this.ledger.mint(input.to, input.amount);
      return toAccountView(this.ledger.getAccount(input.to));
    });
    logger.info('Faucet funds minted', { to: input.to, amount: input.amount.toString() });
    return account;
  }
}
