import { injectable, inject } from 'inversify';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IContractEventRepository } from '../../domain/repositories/IContractEventRepository';
import { IClock } from '../../domain/services/IClock';
import { ILedger } from '../../domain/services/ILedger';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { ContractCallResult, EscrowView, toEscrowView } from '../dto/ContractViews';
import { announce, requireEscrow } from './contractLookup';

export interface WithdrawInput {
  caller: Identity;
  escrowAddress: string;
}

export interface WithdrawOutput {
  escrow: EscrowView;
  amount: string;
}

@injectable()
export class WithdrawUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger,
    @inject('IClock') private clock: IClock,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async execute(input: WithdrawInput): Promise<ContractCallResult<WithdrawOutput>> {
    const outcome = await this.executor.run('withdraw', async () => {
      const escrow = await requireEscrow(this.escrowRepository, input.escrowAddress);
      const receipt = escrow.withdraw(
        { caller: input.caller, timestamp: this.clock.now() },
        this.ledger.balanceOf(escrow.address)
      );
      this.ledger.transfer(escrow.address, receipt.winner, receipt.amount);

      await this.escrowRepository.save(escrow);
      const events = await this.eventRepository.append(escrow.pullEvents());
      return {
        result: {
          escrow: toEscrowView(escrow, this.ledger.balanceOf(escrow.address)),
          amount: receipt.amount.toString()
        },
        events
      };
    });

    announce(outcome.events);
    return outcome;
  }
}
