import { injectable, inject } from 'inversify';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IContractEventRepository } from '../../domain/repositories/IContractEventRepository';
import { IClock } from '../../domain/services/IClock';
import { ILedger } from '../../domain/services/ILedger';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { ContractCallResult, EscrowView, toEscrowView } from '../dto/ContractViews';
import { announce, requireEscrow } from './contractLookup';

export interface SelectWinnerInput {
  caller: Identity;
  escrowAddress: string;
  candidate: Identity;
}

/**
 * Manual mediation: the escrow authority names the winner.
 */
@injectable()
export class SelectWinnerUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger,
    @inject('IClock') private clock: IClock,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async execute(input: SelectWinnerInput): Promise<ContractCallResult<EscrowView>> {
    const outcome = await this.executor.run('selectWinner', async () => {
      const escrow = await requireEscrow(this.escrowRepository, input.escrowAddress);
      escrow.selectWinner({ caller: input.caller, timestamp: this.clock.now() }, input.candidate);

      await this.escrowRepository.save(escrow);
      const events = await this.eventRepository.append(escrow.pullEvents());
      return { result: toEscrowView(escrow, this.ledger.balanceOf(escrow.address)), events };
    });

    announce(outcome.events);
    return outcome;
  }
}
