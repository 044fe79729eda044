import { injectable, inject } from 'inversify';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IContractEventRepository } from '../../domain/repositories/IContractEventRepository';
import { IClock } from '../../domain/services/IClock';
import { ILedger } from '../../domain/services/ILedger';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { ContractCallResult, EscrowView, toEscrowView } from '../dto/ContractViews';
import { announce, requireEscrow } from './contractLookup';

export interface DepositInput {
  caller: Identity;
  escrowAddress: string;
  amount: bigint;
}

@injectable()
export class DepositUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger,
    @inject('IClock') private clock: IClock,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async execute(input: DepositInput): Promise<ContractCallResult<EscrowView>> {
    const outcome = await this.executor.run('deposit', async () => {
      const escrow = await requireEscrow(this.escrowRepository, input.escrowAddress);
      escrow.deposit({ caller: input.caller, timestamp: this.clock.now() }, input.amount);
      this.ledger.payContract(input.caller, escrow.address, input.amount);

      await this.escrowRepository.save(escrow);
      const events = await this.eventRepository.append(escrow.pullEvents());
      return { result: toEscrowView(escrow, this.ledger.balanceOf(escrow.address)), events };
    });

    announce(outcome.events);
    return outcome;
  }
}
