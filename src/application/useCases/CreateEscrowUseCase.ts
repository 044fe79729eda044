import { injectable, inject } from 'inversify';
import { BetEscrow } from '../../domain/entities/BetEscrow';
import { AppError } from '../../domain/errors/AppError';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IContractEventRepository } from '../../domain/repositories/IContractEventRepository';
import { IClock } from '../../domain/services/IClock';
import { ILedger } from '../../domain/services/ILedger';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { ContractCallResult, EscrowView, toEscrowView } from '../dto/ContractViews';
import { announce } from './contractLookup';

export interface CreateEscrowInput {
  caller: Identity;
  bettorA: Identity;
  bettorB: Identity;
  /** Value sent along with creation; held by the escrow, never paid out. */
  initialValue?: bigint;
}

/**
 * Deploys a manually mediated escrow. The caller becomes its authority.
 */
@injectable()
export class CreateEscrowUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger,
    @inject('IClock') private clock: IClock,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async execute(input: CreateEscrowInput): Promise<ContractCallResult<EscrowView>> {
    const initialValue = input.initialValue ?? 0n;
    if (initialValue < 0n) {
      throw AppError.validationError('Initial value cannot be negative');
    }

    const outcome = await this.executor.run('createEscrow', async () => {
      const address = this.ledger.deployContract(input.caller);
      const escrow = BetEscrow.create({
        address,
        authority: input.caller,
        bettorA: input.bettorA,
        bettorB: input.bettorB,
        timestamp: this.clock.now()
      });
      if (initialValue > 0n) {
        this.ledger.payContract(input.caller, address, initialValue);
      }

      await this.escrowRepository.save(escrow);
      const events = await this.eventRepository.append(escrow.pullEvents());
      return { result: toEscrowView(escrow, this.ledger.balanceOf(address)), events };
    });

    announce(outcome.events);
    return outcome;
  }
}
