import { injectable, inject } from 'inversify';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import { IContractEventRepository } from '../../domain/repositories/IContractEventRepository';
import { IClock } from '../../domain/services/IClock';
import { ILedger } from '../../domain/services/ILedger';
import { IPriceFeedProvider } from '../../domain/services/IPriceFeed';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { ContractCallResult, EscrowView, MediatorView, toEscrowView, toMediatorView } from '../dto/ContractViews';
import { announce, requireEscrow, requireMediator } from './contractLookup';

export interface ResolveBetInput {
  caller: Identity;
  mediatorAddress: string;
}

export interface ResolveBetOutput {
  mediator: MediatorView;
  escrow: EscrowView;
}

/**
 * Anyone may trigger resolution; the outcome depends only on the clock and
 * the feed. The mediator's call into its escrow runs in the same unit.
 */
@injectable()
export class ResolveBetUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger,
    @inject('IClock') private clock: IClock,
    @inject('IPriceFeedProvider') private feeds: IPriceFeedProvider,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IMediatorRepository') private mediatorRepository: IMediatorRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async execute(input: ResolveBetInput): Promise<ContractCallResult<ResolveBetOutput>> {
    const outcome = await this.executor.run('resolve', async () => {
      const mediator = await requireMediator(this.mediatorRepository, input.mediatorAddress);
      const escrow = await requireEscrow(this.escrowRepository, mediator.escrowAddress);

      await mediator.resolve(
        { caller: input.caller, timestamp: this.clock.now() },
        escrow,
        this.feeds.getFeed(mediator.terms.priceFeed)
      );

      await this.escrowRepository.save(escrow);
      await this.mediatorRepository.save(mediator);
      const events = await this.eventRepository.append([...escrow.pullEvents(), ...mediator.pullEvents()]);
      return {
        result: {
          mediator: toMediatorView(mediator),
          escrow: toEscrowView(escrow, this.ledger.balanceOf(escrow.address))
        },
        events
      };
    });

    announce(outcome.events);
    return outcome;
  }
}
