import { injectable, inject } from 'inversify';
import { OracleMediator } from '../../domain/entities/OracleMediator';
import { MediatorTerms } from '../../domain/entities/OptionTerms';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import { IContractEventRepository } from '../../domain/repositories/IContractEventRepository';
import { IClock } from '../../domain/services/IClock';
import { ILedger } from '../../domain/services/ILedger';
import { IPriceFeedProvider } from '../../domain/services/IPriceFeed';
import { Identity } from '../../domain/valueObjects/Identity';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { logger } from '../../infrastructure/logging/Logger';
import { ContractCallResult, EscrowView, MediatorView, toEscrowView, toMediatorView } from '../dto/ContractViews';
import { announce } from './contractLookup';

export interface CreateOracleMediatorInput extends MediatorTerms {
  caller: Identity;
}

export interface CreateOracleMediatorOutput {
  mediator: MediatorView;
  escrow: EscrowView;
}

/**
 * Deploys a mediator, which in turn deploys the escrow it governs. The
 * escrow address is derived from the mediator address, so the mediator is
 * its creator and authority.
 */
@injectable()
export class CreateOracleMediatorUseCase {
  constructor(
    @inject('SerialExecutor') private executor: SerialExecutor,
    @inject('ILedger') private ledger: ILedger,
    @inject('IClock') private clock: IClock,
    @inject('IPriceFeedProvider') private feeds: IPriceFeedProvider,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IMediatorRepository') private mediatorRepository: IMediatorRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async execute(input: CreateOracleMediatorInput): Promise<ContractCallResult<CreateOracleMediatorOutput>> {
    const { caller, ...terms } = input;

    const outcome = await this.executor.run('createMediator', async () => {
      const mediatorAddress = this.ledger.deployContract(caller);
      const escrowAddress = this.ledger.deployContract(mediatorAddress);

      const { mediator, escrow } = await OracleMediator.create(
        {
          address: mediatorAddress,
          creator: caller,
          escrowAddress,
          terms,
          timestamp: this.clock.now()
        },
        this.feeds.getFeed(terms.priceFeed)
      );

      await this.escrowRepository.save(escrow);
      await this.mediatorRepository.save(mediator);
      const events = await this.eventRepository.append([...escrow.pullEvents(), ...mediator.pullEvents()]);
      return {
        result: {
          mediator: toMediatorView(mediator),
          escrow: toEscrowView(escrow, this.ledger.balanceOf(escrowAddress))
        },
        events
      };
    });

    logger.info('Oracle mediator deployed', {
      mediator: outcome.result.mediator.address,
      escrow: outcome.result.escrow.address,
      optionType: terms.optionType,
      feedMode: this.feeds.mode
    });
    announce(outcome.events);
    return outcome;
  }
}
