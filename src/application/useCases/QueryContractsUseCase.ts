import { injectable, inject } from 'inversify';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import {
  IContractEventRepository,
  StoredContractEvent
} from '../../domain/repositories/IContractEventRepository';
import { ILedger } from '../../domain/services/ILedger';
import { AppError } from '../../domain/errors/AppError';
import {
  AccountView,
  EscrowView,
  MediatorView,
  toAccountView,
  toEscrowView,
  toMediatorView
} from '../dto/ContractViews';
import { requireEscrow, requireMediator } from './contractLookup';

/** Read-only views; these never go through the executor. */
@injectable()
export class QueryContractsUseCase {
  constructor(
    @inject('ILedger') private ledger: ILedger,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('IMediatorRepository') private mediatorRepository: IMediatorRepository,
    @inject('IContractEventRepository') private eventRepository: IContractEventRepository
  ) {}

  async getEscrow(address: string): Promise<EscrowView> {
    const escrow = await requireEscrow(this.escrowRepository, address);
    return toEscrowView(escrow, this.ledger.balanceOf(escrow.address));
  }

  async getMediator(address: string): Promise<MediatorView> {
    return toMediatorView(await requireMediator(this.mediatorRepository, address));
  }

  async getEvents(address: string): Promise<StoredContractEvent[]> {
    const events = await this.eventRepository.findByContract(address);
    if (events.length === 0) {
      throw AppError.notFound(`No contract events for ${address}`);
    }
    return events;
  }

  getAccount(address: string): AccountView {
    return toAccountView(this.ledger.getAccount(address));
  }
}
