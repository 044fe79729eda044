import { AppError } from '../../domain/errors/AppError';
import { BetEscrow } from '../../domain/entities/BetEscrow';
import { OracleMediator } from '../../domain/entities/OracleMediator';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import { StoredContractEvent } from '../../domain/repositories/IContractEventRepository';
import { logger } from '../../infrastructure/logging/Logger';

export async function requireEscrow(repository: IEscrowRepository, address: string): Promise<BetEscrow> {
  const escrow = await repository.findByAddress(address);
  if (!escrow) {
    throw AppError.notFound(`Escrow ${address} not found`);
  }
  return escrow;
}

export async function requireMediator(repository: IMediatorRepository, address: string): Promise<OracleMediator> {
  const mediator = await repository.findByAddress(address);
  if (!mediator) {
    throw AppError.notFound(`Mediator ${address} not found`);
  }
  return mediator;
}

/** Logs events of a committed call. */
export function announce(events: StoredContractEvent[]): void {
  for (const event of events) {
    logger.info(`Contract event ${event.type}`, {
      contract: event.contractAddress,
      sequence: event.sequence,
      payload: event.payload
    });
  }
}
