import { injectable, inject } from 'inversify';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { EscrowStatus } from '../../domain/entities/EscrowStatus';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import { ZERO_IDENTITY } from '../../domain/valueObjects/Identity';
import { DecisionCoordinator } from '../../infrastructure/coordination/DecisionCoordinator';
import { logger } from '../../infrastructure/logging/Logger';
import { ResolveBetUseCase } from './ResolveBetUseCase';

export interface MonitorSummary {
  checked: number;
  resolved: string[];
  pending: number;
  skipped: number;
  failed: number;
}

/**
 * Poller body: tries to resolve every unresolved mediator whose escrow is
 * locked. A failure for one mediator never stops the sweep.
 */
@injectable()
export class MonitorMediatorsUseCase {
  constructor(
    @inject('IMediatorRepository') private mediatorRepository: IMediatorRepository,
    @inject('IEscrowRepository') private escrowRepository: IEscrowRepository,
    @inject('ResolveBetUseCase') private resolveBetUseCase: ResolveBetUseCase,
    @inject('DecisionCoordinator') private coordinator: DecisionCoordinator
  ) {}

  async execute(): Promise<MonitorSummary> {
    const summary: MonitorSummary = { checked: 0, resolved: [], pending: 0, skipped: 0, failed: 0 };

    const mediators = await this.mediatorRepository.findUnresolved();
    for (const mediator of mediators) {
      summary.checked += 1;

      const escrow = await this.escrowRepository.findByAddress(mediator.escrowAddress);
      if (!escrow || escrow.status !== EscrowStatus.LOCKED) {
        summary.skipped += 1;
        continue;
      }
      if (!this.coordinator.tryStart(mediator.address)) {
        summary.skipped += 1;
        continue;
      }

      try {
        await this.resolveBetUseCase.execute({ caller: ZERO_IDENTITY, mediatorAddress: mediator.address });
        summary.resolved.push(mediator.address);
        this.coordinator.forget(mediator.address);
        logger.info('Mediator resolved by poller', { mediator: mediator.address });
      } catch (error) {
        this.coordinator.finish(mediator.address);
        if (error instanceof AppError && error.code === ErrorCode.NO_WINNER) {
          summary.pending += 1;
          logger.debug('Mediator not resolvable yet', { mediator: mediator.address, reason: error.message });
        } else {
          summary.failed += 1;
          logger.error('Failed to resolve mediator', {
            mediator: mediator.address,
            code: error instanceof AppError ? error.code : undefined,
            error: error instanceof Error ? error.message : 'Unknown error'
          });
        }
      }
    }

    if (summary.checked > 0) {
      logger.debug('Mediator sweep finished', { ...summary, resolved: summary.resolved.length });
    }
    return summary;
  }
}
