import { Request, Response } from 'express';
import { container } from '../../container';
import { CreateEscrowUseCase } from '../../application/useCases/CreateEscrowUseCase';
import { DepositUseCase } from '../../application/useCases/DepositUseCase';
import { SelectWinnerUseCase } from '../../application/useCases/SelectWinnerUseCase';
import { WithdrawUseCase } from '../../application/useCases/WithdrawUseCase';
import { QueryContractsUseCase } from '../../application/useCases/QueryContractsUseCase';
import { callerOf } from '../middleware/authMiddleware';
import { bodyString, bodyWei, optionalBodyWei } from './requestValues';

export class EscrowController {
  async create(req: Request, res: Response): Promise<void> {
    const useCase = container.get<CreateEscrowUseCase>('CreateEscrowUseCase');
    const { result, events } = await useCase.execute({
      caller: callerOf(req),
      bettorA: bodyString(req, 'bettorA'),
      bettorB: bodyString(req, 'bettorB'),
      initialValue: optionalBodyWei(req, 'initialValue')
    });

    res.status(201).json({ success: true, data: { escrow: result, events } });
  }

  async get(req: Request, res: Response): Promise<void> {
    const queries = container.get<QueryContractsUseCase>('QueryContractsUseCase');
    res.json({ success: true, data: await queries.getEscrow(req.params.address) });
  }

  async events(req: Request, res: Response): Promise<void> {
    const queries = container.get<QueryContractsUseCase>('QueryContractsUseCase');
    res.json({ success: true, data: await queries.getEvents(req.params.address) });
  }

  async deposit(req: Request, res: Response): Promise<void> {
    const useCase = container.get<DepositUseCase>('DepositUseCase');
    const { result, events } = await useCase.execute({
      caller: callerOf(req),
      escrowAddress: req.params.address,
      amount: bodyWei(req, 'amount')
    });

    res.json({ success: true, data: { escrow: result, events } });
  }

  async selectWinner(req: Request, res: Response): Promise<void> {
    const useCase = container.get<SelectWinnerUseCase>('SelectWinnerUseCase');
    const { result, events } = await useCase.execute({
      caller: callerOf(req),
      escrowAddress: req.params.address,
      candidate: bodyString(req, 'candidate')
    });

    res.json({ success: true, data: { escrow: result, events } });
  }

  async withdraw(req: Request, res: Response): Promise<void> {
    const useCase = container.get<WithdrawUseCase>('WithdrawUseCase');
    const { result, events } = await useCase.execute({
      caller: callerOf(req),
      escrowAddress: req.params.address
    });

    res.json({ success: true, data: { ...result, events } });
  }
}
