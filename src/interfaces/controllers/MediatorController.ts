import { Request, Response } from 'express';
import { container } from '../../container';
import { CreateOracleMediatorUseCase } from '../../application/useCases/CreateOracleMediatorUseCase';
import { ResolveBetUseCase } from '../../application/useCases/ResolveBetUseCase';
import { QueryContractsUseCase } from '../../application/useCases/QueryContractsUseCase';
import { AppError } from '../../domain/errors/AppError';
import { isOptionType } from '../../domain/entities/OptionTerms';
import { callerOf } from '../middleware/authMiddleware';
import { bodyInteger, bodyString, bodyWei, optionalBodyInteger } from './requestValues';

export class MediatorController {
  async create(req: Request, res: Response): Promise<void> {
    const optionType = bodyString(req, 'optionType');
    if (!isOptionType(optionType)) {
      throw AppError.validationError('optionType must be PUT or CALL');
    }

    const useCase = container.get<CreateOracleMediatorUseCase>('CreateOracleMediatorUseCase');
    const { result, events } = await useCase.execute({
      caller: callerOf(req),
      priceFeed: bodyString(req, 'priceFeed'),
      heartbeat: optionalBodyInteger(req, 'heartbeat'),
      optionType,
      buyer: bodyString(req, 'buyer'),
      seller: bodyString(req, 'seller'),
      strikePrice: bodyWei(req, 'strikePrice'),
      expiration: bodyInteger(req, 'expiration')
    });

    res.status(201).json({ success: true, data: { ...result, events } });
  }

  async get(req: Request, res: Response): Promise<void> {
    const queries = container.get<QueryContractsUseCase>('QueryContractsUseCase');
    res.json({ success: true, data: await queries.getMediator(req.params.address) });
  }

  async resolve(req: Request, res: Response): Promise<void> {
    const useCase = container.get<ResolveBetUseCase>('ResolveBetUseCase');
    const { result, events } = await useCase.execute({
      caller: callerOf(req),
      mediatorAddress: req.params.address
    });

    res.json({ success: true, data: { ...result, events } });
  }
}
