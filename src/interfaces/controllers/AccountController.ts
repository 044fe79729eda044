import { Request, Response } from 'express';
import { container } from '../../container';
import { TransferFundsUseCase } from '../../application/useCases/TransferFundsUseCase';
import { MintFundsUseCase } from '../../application/useCases/MintFundsUseCase';
import { SetFeedPriceUseCase } from '../../application/useCases/SetFeedPriceUseCase';
import { QueryContractsUseCase } from '../../application/useCases/QueryContractsUseCase';
import { callerOf } from '../middleware/authMiddleware';
import { bodyString, bodyWei, optionalBodyInteger } from './requestValues';

/**
 * Ledger accounts and, in mock mode, the price feeds.
 */
export class AccountController {
  async get(req: Request, res: Response): Promise<void> {
    const queries = container.get<QueryContractsUseCase>('QueryContractsUseCase');
    res.json({ success: true, data: queries.getAccount(req.params.address) });
  }

  async transfer(req: Request, res: Response): Promise<void> {
    const useCase = container.get<TransferFundsUseCase>('TransferFundsUseCase');
    const data = await useCase.execute({
      caller: callerOf(req),
      to: bodyString(req, 'to'),
      amount: bodyWei(req, 'amount')
    });
    res.json({ success: true, data });
  }

  async faucet(req: Request, res: Response): Promise<void> {
    const useCase = container.get<MintFundsUseCase>('MintFundsUseCase');
    const data = await useCase.execute({
      to: req.params.address,
      amount: bodyWei(req, 'amount')
    });
    res.json({ success: true, data });
  }

  async setFeedPrice(req: Request, res: Response): Promise<void> {
    const useCase = container.get<SetFeedPriceUseCase>('SetFeedPriceUseCase');
    const data = await useCase.execute({
      feedAddress: req.params.address,
      price: bodyWei(req, 'price'),
      updatedAt: optionalBodyInteger(req, 'updatedAt')
    });
    res.json({ success: true, data });
  }
}
