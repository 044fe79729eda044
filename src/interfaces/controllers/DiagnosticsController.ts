import { Request, Response } from 'express';
import { container } from '../../container';
import { IPriceFeedProvider } from '../../domain/services/IPriceFeed';
import { SerialExecutor } from '../../infrastructure/coordination/SerialExecutor';
import { readinessTracker } from '../../infrastructure/readiness/ReadinessTracker';

export class DiagnosticsController {
  async getDiagnostics(_req: Request, res: Response): Promise<void> {
    const feeds = container.get<IPriceFeedProvider>('IPriceFeedProvider');
    const executor = container.get<SerialExecutor>('SerialExecutor');

    res.json({
      success: true,
      data: {
        oracle: { mode: feeds.mode },
        persistence: process.env.USE_MONGODB === 'true' ? 'mongodb' : 'in-memory',
        executor: { busy: executor.isBusy() },
        readiness: readinessTracker.getReadinessStatus()
      }
    });
  }
}
