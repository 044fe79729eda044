import { createApp } from './app';
import { container } from './container';
import { validateAndExitOnErrors, getEnvDefaults } from './config/validateEnv';
import { MonitorMediatorsUseCase } from './application/useCases/MonitorMediatorsUseCase';
import { MongoDBConnection } from './infrastructure/database/MongoDBConnection';
import { IPriceFeedProvider } from './domain/services/IPriceFeed';
import { ChainlinkPriceFeedProvider } from './infrastructure/oracle/ChainlinkPriceFeed';
import { GracefulShutdown } from './infrastructure/GracefulShutdown';
import { readinessTracker } from './infrastructure/readiness/ReadinessTracker';
import { logger } from './infrastructure/logging/Logger';

let monitoringIntervalId: NodeJS.Timeout | null = null;

async function startServer(): Promise<void> {
  validateAndExitOnErrors();
  const config = getEnvDefaults();

  if (config.USE_MONGODB) {
    logger.info('Connecting to MongoDB...');
    await container.get<MongoDBConnection>('MongoDBConnection').connect();
    readinessTracker.markReady('mongodb');
  }

  const feeds = container.get<IPriceFeedProvider>('IPriceFeedProvider');
  readinessTracker.markReady(`oracle:${feeds.mode}`);

  const app = createApp();
  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info(`BetMe escrow server running on port ${config.PORT}`, {
      host: config.HOST,
      environment: config.NODE_ENV,
      mongodb: config.USE_MONGODB ? 'enabled' : 'disabled',
      oracle: feeds.mode
    });
    readinessTracker.markReady('http');
  });

  server.keepAliveTimeout = 55000;
  server.headersTimeout = 60000;
  server.requestTimeout = 30000;

  const gracefulShutdown = new GracefulShutdown(server);

  gracefulShutdown.registerShutdownCallback('monitor', async () => {
    logger.info('Stopping mediator monitoring...');
    if (monitoringIntervalId) {
      clearInterval(monitoringIntervalId);
      monitoringIntervalId = null;
    }
  });

  gracefulShutdown.registerShutdownCallback('oracle', async () => {
    if (feeds instanceof ChainlinkPriceFeedProvider) {
      feeds.destroy();
    }
  });

  gracefulShutdown.registerShutdownCallback('mongodb', async () => {
    if (config.USE_MONGODB) {
      logger.info('Disconnecting from MongoDB...');
      await container.get<MongoDBConnection>('MongoDBConnection').disconnect();
    }
  });

  startMediatorMonitoring(config.MONITORING_INTERVAL);
}

function startMediatorMonitoring(intervalMs: number): void {
  const monitorUseCase = container.get<MonitorMediatorsUseCase>('MonitorMediatorsUseCase');
  let sweeping = false;

  const sweep = async (): Promise<void> => {
    // a slow sweep must not overlap the next tick
    if (sweeping) return;
    sweeping = true;
    try {
      await monitorUseCase.execute();
    } catch (error) {
      logger.error('Monitoring error', { error: error instanceof Error ? error.message : 'Unknown error' });
    } finally {
      sweeping = false;
    }
  };

  logger.info(`Starting mediator monitoring with interval: ${intervalMs}ms`);
  monitoringIntervalId = setInterval(() => {
    void sweep();
  }, intervalMs);
  readinessTracker.markReady('monitor');

  void sweep();
}

startServer().catch(error => {
  logger.error('Server startup failed', { error: error instanceof Error ? error.message : 'Unknown error' });
  process.exit(1);
});
