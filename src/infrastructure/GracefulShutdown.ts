import { Server } from 'http';
import { logger } from './logging/Logger';

type ShutdownCallback = () => Promise<void>;

export class GracefulShutdown {
  private shutdownCallbacks: Array<{ name: string; callback: ShutdownCallback }> = [];
  private isShuttingDown = false;

  constructor(
    private server: Server,
    private readonly timeoutMs = 30000
  ) {
    this.setupSignalHandlers();
  }

  private setupSignalHandlers(): void {
    process.on('SIGTERM', () => this.trigger('SIGTERM'));
    process.on('SIGINT', () => this.trigger('SIGINT'));
    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      this.trigger('uncaughtException');
    });
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
      this.trigger('unhandledRejection');
    });
  }

  /** Callbacks run after the HTTP server stops accepting connections. */
  registerShutdownCallback(name: string, callback: ShutdownCallback): void {
    this.shutdownCallbacks.push({ name, callback });
  }

  private trigger(signal: string): void {
    if (this.isShuttingDown) {
      logger.info('Shutdown already in progress', { signal });
      return;
    }
    this.isShuttingDown = true;
    this.shutdown(signal).then(
      code => process.exit(code),
      () => process.exit(1)
    );
  }

  private async shutdown(signal: string): Promise<number> {
    logger.info(`Received ${signal}, starting graceful shutdown`);

    const shutdownTimeout = setTimeout(() => {
      logger.error('Graceful shutdown timeout, forcing exit');
      process.exit(1);
    }, this.timeoutMs);

    try {
      logger.info('Closing HTTP server');
      await new Promise<void>((resolve, reject) => {
        this.server.close((err) => {
          if (err) {
            logger.error('Error closing server', { error: err.message });
            reject(err);
          } else {
            logger.info('HTTP server closed');
            resolve();
          }
        });
      });

      logger.info('Running shutdown callbacks');
      await Promise.all(
        this.shutdownCallbacks.map(({ name, callback }) =>
          callback().catch(err =>
            logger.error('Shutdown callback error', {
              callback: name,
              error: err instanceof Error ? err.message : String(err)
            })
          )
        )
      );

      logger.info('Graceful shutdown completed');
      return 0;
    } catch (error) {
      logger.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
      return 1;
    } finally {
      clearTimeout(shutdownTimeout);
    }
  }
}
