import { AsyncLocalStorage } from 'async_hooks';
import { MongoClient, Db, MongoClientOptions, ClientSession } from 'mongodb';
import { injectable } from 'inversify';
import { ITransactionScope } from '../../domain/services/ITransactionScope';
import { logger } from '../logging/Logger';
import { readinessTracker } from '../readiness/ReadinessTracker';

@injectable()
export class MongoDBConnection implements ITransactionScope {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private connecting: Promise<void> | null = null;
  private readonly sessions = new AsyncLocalStorage<ClientSession>();

  async connect(): Promise<void> {
    if (this.connecting) {
      logger.debug('MongoDB connection already in progress, waiting');
      return this.connecting;
    }

    if (this.client && this.db) {
      try {
        await this.client.db('admin').admin().ping();
        logger.debug('Existing MongoDB connection is healthy');
        return;
      } catch (error) {
        logger.warn('Existing connection unhealthy, reconnecting', {
          error: error instanceof Error ? error.message : 'Unknown error'
        });
        await this.forceDisconnect();
      }
    }

    this.connecting = this.open().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private async open(): Promise<void> {
    const uri = (process.env.MONGODB_URI || 'mongodb://localhost:27017').trim();
    if (!/^(mongodb:\/\/|mongodb\+srv:\/\/)/.test(uri)) {
      throw new Error('Invalid scheme, expected connection string to start with "mongodb://" or "mongodb+srv://"');
    }
    const dbName = process.env.MONGODB_DB_NAME || 'betme_escrow';

    const options: MongoClientOptions = {
      appName: 'betme-escrow',
      maxPoolSize: parseInt(process.env.MONGODB_MAX_POOL_SIZE || '5', 10),
      minPoolSize: 1,
      connectTimeoutMS: 30000,
      serverSelectionTimeoutMS: 30000,
      retryReads: true,
      retryWrites: true,
      // snapshots carry optional fields; null must never replace a missing one
      ignoreUndefined: true,
      w: 'majority'
    };

    try {
      const client = new MongoClient(uri, options);
      await client.connect();

      client.on('error', (error) => {
        logger.error('MongoDB connection error', { error: error.message });
      });
      client.on('close', () => {
        logger.warn('MongoDB connection closed');
        readinessTracker.markNotReady('mongodb', 'connection closed');
        this.client = null;
        this.db = null;
      });

      this.client = client;
      this.db = client.db(dbName);
      logger.info('Connected to MongoDB', { dbName, maxPoolSize: options.maxPoolSize });
    } catch (error) {
      logger.error('Failed to connect to MongoDB', { error: error instanceof Error ? error.message : 'Unknown error' });
      this.client = null;
      this.db = null;
      throw error;
    }
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error('Database not connected');
    }
    return this.db;
  }

  /** Session of the transaction the caller runs in, if any. */
  currentSession(): ClientSession | undefined {
    return this.sessions.getStore();
  }

  /**
   * Runs the work in a multi-document transaction (requires a replica set).
   * Repositories join it through `currentSession()`. The work runs once: a
   * failed commit fails the unit instead of retrying it.
   */
  async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
    if (!this.client) {
      throw new Error('Database not connected');
    }
    const session = this.client.startSession();
    try {
      session.startTransaction();
      const result = await this.sessions.run(session, work);
      await session.commitTransaction();
      return result;
    } catch (error) {
      if (session.inTransaction()) {
        await session.abortTransaction().catch((abortError: unknown) => {
          logger.warn('Failed to abort MongoDB transaction', {
            error: abortError instanceof Error ? abortError.message : 'Unknown error'
          });
        });
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  private async forceDisconnect(): Promise<void> {
    if (this.client) {
      try {
        await this.client.close(true);
      } catch (error) {
        logger.warn('Error during force disconnect', { error: error instanceof Error ? error.message : 'Unknown error' });
      } finally {
        this.client = null;
        this.db = null;
      }
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      try {
        await this.client.close();
        logger.info('Disconnected from MongoDB gracefully');
      } catch (error) {
        logger.warn('Error during graceful disconnect', { error: error instanceof Error ? error.message : 'Unknown error' });
      } finally {
        this.client = null;
        this.db = null;
      }
    }
  }
}
