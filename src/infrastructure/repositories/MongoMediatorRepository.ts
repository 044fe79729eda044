import { injectable, inject } from 'inversify';
import { Collection } from 'mongodb';
import { IMediatorRepository } from '../../domain/repositories/IMediatorRepository';
import { MediatorSnapshot, OracleMediator } from '../../domain/entities/OracleMediator';
import { MongoDBConnection } from '../database/MongoDBConnection';
import { logger } from '../logging/Logger';

interface MediatorDocument extends MediatorSnapshot {
  _id: string;
}

@injectable()
export class MongoMediatorRepository implements IMediatorRepository {
  private collection: Collection<MediatorDocument>;

  constructor(
    @inject('MongoDBConnection') private dbConnection: MongoDBConnection
  ) {
    this.collection = this.dbConnection.getDb().collection<MediatorDocument>('mediators');
    this.createIndexes().catch(error => {
      logger.error('Failed to create mediator indexes', {
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    });
  }

  private async createIndexes(): Promise<void> {
    await this.collection.createIndex({ escrowAddress: 1 }, { name: 'escrowAddress_1', unique: true });
    await this.collection.createIndex({ 'resolution.winner': 1, expiration: 1 }, { name: 'resolution_expiration' });
    logger.info('MongoDB indexes created for mediators collection');
  }

  async findByAddress(address: string): Promise<OracleMediator | null> {
    const doc = await this.collection.findOne(
      { _id: address.toLowerCase() },
      { session: this.dbConnection.currentSession() }
    );
    return doc ? this.documentToEntity(doc) : null;
  }

  async findUnresolved(): Promise<OracleMediator[]> {
    const docs = await this.collection
      .find({ resolution: { $exists: false } }, { session: this.dbConnection.currentSession() })
      .sort({ expiration: 1 })
      .toArray();
    return docs.map(doc => this.documentToEntity(doc));
  }

  async save(mediator: OracleMediator): Promise<void> {
    await this.collection.replaceOne(
      { _id: mediator.address.toLowerCase() },
      mediator.toSnapshot(),
      { upsert: true, session: this.dbConnection.currentSession() }
    );
    logger.debug('Mediator saved', { address: mediator.address, resolved: mediator.isResolved() });
  }

  private documentToEntity(doc: MediatorDocument): OracleMediator {
    const { _id, ...snapshot } = doc;
    return OracleMediator.fromSnapshot(snapshot);
  }
}
