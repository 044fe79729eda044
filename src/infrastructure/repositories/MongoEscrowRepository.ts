import { injectable, inject } from 'inversify';
import { Collection } from 'mongodb';
import { IEscrowRepository } from '../../domain/repositories/IEscrowRepository';
import { BetEscrow, EscrowSnapshot } from '../../domain/entities/BetEscrow';
import { MongoDBConnection } from '../database/MongoDBConnection';
import { logger } from '../logging/Logger';

interface EscrowDocument extends EscrowSnapshot {
  _id: string;
}

@injectable()
export class MongoEscrowRepository implements IEscrowRepository {
  private collection: Collection<EscrowDocument>;

  constructor(
    @inject('MongoDBConnection') private dbConnection: MongoDBConnection
  ) {
    this.collection = this.dbConnection.getDb().collection<EscrowDocument>('escrows');
    this.createIndexes().catch(error => {
      logger.error('Failed to create escrow indexes', {
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    });
  }

  private async createIndexes(): Promise<void> {
    await this.collection.createIndex({ status: 1 }, { name: 'status_1' });
    await this.collection.createIndex({ authority: 1 }, { name: 'authority_1' });
    logger.info('MongoDB indexes created for escrows collection');
  }

  async findByAddress(address: string): Promise<BetEscrow | null> {
    const doc = await this.collection.findOne(
      { _id: address.toLowerCase() },
      { session: this.dbConnection.currentSession() }
    );
    return doc ? this.documentToEntity(doc) : null;
  }

  async save(escrow: BetEscrow): Promise<void> {
    const snapshot = escrow.toSnapshot();
    await this.collection.replaceOne(
      { _id: escrow.address.toLowerCase() },
      snapshot,
      { upsert: true, session: this.dbConnection.currentSession() }
    );
    logger.debug('Escrow saved', { address: escrow.address, status: snapshot.status });
  }

  private documentToEntity(doc: EscrowDocument): BetEscrow {
    const { _id, ...snapshot } = doc;
    return BetEscrow.fromSnapshot(snapshot);
  }
}
