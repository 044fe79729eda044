import { injectable, inject } from 'inversify';
import { Collection } from 'mongodb';
import { ContractEvent } from '../../domain/events/ContractEvent';
import {
  IContractEventRepository,
  StoredContractEvent
} from '../../domain/repositories/IContractEventRepository';
import { MongoDBConnection } from '../database/MongoDBConnection';
import { logger } from '../logging/Logger';

interface ContractEventDocument extends StoredContractEvent {
  contractKey: string;
}

/**
 * Append-only event history. Appends happen inside a serialized unit of
 * work, so the document count is a safe sequence source.
 */
@injectable()
export class MongoContractEventRepository implements IContractEventRepository {
  private collection: Collection<ContractEventDocument>;

  constructor(
    @inject('MongoDBConnection') private dbConnection: MongoDBConnection
  ) {
    this.collection = this.dbConnection.getDb().collection<ContractEventDocument>('contract_events');
    this.createIndexes().catch(error => {
      logger.error('Failed to create contract event indexes', {
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    });
  }

  private async createIndexes(): Promise<void> {
    await this.collection.createIndex({ sequence: 1 }, { name: 'sequence_1', unique: true });
    await this.collection.createIndex({ contractKey: 1, sequence: 1 }, { name: 'contractKey_1_sequence_1' });
  }

  async append(events: ContractEvent[]): Promise<StoredContractEvent[]> {
    if (events.length === 0) {
      return [];
    }
    const session = this.dbConnection.currentSession();
    const offset = await this.collection.countDocuments({}, { session });
    const docs: ContractEventDocument[] = events.map((event, index) => ({
      type: event.type,
      contractAddress: event.contractAddress,
      contractKey: event.contractAddress.toLowerCase(),
      timestamp: event.timestamp,
      sequence: offset + index + 1,
      payload: event.toJSON()
    }));
    await this.collection.insertMany(docs, { session });
    return docs.map(doc => this.documentToStored(doc));
  }

  async findByContract(address: string): Promise<StoredContractEvent[]> {
    const docs = await this.collection
      .find({ contractKey: address.toLowerCase() }, { session: this.dbConnection.currentSession() })
      .sort({ sequence: 1 })
      .toArray();
    return docs.map(doc => this.documentToStored(doc));
  }

  private documentToStored(doc: ContractEventDocument): StoredContractEvent {
    return {
      type: doc.type,
      contractAddress: doc.contractAddress,
      timestamp: doc.timestamp,
      sequence: doc.sequence,
      payload: doc.payload
    };
  }
}
