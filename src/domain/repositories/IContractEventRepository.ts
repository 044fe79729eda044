import { ContractEvent } from '../events/ContractEvent';

export interface StoredContractEvent {
  type: string;
  contractAddress: string;
  timestamp: number;
  sequence: number;
  payload: Record<string, unknown>;
}

export interface IContractEventRepository {
  append(events: ContractEvent[]): Promise<StoredContractEvent[]>;
  findByContract(address: string): Promise<StoredContractEvent[]>;
}
