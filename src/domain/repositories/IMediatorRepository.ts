import { OracleMediator } from '../entities/OracleMediator';

export interface IMediatorRepository {
  findByAddress(address: string): Promise<OracleMediator | null>;
  /** Mediators that have not named a winner yet. */
  findUnresolved(): Promise<OracleMediator[]>;
  save(mediator: OracleMediator): Promise<void>;
}
