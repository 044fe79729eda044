import { BetEscrow } from '../entities/BetEscrow';

export interface IEscrowRepository {
  findByAddress(address: string): Promise<BetEscrow | null>;
  save(escrow: BetEscrow): Promise<void>;
}
