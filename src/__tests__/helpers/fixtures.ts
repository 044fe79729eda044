import { IClock } from '../../domain/services/IClock';

export const AUTHORITY = '0x1000000000000000000000000000000000000001';
export const BETTOR_A = '0x2000000000000000000000000000000000000002';
export const BETTOR_B = '0x3000000000000000000000000000000000000003';
export const OUTSIDER = '0x4000000000000000000000000000000000000004';
export const FEED = '0x5000000000000000000000000000000000000005';
export const ESCROW = '0x6000000000000000000000000000000000000006';
export const MEDIATOR = '0x7000000000000000000000000000000000000007';

export const ADMIN_KEY = '0x' + '11'.repeat(32);
export const ALICE_KEY = '0x' + '22'.repeat(32);
export const BOB_KEY = '0x' + '33'.repeat(32);

export const ONE_ETHER = 10n ** 18n;

export const T0 = 1_700_000_000;

export class ManualClock implements IClock {
  constructor(private current: number = T0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
