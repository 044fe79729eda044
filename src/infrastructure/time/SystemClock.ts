import { injectable } from 'inversify';
import { IClock } from '../../domain/services/IClock';

@injectable()
export class SystemClock implements IClock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}
