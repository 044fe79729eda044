import { Identity } from './Identity';

/**
 * Per-call facts supplied by the substrate: who is calling and when
 * (unix seconds).
 */
export interface CallContext {
  caller: Identity;
  timestamp: number;
}
