import type {
  Coordinate,
  ParitySlots,
} from '../types/aircraft.types';
import type { MessageDecoder } from '../utils/modeS';
import logger from '../utils/logger';

/**
 * Per-aircraft CPR state, owned by the aggregator and handed to the resolver.
 */
export interface CprTrackingState {
  slots: ParitySlots;
  lastFailureLogAt: number | null;
  lastStalePairKey: string | null;
}

export type ResolveOutcome =
  | { status: 'resolved'; position: Coordinate }
  | { status: 'pending' }
  | { status: 'duplicate' }
  | { status: 'stale'; deltaSeconds: number; counted: boolean }
  | { status: 'failed' };

export interface PositionResolverOptions {
  staleSeconds: number;
  failureLogSeconds: number;
  reference: Coordinate | null;
}

export function createCprTrackingState(): CprTrackingState {
  return {
    slots: { even: null, odd: null },
    lastFailureLogAt: null,
    lastStalePairKey: null,
  };
}

/**
 * Decides when an even/odd pair of position frames may be decoded globally.
 */
export class PositionResolver {
  constructor(
    private readonly decoder: MessageDecoder,
    private readonly options: PositionResolverOptions,
  ) {}

  resolve(
    address: string,
    state: CprTrackingState,
    frame: string,
    timestamp: number,
  ): ResolveOutcome {
    const parity = this.decoder.parity(frame);
    if (parity === null) {
      return { status: 'pending' };
    }

    const existing = state.slots[parity];
    if (existing && existing.frame === frame && existing.timestamp === timestamp) {
      return { status: 'duplicate' };
    }

    state.slots[parity] = { parity, frame, timestamp };

    const { even, odd } = state.slots;
    if (!even || !odd) {
      return { status: 'pending' };
    }

    const deltaSeconds = Math.abs(even.timestamp - odd.timestamp);
    if (deltaSeconds > this.options.staleSeconds) {
      // Keep only the frame that just arrived
      if (parity === 'even') {
        state.slots.odd = null;
      } else {
        state.slots.even = null;
      }
      const pairKey = `${even.frame}@${even.timestamp}|${odd.frame}@${odd.timestamp}`;
      const counted = state.lastStalePairKey !== pairKey;
      state.lastStalePairKey = pairKey;
      if (this.shouldLog(state, timestamp)) {
        logger.debug('Ignoring stale CPR pair', { address, deltaSeconds });
      }
      return { status: 'stale', deltaSeconds, counted };
    }

    const position = this.decoder.resolvePosition(
      even.frame,
      odd.frame,
      even.timestamp,
      odd.timestamp,
      this.options.reference,
    );
    if (!position) {
      if (this.shouldLog(state, timestamp)) {
        logger.debug('Failed to resolve CPR position', { address });
      }
      return { status: 'failed' };
    }

    state.lastFailureLogAt = null;
    return { status: 'resolved', position };
  }

  private shouldLog(state: CprTrackingState, timestamp: number): boolean {
    if (state.lastFailureLogAt !== null
      && timestamp - state.lastFailureLogAt <= this.options.failureLogSeconds) {
      return false;
    }
    state.lastFailureLogAt = timestamp;
    return true;
  }
}

export default PositionResolver;
