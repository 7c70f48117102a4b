import type {
  AircraftRecord,
  Coordinate,
  Snapshot,
} from '../types/aircraft.types';
import type { MessageDecoder } from '../utils/modeS';
import { distanceFromReference } from '../utils/geo';
import logger from '../utils/logger';
import {
  createCprTrackingState,
  type CprTrackingState,
  type PositionResolver,
} from './PositionResolver';

type AssemblyState = 'pending' | 'complete' | 'incomplete';

interface TrackedAircraft {
  record: AircraftRecord;
  cpr: CprTrackingState;
  assembly: AssemblyState;
}

export interface AggregatorOptions {
  assemblyTimeoutSeconds: number;
  recordTtlSeconds: number;
  reference: Coordinate | null;
}

export interface AggregatorStats {
  framesAccepted: number;
  framesDropped: number;
  stalePairs: number;
  assembliesCompleted: number;
  assembliesIncomplete: number;
  trackedAircraft: number;
}

export interface SnapshotProvider {
  snapshot(): Snapshot;
}

/**
 * Owns one mutable record per aircraft address. Single writer: only the
 * frame feed calls ingest(); readers only ever see snapshot() copies.
 */
export class AircraftStateAggregator implements SnapshotProvider {
  private aircraft: Map<string, TrackedAircraft> = new Map();

  private stats = {
    framesAccepted: 0,
    framesDropped: 0,
    stalePairs: 0,
    assembliesCompleted: 0,
    assembliesIncomplete: 0,
  };

  constructor(
    private readonly decoder: MessageDecoder,
    private readonly resolver: PositionResolver,
    private readonly options: AggregatorOptions,
  ) {}

  /**
   * Merge one frame into its aircraft's record. Frames that fail validation
   * or carry no usable type code are dropped silently and return null.
   */
  ingest(frame: string, timestamp: number): AircraftRecord | null {
    if (!this.decoder.isValid(frame) || this.decoder.downlinkFormat(frame) !== 17) {
      this.stats.framesDropped += 1;
      return null;
    }
    const address = this.decoder.address(frame);
    const tc = this.decoder.typeCode(frame);
    if (!address || tc === null || tc === 0) {
      this.stats.framesDropped += 1;
      return null;
    }

    const tracked = this.track(address, timestamp);
    const { record } = tracked;
    if (timestamp < record.firstSeen) {
      record.firstSeen = timestamp;
    }
    record.lastUpdate = Math.max(record.lastUpdate, timestamp);
    this.stats.framesAccepted += 1;

    if (tc >= 1 && tc <= 4) {
      const callsign = this.decoder.callsign(frame);
      if (callsign) {
        record.callsign = callsign;
      }
    } else if (tc >= 5 && tc <= 8) {
      this.updatePosition(tracked, frame, timestamp);
      const velocity = this.decoder.surfaceVelocity(frame);
      if (velocity) {
        record.velocity = Object.freeze(velocity);
      }
    } else if (tc >= 9 && tc <= 18) {
      const altitude = this.decoder.altitude(frame);
      if (altitude !== null) {
        record.altitude = altitude;
      }
      this.updatePosition(tracked, frame, timestamp);
    } else if (tc === 19) {
      const velocity = this.decoder.airborneVelocity(frame);
      if (velocity) {
        record.velocity = Object.freeze(velocity);
      }
    } else if (tc >= 20 && tc <= 22) {
      this.updatePosition(tracked, frame, timestamp);
    }

    this.checkAssembly(tracked, timestamp);
    return record;
  }

  /**
   * Frozen point-in-time copy. Nested objects are shared: they are replaced,
   * never mutated, once attached to a record.
   */
  snapshot(): Snapshot {
    const copy: Record<string, Readonly<AircraftRecord>> = {};
    for (const [address, { record }] of this.aircraft.entries()) {
      copy[address] = Object.freeze({ ...record });
    }
    return Object.freeze(copy);
  }

  /**
   * Forget aircraft not heard from within the record TTL.
   */
  prune(now: number): number {
    const cutoff = now - this.options.recordTtlSeconds;
    let removed = 0;
    for (const [address, { record }] of this.aircraft.entries()) {
      if (record.lastUpdate < cutoff) {
        this.aircraft.delete(address);
        removed += 1;
      }
    }
    if (removed > 0) {
      logger.debug('Pruned inactive aircraft', { removed, remaining: this.aircraft.size });
    }
    return removed;
  }

  getStats(): AggregatorStats {
    return { ...this.stats, trackedAircraft: this.aircraft.size };
  }

  private track(address: string, timestamp: number): TrackedAircraft {
    const existing = this.aircraft.get(address);
    if (existing) {
      return existing;
    }
    const tracked: TrackedAircraft = {
      record: {
        address,
        callsign: null,
        position: null,
        altitude: null,
        velocity: null,
        firstSeen: timestamp,
        lastUpdate: timestamp,
        distanceNm: null,
        distanceKm: null,
        assemblyTimeMs: null,
        staleCprCount: 0,
      },
      cpr: createCprTrackingState(),
      assembly: 'pending',
    };
    this.aircraft.set(address, tracked);
    logger.debug('Tracking new aircraft', { address });
    return tracked;
  }

  private updatePosition(tracked: TrackedAircraft, frame: string, timestamp: number): void {
    const { record } = tracked;
    const outcome = this.resolver.resolve(record.address, tracked.cpr, frame, timestamp);
    if (outcome.status === 'stale') {
      if (outcome.counted) {
        record.staleCprCount += 1;
        this.stats.stalePairs += 1;
      }
      return;
    }
    if (outcome.status !== 'resolved') {
      return;
    }
    record.position = Object.freeze(outcome.position);
    const { distanceNm, distanceKm } = distanceFromReference(outcome.position, this.options.reference);
    record.distanceNm = distanceNm;
    record.distanceKm = distanceKm;
  }

  private checkAssembly(tracked: TrackedAircraft, timestamp: number): void {
    if (tracked.assembly !== 'pending') {
      return;
    }
    const { record } = tracked;
    const elapsedSeconds = timestamp - record.firstSeen;
    if (record.callsign !== null
      && record.position !== null
      && record.altitude !== null
      && record.velocity !== null) {
      tracked.assembly = 'complete';
      record.assemblyTimeMs = elapsedSeconds * 1000;
      this.stats.assembliesCompleted += 1;
      logger.debug('Aircraft state assembly complete', {
        address: record.address,
        assemblyTimeMs: record.assemblyTimeMs,
      });
      return;
    }
    if (elapsedSeconds > this.options.assemblyTimeoutSeconds) {
      tracked.assembly = 'incomplete';
      this.stats.assembliesIncomplete += 1;
      logger.debug('Aircraft state assembly timed out', {
        address: record.address,
        elapsedSeconds,
      });
    }
  }
}

export default AircraftStateAggregator;
