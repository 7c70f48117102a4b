/**
 * Aircraft state as tracked in memory and published on the snapshot feed.
 * Every field is always present; unknown values are null.
 */

export type Parity = 'even' | 'odd';

export interface Coordinate {
  lat: number;
  lon: number;
}

/**
 * GS: ground speed with track angle. IAS/TAS: airspeed with magnetic heading.
 */
export type VelocityType = 'GS' | 'IAS' | 'TAS';

export interface Velocity {
  speed: number | null;
  track: number | null;
  verticalRate: number | null;
  type: VelocityType;
}

export interface AircraftRecord {
  address: string;
  callsign: string | null;
  position: Coordinate | null;
  altitude: number | null;
  velocity: Velocity | null;
  firstSeen: number;
  lastUpdate: number;
  distanceNm: number | null;
  distanceKm: number | null;
  assemblyTimeMs: number | null;
  staleCprCount: number;
}

export type Snapshot = Readonly<Record<string, Readonly<AircraftRecord>>>;

export interface ParitySlot {
  parity: Parity;
  frame: string;
  timestamp: number;
}

export interface ParitySlots {
  even: ParitySlot | null;
  odd: ParitySlot | null;
}
