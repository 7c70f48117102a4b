import type {
  Coordinate,
  Parity,
  Velocity,
} from '../types/aircraft.types';
import { resolveGlobalPosition } from './cpr';

/**
 * Narrow decoding surface the tracking pipeline depends on.
 * Frames are 112-bit extended squitters as 28 hex characters.
 */
export interface MessageDecoder {
  isValid(frame: string): boolean;
  downlinkFormat(frame: string): number;
  address(frame: string): string | null;
  typeCode(frame: string): number | null;
  callsign(frame: string): string | null;
  altitude(frame: string): number | null;
  parity(frame: string): Parity | null;
  airborneVelocity(frame: string): Velocity | null;
  surfaceVelocity(frame: string): Velocity | null;
  resolvePosition(
    evenFrame: string,
    oddFrame: string,
    evenTimestamp: number,
    oddTimestamp: number,
    reference?: Coordinate | null,
  ): Coordinate | null;
}

export const FRAME_HEX_LENGTH = 28;

const HEX_PATTERN = /^[0-9A-F]+$/;

const CALLSIGN_CHARSET = '#ABCDEFGHIJKLMNOPQRSTUVWXYZ#####_###############0123456789######';

// 0x1FFF409
const CRC_GENERATOR = [1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 0, 1, 0, 0, 0, 0, 0, 0, 1, 0, 0, 1];

export function normalizeFrame(frame: string): string {
  return frame.trim().toUpperCase();
}

export function hexToBin(hex: string): string {
  let bits = '';
  for (const char of hex) {
    bits += parseInt(char, 16).toString(2).padStart(4, '0');
  }
  return bits;
}

export function binToInt(bits: string): number {
  return bits.length === 0 ? 0 : parseInt(bits, 2);
}

/**
 * Remainder of the Mode S CRC-24 over the whole frame; zero for an intact
 * extended squitter, whose last 24 bits are plain parity.
 */
export function crcRemainder(frame: string): number {
  const bits = Array.from(hexToBin(normalizeFrame(frame)), (bit) => (bit === '1' ? 1 : 0));
  for (let i = 0; i < bits.length - 24; i += 1) {
    if (bits[i] === 1) {
      for (let j = 0; j < CRC_GENERATOR.length; j += 1) {
        bits[i + j] ^= CRC_GENERATOR[j];
      }
    }
  }
  return binToInt(bits.slice(-24).join(''));
}

/**
 * ME field (message, extended squitter): bits 32..87.
 */
function messageBits(frame: string): string {
  return hexToBin(normalizeFrame(frame)).slice(32, 88);
}

function grayToInt(bits: string): number {
  let num = binToInt(bits);
  num ^= num >> 8;
  num ^= num >> 4;
  num ^= num >> 2;
  num ^= num >> 1;
  return num;
}

function grayToAltitude(gray: string): number | null {
  const n500 = grayToInt(gray.slice(0, 8));
  let n100 = grayToInt(gray.slice(8));
  if (n100 === 0 || n100 === 5 || n100 === 6) {
    return null;
  }
  if (n100 === 7) {
    n100 = 5;
  }
  if (n500 % 2 === 1) {
    n100 = 6 - n100;
  }
  return n500 * 500 + n100 * 100 - 1300;
}

/**
 * Decode a 13-bit altitude code (M bit at index 6, Q bit at index 8).
 */
export function altitudeCodeToFeet(code: string): number | null {
  if (code.length !== 13 || binToInt(code) === 0) {
    return null;
  }
  const mBit = code.charAt(6);
  const qBit = code.charAt(8);
  if (mBit === '1') {
    // Metric altitudes are not transmitted by airborne position squitters
    return null;
  }
  if (qBit === '1') {
    const n = binToInt(code.slice(0, 6) + code.charAt(7) + code.slice(9));
    return n * 25 - 1000;
  }

  const bit = (index: number) => code.charAt(index);
  // C1 A1 C2 A2 C4 A4 M B1 Q B2 D2 B4 D4
  const gray = bit(10) + bit(12) + bit(1) + bit(3) + bit(5)
    + bit(7) + bit(9) + bit(11) + bit(0) + bit(2) + bit(4);
  return grayToAltitude(gray);
}

const SURFACE_MOVEMENT_BOUNDS = [2, 9, 13, 39, 94, 109, 124];
const SURFACE_KNOTS_BOUNDS = [0.125, 1, 2, 15, 70, 100, 175];
const SURFACE_KNOTS_STEP = [0.125, 0.25, 0.5, 1, 2, 5];

function surfaceMovementToKnots(movement: number): number | null {
  if (movement === 0 || movement > 124) {
    return null;
  }
  if (movement === 1) {
    return 0;
  }
  if (movement === 124) {
    return 175;
  }
  const upper = SURFACE_MOVEMENT_BOUNDS.findIndex((bound) => bound > movement);
  const band = upper - 1;
  return SURFACE_KNOTS_BOUNDS[band] + (movement - SURFACE_MOVEMENT_BOUNDS[band]) * SURFACE_KNOTS_STEP[band];
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

function isValid(frame: string): boolean {
  const normalized = normalizeFrame(frame);
  if (normalized.length !== FRAME_HEX_LENGTH || !HEX_PATTERN.test(normalized)) {
    return false;
  }
  return crcRemainder(normalized) === 0;
}

function downlinkFormat(frame: string): number {
  const df = binToInt(hexToBin(normalizeFrame(frame).slice(0, 2)).slice(0, 5));
  return df >= 24 ? 24 : df;
}

function isExtendedSquitter(frame: string): boolean {
  const df = downlinkFormat(frame);
  return df === 17 || df === 18;
}

function address(frame: string): string | null {
  if (!isExtendedSquitter(frame)) {
    return null;
  }
  return normalizeFrame(frame).slice(2, 8);
}

function typeCode(frame: string): number | null {
  if (!isExtendedSquitter(frame)) {
    return null;
  }
  return binToInt(messageBits(frame).slice(0, 5));
}

function callsign(frame: string): string | null {
  const tc = typeCode(frame);
  if (tc === null || tc < 1 || tc > 4) {
    return null;
  }
  const bits = messageBits(frame).slice(8, 56);
  let chars = '';
  for (let i = 0; i < 8; i += 1) {
    chars += CALLSIGN_CHARSET.charAt(binToInt(bits.slice(i * 6, i * 6 + 6)));
  }
  const cleaned = chars.replace(/#/g, '').replace(/_/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : null;
}

function altitude(frame: string): number | null {
  const tc = typeCode(frame);
  if (tc === null || tc < 9 || tc > 18) {
    return null;
  }
  const bits = messageBits(frame).slice(8, 20);
  // Airborne position squitters omit the M bit
  return altitudeCodeToFeet(`${bits.slice(0, 6)}0${bits.slice(6)}`);
}

function parity(frame: string): Parity | null {
  const tc = typeCode(frame);
  if (tc === null || tc < 5 || tc > 22 || tc === 19) {
    return null;
  }
  return messageBits(frame).charAt(21) === '1' ? 'odd' : 'even';
}

function airborneVelocity(frame: string): Velocity | null {
  if (typeCode(frame) !== 19) {
    return null;
  }
  const me = messageBits(frame);
  const subtype = binToInt(me.slice(5, 8));
  if (subtype < 1 || subtype > 4) {
    return null;
  }
  if (binToInt(me.slice(14, 24)) === 0 || binToInt(me.slice(25, 35)) === 0) {
    return null;
  }

  const verticalRaw = binToInt(me.slice(37, 46));
  const verticalSign = me.charAt(36) === '1' ? -1 : 1;
  const verticalRate = verticalRaw === 0 ? null : verticalSign * (verticalRaw - 1) * 64;

  if (subtype === 1 || subtype === 2) {
    const scale = subtype === 2 ? 4 : 1;
    const eastWest = (me.charAt(13) === '1' ? -1 : 1) * (binToInt(me.slice(14, 24)) - 1) * scale;
    const northSouth = (me.charAt(24) === '1' ? -1 : 1) * (binToInt(me.slice(25, 35)) - 1) * scale;
    const speed = Math.sqrt(eastWest ** 2 + northSouth ** 2);
    let track = (Math.atan2(eastWest, northSouth) * 180) / Math.PI;
    if (track < 0) {
      track += 360;
    }
    return {
      speed: Math.round(speed),
      track: round(track, 2),
      verticalRate,
      type: 'GS',
    };
  }

  const heading = me.charAt(13) === '1' ? round((binToInt(me.slice(14, 24)) / 1024) * 360, 2) : null;
  const airspeedRaw = binToInt(me.slice(25, 35));
  const airspeed = (airspeedRaw - 1) * (subtype === 4 ? 4 : 1);
  return {
    speed: airspeed,
    track: heading,
    verticalRate,
    type: me.charAt(24) === '1' ? 'TAS' : 'IAS',
  };
}

function surfaceVelocity(frame: string): Velocity | null {
  const tc = typeCode(frame);
  if (tc === null || tc < 5 || tc > 8) {
    return null;
  }
  const me = messageBits(frame);
  const speed = surfaceMovementToKnots(binToInt(me.slice(5, 12)));
  const track = me.charAt(12) === '1' ? round((binToInt(me.slice(13, 20)) * 360) / 128, 1) : null;
  return {
    speed,
    track,
    verticalRate: 0,
    type: 'GS',
  };
}

function resolvePosition(
  evenFrame: string,
  oddFrame: string,
  evenTimestamp: number,
  oddTimestamp: number,
  reference: Coordinate | null = null,
): Coordinate | null {
  const evenTc = typeCode(evenFrame);
  const oddTc = typeCode(oddFrame);
  if (evenTc === null || oddTc === null) {
    return null;
  }
  if (parity(evenFrame) !== 'even' || parity(oddFrame) !== 'odd') {
    return null;
  }
  const evenMe = messageBits(evenFrame);
  const oddMe = messageBits(oddFrame);
  return resolveGlobalPosition(
    {
      typeCode: evenTc,
      cprLat: binToInt(evenMe.slice(22, 39)) / 131072,
      cprLon: binToInt(evenMe.slice(39, 56)) / 131072,
      timestamp: evenTimestamp,
    },
    {
      typeCode: oddTc,
      cprLat: binToInt(oddMe.slice(22, 39)) / 131072,
      cprLon: binToInt(oddMe.slice(39, 56)) / 131072,
      timestamp: oddTimestamp,
    },
    reference,
  );
}

export const modeSDecoder: MessageDecoder = {
  isValid,
  downlinkFormat,
  address,
  typeCode,
  callsign,
  altitude,
  parity,
  airborneVelocity,
  surfaceVelocity,
  resolvePosition,
};

export default modeSDecoder;
