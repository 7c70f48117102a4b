import { snapshotSchema } from '../snapshot.schemas';

describe('snapshot schemas', () => {
  it('accepts a keyed mapping of aircraft records', () => {
    const parsed = snapshotSchema.parse({
      ABC123: {
        address: 'ABC123',
        callsign: 'TEST1',
        position: { lat: 52.2572, lon: 3.91937 },
        altitude: 38000,
        velocity: { speed: 159, track: 182.88, verticalRate: -832, type: 'GS' },
        firstSeen: 100,
        lastUpdate: 104,
        distanceNm: 12.5,
        distanceKm: 23.15,
        assemblyTimeMs: 4000,
        staleCprCount: 1,
      },
    });

    expect(parsed.ABC123.velocity?.type).toBe('GS');
    expect(parsed.ABC123.staleCprCount).toBe(1);
  });

  it('rejects arrays and non-object payloads', () => {
    expect(snapshotSchema.safeParse(['x']).success).toBe(false);
    expect(snapshotSchema.safeParse('snapshot').success).toBe(false);
    expect(snapshotSchema.safeParse(null).success).toBe(false);
  });

  it('rejects out-of-range coordinates and unknown velocity types', () => {
    const base = { address: 'ABC123', firstSeen: 100, lastUpdate: 104 };

    expect(snapshotSchema.safeParse({ ABC123: { ...base, position: { lat: 91, lon: 0 } } }).success).toBe(false);
    expect(snapshotSchema.safeParse({
      ABC123: { ...base, velocity: { speed: 1, track: 1, verticalRate: 0, type: 'MACH' } },
    }).success).toBe(false);
  });

  it('accepts an empty snapshot', () => {
    expect(snapshotSchema.parse({})).toEqual({});
  });
});
