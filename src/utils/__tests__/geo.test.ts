import { distanceFromReference, haversineNm } from '../geo';

describe('geo', () => {
  it('measures one degree of longitude at the equator', () => {
    expect(haversineNm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(60.0405, 3);
  });

  it('is zero for identical points', () => {
    expect(haversineNm({ lat: 52.1, lon: 4.2 }, { lat: 52.1, lon: 4.2 })).toBe(0);
  });

  it('annotates nautical miles and kilometres from the reference', () => {
    const { distanceNm, distanceKm } = distanceFromReference({ lat: 0, lon: 1 }, { lat: 0, lon: 0 });
    expect(distanceNm).toBeCloseTo(60.0405, 3);
    expect(distanceKm).toBeCloseTo(111.195, 2);
  });

  it('clears both distances without a reference or a position', () => {
    expect(distanceFromReference({ lat: 0, lon: 1 }, null)).toEqual({ distanceNm: null, distanceKm: null });
    expect(distanceFromReference(null, { lat: 0, lon: 0 })).toEqual({ distanceNm: null, distanceKm: null });
  });
});
