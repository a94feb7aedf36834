import { describe, it, expect } from 'vitest';
import { areaCenter, clampConfidence, distanceKm, resolveArea } from './geo';
import { DEFAULT_AREAS } from '../config/types';

const areas = DEFAULT_AREAS.map((area) => ({ ...area, center: { ...area.center } }));

describe('geo', () => {
  it('measures zero distance to itself', () => {
    expect(distanceKm({ lat: 34, lon: -118 }, { lat: 34, lon: -118 })).toBe(0);
  });

  it('measures one degree of latitude as about 111km', () => {
    expect(distanceKm({ lat: 0, lon: 0 }, { lat: 1, lon: 0 })).toBeCloseTo(111.19, 1);
  });

  it('resolves a point to the area that contains it', () => {
    expect(resolveArea({ lat: 34.1015, lon: -118.2012 }, areas)).toBe('Area Delta');
    expect(resolveArea({ lat: 34.0531, lon: -118.2449 }, areas)).toBe('Area Alpha');
  });

  it('names a sector for points outside every area', () => {
    expect(resolveArea({ lat: 35.5, lon: -117.25 }, areas)).toBe('Sector 35.50,-117.25');
  });

  it('looks up area centers', () => {
    expect(areaCenter('Area Delta', areas)).toEqual({ lat: 34.1, lon: -118.2 });
    expect(areaCenter('Area Zulu', areas)).toBeNull();
  });

  it('clamps confidence into [0, 1]', () => {
    expect(clampConfidence(1.4)).toBe(1);
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(0.42)).toBe(0.42);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});
