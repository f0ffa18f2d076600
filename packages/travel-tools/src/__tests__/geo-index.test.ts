import { describe, it, expect } from 'vitest';
import { StoreDecimal } from '@concierge/core';
import { GeoIndex, defaultGeoIndex, haversineKm, parseCoordinate, parsePlaces } from '../geo-index.js';

const AUCKLAND = { lat: -36.8509, lon: 174.7645 };
const WELLINGTON = { lat: -41.2865, lon: 174.7762 };

describe('haversineKm', () => {
  it('puts Auckland about 495 km from Wellington', () => {
    const d = haversineKm(AUCKLAND.lat, AUCKLAND.lon, WELLINGTON.lat, WELLINGTON.lon);
    expect(d).toBeGreaterThan(490);
    expect(d).toBeLessThan(500);
  });

  it('is symmetric', () => {
    const there = haversineKm(AUCKLAND.lat, AUCKLAND.lon, WELLINGTON.lat, WELLINGTON.lon);
    const back = haversineKm(WELLINGTON.lat, WELLINGTON.lon, AUCKLAND.lat, AUCKLAND.lon);
    expect(back).toBeCloseTo(there, 9);
  });

  it('is zero for the same point', () => {
    expect(haversineKm(AUCKLAND.lat, AUCKLAND.lon, AUCKLAND.lat, AUCKLAND.lon)).toBe(0);
  });
});

describe('parseCoordinate', () => {
  it('reads numbers and decimals', () => {
    expect(parseCoordinate(-36.85)).toBe(-36.85);
    expect(parseCoordinate(new StoreDecimal('174.76'))).toBe(174.76);
  });

  it('strips literal quotes from strings', () => {
    expect(parseCoordinate('"-36.85"')).toBe(-36.85);
    expect(parseCoordinate(' 174.76 ')).toBe(174.76);
  });

  it('reports absent attributes as undefined', () => {
    expect(parseCoordinate(undefined)).toBeUndefined();
    expect(parseCoordinate(null)).toBeUndefined();
  });

  it('reports unparseable values as null', () => {
    expect(parseCoordinate('north')).toBeNull();
    expect(parseCoordinate('""')).toBeNull();
    expect(parseCoordinate(true)).toBeNull();
  });
});

describe('GeoIndex', () => {
  const index = defaultGeoIndex();

  it('loads the built-in place table', () => {
    expect(index.size).toBe(16);
    expect(index.names()[0]).toBe('auckland');
  });

  it('resolves exact names case-insensitively', () => {
    expect(index.resolve('Wellington')).toEqual({ name: 'wellington', lat: -41.2865, lon: 174.7762 });
  });

  it('resolves a query that contains a place name', () => {
    expect(index.resolve('Auckland CBD')?.name).toBe('auckland');
  });

  it('resolves a query contained in a place name', () => {
    expect(index.resolve('tekapo')?.name).toBe('lake tekapo');
    expect(index.resolve('mt')?.name).toBe('mt cook');
  });

  it('returns null for unknown places and blank queries', () => {
    expect(index.resolve('Sydney')).toBeNull();
    expect(index.resolve('   ')).toBeNull();
  });

  it('prefers an exact match over an earlier substring match', () => {
    const custom = new GeoIndex([
      { name: 'port', lat: 1, lon: 1 },
      { name: 'newport', lat: 2, lon: 2 },
    ]);
    expect(custom.resolve('newport')?.name).toBe('newport');
  });

  it('takes the first substring match in insertion order', () => {
    const custom = new GeoIndex([
      { name: 'port', lat: 1, lon: 1 },
      { name: 'portland', lat: 2, lon: 2 },
    ]);
    expect(custom.resolve('portland harbour')?.name).toBe('port');
  });

  it('lower-cases names given to it', () => {
    const custom = new GeoIndex([{ name: 'Picton', lat: -41.29, lon: 174.0 }]);
    expect(custom.resolve('picton')?.name).toBe('picton');
  });
});

describe('parsePlaces', () => {
  it('rejects out-of-range coordinates', () => {
    expect(() => parsePlaces([{ name: 'nowhere', lat: 95, lon: 0 }])).toThrow();
  });
});
