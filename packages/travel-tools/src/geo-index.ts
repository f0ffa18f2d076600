import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { isStoreDecimal, type ItemValue } from '@concierge/core';
import type { GeoPlace } from './types.js';

const EARTH_RADIUS_KM = 6371;

const placesSchema = z.array(
  z.object({
    name: z.string().min(1),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
  }),
);

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in km between two points given in decimal degrees.
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const dLat = phi2 - phi1;
  const dLon = toRadians(lon2) - toRadians(lon1);

  const a = Math.sin(dLat / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
}

/**
 * Read a coordinate attribute. Accepts numbers, store decimals and numeric
 * strings, optionally wrapped in literal double quotes.
 *
 * @returns the value in degrees, `undefined` when the attribute is absent,
 *   or `null` when it is present but unparseable
 */
export function parseCoordinate(value: ItemValue | undefined): number | null | undefined {
  if (value === undefined || value === null) return undefined;

  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (isStoreDecimal(value)) {
    n = value.toNumber();
  } else if (typeof value === 'string') {
    const text = value.trim().replace(/^"+|"+$/g, '').trim();
    n = text === '' ? NaN : Number(text);
  } else {
    return null;
  }

  return Number.isFinite(n) ? n : null;
}

/**
 * Immutable table of known place names and their coordinates.
 *
 * Lookup order is insertion order, so the first substring match wins.
 */
export class GeoIndex {
  private readonly places: readonly GeoPlace[];

  constructor(places: readonly GeoPlace[]) {
    this.places = Object.freeze(
      places.map((p) => Object.freeze({ name: p.name.toLowerCase(), lat: p.lat, lon: p.lon })),
    );
  }

  /**
   * Resolve a free-text location: case-insensitive exact name first, then
   * the first place where either name contains the other.
   */
  resolve(location: string): GeoPlace | null {
    const query = location.trim().toLowerCase();
    if (!query) return null;

    for (const place of this.places) {
      if (place.name === query) return place;
    }

    for (const place of this.places) {
      if (query.includes(place.name) || place.name.includes(query)) return place;
    }

    return null;
  }

  names(): string[] {
    return this.places.map((p) => p.name);
  }

  get size(): number {
    return this.places.length;
  }
}

/**
 * Parse and validate a list of places, e.g. from a JSON file.
 */
export function parsePlaces(data: unknown): GeoPlace[] {
  return placesSchema.parse(data);
}

let defaultIndex: GeoIndex | undefined;

/**
 * The built-in New Zealand place table, loaded once from `data/nz-places.json`.
 */
export function defaultGeoIndex(): GeoIndex {
  if (!defaultIndex) {
    const raw = readFileSync(new URL('../data/nz-places.json', import.meta.url), 'utf-8');
    defaultIndex = new GeoIndex(parsePlaces(JSON.parse(raw)));
  }
  return defaultIndex;
}
