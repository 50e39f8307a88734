import type { Coordinate, RouteSample } from '../types.js';

export const DEFAULT_SAMPLE_COUNT = 5;

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

const normalizeSampleCount = (count: number): number => {
  const rounded = Math.round(count);
  return Number.isFinite(rounded) && rounded >= 1 ? rounded : 1;
};

/**
 * Evenly spaced points on the straight line between two coordinates, origin
 * and destination included. This is plain linear interpolation of latitude
 * and longitude, not a great-circle path and not a road route.
 */
export const sampleRoute = (origin: Coordinate, destination: Coordinate, count: number = DEFAULT_SAMPLE_COUNT): RouteSample[] => {
  const segments = normalizeSampleCount(count);
  return Array.from({ length: segments + 1 }, (_, index) => {
    const t = index / segments;
    return {
      index,
      coordinate: {
        lat: lerp(origin.lat, destination.lat, t),
        lon: lerp(origin.lon, destination.lon, t),
      },
    };
  });
};
