import type { Coordinate, TripSummary } from '../types.js';

const EARTH_RADIUS_KM = 6371;
const DEFAULT_AVERAGE_SPEED_KMH = 60;

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTH_SHORT_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export const haversineKm = (a: Coordinate, b: Coordinate): number => {
  const toRadians = (v: number) => (v * Math.PI) / 180;
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
};

export const formatDistanceKm = (a: Coordinate, b: Coordinate): string => `${haversineKm(a, b).toFixed(1)} km`;

export const estimateDriveTime = (a: Coordinate, b: Coordinate, avgKmh: number = DEFAULT_AVERAGE_SPEED_KMH): string => {
  const totalMinutes = Math.round((haversineKm(a, b) / avgKmh) * 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
};

export const buildTripSummary = (origin: Coordinate, destination: Coordinate): TripSummary => ({
  distanceKm: haversineKm(origin, destination),
  distanceText: formatDistanceKm(origin, destination),
  driveTimeText: estimateDriveTime(origin, destination),
});

export const celsiusToFahrenheit = (celsius: number): number => (celsius * 9) / 5 + 32;

export type TemperatureUnit = 'c' | 'f';

export const formatTemperature = (celsius: number | null, unit: TemperatureUnit = 'c'): string => {
  if (celsius === null || !Number.isFinite(celsius)) {
    return '--';
  }
  return unit === 'f' ? `${Math.round(celsiusToFahrenheit(celsius))}°F` : `${Math.round(celsius)}°C`;
};

/** "Monday, Oct 19  3:04 PM" at the observed location's UTC offset. */
export const formatLocalTime = (observedAtSeconds: number, utcOffsetSeconds: number): string => {
  const local = new Date((observedAtSeconds + utcOffsetSeconds) * 1000);
  const hours24 = local.getUTCHours();
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  const minutes = String(local.getUTCMinutes()).padStart(2, '0');
  const meridiem = hours24 < 12 ? 'AM' : 'PM';
  const weekday = WEEKDAY_NAMES[local.getUTCDay()];
  const month = MONTH_SHORT_NAMES[local.getUTCMonth()];
  return `${weekday}, ${month} ${local.getUTCDate()}  ${hours12}:${minutes} ${meridiem}`;
};
