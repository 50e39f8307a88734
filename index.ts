import {
  ADVICE_TIMEOUT_MS,
  DEBUG_TRIP,
  DEFAULT_CITY,
  DEVICE_LOCATION,
  DEVICE_LOCATION_PERMISSION,
  GEOCODER_BASE_URL,
  HOME_WEATHER_TIMEOUT_MS,
  OPENAI_API_KEY,
  OPENAI_API_URL,
  OPENAI_MODEL,
  OPENWEATHER_API_KEY,
  OPENWEATHER_API_URL,
  PREFERENCES_FILE,
  REQUEST_TIMEOUT_MS,
  ROUTE_SAMPLE_COUNT,
  ROUTE_WEATHER_TIMEOUT_MS,
} from './src/config/runtime.js';
import { createFetchWithTimeout } from './src/utils/http-client.js';
import { createGeocodingService } from './src/utils/geocoding-service.js';
import { createWeatherService } from './src/utils/weather-service.js';
import { createAdviceService } from './src/utils/advice-service.js';
import { createConfiguredLocationProvider } from './src/utils/location-service.js';
import { createFileStore } from './src/utils/preferences.js';
import { createTripPlanner } from './src/planner/trip-planner.js';
import { createTripSession, type TripSessionState } from './src/planner/trip-session.js';
import { createHomeWeatherLoader } from './src/planner/home-weather.js';

const tripLog = (...args: unknown[]) => {
  if (DEBUG_TRIP) {
    console.log(...args);
  }
};

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

export const geocoder = createGeocodingService({ fetchWithTimeout, baseUrl: GEOCODER_BASE_URL });

export const weather = createWeatherService({
  fetchWithTimeout,
  apiKey: OPENWEATHER_API_KEY,
  apiUrl: OPENWEATHER_API_URL,
  defaultTimeoutMs: ROUTE_WEATHER_TIMEOUT_MS,
});

export const advice = createAdviceService({
  fetchWithTimeout,
  apiKey: OPENAI_API_KEY,
  apiUrl: OPENAI_API_URL,
  model: OPENAI_MODEL,
  timeoutMs: ADVICE_TIMEOUT_MS,
});

export const locationProvider = createConfiguredLocationProvider({
  position: DEVICE_LOCATION,
  permission: DEVICE_LOCATION_PERMISSION,
});

export const preferencesStore = createFileStore(PREFERENCES_FILE);

export const tripPlanner = createTripPlanner({
  geocoder,
  weather,
  advice,
  locationProvider,
  sampleCount: ROUTE_SAMPLE_COUNT,
  routeWeatherTimeoutMs: ROUTE_WEATHER_TIMEOUT_MS,
  log: tripLog,
});

export const homeWeather = createHomeWeatherLoader({
  weather,
  store: preferencesStore,
  locationProvider,
  defaultCity: DEFAULT_CITY,
  timeoutMs: HOME_WEATHER_TIMEOUT_MS,
});

export const planTrip = tripPlanner.planTrip;

export const openTripSession = (onChange?: (state: TripSessionState) => void) =>
  createTripSession({ planner: tripPlanner, onChange });

export * from './src/types.js';
export * from './src/utils/errors.js';
export { createFetchWithTimeout, DEFAULT_FETCH_HEADERS } from './src/utils/http-client.js';
export type { FetchWithTimeout } from './src/utils/http-client.js';
export { createGeocodingService, formatCoordinateLabel } from './src/utils/geocoding-service.js';
export { createWeatherService, parseCoordinatePair, serializeCoordinatePair } from './src/utils/weather-service.js';
export { createAdviceService, buildAdvicePrompt, formatTripDate } from './src/utils/advice-service.js';
export { createConfiguredLocationProvider, getCurrentLocation } from './src/utils/location-service.js';
export { createFileStore, createMemoryStore, LAST_LOCATION_KEY, readLastLocation, writeLastLocation } from './src/utils/preferences.js';
export { classifySeverity, worstSeverity, severityColor, severityLabel, SEVERITY_LEGEND } from './src/utils/severity.js';
export { sampleRoute, lerp } from './src/utils/route-sampler.js';
export {
  haversineKm,
  formatDistanceKm,
  estimateDriveTime,
  buildTripSummary,
  celsiusToFahrenheit,
  formatTemperature,
  formatLocalTime,
} from './src/utils/trip-summary.js';
export type { TemperatureUnit } from './src/utils/trip-summary.js';
export { createTripPlanner, UNKNOWN_WEATHER_DESCRIPTION } from './src/planner/trip-planner.js';
export type { TripPlanner, PlanTripOptions } from './src/planner/trip-planner.js';
export { createTripSession, IDLE_SESSION_STATE } from './src/planner/trip-session.js';
export type { TripSession, TripSessionState } from './src/planner/trip-session.js';
export { createHomeWeatherLoader } from './src/planner/home-weather.js';
export type { HomeWeatherLoader, HomeWeatherResult } from './src/planner/home-weather.js';
