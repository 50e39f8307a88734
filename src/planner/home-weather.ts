import type { Coordinate, KeyValueStore, LocationProvider, WeatherObservation, WeatherService } from '../types.js';
import { readErrorMessage } from '../utils/http-client.js';
import { getCurrentLocation } from '../utils/location-service.js';
import { readLastLocation, writeLastLocation } from '../utils/preferences.js';
import { serializeCoordinatePair } from '../utils/weather-service.js';

export interface HomeWeatherResult {
  query: string;
  observation: WeatherObservation | null;
  error: string | null;
  // Why the fallback city was shown instead of the saved or device location.
  notice: string | null;
}

interface CreateHomeWeatherLoaderOptions {
  weather: WeatherService;
  store: KeyValueStore;
  locationProvider: LocationProvider;
  defaultCity: string;
  timeoutMs: number;
}

export const createHomeWeatherLoader = ({
  weather,
  store,
  locationProvider,
  defaultCity,
  timeoutMs,
}: CreateHomeWeatherLoaderOptions) => {
  // A failed fetch leaves the saved preference as it was.
  const fetchAndRemember = async (query: string): Promise<HomeWeatherResult> => {
    let observation: WeatherObservation;
    try {
      observation = await weather.fetchCurrentByQuery(query, timeoutMs);
    } catch (error) {
      console.warn(`[Weather] Current weather unavailable for "${query}":`, readErrorMessage(error));
      return { query, observation: null, error: readErrorMessage(error), notice: null };
    }
    try {
      await writeLastLocation(store, query);
    } catch (error) {
      console.warn(`[Preferences] Could not save "${query}" as the last location:`, readErrorMessage(error));
      return { query, observation, error: readErrorMessage(error), notice: null };
    }
    return { query, observation, error: null, notice: null };
  };

  const resolveStartupQuery = async (): Promise<string> => {
    const saved = await readLastLocation(store);
    if (saved) {
      return saved;
    }
    return serializeCoordinatePair(await getCurrentLocation(locationProvider));
  };

  const load = async (): Promise<HomeWeatherResult> => {
    let query: string;
    try {
      query = await resolveStartupQuery();
    } catch (error) {
      const startupError = readErrorMessage(error);
      console.warn(`[Weather] Falling back to ${defaultCity}:`, startupError);
      const fallback = await fetchAndRemember(defaultCity);
      return { ...fallback, notice: startupError };
    }
    return fetchAndRemember(query);
  };

  const search = async (rawQuery: string): Promise<HomeWeatherResult> => {
    const query = rawQuery.trim();
    if (!query) {
      return { query, observation: null, error: 'Search text is empty.', notice: null };
    }
    return fetchAndRemember(query);
  };

  const useCurrentLocation = async (): Promise<HomeWeatherResult> => {
    let coordinate: Coordinate;
    try {
      coordinate = await getCurrentLocation(locationProvider);
    } catch (error) {
      console.warn('[Weather] Device location unavailable:', readErrorMessage(error));
      return { query: '', observation: null, error: readErrorMessage(error), notice: null };
    }
    return fetchAndRemember(serializeCoordinatePair(coordinate));
  };

  return { load, search, useCurrentLocation };
};

export type HomeWeatherLoader = ReturnType<typeof createHomeWeatherLoader>;
