import type { Coordinate, WeatherObservation, WeatherService } from '../types.js';
import { ProviderError } from './errors.js';
import { type FetchWithTimeout, readErrorMessage } from './http-client.js';
import { OpenWeatherCurrentSchema, formatZodIssues, type OpenWeatherCurrentPayload } from './validation.js';

interface CreateWeatherServiceOptions {
  fetchWithTimeout: FetchWithTimeout;
  apiKey: string;
  apiUrl: string;
  defaultTimeoutMs: number;
}

const COORDINATE_PAIR_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;

export const parseCoordinatePair = (value: string): Coordinate | null => {
  const match = value.match(COORDINATE_PAIR_PATTERN);
  if (!match) {
    return null;
  }
  const lat = Number(match[1]);
  const lon = Number(match[2]);
  if (!Number.isFinite(lat) || !Number.isFinite(lon) || lat < -90 || lat > 90 || lon < -180 || lon > 180) {
    return null;
  }
  return { lat, lon };
};

// Six decimals keep tiny values out of exponent form, which the pair pattern would not read back.
const formatCoordinateValue = (value: number): string => String(Number(value.toFixed(6)));

export const serializeCoordinatePair = ({ lat, lon }: Coordinate): string =>
  `${formatCoordinateValue(lat)},${formatCoordinateValue(lon)}`;

const readWeatherDescription = (payload: OpenWeatherCurrentPayload): string => {
  const [first] = payload.weather;
  if (!first) {
    return '';
  }
  return first.description || first.main || '';
};

export const toWeatherObservation = (payload: OpenWeatherCurrentPayload): WeatherObservation => ({
  description: readWeatherDescription(payload),
  condition: payload.weather[0]?.main ?? null,
  temperatureC: payload.main?.temp ?? null,
  feelsLikeC: payload.main?.feels_like ?? null,
  minTemperatureC: payload.main?.temp_min ?? null,
  maxTemperatureC: payload.main?.temp_max ?? null,
  humidityPct: payload.main?.humidity ?? null,
  pressureHpa: payload.main?.pressure ?? null,
  windSpeedMs: payload.wind?.speed ?? null,
  windDirectionDeg: payload.wind?.deg ?? null,
  cloudCoverPct: payload.clouds?.all ?? null,
  country: payload.sys?.country ?? null,
  locationName: payload.name ?? null,
  observedAt: payload.dt ?? null,
  utcOffsetSeconds: payload.timezone ?? null,
});

export const createWeatherService = ({
  fetchWithTimeout,
  apiKey,
  apiUrl,
  defaultTimeoutMs,
}: CreateWeatherServiceOptions): WeatherService => {
  const requestObservation = async (params: URLSearchParams, timeoutMs: number): Promise<WeatherObservation> => {
    if (!apiKey) {
      throw new ProviderError('weather', 'OpenWeather API key is not configured.');
    }
    params.set('units', 'metric');
    params.set('appid', apiKey);

    let response: Response;
    try {
      response = await fetchWithTimeout(`${apiUrl}?${params.toString()}`, {}, timeoutMs);
    } catch (error) {
      throw new ProviderError('weather', `Weather API request failed: ${readErrorMessage(error)}`);
    }
    if (!response.ok) {
      throw new ProviderError('weather', `Weather API error: ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError('weather', `Weather API returned invalid JSON: ${readErrorMessage(error)}`, response.status);
    }

    const parsed = OpenWeatherCurrentSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('weather', formatZodIssues(parsed.error, 'Weather API returned an unexpected payload'), response.status);
    }
    if (parsed.data.cod !== undefined && Number(parsed.data.cod) !== 200) {
      throw new ProviderError('weather', parsed.data.message || 'Weather API error', Number(parsed.data.cod) || null);
    }
    return toWeatherObservation(parsed.data);
  };

  const fetchCurrent = (coordinate: Coordinate, timeoutMs: number = defaultTimeoutMs) =>
    requestObservation(new URLSearchParams({ lat: String(coordinate.lat), lon: String(coordinate.lon) }), timeoutMs);

  const fetchCurrentByQuery = (query: string, timeoutMs: number = defaultTimeoutMs) => {
    const coordinate = parseCoordinatePair(query);
    if (coordinate) {
      return fetchCurrent(coordinate, timeoutMs);
    }
    return requestObservation(new URLSearchParams({ q: query.trim() }), timeoutMs);
  };

  return { fetchCurrent, fetchCurrentByQuery };
};
