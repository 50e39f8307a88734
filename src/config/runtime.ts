import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const readTrimmed = (rawValue: string | undefined, fallback: string = ''): string => {
  const trimmed = (rawValue || '').trim();
  return trimmed || fallback;
};

export const DEBUG_TRIP = process.env.DEBUG_TRIP === 'true';

export const OPENWEATHER_API_KEY = readTrimmed(process.env.OPENWEATHER_API_KEY);
export const OPENWEATHER_API_URL = readTrimmed(process.env.OPENWEATHER_API_URL, 'https://api.openweathermap.org/data/2.5/weather');

export const OPENAI_API_KEY = readTrimmed(process.env.OPENAI_API_KEY);
export const OPENAI_API_URL = readTrimmed(process.env.OPENAI_API_URL, 'https://api.openai.com/v1/chat/completions');
export const OPENAI_MODEL = readTrimmed(process.env.OPENAI_MODEL, 'gpt-4o-mini');

export const GEOCODER_BASE_URL = readTrimmed(process.env.GEOCODER_BASE_URL, 'https://nominatim.openstreetmap.org');

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const ROUTE_WEATHER_TIMEOUT_MS = parsePositiveInt(process.env.ROUTE_WEATHER_TIMEOUT_MS, 10000);
export const HOME_WEATHER_TIMEOUT_MS = parsePositiveInt(process.env.HOME_WEATHER_TIMEOUT_MS, 12000);
// Chat completions routinely run past the default request timeout.
export const ADVICE_TIMEOUT_MS = parsePositiveInt(process.env.ADVICE_TIMEOUT_MS, 60000);
export const ROUTE_SAMPLE_COUNT = parsePositiveInt(process.env.ROUTE_SAMPLE_COUNT, 5);

export const DEFAULT_CITY = readTrimmed(process.env.DEFAULT_CITY, 'New Delhi');
export const PREFERENCES_FILE = readTrimmed(process.env.PREFERENCES_FILE, '.route-weather/preferences.json');

// "lat,lon" of the host when it has no positioning hardware of its own
export const DEVICE_LOCATION = readTrimmed(process.env.DEVICE_LOCATION);
export const DEVICE_LOCATION_PERMISSION = readTrimmed(process.env.DEVICE_LOCATION_PERMISSION, 'granted');
