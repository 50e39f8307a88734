import { createHomeWeatherLoader } from '../src/planner/home-weather.js';
import type { KeyValueStore } from '../src/types.js';
import { createMemoryStore, LAST_LOCATION_KEY } from '../src/utils/preferences.js';
import { createStubLocationProvider, createStubWeather, providerFailure } from './helpers/stubs.js';

interface SetupOptions {
  saved?: string | null;
  weatherOutcomes?: (string | Error)[];
  location?: ReturnType<typeof createStubLocationProvider>;
  store?: KeyValueStore;
}

const setup = ({
  saved = null,
  weatherOutcomes = ['clear sky'],
  location = createStubLocationProvider({ position: { lat: 28.6, lon: 77.2 } }),
  store = createMemoryStore(saved === null ? {} : { [LAST_LOCATION_KEY]: saved }),
}: SetupOptions = {}) => {
  const weatherCalls: string[] = [];
  const loader = createHomeWeatherLoader({
    weather: createStubWeather(weatherOutcomes, weatherCalls),
    store,
    locationProvider: location.provider,
    defaultCity: 'New Delhi',
    timeoutMs: 12000,
  });
  return { loader, store, weatherCalls, locationCalls: location.calls };
};

test('loads the saved location without touching device location', async () => {
  const { loader, weatherCalls, locationCalls } = setup({ saved: 'Mumbai' });

  const result = await loader.load();

  expect(result.query).toBe('Mumbai');
  expect(result.error).toBeNull();
  expect(result.observation?.description).toBe('clear sky');
  expect(weatherCalls).toEqual(['weather:Mumbai']);
  expect(locationCalls).toEqual([]);
});

test('without a saved location the device coordinates are stored and used', async () => {
  const { loader, store, weatherCalls } = setup();

  const result = await loader.load();

  expect(result.query).toBe('28.6,77.2');
  expect(weatherCalls).toEqual(['weather:28.6,77.2']);
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('28.6,77.2');
});

test('falls back to the default city when the device location is unavailable', async () => {
  const { loader, store, weatherCalls } = setup({ location: createStubLocationProvider({ enabled: false }) });

  const result = await loader.load();

  expect(result.query).toBe('New Delhi');
  expect(result.observation?.description).toBe('clear sky');
  expect(result.error).toBeNull();
  expect(result.notice).toBe('Location services are disabled.');
  expect(weatherCalls).toEqual(['weather:New Delhi']);
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('New Delhi');
});

test('search remembers the query after a successful fetch', async () => {
  const { loader, store } = setup({ saved: 'Mumbai' });

  const result = await loader.search('  Chennai ');

  expect(result).toMatchObject({ query: 'Chennai', error: null });
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('Chennai');
});

test('a failed fetch reports the error and keeps the saved location', async () => {
  const { loader, store } = setup({ saved: 'Mumbai', weatherOutcomes: [providerFailure('city not found')] });

  const result = await loader.search('Nowhereville');

  expect(result).toEqual({ query: 'Nowhereville', observation: null, error: 'city not found', notice: null });
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('Mumbai');
});

test('blank searches make no request', async () => {
  const { loader, weatherCalls } = setup();
  await expect(loader.search('   ')).resolves.toEqual({ query: '', observation: null, error: 'Search text is empty.', notice: null });
  expect(weatherCalls).toEqual([]);
});

test('a failed preference write keeps the fetched observation', async () => {
  const store: KeyValueStore = {
    getString: async () => 'Mumbai',
    setString: async () => {
      throw new Error('EACCES: permission denied');
    },
  };
  const { loader } = setup({ store });

  const result = await loader.load();

  expect(result.query).toBe('Mumbai');
  expect(result.observation?.description).toBe('clear sky');
  expect(result.error).toBe('EACCES: permission denied');
  expect(result.notice).toBeNull();
});

test('current location fetches by coordinates and remembers them', async () => {
  const location = createStubLocationProvider({ position: { lat: 19.07, lon: 72.88 } });
  const { loader, store, weatherCalls } = setup({ saved: 'Mumbai', location });

  const result = await loader.useCurrentLocation();

  expect(result).toMatchObject({ query: '19.07,72.88', error: null, notice: null });
  expect(result.observation?.description).toBe('clear sky');
  expect(weatherCalls).toEqual(['weather:19.07,72.88']);
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('19.07,72.88');
});

test('current location reports a denied permission without fetching', async () => {
  const location = createStubLocationProvider({ permission: 'denied' });
  const { loader, store, weatherCalls } = setup({ saved: 'Mumbai', location });

  const result = await loader.useCurrentLocation();

  expect(result).toEqual({ query: '', observation: null, error: 'Location permissions are denied', notice: null });
  expect(weatherCalls).toEqual([]);
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('Mumbai');
});
