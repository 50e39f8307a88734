import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  createFileStore,
  createMemoryStore,
  LAST_LOCATION_KEY,
  readLastLocation,
  writeLastLocation,
} from '../src/utils/preferences.js';

let tempDir = '';

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'route-weather-prefs-'));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

test('memory store round-trips strings and reports missing keys as null', async () => {
  const store = createMemoryStore({ theme: 'dark' });
  expect(await store.getString('theme')).toBe('dark');
  expect(await store.getString(LAST_LOCATION_KEY)).toBeNull();
  await store.setString(LAST_LOCATION_KEY, 'Pune');
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('Pune');
});

test('file store creates the file and its directory on first write', async () => {
  const filePath = path.join(tempDir, 'nested', 'preferences.json');
  const store = createFileStore(filePath);

  expect(await store.getString(LAST_LOCATION_KEY)).toBeNull();
  await store.setString(LAST_LOCATION_KEY, '28.61,77.21');

  expect(JSON.parse(await fs.readFile(filePath, 'utf8'))).toEqual({ last_location: '28.61,77.21' });
  expect(await createFileStore(filePath).getString(LAST_LOCATION_KEY)).toBe('28.61,77.21');
});

test('file store treats a corrupt file as empty and rewrites it', async () => {
  const filePath = path.join(tempDir, 'preferences.json');
  await fs.writeFile(filePath, '{not json', 'utf8');
  const store = createFileStore(filePath);

  expect(await store.getString(LAST_LOCATION_KEY)).toBeNull();
  await store.setString(LAST_LOCATION_KEY, 'Goa');
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('Goa');
});

test('last location helpers trim values and ignore blanks', async () => {
  const store = createMemoryStore({ [LAST_LOCATION_KEY]: '   ' });
  expect(await readLastLocation(store)).toBeNull();

  await writeLastLocation(store, '  Mumbai ');
  expect(await readLastLocation(store)).toBe('Mumbai');

  await writeLastLocation(store, '   ');
  expect(await store.getString(LAST_LOCATION_KEY)).toBe('Mumbai');
});
