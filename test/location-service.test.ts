import { LocationUnavailableError } from '../src/utils/errors.js';
import { createConfiguredLocationProvider, getCurrentLocation, LOCATION_MESSAGES } from '../src/utils/location-service.js';
import { createStubLocationProvider } from './helpers/stubs.js';

test('returns the position when the service is on and permission is granted', async () => {
  const { provider, calls } = createStubLocationProvider({ position: { lat: 19.07, lon: 72.88 } });
  await expect(getCurrentLocation(provider)).resolves.toEqual({ lat: 19.07, lon: 72.88 });
  expect(calls).toEqual(['isServiceEnabled', 'checkPermission', 'getCurrentPosition']);
});

test('disabled service fails before permissions are checked', async () => {
  const { provider, calls } = createStubLocationProvider({ enabled: false });
  await expect(getCurrentLocation(provider)).rejects.toMatchObject({
    kind: 'LocationUnavailable',
    reason: 'service_disabled',
    message: 'Location services are disabled.',
  });
  expect(calls).toEqual(['isServiceEnabled']);
});

test('asks once for permission and fails when it stays denied', async () => {
  const { provider, calls } = createStubLocationProvider({ permission: 'denied' });
  const failure = getCurrentLocation(provider);
  await expect(failure).rejects.toBeInstanceOf(LocationUnavailableError);
  await expect(failure).rejects.toMatchObject({ reason: 'permission_denied', message: LOCATION_MESSAGES.permission_denied });
  expect(calls).toEqual(['isServiceEnabled', 'checkPermission', 'requestPermission']);
});

test('a granted request lets the lookup continue', async () => {
  const { provider, calls } = createStubLocationProvider({ permission: 'denied', afterRequest: 'granted' });
  await expect(getCurrentLocation(provider)).resolves.toEqual({ lat: 28.6, lon: 77.2 });
  expect(calls).toContain('requestPermission');
});

test('permanently denied permission has its own message', async () => {
  const { provider } = createStubLocationProvider({ permission: 'denied_forever' });
  await expect(getCurrentLocation(provider)).rejects.toMatchObject({
    reason: 'permission_denied_forever',
    message: 'Location permissions are permanently denied. Please enable them in settings.',
  });
});

test('configured provider reads its position from a lat,lon string', async () => {
  const provider = createConfiguredLocationProvider({ position: '12.97,77.59', permission: 'granted' });
  await expect(getCurrentLocation(provider)).resolves.toEqual({ lat: 12.97, lon: 77.59 });
});

test('configured provider without a position acts as a disabled service', async () => {
  const provider = createConfiguredLocationProvider({ position: '', permission: 'granted' });
  await expect(getCurrentLocation(provider)).rejects.toMatchObject({ reason: 'service_disabled' });
});

test('configured provider honours a denied permission', async () => {
  const provider = createConfiguredLocationProvider({ position: '12.97,77.59', permission: 'DENIED_FOREVER' });
  await expect(getCurrentLocation(provider)).rejects.toMatchObject({ reason: 'permission_denied_forever' });
});
