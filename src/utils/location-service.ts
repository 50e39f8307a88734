import type { Coordinate, LocationPermission, LocationProvider } from '../types.js';
import { LocationUnavailableError } from './errors.js';
import { parseCoordinatePair } from './weather-service.js';

export const LOCATION_MESSAGES = {
  service_disabled: 'Location services are disabled.',
  permission_denied: 'Location permissions are denied',
  permission_denied_forever: 'Location permissions are permanently denied. Please enable them in settings.',
} as const;

export const getCurrentLocation = async (provider: LocationProvider): Promise<Coordinate> => {
  const serviceEnabled = await provider.isServiceEnabled();
  if (!serviceEnabled) {
    throw new LocationUnavailableError('service_disabled', LOCATION_MESSAGES.service_disabled);
  }

  let permission = await provider.checkPermission();
  if (permission === 'denied') {
    permission = await provider.requestPermission();
    if (permission === 'denied') {
      throw new LocationUnavailableError('permission_denied', LOCATION_MESSAGES.permission_denied);
    }
  }

  if (permission === 'denied_forever') {
    throw new LocationUnavailableError('permission_denied_forever', LOCATION_MESSAGES.permission_denied_forever);
  }

  return provider.getCurrentPosition();
};

export const normalizeLocationPermission = (value: string | null | undefined): LocationPermission => {
  const normalized = String(value || '').trim().toLowerCase();
  if (normalized === 'denied') return 'denied';
  if (normalized === 'denied_forever') return 'denied_forever';
  return 'granted';
};

interface CreateConfiguredLocationProviderOptions {
  position: string;
  permission: string;
}

/**
 * Location provider for hosts without positioning hardware: the position is a
 * configured "lat,lon" string, and the service counts as disabled when it is
 * missing or malformed. A permission request never upgrades the configured
 * permission.
 */
export const createConfiguredLocationProvider = ({ position, permission }: CreateConfiguredLocationProviderOptions): LocationProvider => {
  const coordinate = parseCoordinatePair(position);
  const configuredPermission = normalizeLocationPermission(permission);

  return {
    isServiceEnabled: async () => coordinate !== null,
    checkPermission: async () => configuredPermission,
    requestPermission: async () => configuredPermission,
    getCurrentPosition: async () => {
      if (!coordinate) {
        throw new LocationUnavailableError('service_disabled', LOCATION_MESSAGES.service_disabled);
      }
      return coordinate;
    },
  };
};
