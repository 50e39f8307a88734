import type { Coordinate, GeocodingService } from '../types.js';
import { NotFoundError } from './errors.js';
import { DEFAULT_FETCH_HEADERS, type FetchWithTimeout, readErrorMessage } from './http-client.js';
import { NominatimReverseSchema, NominatimSearchSchema, type NominatimReversePayload } from './validation.js';

interface CreateGeocodingServiceOptions {
  fetchWithTimeout: FetchWithTimeout;
  baseUrl: string;
  fetchHeaders?: Record<string, string>;
}

export const formatCoordinateLabel = ({ lat, lon }: Coordinate): string => `${lat.toFixed(3)}, ${lon.toFixed(3)}`;

const firstNonEmpty = (...values: (string | null | undefined)[]): string => {
  for (const value of values) {
    const trimmed = typeof value === 'string' ? value.trim() : '';
    if (trimmed) {
      return trimmed;
    }
  }
  return '';
};

export const composePlaceLabel = (payload: NominatimReversePayload, coordinate: Coordinate): string => {
  const address: NonNullable<NominatimReversePayload['address']> = payload.address ?? {};
  const locality = firstNonEmpty(address.city, address.town, address.village, address.hamlet, address.municipality);
  const subAdministrativeArea = firstNonEmpty(address.county, address.state_district);
  const country = firstNonEmpty(address.country);

  const parts: string[] = [];
  if (locality) parts.push(locality);
  if (subAdministrativeArea && !parts.includes(subAdministrativeArea)) parts.push(subAdministrativeArea);
  if (country) parts.push(country);

  return parts.length > 0 ? parts.join(', ') : formatCoordinateLabel(coordinate);
};

export const createGeocodingService = ({
  fetchWithTimeout,
  baseUrl,
  fetchHeaders = DEFAULT_FETCH_HEADERS,
}: CreateGeocodingServiceOptions): GeocodingService => {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const fetchOptions = { headers: fetchHeaders };

  const resolveForward = async (placeText: string): Promise<Coordinate> => {
    const query = placeText.trim();
    if (!query) {
      throw new NotFoundError('No place name was given to look up.');
    }

    const params = new URLSearchParams({ format: 'json', q: query, limit: '1' });
    let payload: unknown;
    try {
      const response = await fetchWithTimeout(`${normalizedBase}/search?${params.toString()}`, fetchOptions);
      if (!response.ok) {
        throw new Error(`Nominatim search failed with status ${response.status}`);
      }
      payload = await response.json();
    } catch (error) {
      console.warn(`[Geocoding] Forward lookup failed for "${query}":`, readErrorMessage(error));
      throw new NotFoundError(`No location found for "${query}".`);
    }

    const parsed = NominatimSearchSchema.safeParse(payload);
    if (!parsed.success || parsed.data.length === 0) {
      throw new NotFoundError(`No location found for "${query}".`);
    }

    const [first] = parsed.data;
    return { lat: first.lat, lon: first.lon };
  };

  const resolveReverse = async (coordinate: Coordinate): Promise<string> => {
    const params = new URLSearchParams({
      format: 'json',
      lat: String(coordinate.lat),
      lon: String(coordinate.lon),
      zoom: '10',
      addressdetails: '1',
    });

    try {
      const response = await fetchWithTimeout(`${normalizedBase}/reverse?${params.toString()}`, fetchOptions);
      if (!response.ok) {
        throw new Error(`Nominatim reverse failed with status ${response.status}`);
      }
      const parsed = NominatimReverseSchema.safeParse(await response.json());
      if (!parsed.success || parsed.data.error) {
        return formatCoordinateLabel(coordinate);
      }
      return composePlaceLabel(parsed.data, coordinate);
    } catch (error) {
      console.warn(`[Geocoding] Reverse lookup failed for ${formatCoordinateLabel(coordinate)}:`, readErrorMessage(error));
      return formatCoordinateLabel(coordinate);
    }
  };

  return { resolveForward, resolveReverse };
};
