export interface Coordinate {
  readonly lat: number;
  readonly lon: number;
}

export interface PlaceResolution {
  readonly displayText: string;
  readonly coordinate: Coordinate;
}

export interface RouteSample {
  readonly coordinate: Coordinate;
  readonly index: number;
}

export const SeverityLevel = {
  GOOD: 0,
  MODERATE: 1,
  SEVERE: 2,
} as const;

export type SeverityLevel = (typeof SeverityLevel)[keyof typeof SeverityLevel];

export type SeverityColor = 'green' | 'blue' | 'red';

export interface CityStop {
  readonly sample: RouteSample;
  readonly label: string;
  readonly weatherDescription: string;
  readonly severity: SeverityLevel;
}

// Metric units as returned by the provider; display conversion happens elsewhere.
export interface WeatherObservation {
  description: string;
  condition: string | null;
  temperatureC: number | null;
  feelsLikeC: number | null;
  minTemperatureC: number | null;
  maxTemperatureC: number | null;
  humidityPct: number | null;
  pressureHpa: number | null;
  windSpeedMs: number | null;
  windDirectionDeg: number | null;
  cloudCoverPct: number | null;
  country: string | null;
  locationName: string | null;
  observedAt: number | null;
  utcOffsetSeconds: number | null;
}

export interface TripSummary {
  readonly distanceKm: number;
  readonly distanceText: string;
  readonly driveTimeText: string;
}

export interface TripPlan {
  readonly origin: PlaceResolution;
  readonly destination: PlaceResolution;
  readonly samples: readonly CityStop[];
  readonly route: readonly Coordinate[];
  readonly worstSeverity: SeverityLevel;
  readonly routeColor: SeverityColor;
  readonly aiAdvice: string;
  readonly selectedDate: Date | null;
  readonly summary: TripSummary;
}

export type OriginSource = { kind: 'device' } | { kind: 'text'; text: string };

export interface TripPlanRequest {
  origin: OriginSource;
  destination: string;
  date?: Date | null;
}

export type PipelineStage =
  | 'idle'
  | 'resolving'
  | 'sampling'
  | 'enriching'
  | 'aggregating'
  | 'requesting_advice'
  | 'done'
  | 'failed';

export type TripErrorKind = 'EmptyInput' | 'NotFound' | 'LocationUnavailable' | 'ProviderError';

export type TripPlanResult =
  | { ok: true; plan: TripPlan }
  | { ok: false; kind: TripErrorKind; error: string };

export interface GeocodingService {
  resolveForward: (placeText: string) => Promise<Coordinate>;
  resolveReverse: (coordinate: Coordinate) => Promise<string>;
}

export interface WeatherService {
  fetchCurrent: (coordinate: Coordinate, timeoutMs?: number) => Promise<WeatherObservation>;
  fetchCurrentByQuery: (query: string, timeoutMs?: number) => Promise<WeatherObservation>;
}

export interface AdviceRequest {
  origin: string;
  destination: string;
  date: Date;
}

export interface AdviceService {
  getAdvice: (request: AdviceRequest) => Promise<string>;
}

export type LocationPermission = 'granted' | 'denied' | 'denied_forever';

export interface LocationProvider {
  isServiceEnabled: () => Promise<boolean>;
  checkPermission: () => Promise<LocationPermission>;
  requestPermission: () => Promise<LocationPermission>;
  getCurrentPosition: () => Promise<Coordinate>;
}

export interface KeyValueStore {
  getString: (key: string) => Promise<string | null>;
  setString: (key: string, value: string) => Promise<void>;
}
