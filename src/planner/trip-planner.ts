import type {
  AdviceService,
  CityStop,
  Coordinate,
  GeocodingService,
  LocationProvider,
  PipelineStage,
  PlaceResolution,
  RouteSample,
  TripPlan,
  TripPlanRequest,
  TripPlanResult,
  WeatherService,
} from '../types.js';
import { SeverityLevel } from '../types.js';
import { EmptyInputError, NotFoundError, TripPlannerError } from '../utils/errors.js';
import { readErrorMessage } from '../utils/http-client.js';
import { getCurrentLocation } from '../utils/location-service.js';
import { DEFAULT_SAMPLE_COUNT, sampleRoute } from '../utils/route-sampler.js';
import { classifySeverity, severityColor, worstSeverity } from '../utils/severity.js';
import { buildTripSummary } from '../utils/trip-summary.js';

export const UNKNOWN_WEATHER_DESCRIPTION = 'unknown';

type EndpointRole = 'origin' | 'destination';

const ROLE_LABELS: Record<EndpointRole, string> = {
  origin: 'Origin',
  destination: 'Destination',
};

interface CreateTripPlannerOptions {
  geocoder: GeocodingService;
  weather: WeatherService;
  advice: AdviceService;
  locationProvider: LocationProvider;
  sampleCount?: number;
  routeWeatherTimeoutMs?: number;
  now?: () => Date;
  log?: (...args: unknown[]) => void;
}

export interface PlanTripOptions {
  onStage?: (stage: PipelineStage) => void;
}

const requireText = (role: EndpointRole, rawText: string): string => {
  const text = rawText.trim();
  if (!text) {
    throw new EmptyInputError(`${ROLE_LABELS[role]} is empty.`);
  }
  return text;
};

export const createTripPlanner = ({
  geocoder,
  weather,
  advice,
  locationProvider,
  sampleCount = DEFAULT_SAMPLE_COUNT,
  routeWeatherTimeoutMs,
  now = () => new Date(),
  log = () => {},
}: CreateTripPlannerOptions) => {
  const geocodeEndpoint = async (role: EndpointRole, text: string): Promise<PlaceResolution> => {
    try {
      const coordinate = await geocoder.resolveForward(text);
      return { displayText: text, coordinate };
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(`Could not find ${role} location.`);
      }
      throw error;
    }
  };

  const resolveDeviceOrigin = async (): Promise<PlaceResolution> => {
    const coordinate = await getCurrentLocation(locationProvider);
    const displayText = await geocoder.resolveReverse(coordinate);
    return { displayText, coordinate };
  };

  const enrichSample = async (sample: RouteSample): Promise<CityStop> => {
    let weatherDescription = UNKNOWN_WEATHER_DESCRIPTION;
    let severity: SeverityLevel = SeverityLevel.GOOD;
    try {
      const observation = await weather.fetchCurrent(sample.coordinate, routeWeatherTimeoutMs);
      weatherDescription = observation.description;
      severity = classifySeverity(observation.description);
    } catch (error) {
      console.warn(`[Trip] Weather unavailable for route sample ${sample.index}:`, readErrorMessage(error));
    }
    const label = await geocoder.resolveReverse(sample.coordinate);
    return { sample, label, weatherDescription, severity };
  };

  const planTrip = async (request: TripPlanRequest, { onStage }: PlanTripOptions = {}): Promise<TripPlanResult> => {
    const enter = (stage: PipelineStage) => {
      log(`[Trip] stage -> ${stage}`);
      onStage?.(stage);
    };

    try {
      enter('resolving');
      // Both texts are checked before anything goes out on the network.
      const originText = request.origin.kind === 'text' ? requireText('origin', request.origin.text) : null;
      const destinationText = requireText('destination', request.destination);

      const origin = originText === null ? await resolveDeviceOrigin() : await geocodeEndpoint('origin', originText);
      const destination = await geocodeEndpoint('destination', destinationText);
      log('[Trip] resolved', origin, destination);

      enter('sampling');
      const samples = sampleRoute(origin.coordinate, destination.coordinate, sampleCount);
      const route: Coordinate[] = samples.map((sample) => sample.coordinate);

      enter('enriching');
      const stops: CityStop[] = [];
      for (const sample of samples) {
        stops.push(await enrichSample(sample));
      }

      enter('aggregating');
      const worst = worstSeverity(stops.map((stop) => stop.severity));

      enter('requesting_advice');
      const selectedDate = request.date ?? null;
      const aiAdvice = await advice.getAdvice({
        origin: origin.displayText,
        destination: destination.displayText,
        date: selectedDate ?? now(),
      });

      const plan: TripPlan = Object.freeze({
        origin,
        destination,
        samples: Object.freeze(stops),
        route: Object.freeze(route),
        worstSeverity: worst,
        routeColor: severityColor(worst),
        aiAdvice,
        selectedDate,
        summary: buildTripSummary(origin.coordinate, destination.coordinate),
      });
      enter('done');
      return { ok: true, plan };
    } catch (error) {
      enter('failed');
      if (error instanceof TripPlannerError) {
        return { ok: false, kind: error.kind, error: error.message };
      }
      console.error('[Trip] Unexpected pipeline failure:', error);
      return { ok: false, kind: 'ProviderError', error: readErrorMessage(error) };
    }
  };

  return { planTrip };
};

export type TripPlanner = ReturnType<typeof createTripPlanner>;
