import type { TripErrorKind } from '../types.js';

export class TripPlannerError extends Error {
  public readonly kind: TripErrorKind;

  constructor(kind: TripErrorKind, message: string) {
    super(message);
    this.name = 'TripPlannerError';
    this.kind = kind;
  }
}

export class EmptyInputError extends TripPlannerError {
  constructor(message: string) {
    super('EmptyInput', message);
    this.name = 'EmptyInputError';
  }
}

export class NotFoundError extends TripPlannerError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'NotFoundError';
  }
}

export type LocationUnavailableReason = 'service_disabled' | 'permission_denied' | 'permission_denied_forever';

export class LocationUnavailableError extends TripPlannerError {
  public readonly reason: LocationUnavailableReason;

  constructor(reason: LocationUnavailableReason, message: string) {
    super('LocationUnavailable', message);
    this.name = 'LocationUnavailableError';
    this.reason = reason;
  }
}

export type ProviderName = 'weather' | 'advice' | 'geocoding' | 'location';

export class ProviderError extends TripPlannerError {
  public readonly provider: ProviderName;
  public readonly status: number | null;

  constructor(provider: ProviderName, message: string, status: number | null = null) {
    super('ProviderError', message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = status;
  }
}
