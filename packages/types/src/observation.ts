/**
 * Observation records: raw input, normalized facts, reconciled pairs
 *
 * All timestamps are ISO 8601 strings in UTC; calendar dates are
 * YYYY-MM-DD strings (UTC date of the timestamp).
 */

/**
 * Raw observation as stored by the acquisition layer
 */
export interface RawObservation {
  readonly id: string;
  readonly city: string | null;
  readonly country: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly observationTime: string | null;
  /** Weather API payload: parsed JSON or JSON text */
  readonly weatherData: unknown;
  /** Air-quality API payload: parsed JSON or JSON text, may be absent */
  readonly airQualityData?: unknown;
}

/**
 * Identity every observation, aggregate and dimension is partitioned by
 */
export interface EntityKey {
  readonly city: string;
  readonly country: string | null;
}

export type WeatherCategory =
  | 'Clear'
  | 'Cloudy'
  | 'Rainy'
  | 'Snowy'
  | 'Stormy'
  | 'Misty'
  | 'Other';

export type StandardPollutant = 'PM2.5' | 'PM10' | 'Ozone' | 'CO' | 'NO2' | 'SO2';

/**
 * Weather observation after extraction, range validation and unit derivation
 */
export interface NormalizedWeatherObservation extends EntityKey {
  readonly id: string;
  readonly observationTime: string;
  readonly observationDate: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly weatherCityName: string | null;

  readonly temperatureCelsius: number | null;
  readonly feelsLikeCelsius: number | null;
  readonly temperatureMinCelsius: number | null;
  readonly temperatureMaxCelsius: number | null;
  readonly pressureHpa: number | null;
  readonly humidityPercent: number | null;

  readonly weatherMain: string | null;
  readonly weatherDescription: string | null;
  readonly weatherIcon: string | null;
  readonly weatherCategory: WeatherCategory;

  readonly windSpeedMps: number | null;
  readonly windDirectionDegrees: number | null;
  readonly cloudinessPercent: number | null;
  readonly visibilityMeters: number | null;

  readonly weatherTimestamp: string | null;
  readonly apiTimestamp: string | null;
  readonly airQualityObservationCount: number | null;

  readonly hasWeatherError: boolean;
  readonly weatherError: string | null;
  readonly hasAirQualityError: boolean;
  readonly airQualityError: string | null;

  // Derived units
  readonly temperatureFahrenheit: number | null;
  readonly feelsLikeFahrenheit: number | null;
  readonly windSpeedMph: number | null;
}

/**
 * One pollutant reading taken from the secondary (air-quality) payload
 */
export interface NormalizedAirQualityObservation extends EntityKey {
  /** `${recordId}:${index}` */
  readonly id: string;
  readonly recordId: string;
  readonly observedAt: string;
  readonly observationDate: string;
  readonly observationHour: number | null;
  readonly localTimezone: string | null;
  readonly reportingArea: string | null;
  readonly stateCode: string | null;

  /** Canonical pollutant label, or the raw parameter name when unmatched */
  readonly pollutant: string;
  readonly isStandardPollutant: boolean;
  readonly originalParameterName: string | null;

  readonly aqiValue: number;
  readonly concentrationValue: number | null;
  readonly concentrationUnit: string | null;

  readonly aqiCategory: string;
  readonly aqiColor: string;
  readonly healthImpactLevel: number;
  readonly originalCategory: string | null;

  /** Coordinates reported by the air-quality station */
  readonly stationLatitude: number | null;
  readonly stationLongitude: number | null;
  /** Coordinates of the parent observation record */
  readonly latitude: number | null;
  readonly longitude: number | null;
}

/**
 * Field- or record-level data quality signal
 */
export interface DataQualityIssue {
  readonly recordId: string;
  /** Text before the first ':' of the message, used for grouping */
  readonly category: string;
  readonly message: string;
  readonly field?: string;
}

export type NormalizationResult =
  | {
      readonly valid: true;
      readonly weather: NormalizedWeatherObservation;
      readonly airQuality: readonly NormalizedAirQualityObservation[];
      readonly issues: readonly DataQualityIssue[];
    }
  | {
      readonly valid: false;
      readonly recordId: string;
      readonly issues: readonly DataQualityIssue[];
    };

/**
 * Weather observation paired with its best air-quality reading
 */
export interface ReconciledObservation {
  readonly weather: NormalizedWeatherObservation;
  readonly airQuality: NormalizedAirQualityObservation | null;
  readonly distanceMiles: number | null;
  readonly timeOffsetMinutes: number | null;
  /** Readings of the same entity inside the matching window */
  readonly candidateCount: number;
  readonly worstCandidateAqi: number | null;
}

/**
 * Air-quality reading annotated with its distance to the paired weather record
 */
export interface ReconciledAirQualityObservation extends NormalizedAirQualityObservation {
  readonly pairedWeatherId: string | null;
  readonly distanceMiles: number | null;
}
