/**
 * Daily aggregates (pre-trend)
 *
 * Derived rows: recomputed from normalized observations on every run,
 * never mutated in place.
 */

import type { EntityKey } from './observation.js';

export interface DailyWeatherAggregate extends EntityKey {
  readonly observationDate: string;
  readonly latitude: number | null;
  readonly longitude: number | null;

  readonly avgTemperatureCelsius: number | null;
  readonly minTemperatureCelsius: number | null;
  readonly maxTemperatureCelsius: number | null;
  readonly avgFeelsLikeCelsius: number | null;
  readonly avgTemperatureFahrenheit: number | null;
  readonly minTemperatureFahrenheit: number | null;
  readonly maxTemperatureFahrenheit: number | null;
  readonly avgFeelsLikeFahrenheit: number | null;

  readonly avgHumidityPercent: number | null;
  readonly minHumidityPercent: number | null;
  readonly maxHumidityPercent: number | null;
  readonly avgPressureHpa: number | null;

  readonly avgWindSpeedMps: number | null;
  readonly maxWindSpeedMps: number | null;
  readonly avgWindSpeedMph: number | null;
  readonly maxWindSpeedMph: number | null;

  readonly avgCloudinessPercent: number | null;
  readonly avgVisibilityMeters: number | null;

  readonly primaryWeatherMain: string | null;
  readonly primaryWeatherDescription: string | null;
  readonly primaryWeatherCategory: string | null;
  readonly weatherStabilityPercent: number | null;

  readonly totalObservations: number;
  readonly successfulObservations: number;
  readonly errorObservations: number;
  readonly successRatePercent: number;
  readonly firstObservationTime: string;
  readonly lastObservationTime: string;

  // Cross-source enrichment
  readonly pairedObservations: number;
  readonly avgPairedAqi: number | null;
  readonly avgStationDistanceMiles: number | null;
}

/**
 * One row per (entity, date, pollutant)
 */
export interface PollutantDailyAggregate extends EntityKey {
  readonly observationDate: string;
  readonly pollutant: string;

  readonly avgAqiValue: number;
  readonly minAqiValue: number;
  readonly maxAqiValue: number;

  readonly avgConcentrationValue: number | null;
  readonly minConcentrationValue: number | null;
  readonly maxConcentrationValue: number | null;
  readonly concentrationUnit: string | null;

  readonly primaryAqiCategory: string | null;
  readonly primaryAqiColor: string | null;
  readonly avgHealthImpactLevel: number;

  readonly avgLatitude: number | null;
  readonly avgLongitude: number | null;
  readonly avgDistanceMiles: number | null;

  readonly totalObservations: number;
  readonly firstObservationTime: string;
  readonly lastObservationTime: string;
  readonly primaryReportingArea: string | null;
  readonly primaryStateCode: string | null;
}

/**
 * One row per (entity, date); the worst pollutant dominates
 */
export interface DailyAirQualityAggregate extends EntityKey {
  readonly observationDate: string;

  readonly overallAqiValue: number;
  readonly peakAqiValue: number;
  readonly primaryPollutant: string;
  readonly overallAqiCategory: string;
  readonly overallAqiColor: string;
  readonly overallHealthImpactLevel: number;

  readonly pollutantsMeasured: number;
  readonly pollutantList: readonly string[];

  readonly avgLatitude: number | null;
  readonly avgLongitude: number | null;
  readonly avgDistanceMiles: number | null;
  readonly totalObservations: number;
  readonly firstObservationTime: string;
  readonly lastObservationTime: string;
  readonly primaryReportingArea: string | null;
  readonly primaryStateCode: string | null;
}
