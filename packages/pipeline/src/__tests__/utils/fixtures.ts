/**
 * Test Fixture Factories
 *
 * Minimal valid objects with fixed defaults; every factory takes
 * overrides so a test states only what it is about.
 */

import type {
  DailyAirQualityAggregate,
  DailyWeatherAggregate,
  NormalizedAirQualityObservation,
  NormalizedWeatherObservation,
  RawObservation,
  ReconciledAirQualityObservation,
} from '@airshed/types';
import type { PipelineLogger } from '../../core/utils/logger.js';

// ============================================================================
// Raw payloads
// ============================================================================

export interface WeatherPayloadOptions {
  readonly temp?: number | null;
  readonly feelsLike?: number | null;
  readonly humidity?: number | null;
  readonly pressure?: number | null;
  readonly windSpeed?: number | null;
  readonly main?: string;
  readonly description?: string;
  readonly lat?: number;
  readonly lon?: number;
  readonly name?: string;
}

/**
 * Weather API payload in the shape acquisition stores it
 */
export function createWeatherPayload(options: WeatherPayloadOptions = {}): Record<string, unknown> {
  return {
    coord: { lat: options.lat ?? 39.8, lon: options.lon ?? -89.65 },
    weather: [
      {
        main: options.main ?? 'Clouds',
        description: options.description ?? 'broken clouds',
        icon: '04d',
      },
    ],
    main: {
      temp: options.temp === undefined ? 20 : options.temp,
      feels_like: options.feelsLike === undefined ? 19.5 : options.feelsLike,
      temp_min: 18,
      temp_max: 22,
      pressure: options.pressure === undefined ? 1013 : options.pressure,
      humidity: options.humidity === undefined ? 55 : options.humidity,
    },
    visibility: 10000,
    wind: { speed: options.windSpeed === undefined ? 4.2 : options.windSpeed, deg: 230 },
    clouds: { all: 75 },
    dt: 1709301600,
    name: options.name ?? 'Springfield',
  };
}

export interface AirQualityEntryOptions {
  readonly parameter?: string;
  readonly aqi?: number;
  readonly value?: number;
  readonly date?: string;
  readonly hour?: number;
  readonly timezone?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly reportingArea?: string;
  readonly category?: string;
}

/**
 * One station observation of the air-quality payload
 */
export function createAirQualityEntry(options: AirQualityEntryOptions = {}): Record<string, unknown> {
  return {
    DateObserved: options.date ?? '2024-03-01',
    HourObserved: options.hour ?? 8,
    LocalTimeZone: options.timezone ?? 'CST',
    ReportingArea: options.reportingArea ?? 'Springfield',
    StateCode: 'IL',
    Latitude: options.latitude ?? 39.78,
    Longitude: options.longitude ?? -89.64,
    ParameterName: options.parameter ?? 'PM2.5',
    AQI: options.aqi ?? 45,
    Value: options.value ?? 10.8,
    Unit: 'UG/M3',
    Category: { Number: 1, Name: options.category ?? 'Good' },
  };
}

export function createAirQualityPayload(entries: readonly Record<string, unknown>[]): Record<string, unknown> {
  return { observations: entries, total_observations: entries.length };
}

export function createRawObservation(overrides: Partial<RawObservation> = {}): RawObservation {
  return {
    id: '1',
    city: 'Springfield',
    country: 'US',
    latitude: 39.8,
    longitude: -89.65,
    observationTime: '2024-03-01T14:00:00Z',
    weatherData: createWeatherPayload(),
    airQualityData: null,
    ...overrides,
  };
}

// ============================================================================
// Normalized observations
// ============================================================================

export function createWeatherObservation(
  overrides: Partial<NormalizedWeatherObservation> = {}
): NormalizedWeatherObservation {
  return {
    id: 'w1',
    city: 'Springfield',
    country: 'US',
    observationTime: '2024-03-01T14:00:00.000Z',
    observationDate: '2024-03-01',
    latitude: 40,
    longitude: -89,
    weatherCityName: 'Springfield',

    temperatureCelsius: 20,
    feelsLikeCelsius: 19.5,
    temperatureMinCelsius: 18,
    temperatureMaxCelsius: 22,
    pressureHpa: 1013,
    humidityPercent: 55,

    weatherMain: 'Clouds',
    weatherDescription: 'broken clouds',
    weatherIcon: '04d',
    weatherCategory: 'Cloudy',

    windSpeedMps: 4.2,
    windDirectionDegrees: 230,
    cloudinessPercent: 75,
    visibilityMeters: 10000,

    weatherTimestamp: null,
    apiTimestamp: null,
    airQualityObservationCount: null,

    hasWeatherError: false,
    weatherError: null,
    hasAirQualityError: false,
    airQualityError: null,

    temperatureFahrenheit: 68,
    feelsLikeFahrenheit: 67.1,
    windSpeedMph: 9.4,
    ...overrides,
  };
}

export function createAirQualityObservation(
  overrides: Partial<NormalizedAirQualityObservation> = {}
): NormalizedAirQualityObservation {
  return {
    id: 'w1:0',
    recordId: 'w1',
    city: 'Springfield',
    country: 'US',
    observedAt: '2024-03-01T14:00:00.000Z',
    observationDate: '2024-03-01',
    observationHour: 8,
    localTimezone: 'CST',
    reportingArea: 'Springfield',
    stateCode: 'IL',

    pollutant: 'PM2.5',
    isStandardPollutant: true,
    originalParameterName: 'PM2.5',

    aqiValue: 45,
    concentrationValue: 10.8,
    concentrationUnit: 'UG/M3',

    aqiCategory: 'Good',
    aqiColor: 'Green',
    healthImpactLevel: 1,
    originalCategory: 'Good',

    stationLatitude: null,
    stationLongitude: null,
    latitude: 40,
    longitude: -89,
    ...overrides,
  };
}

export function createReconciledReading(
  overrides: Partial<ReconciledAirQualityObservation> = {}
): ReconciledAirQualityObservation {
  return {
    ...createAirQualityObservation(overrides),
    pairedWeatherId: null,
    distanceMiles: null,
    ...overrides,
  };
}

// ============================================================================
// Daily aggregates
// ============================================================================

export function createDailyWeatherAggregate(
  overrides: Partial<DailyWeatherAggregate> = {}
): DailyWeatherAggregate {
  return {
    city: 'Springfield',
    country: 'US',
    observationDate: '2024-03-01',
    latitude: 40,
    longitude: -89,

    avgTemperatureCelsius: 20,
    minTemperatureCelsius: 18,
    maxTemperatureCelsius: 22,
    avgFeelsLikeCelsius: 19.5,
    avgTemperatureFahrenheit: 68,
    minTemperatureFahrenheit: 64.4,
    maxTemperatureFahrenheit: 71.6,
    avgFeelsLikeFahrenheit: 67.1,

    avgHumidityPercent: 55,
    minHumidityPercent: 50,
    maxHumidityPercent: 60,
    avgPressureHpa: 1013,

    avgWindSpeedMps: 4.2,
    maxWindSpeedMps: 5,
    avgWindSpeedMph: 9.4,
    maxWindSpeedMph: 11.2,

    avgCloudinessPercent: 75,
    avgVisibilityMeters: 10000,

    primaryWeatherMain: 'Clouds',
    primaryWeatherDescription: 'broken clouds',
    primaryWeatherCategory: 'Cloudy',
    weatherStabilityPercent: 100,

    totalObservations: 4,
    successfulObservations: 4,
    errorObservations: 0,
    successRatePercent: 100,
    firstObservationTime: '2024-03-01T00:00:00.000Z',
    lastObservationTime: '2024-03-01T18:00:00.000Z',

    pairedObservations: 0,
    avgPairedAqi: null,
    avgStationDistanceMiles: null,
    ...overrides,
  };
}

export function createDailyAirQualityAggregate(
  overrides: Partial<DailyAirQualityAggregate> = {}
): DailyAirQualityAggregate {
  return {
    city: 'Riverton',
    country: 'US',
    observationDate: '2024-03-01',

    overallAqiValue: 10,
    peakAqiValue: 10,
    primaryPollutant: 'PM2.5',
    overallAqiCategory: 'Good',
    overallAqiColor: 'Green',
    overallHealthImpactLevel: 1,

    pollutantsMeasured: 1,
    pollutantList: ['PM2.5'],

    avgLatitude: null,
    avgLongitude: null,
    avgDistanceMiles: null,
    totalObservations: 3,
    firstObservationTime: '2024-03-01T08:00:00.000Z',
    lastObservationTime: '2024-03-01T16:00:00.000Z',
    primaryReportingArea: 'Riverton',
    primaryStateCode: 'WY',
    ...overrides,
  };
}

// ============================================================================
// Logger
// ============================================================================

export interface RecordedLog {
  readonly level: 'debug' | 'info' | 'warn' | 'error';
  readonly message: string;
  readonly metadata: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Logger that records entries instead of printing; children share the list
 */
export function createRecordingLogger(entries: RecordedLog[] = []): PipelineLogger & {
  readonly entries: RecordedLog[];
} {
  const record =
    (level: RecordedLog['level']) =>
    (message: string, metadata?: Readonly<Record<string, unknown>>): void => {
      entries.push({ level, message, metadata });
    };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: () => createRecordingLogger(entries),
  };
}
