/**
 * Weather payload extraction
 *
 * @module normalization/weather
 */

import type { DataQualityIssue, NormalizedWeatherObservation } from '@airshed/types';
import type { ValidationRanges } from '../core/config.js';
import { getPath, toNumber, toText } from '../core/type-guards.js';
import { celsiusToFahrenheit, mpsToMph } from '../core/utils/math.js';
import { fromUnixSeconds, parseTimestamp } from '../core/utils/dates.js';
import { createIssue, withinRange } from './issues.js';
import { standardizeWeatherCategory } from './standardize.js';

/**
 * Identity already validated by the record normalizer
 */
export interface ObservationIdentity {
  readonly id: string;
  readonly city: string;
  readonly country: string | null;
  readonly observationTime: string;
  readonly observationDate: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

/**
 * Secondary-source fields carried on the weather row
 */
export interface AirQualitySummary {
  readonly observationCount: number | null;
  readonly error: string | null;
}

export function errorText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toText(value) ?? JSON.stringify(value);
}

export function extractWeather(
  identity: ObservationIdentity,
  payload: unknown,
  airQuality: AirQualitySummary,
  ranges: ValidationRanges,
  issues: DataQualityIssue[]
): NormalizedWeatherObservation {
  const { id } = identity;
  const num = (path: string): number | null => toNumber(getPath(payload, path));
  const text = (path: string): string | null => toText(getPath(payload, path));

  const weatherError = errorText(getPath(payload, 'error'));
  if (weatherError !== null) {
    issues.push(createIssue(id, `Weather API error: ${weatherError}`, 'error'));
  }

  const temperature = ranges.temperatureCelsius;
  const temperatureCelsius = withinRange(num('main.temp'), temperature, 'Temperature', 'main.temp', id, issues);
  const feelsLikeCelsius = withinRange(num('main.feels_like'), temperature, 'Feels like temperature', 'main.feels_like', id, issues);
  const temperatureMinCelsius = withinRange(num('main.temp_min'), temperature, 'Minimum temperature', 'main.temp_min', id, issues);
  const temperatureMaxCelsius = withinRange(num('main.temp_max'), temperature, 'Maximum temperature', 'main.temp_max', id, issues);
  const humidityPercent = withinRange(num('main.humidity'), ranges.humidityPercent, 'Humidity', 'main.humidity', id, issues);
  const pressureHpa = withinRange(num('main.pressure'), ranges.pressureHpa, 'Pressure', 'main.pressure', id, issues);
  const windSpeedMps = withinRange(num('wind.speed'), ranges.windSpeedMps, 'Wind speed', 'wind.speed', id, issues);
  const cloudinessPercent = withinRange(num('clouds.all'), ranges.cloudinessPercent, 'Cloudiness', 'clouds.all', id, issues);
  const visibilityMeters = withinRange(num('visibility'), ranges.visibilityMeters, 'Visibility', 'visibility', id, issues);

  const weatherMain = text('weather.0.main');
  const apiTimestamp = parseTimestamp(getPath(payload, 'api_timestamp'));

  return {
    id,
    city: identity.city,
    country: identity.country,
    observationTime: identity.observationTime,
    observationDate: identity.observationDate,
    latitude: identity.latitude ?? num('coord.lat'),
    longitude: identity.longitude ?? num('coord.lon'),
    weatherCityName: text('name'),

    temperatureCelsius,
    feelsLikeCelsius,
    temperatureMinCelsius,
    temperatureMaxCelsius,
    pressureHpa,
    humidityPercent,

    weatherMain,
    weatherDescription: text('weather.0.description'),
    weatherIcon: text('weather.0.icon'),
    weatherCategory: standardizeWeatherCategory(weatherMain),

    windSpeedMps,
    windDirectionDegrees: num('wind.deg'),
    cloudinessPercent,
    visibilityMeters,

    weatherTimestamp: fromUnixSeconds(num('dt')),
    apiTimestamp: apiTimestamp ? apiTimestamp.toISOString() : null,
    airQualityObservationCount: airQuality.observationCount,

    hasWeatherError: weatherError !== null,
    weatherError,
    hasAirQualityError: airQuality.error !== null,
    airQualityError: airQuality.error,

    temperatureFahrenheit: celsiusToFahrenheit(temperatureCelsius),
    feelsLikeFahrenheit: celsiusToFahrenheit(feelsLikeCelsius),
    windSpeedMph: mpsToMph(windSpeedMps),
  };
}
