/**
 * Daily weather aggregation, one row per (city, country, date)
 *
 * @module aggregation/daily-weather
 */

import type { DailyWeatherAggregate, ReconciledObservation } from '@airshed/types';
import { groupBy } from '../core/utils/grouping.js';
import { roundOrNull } from '../core/utils/math.js';
import {
  earliestInstant,
  latestBy,
  latestInstant,
  max,
  min,
  mode,
  percentage,
  roundedMean,
} from './stats.js';
import { compareEntityDate } from './ordering.js';

function dailyKey(row: ReconciledObservation): string {
  const { city, country, observationDate } = row.weather;
  return JSON.stringify([city, country, observationDate]);
}

function aggregateGroup(group: readonly ReconciledObservation[]): DailyWeatherAggregate {
  const weather = group.map((row) => row.weather);
  const first = weather[0];
  const total = weather.length;
  const errors = weather.filter((w) => w.hasWeatherError).length;

  const primaryWeatherMain = mode(weather.map((w) => w.weatherMain));
  const matchingMode = weather.filter((w) => w.weatherMain === primaryWeatherMain).length;

  const paired = group.filter((row) => row.airQuality !== null);
  const position = latestBy(
    weather,
    (w) => w.observationTime,
    (w) => (w.latitude !== null && w.longitude !== null ? { lat: w.latitude, lon: w.longitude } : null)
  );

  return {
    city: first.city,
    country: first.country,
    observationDate: first.observationDate,
    latitude: position?.lat ?? null,
    longitude: position?.lon ?? null,

    avgTemperatureCelsius: roundedMean(weather.map((w) => w.temperatureCelsius), 1),
    minTemperatureCelsius: roundOrNull(min(weather.map((w) => w.temperatureCelsius)), 1),
    maxTemperatureCelsius: roundOrNull(max(weather.map((w) => w.temperatureCelsius)), 1),
    avgFeelsLikeCelsius: roundedMean(weather.map((w) => w.feelsLikeCelsius), 1),
    avgTemperatureFahrenheit: roundedMean(weather.map((w) => w.temperatureFahrenheit), 1),
    minTemperatureFahrenheit: roundOrNull(min(weather.map((w) => w.temperatureFahrenheit)), 1),
    maxTemperatureFahrenheit: roundOrNull(max(weather.map((w) => w.temperatureFahrenheit)), 1),
    avgFeelsLikeFahrenheit: roundedMean(weather.map((w) => w.feelsLikeFahrenheit), 1),

    avgHumidityPercent: roundedMean(weather.map((w) => w.humidityPercent), 0),
    minHumidityPercent: roundOrNull(min(weather.map((w) => w.humidityPercent)), 0),
    maxHumidityPercent: roundOrNull(max(weather.map((w) => w.humidityPercent)), 0),
    avgPressureHpa: roundedMean(weather.map((w) => w.pressureHpa), 0),

    avgWindSpeedMps: roundedMean(weather.map((w) => w.windSpeedMps), 1),
    maxWindSpeedMps: roundOrNull(max(weather.map((w) => w.windSpeedMps)), 1),
    avgWindSpeedMph: roundedMean(weather.map((w) => w.windSpeedMph), 1),
    maxWindSpeedMph: roundOrNull(max(weather.map((w) => w.windSpeedMph)), 1),

    avgCloudinessPercent: roundedMean(weather.map((w) => w.cloudinessPercent), 0),
    avgVisibilityMeters: roundedMean(weather.map((w) => w.visibilityMeters), 0),

    primaryWeatherMain,
    primaryWeatherDescription: mode(weather.map((w) => w.weatherDescription)),
    primaryWeatherCategory: mode(weather.map((w) => w.weatherCategory)),
    weatherStabilityPercent: primaryWeatherMain === null ? null : percentage(matchingMode, total, 1),

    totalObservations: total,
    successfulObservations: total - errors,
    errorObservations: errors,
    successRatePercent: percentage(total - errors, total, 1),
    firstObservationTime: earliestInstant(weather.map((w) => w.observationTime)),
    lastObservationTime: latestInstant(weather.map((w) => w.observationTime)),

    pairedObservations: paired.length,
    avgPairedAqi: roundedMean(paired.map((row) => row.airQuality?.aqiValue ?? null), 0),
    avgStationDistanceMiles: roundedMean(paired.map((row) => row.distanceMiles), 2),
  };
}

/**
 * Empty groups never occur: a group exists only once a row lands in it
 */
export function aggregateDailyWeather(
  reconciled: readonly ReconciledObservation[]
): DailyWeatherAggregate[] {
  return [...groupBy(reconciled, dailyKey).values()]
    .map(aggregateGroup)
    .sort(compareEntityDate);
}
