/**
 * Daily fact builders: trend fields, classifications, quality flags
 *
 * @module trends/facts
 */

import type {
  DailyAirQualityAggregate,
  DailyAirQualityFact,
  DailyWeatherAggregate,
  DailyWeatherFact,
} from '@airshed/types';
import type { PipelineConfig } from '../core/config.js';
import { dailyFactId, entityId } from '../core/surrogate-key.js';
import { entityKeyString } from '../core/utils/grouping.js';
import { roundOrNull } from '../core/utils/math.js';
import { classify } from '../classification/band-table.js';
import { classifyAqi, classifyTrend, dayOfWeek, seasonOf } from '../classification/classifiers.js';
import { compareEntityDate } from '../aggregation/ordering.js';
import { analyzeTrends } from './analyze.js';

function difference(high: number | null, low: number | null): number | null {
  return high === null || low === null ? null : roundOrNull(high - low, 1);
}

export function buildDailyAirQualityFacts(
  rows: readonly DailyAirQualityAggregate[],
  config: PipelineConfig
): DailyAirQualityFact[] {
  const points = analyzeTrends(rows, {
    keyOf: entityKeyString,
    dateOf: (row) => row.observationDate,
    valueOf: (row) => row.overallAqiValue,
    windowSize: config.rollingWindowDays,
  });

  return points
    .map(({ row, previousValue, delta, rollingAverage }): DailyAirQualityFact => {
      const band = classifyAqi(config.bandTables, row.overallAqiValue);
      const aqiChange = roundOrNull(delta, 1);

      return {
        ...row,
        id: dailyFactId(row.city, row.country, row.observationDate),
        cityId: entityId(row.city, row.country),

        previousAqiValue: previousValue,
        aqiChange,
        aqi7DayAvg: roundOrNull(rollingAverage, 1),
        aqiTrend: classifyTrend(aqiChange, config.trends.aqi),

        healthRecommendation: band.detail ?? band.label,
        airQualityAssessment: classify(config.bandTables.airQualityAssessment, row.overallAqiValue).label,

        hasSufficientObservations:
          row.totalObservations >= config.quality.sufficientAirQualityObservations,
        hasMultiplePollutants: row.pollutantsMeasured >= 2,
        isNearbyStation:
          row.avgDistanceMiles !== null &&
          row.avgDistanceMiles <= config.reconciliation.nearbyStationMiles,

        season: seasonOf(row.observationDate),
        dayOfWeek: dayOfWeek(row.observationDate),
      };
    })
    .sort(compareEntityDate);
}

export function buildDailyWeatherFacts(
  rows: readonly DailyWeatherAggregate[],
  config: PipelineConfig
): DailyWeatherFact[] {
  const { bandTables, quality } = config;
  const points = analyzeTrends(rows, {
    keyOf: entityKeyString,
    dateOf: (row) => row.observationDate,
    valueOf: (row) => row.avgTemperatureCelsius,
    windowSize: config.rollingWindowDays,
  });

  return points
    .map(({ row, previousValue, delta, rollingAverage }): DailyWeatherFact => {
      const temperatureChangeCelsius = roundOrNull(delta, 1);

      return {
        ...row,
        id: dailyFactId(row.city, row.country, row.observationDate),
        cityId: entityId(row.city, row.country),

        temperatureRangeCelsius: difference(row.maxTemperatureCelsius, row.minTemperatureCelsius),
        temperatureRangeFahrenheit: difference(row.maxTemperatureFahrenheit, row.minTemperatureFahrenheit),

        previousAvgTemperatureCelsius: previousValue,
        temperatureChangeCelsius,
        temperature7DayAvgCelsius: roundOrNull(rollingAverage, 1),
        temperatureTrend: classifyTrend(temperatureChangeCelsius, config.trends.temperature),

        temperatureCategory: classify(bandTables.temperature, row.avgTemperatureCelsius).label,
        humidityCategory: classify(bandTables.humidity, row.avgHumidityPercent).label,
        windCategory: classify(bandTables.wind, row.avgWindSpeedMps).label,

        isHighQualityData: row.successRatePercent >= quality.highQualitySuccessRate,
        hasSufficientObservations: row.totalObservations >= quality.sufficientWeatherObservations,

        season: seasonOf(row.observationDate),
        dayOfWeek: dayOfWeek(row.observationDate),
      };
    })
    .sort(compareEntityDate);
}
