/**
 * Daily facts: the externally visible unit, keyed for upsert
 */

import type { DailyAirQualityAggregate, DailyWeatherAggregate } from './aggregate.js';

export type TrendLabel =
  | 'Significantly Worse'
  | 'Worse'
  | 'Stable'
  | 'Better'
  | 'Significantly Better'
  | 'Unknown';

export type Season = 'Winter' | 'Spring' | 'Summer' | 'Fall';

export type DayOfWeek =
  | 'Sunday'
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday';

export interface DailyAirQualityFact extends DailyAirQualityAggregate {
  /** Surrogate key of (city, country, observationDate) */
  readonly id: string;
  /** Surrogate key of (city, country) */
  readonly cityId: string;

  readonly previousAqiValue: number | null;
  readonly aqiChange: number | null;
  readonly aqi7DayAvg: number | null;
  readonly aqiTrend: TrendLabel;

  readonly healthRecommendation: string;
  readonly airQualityAssessment: string;

  readonly hasSufficientObservations: boolean;
  readonly hasMultiplePollutants: boolean;
  readonly isNearbyStation: boolean;

  readonly season: Season;
  readonly dayOfWeek: DayOfWeek;
}

export interface DailyWeatherFact extends DailyWeatherAggregate {
  readonly id: string;
  readonly cityId: string;

  readonly temperatureRangeCelsius: number | null;
  readonly temperatureRangeFahrenheit: number | null;

  readonly previousAvgTemperatureCelsius: number | null;
  readonly temperatureChangeCelsius: number | null;
  readonly temperature7DayAvgCelsius: number | null;
  readonly temperatureTrend: TrendLabel;

  readonly temperatureCategory: string;
  readonly humidityCategory: string;
  readonly windCategory: string;

  readonly isHighQualityData: boolean;
  readonly hasSufficientObservations: boolean;

  readonly season: Season;
  readonly dayOfWeek: DayOfWeek;
}
