/**
 * Air-quality payload extraction: one reading per station observation
 *
 * @module normalization/air-quality
 */

import type { BandTableSet, DataQualityIssue, NormalizedAirQualityObservation } from '@airshed/types';
import type { ValidationRanges } from '../core/config.js';
import { TIMEZONE_OFFSETS_MINUTES } from '../core/constants.js';
import { isRecord, toInteger, toNumber, toText } from '../core/type-guards.js';
import { MS_PER_MINUTE, toCalendarDate } from '../core/utils/dates.js';
import { classifyAqi } from '../classification/classifiers.js';
import type { ObservationIdentity } from './weather.js';
import { createIssue, withinRange } from './issues.js';
import { standardizePollutant } from './standardize.js';

const DATE_OBSERVED = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Instant of a station reading from its local date, hour and zone
 * abbreviation; null when any part is missing or unknown
 */
export function resolveObservedAt(
  dateObserved: string | null,
  hourObserved: number | null,
  localTimezone: string | null
): string | null {
  if (dateObserved === null || hourObserved === null || localTimezone === null) return null;
  if (hourObserved < 0 || hourObserved > 23) return null;

  const match = DATE_OBSERVED.exec(dateObserved.trim());
  if (!match) return null;

  const offset = TIMEZONE_OFFSETS_MINUTES.get(localTimezone.trim().toUpperCase());
  if (offset === undefined) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const localMidnight = Date.UTC(year, month - 1, day);
  if (toCalendarDate(new Date(localMidnight)) !== match[0]) return null;

  return new Date(localMidnight + hourObserved * 60 * MS_PER_MINUTE - offset * MS_PER_MINUTE).toISOString();
}

/**
 * `Category` is either a label or `{ Number, Name }`
 */
function categoryName(value: unknown): string | null {
  if (isRecord(value)) return toText(value.Name);
  return toText(value);
}

export function extractAirQuality(
  identity: ObservationIdentity,
  observations: readonly unknown[],
  ranges: ValidationRanges,
  tables: BandTableSet,
  issues: DataQualityIssue[]
): NormalizedAirQualityObservation[] {
  const readings: NormalizedAirQualityObservation[] = [];

  observations.forEach((entry, index) => {
    const field = `observations.${index}`;
    if (!isRecord(entry)) {
      issues.push(createIssue(identity.id, `Malformed air quality observation: index ${index}`, field));
      return;
    }

    const rawAqi = toNumber(entry.AQI);
    if (rawAqi === null) {
      issues.push(createIssue(identity.id, `Missing AQI: index ${index}`, `${field}.AQI`));
      return;
    }
    const aqiValue = withinRange(rawAqi, ranges.aqi, 'AQI', `${field}.AQI`, identity.id, issues);
    if (aqiValue === null) return;

    const concentrationValue = withinRange(
      toNumber(entry.Value),
      ranges.concentration,
      'Concentration',
      `${field}.Value`,
      identity.id,
      issues
    );

    const observationHour = toInteger(entry.HourObserved);
    const localTimezone = toText(entry.LocalTimeZone);
    const observedAt =
      resolveObservedAt(toText(entry.DateObserved), observationHour, localTimezone) ??
      identity.observationTime;

    const originalParameterName = toText(entry.ParameterName);
    const { pollutant, isStandard } = standardizePollutant(originalParameterName);
    const band = classifyAqi(tables, aqiValue);

    readings.push({
      id: `${identity.id}:${index}`,
      recordId: identity.id,
      city: identity.city,
      country: identity.country,
      observedAt,
      observationDate: toCalendarDate(observedAt),
      observationHour,
      localTimezone,
      reportingArea: toText(entry.ReportingArea),
      stateCode: toText(entry.StateCode),

      pollutant,
      isStandardPollutant: isStandard,
      originalParameterName,

      aqiValue,
      concentrationValue,
      concentrationUnit: toText(entry.Unit),

      aqiCategory: band.label,
      aqiColor: band.color ?? 'Gray',
      healthImpactLevel: band.severity,
      originalCategory: categoryName(entry.Category),

      stationLatitude: toNumber(entry.Latitude),
      stationLongitude: toNumber(entry.Longitude),
      latitude: identity.latitude,
      longitude: identity.longitude,
    });
  });

  return readings;
}
