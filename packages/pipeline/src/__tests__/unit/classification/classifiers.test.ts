import { describe, it, expect, beforeAll } from 'vitest';
import type { BandTableSet } from '@airshed/types';
import { loadBandTables } from '../../../classification/band-table.js';
import {
  classifyAqi,
  classifyClimateZone,
  classifyRegion,
  classifyTrend,
  dayOfWeek,
  estimateTimezone,
  seasonOf,
} from '../../../classification/classifiers.js';

let tables: BandTableSet;

beforeAll(() => {
  tables = loadBandTables();
});

describe('classifyTrend', () => {
  const thresholds = { stableThreshold: 5, significantThreshold: 20 };

  it('labels magnitude and direction', () => {
    expect(classifyTrend(0, thresholds)).toBe('Stable');
    expect(classifyTrend(5, thresholds)).toBe('Stable');
    expect(classifyTrend(-5, thresholds)).toBe('Stable');
    expect(classifyTrend(5.1, thresholds)).toBe('Worse');
    expect(classifyTrend(-8, thresholds)).toBe('Better');
    expect(classifyTrend(20, thresholds)).toBe('Worse');
    expect(classifyTrend(20.5, thresholds)).toBe('Significantly Worse');
    expect(classifyTrend(-25, thresholds)).toBe('Significantly Better');
  });

  it('is Unknown without a delta', () => {
    expect(classifyTrend(null, thresholds)).toBe('Unknown');
    expect(classifyTrend(Number.NaN, thresholds)).toBe('Unknown');
  });

  it('follows configured thresholds', () => {
    expect(classifyTrend(3, { stableThreshold: 2, significantThreshold: 10 })).toBe('Worse');
  });
});

describe('geography', () => {
  it('splits US cities by longitude', () => {
    expect(classifyRegion(tables, 'US', -122.4)).toBe('Western US');
    expect(classifyRegion(tables, 'US', -105)).toBe('Western US');
    expect(classifyRegion(tables, 'US', -90)).toBe('Central US');
    expect(classifyRegion(tables, 'US', -74)).toBe('Eastern US');
    expect(classifyRegion(tables, 'US', null)).toBe('Unknown');
  });

  it('classifies every other country as International', () => {
    expect(classifyRegion(tables, 'GB', -0.12)).toBe('International');
    expect(classifyRegion(tables, null, -90)).toBe('International');
  });

  it('assigns climate zones by latitude', () => {
    expect(classifyClimateZone(tables, 40)).toBe('Northern Temperate');
    expect(classifyClimateZone(tables, 23.5)).toBe('Tropical');
    expect(classifyClimateZone(tables, -66.5)).toBe('Antarctic');
    expect(classifyClimateZone(tables, 70)).toBe('Arctic');
    expect(classifyClimateZone(tables, null)).toBe('Unknown');
  });

  it('estimates the offset from 15-degree bands', () => {
    expect(estimateTimezone(tables, -89.65)).toBe('UTC-5');
    expect(estimateTimezone(tables, 0)).toBe('UTC+0');
    expect(estimateTimezone(tables, -180)).toBe('UTC-11');
    expect(estimateTimezone(tables, 180)).toBe('UTC+12');
    expect(estimateTimezone(tables, 181)).toBe('Unknown');
  });
});

describe('calendar', () => {
  it('maps months to seasons', () => {
    expect(seasonOf('2024-01-15')).toBe('Winter');
    expect(seasonOf('2024-03-01')).toBe('Spring');
    expect(seasonOf('2024-06-30')).toBe('Summer');
    expect(seasonOf('2024-09-01')).toBe('Fall');
    expect(seasonOf('2024-12-01')).toBe('Winter');
  });

  it('names the weekday of a date', () => {
    expect(dayOfWeek('2024-03-01')).toBe('Friday');
    expect(dayOfWeek('2024-03-03')).toBe('Sunday');
  });
});

describe('classifyAqi', () => {
  it('uses the AQI table', () => {
    expect(classifyAqi(tables, 45).label).toBe('Good');
    expect(classifyAqi(tables, 45).color).toBe('Green');
  });
});
