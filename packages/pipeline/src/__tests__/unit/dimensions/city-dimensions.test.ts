import { describe, it, expect } from 'vitest';
import { defaultPipelineConfig } from '../../../core/config.js';
import { entityId } from '../../../core/surrogate-key.js';
import { buildCityDimensions } from '../../../dimensions/city-dimensions.js';
import { createWeatherObservation } from '../../utils/fixtures.js';

const config = defaultPipelineConfig();

describe('buildCityDimensions', () => {
  it('classifies a US city from its latest position', () => {
    const [dimension] = buildCityDimensions(
      [
        createWeatherObservation({ id: 'a', observationTime: '2024-03-01T08:00:00.000Z' }),
        createWeatherObservation({
          id: 'b',
          observationTime: '2024-03-01T14:00:00.000Z',
          latitude: null,
          longitude: null,
          hasWeatherError: true,
          weatherError: 'city not found',
        }),
      ],
      '2024-03-01T20:00:00Z',
      config
    );

    expect(dimension).toEqual({
      id: entityId('Springfield', 'US'),
      city: 'Springfield',
      country: 'US',
      latitude: 40,
      longitude: -89,
      climateZone: 'Northern Temperate',
      regionClassification: 'Central US',
      estimatedTimezone: 'UTC-5',
      firstObservation: '2024-03-01T08:00:00.000Z',
      lastObservation: '2024-03-01T14:00:00.000Z',
      totalObservations: 2,
      successCount: 1,
      errorCount: 1,
      successRatePercent: 50,
      dataFreshness: 'Fresh',
      isActive: false,
      dataQualityTier: 'Poor',
      asOf: '2024-03-01T20:00:00.000Z',
    });
  });

  it('marks non-US cities International', () => {
    const [dimension] = buildCityDimensions(
      [createWeatherObservation({ city: 'London', country: 'GB', latitude: 51.5, longitude: -0.12 })],
      '2024-03-10T14:00:00.000Z',
      config
    );

    expect(dimension).toMatchObject({
      regionClassification: 'International',
      estimatedTimezone: 'UTC+0',
      climateZone: 'Northern Temperate',
      dataFreshness: 'Stale',
      isActive: false,
      dataQualityTier: 'Excellent',
    });
  });

  it('stays active through the last day of the window', () => {
    const history = [createWeatherObservation({ observationTime: '2024-03-01T14:00:00.000Z' })];

    expect(buildCityDimensions(history, '2024-03-08T14:00:00.000Z', config)[0].isActive).toBe(true);
    expect(buildCityDimensions(history, '2024-03-08T14:00:01.000Z', config)[0].isActive).toBe(false);
  });

  it('sorts by city then country with null first', () => {
    const dimensions = buildCityDimensions(
      [
        createWeatherObservation({ id: 'a', city: 'Springfield', country: 'US' }),
        createWeatherObservation({ id: 'b', city: 'London', country: 'GB' }),
        createWeatherObservation({ id: 'c', city: 'Springfield', country: null }),
      ],
      '2024-03-02T00:00:00.000Z',
      config
    );

    expect(dimensions.map((d) => [d.city, d.country])).toEqual([
      ['London', 'GB'],
      ['Springfield', null],
      ['Springfield', 'US'],
    ]);
  });

  it('falls back to Unknown without coordinates', () => {
    const [dimension] = buildCityDimensions(
      [createWeatherObservation({ latitude: null, longitude: null })],
      '2024-03-02T00:00:00.000Z',
      config
    );

    expect(dimension.climateZone).toBe('Unknown');
    expect(dimension.regionClassification).toBe('Unknown');
    expect(dimension.estimatedTimezone).toBe('Unknown');
  });
});
