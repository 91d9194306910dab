import { describe, it, expect } from 'vitest';
import type { RawObservation } from '@airshed/types';
import { defaultPipelineConfig } from '../../../core/config.js';
import { ConfigurationError } from '../../../core/errors.js';
import { deriveRunId, runPipeline } from '../../../pipeline/run-pipeline.js';
import {
  createAirQualityEntry,
  createAirQualityPayload,
  createRawObservation,
  createRecordingLogger,
} from '../../utils/fixtures.js';

const config = defaultPipelineConfig();
const AS_OF = '2024-03-02T00:00:00.000Z';

function dataset(): RawObservation[] {
  return [
    createRawObservation({
      id: '1',
      observationTime: '2024-03-01T14:00:00Z',
      airQualityData: createAirQualityPayload([createAirQualityEntry({ hour: 8, aqi: 45 })]),
    }),
    createRawObservation({
      id: '2',
      observationTime: '2024-03-01T20:00:00Z',
      airQualityData: createAirQualityPayload([
        createAirQualityEntry({ hour: 14, aqi: 60 }),
        createAirQualityEntry({ hour: 14, aqi: 30, parameter: 'OZONE' }),
      ]),
    }),
    createRawObservation({ id: '3', city: 'Riverton', observationTime: '2024-03-01T15:00:00Z' }),
    createRawObservation({ id: '4', city: 'Riverton', observationTime: '2024-03-01T15:00:00.000Z' }),
    createRawObservation({ id: '5', city: null }),
  ];
}

describe('runPipeline', () => {
  it('reports what each stage produced', () => {
    const { report } = runPipeline(dataset(), { config, asOf: AS_OF });

    expect(report).toEqual({
      runId: deriveRunId(dataset(), AS_OF),
      asOf: AS_OF,
      rawRecords: 5,
      duplicateRecords: 1,
      invalidRecords: 1,
      normalizedObservations: 3,
      airQualityReadings: 3,
      pairedObservations: 2,
      unpairedObservations: 1,
      pollutantAggregates: 2,
      weatherFacts: 2,
      airQualityFacts: 1,
      dimensions: 2,
      issuesByCategory: { 'Missing city': 1 },
    });
  });

  it('keeps the greater id of a duplicate pair', () => {
    const { weather } = runPipeline(dataset(), { config, asOf: AS_OF });
    expect(weather.map((w) => w.id)).toEqual(['4', '1', '2']);
  });

  it('pairs weather with the closest reading and aggregates the day', () => {
    const result = runPipeline(dataset(), { config, asOf: AS_OF });

    expect(result.reconciled.map((r) => [r.weather.id, r.airQuality?.pollutant ?? null, r.candidateCount])).toEqual([
      ['4', null, 0],
      ['1', 'PM2.5', 1],
      ['2', 'Ozone', 2],
    ]);
    expect(result.airQualityFacts[0]).toMatchObject({
      city: 'Springfield',
      overallAqiValue: 53,
      primaryPollutant: 'PM2.5',
      overallAqiCategory: 'Moderate',
      pollutantList: ['PM2.5', 'Ozone'],
      aqiTrend: 'Unknown',
    });
  });

  it('does not depend on input order', () => {
    const forward = runPipeline(dataset(), { config, asOf: AS_OF });
    const reversed = runPipeline([...dataset()].reverse(), { config, asOf: AS_OF });

    expect(JSON.stringify(reversed)).toBe(JSON.stringify(forward));
  });

  it('derives a different run id for a different asOf', () => {
    expect(deriveRunId(dataset(), AS_OF)).not.toBe(deriveRunId(dataset(), '2024-03-03T00:00:00.000Z'));
    expect(deriveRunId(dataset(), AS_OF)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('rejects an unparsable asOf', () => {
    expect(() => runPipeline(dataset(), { config, asOf: 'yesterday' })).toThrow(ConfigurationError);
  });

  it('logs dropped records and the run summary', () => {
    const logger = createRecordingLogger();
    runPipeline(dataset(), { config, asOf: AS_OF, logger });

    expect(logger.entries.map((e) => [e.level, e.message])).toEqual([
      ['warn', 'Dropped invalid observation'],
      ['info', 'Pipeline run complete'],
    ]);
    expect(logger.entries[0].metadata).toEqual({ recordId: '5', reasons: ['Missing city'] });
  });
});
