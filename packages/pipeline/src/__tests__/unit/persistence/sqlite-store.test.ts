import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { defaultPipelineConfig } from '../../../core/config.js';
import { entityId } from '../../../core/surrogate-key.js';
import { runPipeline } from '../../../pipeline/run-pipeline.js';
import { SqliteObservationStore } from '../../../persistence/sqlite-store.js';
import { createAirQualityEntry, createAirQualityPayload, createRawObservation, createWeatherPayload } from '../../utils/fixtures.js';

describe('SqliteObservationStore', () => {
  let store: SqliteObservationStore;

  beforeEach(() => {
    store = new SqliteObservationStore(':memory:');
    store.runMigrations();
  });

  afterEach(() => {
    store.close();
  });

  describe('migrations', () => {
    it('applies the schema once', () => {
      store.runMigrations();
      expect(store.getDatabaseVersion()).toBe(1);
    });
  });

  describe('raw observations', () => {
    it('stores payloads as JSON text and normalizes the time', () => {
      store.upsertRawObservations([createRawObservation({ id: '7', observationTime: '2024-03-01T08:00:00-06:00' })]);

      expect(store.listRawObservations()).toEqual([
        {
          id: '7',
          city: 'Springfield',
          country: 'US',
          latitude: 39.8,
          longitude: -89.65,
          observationTime: '2024-03-01T14:00:00.000Z',
          weatherData: JSON.stringify(createWeatherPayload()),
          airQualityData: null,
        },
      ]);
    });

    it('replaces payloads of a record with the same identity', () => {
      store.upsertRawObservations([createRawObservation({ id: '1' })]);
      const airQualityData = createAirQualityPayload([createAirQualityEntry({ aqi: 80 })]);
      store.upsertRawObservations([createRawObservation({ id: '2', airQualityData })]);

      const stored = store.listRawObservations();
      expect(store.countRawObservations()).toBe(1);
      expect(stored[0].id).toBe('1');
      expect(stored[0].airQualityData).toBe(JSON.stringify(airQualityData));
    });

    it('updates a record by id', () => {
      store.upsertRawObservations([createRawObservation({ id: '1', city: 'Springfield' })]);
      store.upsertRawObservations([createRawObservation({ id: '1', city: 'Riverton' })]);

      expect(store.listRawObservations().map((r) => r.city)).toEqual(['Riverton']);
    });

    it('applies a limit', () => {
      store.upsertRawObservations([
        createRawObservation({ id: '1', observationTime: '2024-03-01T00:00:00Z' }),
        createRawObservation({ id: '2', observationTime: '2024-03-01T01:00:00Z' }),
        createRawObservation({ id: '3', observationTime: '2024-03-01T02:00:00Z' }),
      ]);

      expect(store.listRawObservations({ limit: 2 })).toHaveLength(2);
      expect(store.countRawObservations()).toBe(3);
    });
  });

  describe('run results', () => {
    const result = runPipeline(
      [
        createRawObservation({
          id: '1',
          airQualityData: createAirQualityPayload([createAirQualityEntry({ aqi: 45 })]),
        }),
        createRawObservation({ id: '2', city: 'Riverton' }),
      ],
      { config: defaultPipelineConfig(), asOf: '2024-03-02T00:00:00.000Z' }
    );

    it('saves facts, dimensions and the report', () => {
      expect(store.saveRunResults(result)).toEqual({ weatherFacts: 2, airQualityFacts: 1, dimensions: 2, removedFacts: 0 });

      const springfield = entityId('Springfield', 'US');
      expect(store.getWeatherFacts(springfield)).toEqual(
        result.weatherFacts.filter((f) => f.cityId === springfield)
      );
      expect(store.getAirQualityFacts(springfield)).toEqual([...result.airQualityFacts]);
      expect(store.getCityDimensions().map((d) => d.city)).toEqual(['Riverton', 'Springfield']);
      expect(store.getRunReport(result.report.runId)).toEqual(result.report);
    });

    it('upserts on a second save', () => {
      store.saveRunResults(result);
      store.saveRunResults(result);

      expect(store.getCityDimensions()).toHaveLength(2);
      expect(store.getWeatherFacts(entityId('Riverton', 'US'))).toHaveLength(1);
    });

    it('removes facts a rerun no longer produces', () => {
      const config = defaultPipelineConfig();
      const asOf = '2024-03-03T00:00:00.000Z';
      const twoDays = runPipeline(
        [
          createRawObservation({ id: '1', observationTime: '2024-03-01T14:00:00Z' }),
          createRawObservation({ id: '2', observationTime: '2024-03-02T14:00:00Z' }),
        ],
        { config, asOf }
      );
      const oneDay = runPipeline([createRawObservation({ id: '2', observationTime: '2024-03-02T14:00:00Z' })], {
        config,
        asOf,
      });
      const springfield = entityId('Springfield', 'US');

      store.saveRunResults(twoDays);
      const summary = store.saveRunResults(oneDay);

      expect(summary.removedFacts).toBe(1);
      expect(store.getWeatherFacts(springfield).map((f) => f.observationDate)).toEqual(['2024-03-02']);
      expect(store.getCityDimensions()).toHaveLength(1);
    });

    it('keeps facts of cities outside the run', () => {
      store.saveRunResults(result);
      const riverton = runPipeline([createRawObservation({ id: '9', city: 'Riverton' })], {
        config: defaultPipelineConfig(),
        asOf: '2024-03-02T00:00:00.000Z',
      });

      expect(store.saveRunResults(riverton).removedFacts).toBe(0);
      expect(store.getWeatherFacts(entityId('Springfield', 'US'))).toHaveLength(1);
    });

    it('returns null for an unknown run', () => {
      expect(store.getRunReport('missing')).toBeNull();
    });
  });
});
