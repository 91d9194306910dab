/**
 * SQLite Observation Store
 *
 * Storage collaborator for the CLI: raw observations in, daily facts,
 * city dimensions and run reports out. The pipeline itself never touches
 * the database.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3
 * - WAL mode, numbered migrations recorded in schema_migrations
 * - Facts and dimensions upserted by surrogate key, one transaction per run
 * - Dimensions are never deleted
 *
 * @module persistence/sqlite-store
 */

import Database from 'better-sqlite3';
import type {
  CityDimension,
  DailyAirQualityFact,
  DailyWeatherFact,
  RawObservation,
} from '@airshed/types';
import { StoreError, errorMessage } from '../core/errors.js';
import { parseTimestamp } from '../core/utils/dates.js';
import type { PipelineResult, RunReport } from '../pipeline/run-pipeline.js';

// ============================================================================
// Public Types
// ============================================================================

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

export interface ListRawOptions {
  /** Most recently stored first, at most this many */
  readonly limit?: number;
}

export interface SaveRunSummary {
  readonly weatherFacts: number;
  readonly airQualityFacts: number;
  readonly dimensions: number;
  /** Facts of this run's cities that the run no longer produced */
  readonly removedFacts: number;
}

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface RawObservationRow {
  readonly id: string;
  readonly city: string | null;
  readonly country: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly observation_time: string | null;
  readonly weather_data: string | null;
  readonly air_quality_data: string | null;
}

interface PayloadRow {
  readonly payload_json: string;
}

interface RunRow {
  readonly report_json: string;
}

// ============================================================================
// Migrations
// ============================================================================

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        -- Raw observations as delivered by acquisition
        CREATE TABLE raw_observations (
          id TEXT PRIMARY KEY,
          city TEXT,
          country TEXT,
          country_key TEXT NOT NULL DEFAULT '',
          latitude REAL,
          longitude REAL,
          observation_time TEXT,
          weather_data TEXT,
          air_quality_data TEXT,
          created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
          updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
        );

        CREATE UNIQUE INDEX idx_raw_observations_identity
          ON raw_observations(city, country_key, observation_time);
        CREATE INDEX idx_raw_observations_created_at ON raw_observations(created_at DESC);

        -- Daily weather facts keyed by surrogate key
        CREATE TABLE daily_weather_facts (
          id TEXT PRIMARY KEY,
          city_id TEXT NOT NULL,
          city TEXT NOT NULL,
          country TEXT,
          observation_date TEXT NOT NULL,
          avg_temperature_celsius REAL,
          temperature_trend TEXT NOT NULL,
          payload_json TEXT NOT NULL,
          run_id TEXT NOT NULL
        );

        -- Daily air-quality facts keyed by surrogate key
        CREATE TABLE daily_air_quality_facts (
          id TEXT PRIMARY KEY,
          city_id TEXT NOT NULL,
          city TEXT NOT NULL,
          country TEXT,
          observation_date TEXT NOT NULL,
          overall_aqi_value REAL NOT NULL,
          overall_aqi_category TEXT NOT NULL,
          primary_pollutant TEXT NOT NULL,
          payload_json TEXT NOT NULL,
          run_id TEXT NOT NULL
        );

        -- One row per city, never deleted
        CREATE TABLE city_dimensions (
          id TEXT PRIMARY KEY,
          city TEXT NOT NULL,
          country TEXT,
          data_freshness TEXT NOT NULL,
          is_active INTEGER NOT NULL CHECK (is_active IN (0, 1)),
          payload_json TEXT NOT NULL,
          run_id TEXT NOT NULL
        );

        CREATE TABLE pipeline_runs (
          run_id TEXT PRIMARY KEY,
          as_of TEXT NOT NULL,
          report_json TEXT NOT NULL,
          completed_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
        );

        CREATE INDEX idx_weather_facts_city_date ON daily_weather_facts(city_id, observation_date);
        CREATE INDEX idx_air_quality_facts_city_date ON daily_air_quality_facts(city_id, observation_date);
      `);
    },
  },
];

// ============================================================================
// Store
// ============================================================================

function toStoredTime(value: string | null): string | null {
  if (value === null) return null;
  return parseTimestamp(value)?.toISOString() ?? value;
}

function toPayloadText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export class SqliteObservationStore {
  private readonly db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    try {
      this.db = new Database(dbPath);
    } catch (error) {
      throw new StoreError(`Cannot open database at ${dbPath}`, 'open', error);
    }

    // Enable WAL mode for concurrent reads
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('temp_store = MEMORY');
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const message = errorMessage(error);
      throw new StoreError(`${operation} failed: ${message}`, operation, error);
    }
  }

  // ==========================================================================
  // Migration Management
  // ==========================================================================

  /**
   * Run all pending migrations in one transaction
   */
  runMigrations(): void {
    this.run('migrate', () => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
        );
      `);

      const currentVersion = this.getDatabaseVersion();
      const record = this.db.prepare<[number, string]>(
        'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
      );

      this.db.transaction(() => {
        for (const migration of MIGRATIONS) {
          if (migration.version > currentVersion) {
            migration.up(this.db);
            record.run(migration.version, migration.name);
          }
        }
      })();
    });
  }

  /**
   * Current schema version, 0 before any migration
   */
  getDatabaseVersion(): number {
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return row?.version ?? 0;
  }

  // ==========================================================================
  // Raw Observations
  // ==========================================================================

  /**
   * Insert or replace raw observations; a record matching an existing
   * (city, country, observation time) replaces its payloads
   */
  upsertRawObservations(raws: readonly RawObservation[]): number {
    return this.run('upsertRawObservations', () => {
      const stmt = this.db.prepare<{
        id: string;
        city: string | null;
        country: string | null;
        country_key: string;
        latitude: number | null;
        longitude: number | null;
        observation_time: string | null;
        weather_data: string | null;
        air_quality_data: string | null;
      }>(`
        INSERT INTO raw_observations (
          id, city, country, country_key, latitude, longitude,
          observation_time, weather_data, air_quality_data
        ) VALUES (
          @id, @city, @country, @country_key, @latitude, @longitude,
          @observation_time, @weather_data, @air_quality_data
        )
        ON CONFLICT(id) DO UPDATE SET
          city = excluded.city,
          country = excluded.country,
          country_key = excluded.country_key,
          latitude = excluded.latitude,
          longitude = excluded.longitude,
          observation_time = excluded.observation_time,
          weather_data = excluded.weather_data,
          air_quality_data = excluded.air_quality_data,
          updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        ON CONFLICT(city, country_key, observation_time) DO UPDATE SET
          latitude = excluded.latitude,
          longitude = excluded.longitude,
          weather_data = excluded.weather_data,
          air_quality_data = excluded.air_quality_data,
          updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      `);

      const insertAll = this.db.transaction((records: readonly RawObservation[]) => {
        for (const raw of records) {
          stmt.run({
            id: raw.id,
            city: raw.city,
            country: raw.country,
            country_key: raw.country ?? '',
            latitude: raw.latitude,
            longitude: raw.longitude,
            observation_time: toStoredTime(raw.observationTime),
            weather_data: toPayloadText(raw.weatherData),
            air_quality_data: toPayloadText(raw.airQualityData),
          });
        }
        return records.length;
      });

      return insertAll(raws);
    });
  }

  listRawObservations(options: ListRawOptions = {}): RawObservation[] {
    return this.run('listRawObservations', () => {
      const columns = `id, city, country, latitude, longitude, observation_time, weather_data, air_quality_data`;
      const rows =
        options.limit === undefined
          ? this.db
              .prepare<[], RawObservationRow>(`SELECT ${columns} FROM raw_observations ORDER BY id`)
              .all()
          : this.db
              .prepare<[number], RawObservationRow>(
                `SELECT ${columns} FROM raw_observations ORDER BY created_at DESC, id DESC LIMIT ?`
              )
              .all(options.limit);

      return rows.map((row) => ({
        id: row.id,
        city: row.city,
        country: row.country,
        latitude: row.latitude,
        longitude: row.longitude,
        observationTime: row.observation_time,
        weatherData: row.weather_data,
        airQualityData: row.air_quality_data,
      }));
    });
  }

  countRawObservations(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM raw_observations')
      .get();
    return row?.count ?? 0;
  }

  // ==========================================================================
  // Pipeline Output
  // ==========================================================================

  /**
   * Upsert facts, dimensions and the run report in one transaction.
   * Facts of the run's cities not written by this run are deleted;
   * dimensions are kept.
   */
  saveRunResults(result: PipelineResult): SaveRunSummary {
    return this.run('saveRunResults', () => {
      const { runId } = result.report;

      const weatherStmt = this.db.prepare<[string, string, string, string | null, string, number | null, string, string, string]>(`
        INSERT INTO daily_weather_facts (
          id, city_id, city, country, observation_date,
          avg_temperature_celsius, temperature_trend, payload_json, run_id
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          avg_temperature_celsius = excluded.avg_temperature_celsius,
          temperature_trend = excluded.temperature_trend,
          payload_json = excluded.payload_json,
          run_id = excluded.run_id
      `);

      const airQualityStmt = this.db.prepare<[string, string, string, string | null, string, number, string, string, string, string]>(`
        INSERT INTO daily_air_quality_facts (
          id, city_id, city, country, observation_date,
          overall_aqi_value, overall_aqi_category, primary_pollutant, payload_json, run_id
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          overall_aqi_value = excluded.overall_aqi_value,
          overall_aqi_category = excluded.overall_aqi_category,
          primary_pollutant = excluded.primary_pollutant,
          payload_json = excluded.payload_json,
          run_id = excluded.run_id
      `);

      const dimensionStmt = this.db.prepare<[string, string, string | null, string, number, string, string]>(`
        INSERT INTO city_dimensions (id, city, country, data_freshness, is_active, payload_json, run_id)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          data_freshness = excluded.data_freshness,
          is_active = excluded.is_active,
          payload_json = excluded.payload_json,
          run_id = excluded.run_id
      `);

      const staleWeatherStmt = this.db.prepare<[string, string]>(
        'DELETE FROM daily_weather_facts WHERE city_id = ? AND run_id <> ?'
      );
      const staleAirQualityStmt = this.db.prepare<[string, string]>(
        'DELETE FROM daily_air_quality_facts WHERE city_id = ? AND run_id <> ?'
      );

      const runStmt = this.db.prepare<[string, string, string]>(`
        INSERT INTO pipeline_runs (run_id, as_of, report_json) VALUES (?, ?, ?)
        ON CONFLICT(run_id) DO UPDATE SET
          report_json = excluded.report_json,
          completed_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      `);

      const save = this.db.transaction(() => {
        for (const fact of result.weatherFacts) {
          weatherStmt.run(
            fact.id,
            fact.cityId,
            fact.city,
            fact.country,
            fact.observationDate,
            fact.avgTemperatureCelsius,
            fact.temperatureTrend,
            JSON.stringify(fact),
            runId
          );
        }
        for (const fact of result.airQualityFacts) {
          airQualityStmt.run(
            fact.id,
            fact.cityId,
            fact.city,
            fact.country,
            fact.observationDate,
            fact.overallAqiValue,
            fact.overallAqiCategory,
            fact.primaryPollutant,
            JSON.stringify(fact),
            runId
          );
        }
        for (const dimension of result.dimensions) {
          dimensionStmt.run(
            dimension.id,
            dimension.city,
            dimension.country,
            dimension.dataFreshness,
            dimension.isActive ? 1 : 0,
            JSON.stringify(dimension),
            runId
          );
        }
        let removed = 0;
        for (const dimension of result.dimensions) {
          removed += staleWeatherStmt.run(dimension.id, runId).changes;
          removed += staleAirQualityStmt.run(dimension.id, runId).changes;
        }
        runStmt.run(runId, result.report.asOf, JSON.stringify(result.report));
        return removed;
      });

      const removedFacts = save();

      return {
        weatherFacts: result.weatherFacts.length,
        airQualityFacts: result.airQualityFacts.length,
        dimensions: result.dimensions.length,
        removedFacts,
      };
    });
  }

  getWeatherFacts(cityId: string): DailyWeatherFact[] {
    return this.run('getWeatherFacts', () =>
      this.db
        .prepare<[string], PayloadRow>(
          'SELECT payload_json FROM daily_weather_facts WHERE city_id = ? ORDER BY observation_date'
        )
        .all(cityId)
        .map((row): DailyWeatherFact => JSON.parse(row.payload_json))
    );
  }

  getAirQualityFacts(cityId: string): DailyAirQualityFact[] {
    return this.run('getAirQualityFacts', () =>
      this.db
        .prepare<[string], PayloadRow>(
          'SELECT payload_json FROM daily_air_quality_facts WHERE city_id = ? ORDER BY observation_date'
        )
        .all(cityId)
        .map((row): DailyAirQualityFact => JSON.parse(row.payload_json))
    );
  }

  getCityDimensions(): CityDimension[] {
    return this.run('getCityDimensions', () =>
      this.db
        .prepare<[], PayloadRow>('SELECT payload_json FROM city_dimensions ORDER BY city, country')
        .all()
        .map((row): CityDimension => JSON.parse(row.payload_json))
    );
  }

  getRunReport(runId: string): RunReport | null {
    return this.run('getRunReport', () => {
      const row = this.db
        .prepare<[string], RunRow>('SELECT report_json FROM pipeline_runs WHERE run_id = ?')
        .get(runId);
      if (!row) return null;
      const report: RunReport = JSON.parse(row.report_json);
      return report;
    });
  }

  close(): void {
    this.db.close();
  }
}
