/**
 * NDJSON input and JSON output for the CLI
 *
 * Input files hold one raw observation per line. Payload fields may be
 * nested JSON objects or JSON text.
 *
 * @module cli/lib/ndjson
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { RawObservation } from '@airshed/types';
import { InputError, errorMessage } from '../../core/errors.js';

const RawObservationLineSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  city: z.string().nullable().optional(),
  country: z.string().nullable().optional(),
  latitude: z.number().nullable().optional(),
  longitude: z.number().nullable().optional(),
  observationTime: z.string().nullable().optional(),
  weatherData: z.unknown().optional(),
  airQualityData: z.unknown().optional(),
});

/**
 * Parse NDJSON text; blank lines are skipped
 *
 * @throws InputError naming the first offending line
 */
export function parseRawObservations(content: string, source: string): RawObservation[] {
  const records: RawObservation[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') return;
    const lineNumber = index + 1;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new InputError(
        `Line ${lineNumber} is not valid JSON: ${errorMessage(error)}`,
        source,
        lineNumber
      );
    }

    const result = RawObservationLineSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.errors
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new InputError(`Line ${lineNumber} is not a raw observation: ${detail}`, source, lineNumber);
    }

    const { data } = result;
    records.push({
      id: data.id,
      city: data.city ?? null,
      country: data.country ?? null,
      latitude: data.latitude ?? null,
      longitude: data.longitude ?? null,
      observationTime: data.observationTime ?? null,
      weatherData: data.weatherData ?? null,
      airQualityData: data.airQualityData ?? null,
    });
  });

  return records;
}

export async function readRawObservations(path: string): Promise<RawObservation[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputError(
      `Cannot read ${path}: ${errorMessage(error)}`,
      path
    );
  }
  return parseRawObservations(content, path);
}

export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}
