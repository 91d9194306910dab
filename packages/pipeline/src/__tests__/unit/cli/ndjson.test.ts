import { describe, it, expect } from 'vitest';
import { parseRawObservations, readRawObservations } from '../../../cli/lib/ndjson.js';
import { InputError } from '../../../core/errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

describe('parseRawObservations', () => {
  it('reads one record per line and skips blank lines', () => {
    const content = [
      JSON.stringify({ id: 2, city: 'Springfield', observationTime: '2024-03-01T14:00:00Z', weatherData: { main: {} } }),
      '',
      JSON.stringify({ id: 'b', weatherData: '{"main":{}}' }),
      '',
    ].join('\n');

    expect(parseRawObservations(content, 'input.ndjson')).toEqual([
      {
        id: '2',
        city: 'Springfield',
        country: null,
        latitude: null,
        longitude: null,
        observationTime: '2024-03-01T14:00:00Z',
        weatherData: { main: {} },
        airQualityData: null,
      },
      {
        id: 'b',
        city: null,
        country: null,
        latitude: null,
        longitude: null,
        observationTime: null,
        weatherData: '{"main":{}}',
        airQualityData: null,
      },
    ]);
  });

  it('names the line that is not JSON', () => {
    const error = captureError(() => parseRawObservations('{"id":"1"}\r\n{broken', 'input.ndjson'));

    expect(error).toBeInstanceOf(InputError);
    expect(error).toMatchObject({ path: 'input.ndjson', line: 2 });
  });

  it('names the line that is not an observation', () => {
    const error = captureError(() => parseRawObservations('{"id":"1"}\n\n{"city":"Springfield"}', 'input.ndjson'));

    expect(error).toBeInstanceOf(InputError);
    expect(error).toMatchObject({ line: 3 });
  });
});

describe('readRawObservations', () => {
  it('reports an unreadable file', async () => {
    await expect(readRawObservations('/nonexistent/airshed/input.ndjson')).rejects.toBeInstanceOf(InputError);
  });
});
