import { describe, it, expect } from 'vitest';
import { standardizePollutant, standardizeWeatherCategory } from '../../../normalization/standardize.js';
import { issueCategory } from '../../../normalization/issues.js';

describe('standardizeWeatherCategory', () => {
  it.each([
    ['Clear', 'Clear'],
    ['Clouds', 'Cloudy'],
    ['Rain', 'Rainy'],
    ['Snow', 'Snowy'],
    ['Thunderstorm', 'Stormy'],
    ['Fog', 'Misty'],
    ['Mist', 'Misty'],
    ['Drizzle', 'Other'],
    ['Haze', 'Other'],
  ])('maps %s to %s', (main, category) => {
    expect(standardizeWeatherCategory(main)).toBe(category);
  });

  it('maps a missing condition to Other', () => {
    expect(standardizeWeatherCategory(null)).toBe('Other');
  });
});

describe('standardizePollutant', () => {
  it('matches parameter names case-insensitively', () => {
    expect(standardizePollutant('pm2.5')).toEqual({ pollutant: 'PM2.5', isStandard: true });
    expect(standardizePollutant('OZONE')).toEqual({ pollutant: 'Ozone', isStandard: true });
    expect(standardizePollutant('O3')).toEqual({ pollutant: 'Ozone', isStandard: true });
    expect(standardizePollutant('CO')).toEqual({ pollutant: 'CO', isStandard: true });
    expect(standardizePollutant('SO2')).toEqual({ pollutant: 'SO2', isStandard: true });
  });

  it('passes unknown names through unchanged', () => {
    expect(standardizePollutant('NH3')).toEqual({ pollutant: 'NH3', isStandard: false });
  });

  it('labels a missing name Unspecified', () => {
    expect(standardizePollutant(null)).toEqual({ pollutant: 'Unspecified', isStandard: false });
    expect(standardizePollutant('  ')).toEqual({ pollutant: 'Unspecified', isStandard: false });
  });
});

describe('issueCategory', () => {
  it('takes the text before the first colon', () => {
    expect(issueCategory('Temperature out of range: 200')).toBe('Temperature out of range');
    expect(issueCategory('JSON parsing error: Unexpected token: x')).toBe('JSON parsing error');
    expect(issueCategory('Missing city')).toBe('Missing city');
  });
});
