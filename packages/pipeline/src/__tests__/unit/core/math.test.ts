import { describe, it, expect } from 'vitest';
import { celsiusToFahrenheit, mpsToMph, roundOrNull, roundTo } from '../../../core/utils/math.js';

describe('roundTo', () => {
  it('rounds half away from zero', () => {
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(-2.5, 0)).toBe(-3);
    expect(roundTo(0.125, 2)).toBe(0.13);
  });

  it('is not thrown off by binary representation', () => {
    expect(roundTo(1.005, 2)).toBe(1.01);
    expect(roundTo(2.345, 1)).toBe(2.3);
  });

  it('never returns negative zero', () => {
    expect(Object.is(roundTo(-0.04, 1), 0)).toBe(true);
  });

  it('handles values printed in exponent notation', () => {
    expect(roundTo(1e-7, 2)).toBe(0);
  });

  it('passes null through', () => {
    expect(roundOrNull(null, 2)).toBeNull();
    expect(roundOrNull(3.14159, 2)).toBe(3.14);
  });
});

describe('unit conversion', () => {
  it('converts Celsius to Fahrenheit at 1 dp', () => {
    expect(celsiusToFahrenheit(20)).toBe(68);
    expect(celsiusToFahrenheit(-40)).toBe(-40);
    expect(celsiusToFahrenheit(21.5)).toBe(70.7);
    expect(celsiusToFahrenheit(null)).toBeNull();
  });

  it('converts m/s to mph at 1 dp', () => {
    expect(mpsToMph(10)).toBe(22.4);
    expect(mpsToMph(0)).toBe(0);
    expect(mpsToMph(null)).toBeNull();
  });
});
