/**
 * Numeric helpers shared by normalization and aggregation
 */

/**
 * Round half away from zero to `decimals` places
 *
 * Shifts through the decimal exponent so 1.005 rounds to 1.01 rather than
 * 1.00 as `Math.round(1.005 * 100) / 100` would.
 */
export function roundTo(value: number, decimals: number): number {
  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  const shifted = Number(`${magnitude}e${decimals}`);
  let rounded = Number(`${Math.round(shifted)}e-${decimals}`);

  // Exponent notation in `magnitude` (very small or large values)
  if (!Number.isFinite(shifted) || Number.isNaN(rounded)) {
    const factor = 10 ** decimals;
    rounded = Math.round(magnitude * factor) / factor;
  }

  const result = sign * rounded;
  return result === 0 ? 0 : result;
}

export function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : roundTo(value, decimals);
}

export function celsiusToFahrenheit(celsius: number | null): number | null {
  return celsius === null ? null : roundTo((celsius * 9) / 5 + 32, 1);
}

export function mpsToMph(mps: number | null): number | null {
  return mps === null ? null : roundTo(mps * 2.237, 1);
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
