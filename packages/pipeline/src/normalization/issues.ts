import type { DataQualityIssue } from '@airshed/types';
import type { ValueRange } from '../core/config.js';

/**
 * Issue category: message text before the first ':'
 */
export function issueCategory(message: string): string {
  const colon = message.indexOf(':');
  return (colon >= 0 ? message.slice(0, colon) : message).trim();
}

export function createIssue(recordId: string, message: string, field?: string): DataQualityIssue {
  const issue = { recordId, category: issueCategory(message), message };
  return field === undefined ? issue : { ...issue, field };
}

/**
 * Null out a value outside its validity window, recording why
 */
export function withinRange(
  value: number | null,
  range: ValueRange,
  label: string,
  field: string,
  recordId: string,
  issues: DataQualityIssue[]
): number | null {
  if (value === null) return null;
  if (value < range.min || value > range.max) {
    issues.push(createIssue(recordId, `${label} out of range: ${value}`, field));
    return null;
  }
  return value;
}
