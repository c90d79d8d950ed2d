import { UnsupportedValueError } from '../errors.js';
import type { CriteriaValue, ScalarValue } from './types.js';

function isValueList(value: CriteriaValue): value is readonly ScalarValue[] {
  return Array.isArray(value);
}

function formatScalar(value: ScalarValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new UnsupportedValueError(value);
  }
  return String(value);
}

/**
 * Converts a leaf criteria value to the text placed between quotes in
 * `element-value-query`. Arrays become a comma separated list; null becomes
 * the empty string.
 */
export function formatCriteriaValue(value: CriteriaValue): string {
  if (value === null) return '';
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new UnsupportedValueError(value, 'Cannot format an invalid Date as criteria value');
    }
    return value.toISOString();
  }
  if (isValueList(value)) {
    return value.map(formatScalar).join(',');
  }
  return formatScalar(value);
}
