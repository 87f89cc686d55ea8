/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers/arrays/booleans/ranges) but NEVER rename keys.
 */

import { ValidationError } from '@sizinglab/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Coerce a value to a number array
 * Accepts:
 * - Comma-separated string: "1,2.5,3"
 * - Already array: [1,2,3]
 * - undefined/null returns undefined
 */
export function coerceNumberArray(v: unknown, name: string): number[] | undefined {
  if (v === null || v === undefined) return undefined;
  const items: unknown[] = Array.isArray(v)
    ? v
    : isString(v)
      ? v
          .split(',')
          .map((s) => s.trim())
          .filter(Boolean)
      : [v];

  return items.map((item) => {
    const num = coerceNumber(item, name);
    if (num === undefined)
      throw new ValidationError(`Invalid number in array for ${name}`, { name, value: item });
    return num;
  });
}

/**
 * Coerce a value to a boolean
 * Accepts:
 * - Boolean: returns as-is
 * - Number: 0 is false, anything else true
 * - String: 'true'/'1'/'yes'/'on' or 'false'/'0'/'no'/'off'
 * - undefined/null returns undefined
 */
export function coerceBoolean(v: unknown, name: string): boolean | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v !== 0;
  if (isString(v)) {
    const lower = v.trim().toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on') return true;
    if (lower === 'false' || lower === '0' || lower === 'no' || lower === 'off') return false;
  }
  throw new ValidationError(`Invalid boolean for ${name}`, { name, value: v });
}

export interface NumericRange {
  start: number;
  end: number;
  step: number;
}

/**
 * Coerce "start:end:step" into a range
 */
export function coerceRange(v: unknown, name: string): NumericRange | undefined {
  if (v === null || v === undefined) return undefined;
  if (!isString(v)) {
    throw new ValidationError(`Invalid range for ${name}`, { name, value: v });
  }
  const parts = v.split(':');
  if (parts.length !== 3) {
    throw new ValidationError(`Range for ${name} must look like start:end:step`, {
      name,
      value: v,
    });
  }
  const [start, end, step] = parts.map((part) => {
    const num = coerceNumber(part, name);
    if (num === undefined)
      throw new ValidationError(`Invalid number in range for ${name}`, { name, value: part });
    return num;
  });
  return { start, end, step };
}
