/**
 * Metadata Filter
 * Exact, structured predicates over scalar metadata.
 *
 * A plain value means equality. Operator objects support $eq, $ne, $gt,
 * $gte, $lt, $lte, $in and $nin; $and/$or combine nested filters. A missing
 * key only satisfies $ne and $nin. Ordering operators compare numbers with
 * numbers and strings with strings, anything else does not match.
 */

import { ConfigurationError } from '../errors.js';
import { MetadataValueSchema } from '../documents/document.js';
import type { Metadata, MetadataValue } from '../documents/types.js';
import type { FieldCondition, FieldOperators, MetadataFilter } from './types.js';

const OPERATORS = new Set(['$eq', '$ne', '$gt', '$gte', '$lt', '$lte', '$in', '$nin']);

function isScalar(value: unknown): value is MetadataValue {
  return MetadataValueSchema.safeParse(value).success;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Throw a ConfigurationError unless the value is a well-formed filter.
 */
export function assertValidFilter(filter: unknown, path = 'filter'): asserts filter is MetadataFilter {
  if (!isPlainObject(filter)) {
    throw new ConfigurationError(`${path} must be an object`);
  }

  for (const [key, condition] of Object.entries(filter)) {
    if (key === '$and' || key === '$or') {
      if (!Array.isArray(condition)) {
        throw new ConfigurationError(`${path}.${key} must be an array of filters`);
      }
      condition.forEach((nested, i) => assertValidFilter(nested, `${path}.${key}[${i}]`));
      continue;
    }
    if (key.startsWith('$')) {
      throw new ConfigurationError(`Unknown logical operator ${key} in ${path}`);
    }
    if (isScalar(condition)) {
      continue;
    }
    if (!isPlainObject(condition)) {
      throw new ConfigurationError(`${path}.${key} must be a scalar or an operator object`);
    }
    for (const [op, operand] of Object.entries(condition)) {
      if (!OPERATORS.has(op)) {
        throw new ConfigurationError(`Unknown operator ${op} in ${path}.${key}`);
      }
      const valid =
        op === '$in' || op === '$nin'
          ? Array.isArray(operand) && operand.every(isScalar)
          : isScalar(operand);
      if (!valid) {
        throw new ConfigurationError(`Invalid operand for ${op} in ${path}.${key}`);
      }
    }
  }
}

function compare(
  actual: MetadataValue,
  expected: number | string,
  test: (a: number | string, b: number | string) => boolean
): boolean {
  if (typeof actual === 'number' && typeof expected === 'number') return test(actual, expected);
  if (typeof actual === 'string' && typeof expected === 'string') return test(actual, expected);
  return false;
}

function matchesOperators(actual: MetadataValue | undefined, operators: FieldOperators): boolean {
  const entries: Array<[string, unknown]> = Object.entries(operators);
  for (const [op, operand] of entries) {
    if (operand === undefined) continue;

    if (op === '$ne') {
      if (actual === operand) return false;
      continue;
    }
    if (op === '$nin') {
      if (Array.isArray(operand) && actual !== undefined && operand.includes(actual)) return false;
      continue;
    }
    if (actual === undefined) {
      return false;
    }

    switch (op) {
      case '$eq':
        if (actual !== operand) return false;
        break;
      case '$in':
        if (!Array.isArray(operand) || !operand.includes(actual)) return false;
        break;
      case '$gt':
      case '$gte':
      case '$lt':
      case '$lte': {
        if (typeof operand !== 'number' && typeof operand !== 'string') return false;
        const ok = compare(actual, operand, (a, b) =>
          op === '$gt' ? a > b : op === '$gte' ? a >= b : op === '$lt' ? a < b : a <= b
        );
        if (!ok) return false;
        break;
      }
      default:
        return false;
    }
  }
  return true;
}

function matchesCondition(actual: MetadataValue | undefined, condition: FieldCondition): boolean {
  if (isScalar(condition)) {
    return actual === condition;
  }
  return matchesOperators(actual, condition);
}

/**
 * Evaluate a filter against a metadata map.
 */
export function matchesFilter(metadata: Metadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) {
    return true;
  }

  for (const [key, condition] of Object.entries(filter)) {
    if (condition === undefined) continue;

    if (key === '$and' || key === '$or') {
      if (!Array.isArray(condition)) return false;
      const results = condition.map((nested) => matchesFilter(metadata, nested));
      const ok = key === '$and' ? results.every(Boolean) : results.some(Boolean);
      if (!ok) return false;
      continue;
    }

    if (Array.isArray(condition)) {
      return false;
    }

    const actual = Object.prototype.hasOwnProperty.call(metadata, key) ? metadata[key] : undefined;
    if (!matchesCondition(actual, condition)) {
      return false;
    }
  }

  return true;
}
