/**
 * Field Extractors
 *
 * Turn arbitrary records into (name, value) pairs for bulk row population.
 */

import { isNullableValue } from '@csvgrid/shared';
import type { CsvCellValue, CsvField, FieldExtractor } from './types';

/**
 * Own enumerable properties in definition order, then getters declared
 * on the record's classes (nearest class first). Methods are skipped.
 *
 * Integer-like keys ("2024", "7") always come first, in ascending order,
 * ahead of every other own key: that is JavaScript's property order and
 * applies to records parsed from JSON too. Use {@link pickFields} when the
 * column order must be exact.
 */
export const propertyFieldExtractor: FieldExtractor<object> = function* (record) {
  const seen = new Set<string>();

  for (const name of Object.keys(record)) {
    seen.add(name);
    const value: unknown = Reflect.get(record, name);
    if (typeof value !== 'function') {
      yield [name, value];
    }
  }

  let proto: unknown = Object.getPrototypeOf(record);
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    for (const [name, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(proto))) {
      if (seen.has(name) || !descriptor.get) continue;
      seen.add(name);
      yield [name, Reflect.get(record, name)];
    }
    proto = Object.getPrototypeOf(proto);
  }
};

/**
 * Extract exactly the named fields, in the given order
 *
 * @example
 * table.addRows(users, pickFields('name', 'email'));
 */
export function pickFields<T extends object>(...names: (keyof T & string)[]): FieldExtractor<T> {
  return function* (record) {
    for (const name of names) {
      yield [name, record[name]];
    }
  };
}

/**
 * Narrow an extracted value to something a cell can hold.
 * Objects other than dates and null sentinels become their string form.
 */
export function toCellValue(value: unknown): CsvCellValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
    case 'undefined':
      return value;
    case 'object':
      if (value === null || value instanceof Date || isNullableValue(value)) return value;
      return String(value);
    default:
      return String(value);
  }
}

export type { CsvField, FieldExtractor };
