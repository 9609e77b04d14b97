import { convert } from './converters.js';
import { ParameterBindingException } from './errors.js';
import { getFirstValue, getValues } from './raw-parameters.js';
import type { FilterValues, ParameterTable, RawParameters } from './types.js';

/**
 * Bind raw request parameters into typed filter values.
 *
 * Walks the parameter table: parameters present in the request are converted
 * and assigned to their field, absent ones leave the field unset. Parameters
 * no descriptor names are ignored. The first conversion failure aborts the
 * whole bind.
 *
 * @throws {ParameterBindingException} If a value cannot be converted
 *
 * @example
 * ```typescript
 * const table = {
 *   incidentType: { converter: converters.string },
 *   open: { converter: converters.boolean },
 *   tenantIds: { name: 'tenantIdIn', converter: converters.stringList },
 * };
 *
 * bindParameters(table, { open: ['true'], tenantIdIn: ['a,b'], unknown: ['x'] });
 * // { open: true, tenantIds: ['a', 'b'] }
 * ```
 */
export function bindParameters<TFilters>(
  table: ParameterTable<TFilters>,
  parameters: RawParameters
): FilterValues<TFilters> {
  const filters: FilterValues<TFilters> = {};

  for (const field in table) {
    const descriptor = table[field];
    const name = descriptor.name ?? field;
    const multiValued = descriptor.multiValued ?? descriptor.converter.multiValued;

    const rawValue = multiValued
      ? getValues(parameters, name)?.join(',')
      : getFirstValue(parameters, name);
    if (rawValue === undefined) continue;

    const result = convert(descriptor.converter, rawValue);
    if (!result.success) {
      throw new ParameterBindingException(name, rawValue, result.message);
    }
    filters[field] = result.value;
  }

  return filters;
}

/**
 * Check that every external parameter name in a table is unique.
 *
 * @throws {Error} If two fields bind the same external name
 */
export function assertUniqueParameterNames<TFilters>(
  queryType: string,
  table: ParameterTable<TFilters>
): void {
  const seen = new Set<string>();
  for (const field in table) {
    const name = table[field].name ?? field;
    if (seen.has(name)) {
      throw new Error(`Query type "${queryType}" declares parameter "${name}" more than once`);
    }
    seen.add(name);
  }
}
