import type { RawParameters } from './types.js';

/**
 * Normalize a loose parameter record into RawParameters.
 * Single strings become one-element lists; undefined entries are dropped.
 *
 * @example
 * ```typescript
 * toRawParameters({ incidentType: 'failedJob', tenantIdIn: ['a', 'b'] });
 * // { incidentType: ['failedJob'], tenantIdIn: ['a', 'b'] }
 * ```
 */
export function toRawParameters(
  record: Readonly<Record<string, string | readonly string[] | undefined>>
): RawParameters {
  const parameters: Record<string, readonly string[]> = {};
  for (const [name, value] of Object.entries(record)) {
    if (value === undefined) continue;
    parameters[name] = typeof value === 'string' ? [value] : [...value];
  }
  return parameters;
}

/**
 * Get every value of a parameter, or undefined when the parameter is absent.
 * A parameter present with an empty value list counts as absent.
 */
export function getValues(parameters: RawParameters, name: string): readonly string[] | undefined {
  if (!Object.hasOwn(parameters, name)) {
    return undefined;
  }
  const values = parameters[name];
  return values.length > 0 ? values : undefined;
}

/**
 * Get the first value of a parameter, or undefined when the parameter is absent.
 */
export function getFirstValue(parameters: RawParameters, name: string): string | undefined {
  return getValues(parameters, name)?.[0];
}
