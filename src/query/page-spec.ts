import { convert, converters } from './converters.js';
import { ParameterBindingException } from './errors.js';
import { UNBOUNDED_MAX_RESULTS } from './executor.js';
import { getFirstValue } from './raw-parameters.js';
import type { PageSpec, RawParameters } from './types.js';

/** Reserved parameter carrying the index of the first result */
export const FIRST_RESULT_PARAMETER = 'firstResult';
/** Reserved parameter carrying the page size */
export const MAX_RESULTS_PARAMETER = 'maxResults';

function readBound(parameters: RawParameters, name: string, minimum: number): number | undefined {
  const rawValue = getFirstValue(parameters, name);
  if (rawValue === undefined) {
    return undefined;
  }

  const result = convert(converters.integer, rawValue);
  if (!result.success) {
    throw new ParameterBindingException(name, rawValue, result.message);
  }
  if (result.value < minimum) {
    throw new ParameterBindingException(name, rawValue, `Expected an integer >= ${minimum}`);
  }
  if (result.value > UNBOUNDED_MAX_RESULTS) {
    throw new ParameterBindingException(
      name,
      rawValue,
      `Expected an integer <= ${UNBOUNDED_MAX_RESULTS}`
    );
  }
  return result.value;
}

/**
 * Read pagination bounds from the reserved `firstResult` / `maxResults` parameters.
 * Absent parameters stay absent so the executor can pick the unbounded path.
 *
 * @throws {ParameterBindingException} If `firstResult` is not a non-negative
 * integer or `maxResults` not a positive one, or either exceeds `UNBOUNDED_MAX_RESULTS`
 */
export function parsePageSpec(parameters: RawParameters): PageSpec {
  const firstResult = readBound(parameters, FIRST_RESULT_PARAMETER, 0);
  const maxResults = readBound(parameters, MAX_RESULTS_PARAMETER, 1);
  return {
    ...(firstResult !== undefined && { firstResult }),
    ...(maxResults !== undefined && { maxResults }),
  };
}
