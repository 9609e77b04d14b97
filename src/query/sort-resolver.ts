import { InvalidSortException } from './errors.js';
import { getValues } from './raw-parameters.js';
import type { RawParameters, SortCriterion, SortDirection } from './types.js';

/** Reserved parameter carrying the requested sort fields */
export const SORT_BY_PARAMETER = 'sortBy';
/** Reserved parameter carrying the requested sort directions */
export const SORT_ORDER_PARAMETER = 'sortOrder';

const SORT_DIRECTIONS: readonly SortDirection[] = ['asc', 'desc'];

function isSortDirection(value: string): value is SortDirection {
  return SORT_DIRECTIONS.some((direction) => direction === value);
}

/**
 * Read sort criteria from the reserved `sortBy` / `sortOrder` parameters.
 *
 * Values are paired by position: the n-th `sortBy` takes the n-th `sortOrder`.
 * A missing direction defaults to `asc`. Field names are not checked here;
 * see {@link resolveSorting}.
 *
 * @throws {InvalidSortException} If a direction is not `asc`/`desc`, or more
 * directions than fields are given
 *
 * @example
 * ```typescript
 * parseSortCriteria('incident', { sortBy: ['createTime', 'incidentId'], sortOrder: ['desc'] });
 * // [{ field: 'createTime', direction: 'desc' }, { field: 'incidentId', direction: 'asc' }]
 * ```
 */
export function parseSortCriteria(queryType: string, parameters: RawParameters): SortCriterion[] {
  const fields = getValues(parameters, SORT_BY_PARAMETER) ?? [];
  const directions = getValues(parameters, SORT_ORDER_PARAMETER) ?? [];

  if (directions.length > fields.length) {
    throw new InvalidSortException(
      SORT_ORDER_PARAMETER,
      queryType,
      `Parameter '${SORT_ORDER_PARAMETER}' requires a matching '${SORT_BY_PARAMETER}'`
    );
  }

  return fields.map((field, index) => {
    const direction = directions[index] ?? 'asc';
    if (!isSortDirection(direction)) {
      throw new InvalidSortException(
        field,
        queryType,
        `Cannot sort ${queryType} by '${field}': sort order '${direction}' must be 'asc' or 'desc'`
      );
    }
    return { field, direction };
  });
}

/**
 * Anything that can answer whether a field is sortable.
 */
export interface SortFieldValidator {
  readonly name: string;
  isValidSortField(field: string): boolean;
}

/**
 * Validate sort criteria against a query type's whitelist.
 *
 * Order is preserved and duplicates are kept. The first field outside the
 * whitelist rejects the whole request.
 *
 * @throws {InvalidSortException} If any field is not whitelisted
 */
export function resolveSorting(
  queryType: SortFieldValidator,
  criteria: readonly SortCriterion[]
): readonly SortCriterion[] {
  for (const criterion of criteria) {
    if (!queryType.isValidSortField(criterion.field)) {
      throw new InvalidSortException(criterion.field, queryType.name);
    }
  }
  return criteria;
}
