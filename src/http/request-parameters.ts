import type { Context } from 'hono';
import {
  array,
  boolean,
  type InferOutput,
  number,
  object,
  optional,
  safeParse,
  string,
  union,
} from 'valibot';
import { ParameterBindingException } from '../query/errors.js';
import { SORT_BY_PARAMETER, SORT_ORDER_PARAMETER } from '../query/sort-resolver.js';
import type { RawParameters } from '../query/types.js';
import { BadRequestException } from './errors.js';

/** Body property carrying sort criteria in POST queries */
export const SORTING_PROPERTY = 'sorting';

const scalarSchema = union([string(), number(), boolean()]);
const parameterValueSchema = union([scalarSchema, array(scalarSchema)]);
const sortingSchema = array(
  object({
    sortBy: string(),
    sortOrder: optional(string()),
  })
);

type Scalar = InferOutput<typeof scalarSchema>;

/**
 * Read RawParameters from the (multi-valued) query string.
 */
export function queryParameters(c: Context): RawParameters {
  return c.req.queries();
}

function toText(value: Scalar): string {
  return typeof value === 'string' ? value : String(value);
}

function sortingToParameters(value: unknown): Record<string, string[]> {
  const result = safeParse(sortingSchema, value);
  if (!result.success) {
    throw new ParameterBindingException(
      SORTING_PROPERTY,
      JSON.stringify(value),
      'Expected a list of { sortBy, sortOrder } objects'
    );
  }
  return {
    [SORT_BY_PARAMETER]: result.output.map((criterion) => criterion.sortBy),
    [SORT_ORDER_PARAMETER]: result.output.map((criterion) => criterion.sortOrder ?? 'asc'),
  };
}

/**
 * Convert a JSON request body into RawParameters.
 *
 * Scalars become a single text value, arrays become one value per entry and
 * `null` counts as absent. `sorting: [{ sortBy, sortOrder }]` is turned into
 * positional `sortBy` / `sortOrder` values.
 *
 * @throws {BadRequestException} If the body is not a JSON object
 * @throws {ParameterBindingException} If a property holds a nested object, or
 * `sorting` is combined with top-level `sortBy` / `sortOrder`
 *
 * @example
 * ```typescript
 * bodyParameters({ open: true, tenantIdIn: ['a', 'b'], sorting: [{ sortBy: 'createTime' }] });
 * // { open: ['true'], tenantIdIn: ['a', 'b'], sortBy: ['createTime'], sortOrder: ['asc'] }
 * ```
 */
export function bodyParameters(body: unknown): RawParameters {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new BadRequestException('Request body must be a JSON object');
  }

  const entries = Object.entries(body).filter(
    ([, value]) => value !== null && value !== undefined
  );
  const names = new Set(entries.map(([name]) => name));
  if (
    names.has(SORTING_PROPERTY) &&
    (names.has(SORT_BY_PARAMETER) || names.has(SORT_ORDER_PARAMETER))
  ) {
    throw new ParameterBindingException(
      SORTING_PROPERTY,
      JSON.stringify(entries.find(([name]) => name === SORTING_PROPERTY)?.[1]),
      `Cannot be combined with ${SORT_BY_PARAMETER} or ${SORT_ORDER_PARAMETER}`
    );
  }

  const parameters: Record<string, string[]> = {};
  for (const [name, value] of entries) {
    if (name === SORTING_PROPERTY) {
      Object.assign(parameters, sortingToParameters(value));
      continue;
    }

    const result = safeParse(parameterValueSchema, value);
    if (!result.success) {
      throw new ParameterBindingException(
        name,
        JSON.stringify(value),
        'Expected a string, number, boolean or a list of them'
      );
    }
    parameters[name] = Array.isArray(result.output)
      ? result.output.map(toText)
      : [toText(result.output)];
  }

  return parameters;
}

/**
 * Read and convert the JSON body of a request. An empty body counts as `{}`.
 */
export async function readBodyParameters(c: Context): Promise<RawParameters> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    throw new BadRequestException('Request body must be valid JSON', { cause: error });
  }
  return bodyParameters(body);
}
