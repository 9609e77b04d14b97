import {
  type BaseIssue,
  type BaseSchema,
  digits,
  picklist,
  pipe,
  safeParse,
  string,
  transform,
} from 'valibot';

/**
 * Converts one raw text value into a typed value.
 */
export interface Converter<TValue> {
  /** Whether every raw value of a parameter is read, not just the first */
  readonly multiValued: boolean;
  readonly schema: BaseSchema<string, TValue, BaseIssue<unknown>>;
}

export type ConversionResult<TValue> =
  | { readonly success: true; readonly value: TValue }
  | { readonly success: false; readonly message: string };

/**
 * Split a comma-delimited value into trimmed, non-empty entries, keeping order.
 */
function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Built-in converters. Shared and stateless.
 */
export const converters = {
  string: {
    multiValued: false,
    schema: string(),
  },
  boolean: {
    multiValued: false,
    schema: pipe(
      string(),
      picklist(['true', 'false'], 'Expected "true" or "false"'),
      transform((value) => value === 'true')
    ),
  },
  stringList: {
    multiValued: true,
    schema: pipe(string(), transform(splitList)),
  },
  integer: {
    multiValued: false,
    schema: pipe(
      string(),
      transform((value) => value.trim()),
      digits('Expected a non-negative integer'),
      transform((value) => Number.parseInt(value, 10))
    ),
  },
} as const satisfies Record<string, Converter<unknown>>;

/**
 * Run a converter against a raw text value.
 *
 * @example
 * ```typescript
 * convert(converters.boolean, 'true'); // { success: true, value: true }
 * convert(converters.boolean, 'TRUE'); // { success: false, message: 'Expected "true" or "false"' }
 * convert(converters.stringList, 'a, b,,c'); // { success: true, value: ['a', 'b', 'c'] }
 * ```
 */
export function convert<TValue>(
  converter: Converter<TValue>,
  rawValue: string
): ConversionResult<TValue> {
  const result = safeParse(converter.schema, rawValue);
  if (result.success) {
    return { success: true, value: result.output };
  }
  return { success: false, message: result.issues[0].message };
}

