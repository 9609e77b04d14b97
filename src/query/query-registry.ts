import type { AnyQueryType } from './types.js';

/**
 * Registry of query types, keyed by name.
 */
export class QueryTypeRegistry {
  private readonly queryTypes = new Map<string, AnyQueryType>();

  constructor(initialQueryTypes: AnyQueryType[] = []) {
    for (const queryType of initialQueryTypes) {
      this.register(queryType);
    }
  }

  /**
   * Register a query type. Throws if the name or path is already taken.
   */
  register(queryType: AnyQueryType): this {
    if (this.queryTypes.has(queryType.name)) {
      throw new Error(`Query type "${queryType.name}" is already registered`);
    }
    const clash = this.list().find((existing) => existing.path === queryType.path);
    if (clash) {
      throw new Error(
        `Query type "${queryType.name}" uses path "${queryType.path}" already taken by "${clash.name}"`
      );
    }
    this.queryTypes.set(queryType.name, queryType);
    return this;
  }

  list(): AnyQueryType[] {
    return [...this.queryTypes.values()];
  }
}

/**
 * Convenience helper to build a registry from an array.
 */
export function createQueryTypeRegistry(queryTypes: AnyQueryType[] = []): QueryTypeRegistry {
  return new QueryTypeRegistry(queryTypes);
}
