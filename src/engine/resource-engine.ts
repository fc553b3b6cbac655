import type { ResourceTypeMap, ResourceTypeName } from "../fhir";
import type { SearchQuery } from "../search/search-query";

export interface SearchResult<T> {
  resource: T;
}

export interface QueryOptions {
  signal?: AbortSignal;
}

/**
 * Query contract of a FHIR resource engine.
 *
 * Implementations propagate their own failures (HTTP, aborted signal, bad query)
 * unchanged; callers get no partial results.
 */
export interface ResourceEngine {
  search<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options?: QueryOptions,
  ): Promise<Array<SearchResult<ResourceTypeMap[K]>>>;

  /** Number of resources matching query.filters. Sort and paging are ignored. */
  count<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options?: QueryOptions,
  ): Promise<number>;
}

export class UnsupportedSearchParamError extends Error {
  constructor(resourceType: string, param: string) {
    super(`${resourceType} does not support search parameter "${param}"`);
    this.name = "UnsupportedSearchParamError";
  }
}
