/**
 * Search Query Values
 *
 * Explicit, serializable description of a FHIR search: string filters,
 * sort and paging. Engines either evaluate it directly (InMemoryEngine)
 * or turn it into REST search parameters via toSearchParams (AidboxEngine).
 */

// ============================================================================
// Types
// ============================================================================

export type StringSearchParam = "name" | "given" | "family";

export type StringModifier = "contains" | "exact";

export type SortOrder = "asc" | "desc";

export interface StringFilter {
  param: StringSearchParam;
  modifier: StringModifier;
  value: string;
}

export interface SortSpec {
  param: StringSearchParam;
  order: SortOrder;
}

export interface SearchQuery {
  filters: StringFilter[];
  sort?: SortSpec;
  /** Page size. When absent the engine returns every match. */
  count?: number;
  /** Zero-based offset of the first result. Must be a multiple of count. */
  from?: number;
}

export class InvalidSearchQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSearchQueryError";
  }
}

// ============================================================================
// Builders
// ============================================================================

export function contains(param: StringSearchParam, value: string): StringFilter {
  return { param, modifier: "contains", value };
}

export function exact(param: StringSearchParam, value: string): StringFilter {
  return { param, modifier: "exact", value };
}

/**
 * Same filters, no sort or paging. Used for counting.
 */
export function withoutPaging(query: SearchQuery): SearchQuery {
  return { filters: query.filters };
}

export function validateSearchQuery(query: SearchQuery): void {
  const { count, from } = query;

  if (count !== undefined && (!Number.isInteger(count) || count < 0)) {
    throw new InvalidSearchQueryError(`count must be a non-negative integer, got ${count}`);
  }
  if (from === undefined || from === 0) return;
  if (!Number.isInteger(from) || from < 0) {
    throw new InvalidSearchQueryError(`from must be a non-negative integer, got ${from}`);
  }
  if (!count) {
    throw new InvalidSearchQueryError("from requires a positive count");
  }
  if (from % count !== 0) {
    throw new InvalidSearchQueryError(`from (${from}) must be a multiple of count (${count})`);
  }
}

/**
 * Build FHIR REST search parameters.
 *
 * { filters: [contains("name", "an")], sort: { param: "given", order: "asc" }, count: 100 }
 *   → name:contains=an & _sort=given & _count=100 & _page=1
 */
export function toSearchParams(query: SearchQuery): URLSearchParams {
  validateSearchQuery(query);

  const params = new URLSearchParams();
  for (const filter of query.filters) {
    params.append(`${filter.param}:${filter.modifier}`, filter.value);
  }
  if (query.sort) {
    const prefix = query.sort.order === "desc" ? "-" : "";
    params.set("_sort", `${prefix}${query.sort.param}`);
  }
  if (query.count !== undefined) {
    params.set("_count", String(query.count));
    if (query.count > 0) {
      params.set("_page", String((query.from ?? 0) / query.count + 1));
    }
  }
  return params;
}
