import { aidboxFetch, toAidboxPath, type Bundle } from "../aidbox";
import type { ResourceTypeMap, ResourceTypeName } from "../fhir";
import { toSearchParams, validateSearchQuery, withoutPaging, type SearchQuery } from "../search/search-query";
import type { QueryOptions, ResourceEngine, SearchResult } from "./resource-engine";

/** Page size used when a search asks for every match. */
export const FETCH_ALL_PAGE_SIZE = 100;

/**
 * ResourceEngine backed by the Aidbox FHIR REST API.
 */
export class AidboxEngine implements ResourceEngine {
  async search<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options: QueryOptions = {},
  ): Promise<Array<SearchResult<ResourceTypeMap[K]>>> {
    validateSearchQuery(query);

    if (query.count !== undefined) {
      const bundle = await aidboxFetch<Bundle<ResourceTypeMap[K]>>(
        `/fhir/${resourceType}?${toSearchParams(query)}`,
        { signal: options.signal },
      );
      return bundle.entry ?? [];
    }

    // No page size requested: walk the next links until the server runs out
    const results: Array<SearchResult<ResourceTypeMap[K]>> = [];
    let path: string | undefined =
      `/fhir/${resourceType}?${toSearchParams({ ...query, count: FETCH_ALL_PAGE_SIZE, from: 0 })}`;

    while (path) {
      const bundle: Bundle<ResourceTypeMap[K]> = await aidboxFetch<Bundle<ResourceTypeMap[K]>>(path, {
        signal: options.signal,
      });
      results.push(...(bundle.entry ?? []));

      const next = bundle.link?.find((l) => l.relation === "next");
      path = next && bundle.entry?.length ? toAidboxPath(next.url) : undefined;
    }

    return results;
  }

  async count<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options: QueryOptions = {},
  ): Promise<number> {
    const params = toSearchParams(withoutPaging(query));
    params.set("_count", "0");
    params.set("_total", "accurate");

    const bundle = await aidboxFetch<Bundle<ResourceTypeMap[K]>>(
      `/fhir/${resourceType}?${params}`,
      { signal: options.signal },
    );
    return bundle.total ?? 0;
  }
}
