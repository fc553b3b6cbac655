/**
 * In-process ResourceEngine.
 *
 * Evaluates SearchQuery values over resources held in memory, following the
 * FHIR string search rules the patient list relies on:
 *   - name   → text, family, given, prefix and suffix of every HumanName
 *   - given  → given parts only
 *   - family → family only
 *   - :contains is a case-insensitive substring match, :exact is strict equality
 */

import type {
  AnyResource,
  HumanName,
  Patient,
  ResourceTypeMap,
  ResourceTypeName,
} from "../fhir";
import {
  validateSearchQuery,
  type SearchQuery,
  type SortSpec,
  type StringFilter,
  type StringSearchParam,
} from "../search/search-query";
import {
  UnsupportedSearchParamError,
  type QueryOptions,
  type ResourceEngine,
  type SearchResult,
} from "./resource-engine";

type ResourceStore = {
  [K in ResourceTypeName]: Map<string, ResourceTypeMap[K]>;
};

function namePartValues(name: HumanName, param: StringSearchParam): string[] {
  switch (param) {
    case "given":
      return name.given ?? [];
    case "family":
      return name.family ? [name.family] : [];
    case "name":
      return [
        ...(name.text ? [name.text] : []),
        ...(name.family ? [name.family] : []),
        ...(name.given ?? []),
        ...(name.prefix ?? []),
        ...(name.suffix ?? []),
      ];
  }
}

function stringParamValues(resource: AnyResource, param: StringSearchParam): string[] {
  if (resource.resourceType !== "Patient") {
    throw new UnsupportedSearchParamError(resource.resourceType, param);
  }
  return (resource.name ?? []).flatMap((name) => namePartValues(name, param));
}

/** String search params are only defined on Patient names. */
function assertSearchable(resourceType: ResourceTypeName, query: SearchQuery): void {
  if (resourceType === "Patient") return;
  const param = query.filters[0]?.param ?? query.sort?.param;
  if (param) {
    throw new UnsupportedSearchParamError(resourceType, param);
  }
}

function matchesFilter(resource: AnyResource, filter: StringFilter): boolean {
  const values = stringParamValues(resource, filter.param);
  if (filter.modifier === "exact") {
    return values.some((v) => v === filter.value);
  }
  const needle = filter.value.toLowerCase();
  return values.some((v) => v.toLowerCase().includes(needle));
}

function sortKey(patient: Patient, param: StringSearchParam): string | undefined {
  const firstName = patient.name?.[0];
  if (!firstName) return undefined;
  return namePartValues(firstName, param)[0];
}

function compareByKey(a: AnyResource, b: AnyResource, sort: SortSpec): number {
  if (a.resourceType !== "Patient" || b.resourceType !== "Patient") {
    throw new UnsupportedSearchParamError(a.resourceType, sort.param);
  }
  const keyA = sortKey(a, sort.param);
  const keyB = sortKey(b, sort.param);

  let result: number;
  if (keyA === keyB) result = 0;
  else if (keyA === undefined) result = -1;
  else if (keyB === undefined) result = 1;
  else result = keyA < keyB ? -1 : 1;

  return sort.order === "desc" ? -result : result;
}

export class InMemoryEngine implements ResourceEngine {
  private readonly store: ResourceStore = {
    Patient: new Map(),
    RiskAssessment: new Map(),
    Observation: new Map(),
    Condition: new Map(),
  };
  private nextId = 1;

  /**
   * Store resources, replacing any with the same type and id.
   * Resources without an id are assigned a sequential one.
   */
  save(...resources: AnyResource[]): void {
    for (const resource of resources) {
      const id = resource.id ?? String(this.nextId++);
      switch (resource.resourceType) {
        case "Patient":
          this.store.Patient.set(id, { ...resource, id });
          break;
        case "RiskAssessment":
          this.store.RiskAssessment.set(id, { ...resource, id });
          break;
        case "Observation":
          this.store.Observation.set(id, { ...resource, id });
          break;
        case "Condition":
          this.store.Condition.set(id, { ...resource, id });
          break;
      }
    }
  }

  clear(): void {
    for (const map of Object.values(this.store)) {
      map.clear();
    }
  }

  async search<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options: QueryOptions = {},
  ): Promise<Array<SearchResult<ResourceTypeMap[K]>>> {
    options.signal?.throwIfAborted();
    validateSearchQuery(query);
    assertSearchable(resourceType, query);

    const matches = this.match(resourceType, query.filters);
    const { sort } = query;
    if (sort) {
      // Array.prototype.sort is stable: ties keep insertion order
      matches.sort((a, b) => compareByKey(a, b, sort));
    }

    const from = query.from ?? 0;
    const page = query.count === undefined ? matches.slice(from) : matches.slice(from, from + query.count);
    return page.map((resource) => ({ resource }));
  }

  async count<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options: QueryOptions = {},
  ): Promise<number> {
    options.signal?.throwIfAborted();
    assertSearchable(resourceType, query);
    return this.match(resourceType, query.filters).length;
  }

  private match<K extends ResourceTypeName>(
    resourceType: K,
    filters: StringFilter[],
  ): Array<ResourceTypeMap[K]> {
    const resources: Array<ResourceTypeMap[K]> = [...this.store[resourceType].values()];
    return resources.filter((resource) => filters.every((filter) => matchesFilter(resource, filter)));
  }
}
