/**
 * Patient List Service
 *
 * Lists patients matching a name filter and enriches each with the risk code
 * of its most recent RiskAssessment.
 *
 * Flow per search:
 *   1. Patient search: filters, sorted by given name, first page only
 *   2. RiskAssessment search: everything, reduced to the latest per subject
 *   3. Join on "Patient/<resourceId>"
 */

import type { QueryOptions, ResourceEngine } from "../engine/resource-engine";
import { contains, type SearchQuery, type StringFilter } from "../search/search-query";
import { toPatientItem, type PatientItem } from "./patient-item";
import { riskCodeOf, selectLatestBySubject, toRiskAssessmentItem } from "./risk-assessments";

export const PAGE_SIZE = 100;

// ============================================================================
// Request
// ============================================================================

/**
 * Free-text search over the combined name, or independent given/family filters.
 * Empty or absent values match everything.
 */
export type PatientSearchRequest =
  | { kind: "name"; query?: string }
  | { kind: "given-family"; givenName?: string; familyName?: string };

export const ALL_PATIENTS: PatientSearchRequest = { kind: "name" };

export function patientFilters(request: PatientSearchRequest): StringFilter[] {
  if (request.kind === "name") {
    return request.query ? [contains("name", request.query)] : [];
  }

  const filters: StringFilter[] = [];
  if (request.givenName) filters.push(contains("given", request.givenName));
  if (request.familyName) filters.push(contains("family", request.familyName));
  return filters;
}

export function patientPageQuery(request: PatientSearchRequest): SearchQuery {
  return {
    filters: patientFilters(request),
    sort: { param: "given", order: "asc" },
    count: PAGE_SIZE,
    from: 0,
  };
}

// ============================================================================
// Service
// ============================================================================

export class PatientListService {
  constructor(private readonly engine: ResourceEngine) {}

  async search(request: PatientSearchRequest, options: QueryOptions = {}): Promise<PatientItem[]> {
    const results = await this.engine.search("Patient", patientPageQuery(request), options);
    const patients = results.map((result, index) => toPatientItem(result.resource, index + 1));

    const risks = await this.getLatestRiskAssessments(options);
    for (const patient of patients) {
      const assessment = risks.get(`Patient/${patient.resourceId}`);
      if (!assessment) continue;

      patient.risk = riskCodeOf(assessment) ?? patient.risk;
      patient.riskItem = toRiskAssessmentItem(assessment);
    }

    return patients;
  }

  /**
   * Count of all patients matching the request, unlike search which only
   * returns the first page.
   */
  async count(request: PatientSearchRequest, options: QueryOptions = {}): Promise<number> {
    return this.engine.count("Patient", { filters: patientFilters(request) }, options);
  }

  private async getLatestRiskAssessments(options: QueryOptions) {
    const results = await this.engine.search("RiskAssessment", { filters: [] }, options);
    return selectLatestBySubject(results.map((r) => r.resource));
  }
}
