export { AidboxEngine } from "./engine/aidbox-engine";
export { InMemoryEngine } from "./engine/in-memory-engine";
export {
  UnsupportedSearchParamError,
  type QueryOptions,
  type ResourceEngine,
  type SearchResult,
} from "./engine/resource-engine";
export {
  contains,
  exact,
  toSearchParams,
  withoutPaging,
  InvalidSearchQueryError,
  type SearchQuery,
  type SortSpec,
  type StringFilter,
  type StringSearchParam,
} from "./search/search-query";
export { toLocalDate, toPatientItem, humanNameAsSingleString, type LocalDate, type PatientItem } from "./patient-list/patient-item";
export { toObservationItem, toConditionItem, type ObservationItem, type ConditionItem } from "./patient-list/clinical-items";
export {
  occurrenceTime,
  riskCodeOf,
  selectLatestBySubject,
  toRiskAssessmentItem,
  type RiskAssessmentItem,
} from "./patient-list/risk-assessments";
export {
  PAGE_SIZE,
  ALL_PATIENTS,
  PatientListService,
  patientFilters,
  type PatientSearchRequest,
} from "./patient-list/patient-list-service";
export { PatientListModel, type PatientListListener, type PatientListState } from "./patient-list/patient-list-model";
export { createListModel, InvalidArgumentError, type ListModelKind } from "./patient-list/model-factory";
export { HttpError, NotFoundError } from "./aidbox";
