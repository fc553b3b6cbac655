/**
 * FHIR R4 resource types used by the patient list.
 *
 * Backed by the `fhir4` namespace from @types/fhir.
 */

export type Patient = fhir4.Patient;
export type HumanName = fhir4.HumanName;
export type RiskAssessment = fhir4.RiskAssessment;
export type Observation = fhir4.Observation;
export type Condition = fhir4.Condition;
export type CodeableConcept = fhir4.CodeableConcept;

export interface ResourceTypeMap {
  Patient: Patient;
  RiskAssessment: RiskAssessment;
  Observation: Observation;
  Condition: Condition;
}

export type ResourceTypeName = keyof ResourceTypeMap;

export type AnyResource = ResourceTypeMap[ResourceTypeName];
