import type { CodeableConcept, Condition, Observation } from "../fhir";

/** The Observation's details for display purposes. */
export interface ObservationItem {
  id: string;
  code: string;
  effective: string;
  value: string;
}

/** The Condition's details for display purposes. */
export interface ConditionItem {
  id: string;
  code: string;
  effective: string;
  value: string;
}

function conceptText(concept: CodeableConcept | undefined): string {
  return concept?.text ?? concept?.coding?.[0]?.display ?? concept?.coding?.[0]?.code ?? "";
}

function observationValue(observation: Observation): string {
  const quantity = observation.valueQuantity;
  if (quantity?.value !== undefined) {
    return quantity.unit ? `${quantity.value} ${quantity.unit}` : String(quantity.value);
  }
  if (observation.valueString !== undefined) return observation.valueString;
  if (observation.valueCodeableConcept) return conceptText(observation.valueCodeableConcept);
  if (observation.valueBoolean !== undefined) return String(observation.valueBoolean);
  if (observation.valueInteger !== undefined) return String(observation.valueInteger);
  return "";
}

export function toObservationItem(observation: Observation): ObservationItem {
  return {
    id: observation.id ?? "",
    code: conceptText(observation.code),
    effective: observation.effectiveDateTime ?? observation.effectivePeriod?.start ?? observation.effectiveInstant ?? "",
    value: observationValue(observation),
  };
}

/**
 * `value` carries the clinical status code (active, resolved, ...).
 */
export function toConditionItem(condition: Condition): ConditionItem {
  return {
    id: condition.id ?? "",
    code: conceptText(condition.code),
    effective: condition.onsetDateTime ?? condition.recordedDate ?? "",
    value: condition.clinicalStatus?.coding?.[0]?.code ?? "",
  };
}
