import type { Patient, RiskAssessment } from "../../../src/fhir";

export function makePatient(id: string, given: string, family?: string, overrides: Partial<Patient> = {}): Patient {
  return {
    resourceType: "Patient",
    id,
    active: true,
    name: [{ given: [given], ...(family ? { family } : {}) }],
    ...overrides,
  };
}

export function makeRiskAssessment(
  id: string,
  patientId: string,
  occurrenceDateTime: string | undefined,
  riskCode?: string,
): RiskAssessment {
  return {
    resourceType: "RiskAssessment",
    id,
    status: "final",
    subject: { reference: `Patient/${patientId}` },
    ...(occurrenceDateTime ? { occurrenceDateTime } : {}),
    ...(riskCode
      ? {
          prediction: [
            {
              qualitativeRisk: {
                coding: [{ system: "http://terminology.hl7.org/CodeSystem/risk-probability", code: riskCode }],
              },
            },
          ],
        }
      : {}),
  };
}
