/**
 * Risk Assessment Selection
 *
 * Reduces a flat list of RiskAssessments to the most recent one per subject.
 */

import type { RiskAssessment } from "../fhir";

/** Display projection of the assessment chosen for a patient. */
export interface RiskAssessmentItem {
  assessmentId: string;
  subject: string;
  riskCode: string;
  occurrence: string;
}

/**
 * Epoch millis of occurrenceDateTime, falling back to occurrencePeriod.start.
 * Undefined when neither is present or the value does not parse.
 */
export function occurrenceTime(assessment: RiskAssessment): number | undefined {
  const value = assessment.occurrenceDateTime ?? assessment.occurrencePeriod?.start;
  if (!value) return undefined;
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : time;
}

function isNewer(candidate: RiskAssessment, candidateTime: number, current: RiskAssessment, currentTime: number): boolean {
  if (candidateTime !== currentTime) return candidateTime > currentTime;
  // Same instant: the smallest id wins so the choice does not depend on engine order
  return (candidate.id ?? "") < (current.id ?? "");
}

/**
 * Latest assessment per subject reference ("Patient/<id>").
 *
 * Assessments without a resolvable occurrence are never chosen; a subject
 * whose assessments all lack one is absent from the result.
 */
export function selectLatestBySubject(assessments: RiskAssessment[]): Map<string, RiskAssessment> {
  const latest = new Map<string, { assessment: RiskAssessment; time: number }>();

  for (const assessment of assessments) {
    const subject = assessment.subject.reference;
    const time = occurrenceTime(assessment);
    if (!subject || time === undefined) continue;

    const current = latest.get(subject);
    if (!current || isNewer(assessment, time, current.assessment, current.time)) {
      latest.set(subject, { assessment, time });
    }
  }

  return new Map([...latest].map(([subject, { assessment }]) => [subject, assessment]));
}

/**
 * Code of the first qualitative risk coding of the first prediction.
 */
export function riskCodeOf(assessment: RiskAssessment): string | undefined {
  return assessment.prediction?.[0]?.qualitativeRisk?.coding?.[0]?.code;
}

export function toRiskAssessmentItem(assessment: RiskAssessment): RiskAssessmentItem {
  return {
    assessmentId: assessment.id ?? "",
    subject: assessment.subject.reference ?? "",
    riskCode: riskCodeOf(assessment) ?? "",
    occurrence: assessment.occurrenceDateTime ?? assessment.occurrencePeriod?.start ?? "",
  };
}
