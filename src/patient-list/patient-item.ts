import type { HumanName, Patient } from "../fhir";
import type { RiskAssessmentItem } from "./risk-assessments";

/** Calendar date, YYYY-MM-DD. */
export type LocalDate = string;

/**
 * The Patient's details for display purposes.
 *
 * `id` is the 1-based position within the current result page and is
 * recomputed on every query; `resourceId` is the stable FHIR id.
 */
export interface PatientItem {
  id: string;
  resourceId: string;
  name: string;
  gender: string;
  dob?: LocalDate;
  phone: string;
  city: string;
  country: string;
  isActive: boolean;
  html: string;
  risk: string;
  riskItem?: RiskAssessmentItem;
}

const FHIR_DATE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

/**
 * Convert a FHIR `date` to a calendar date. Partial dates take the first
 * month/day ("1985" → "1985-01-01"). Returns undefined for anything else.
 *
 * A FHIR date carries no time or zone, so no time zone is involved.
 */
export function toLocalDate(value: string | undefined): LocalDate | undefined {
  if (!value) return undefined;
  const match = FHIR_DATE.exec(value);
  if (!match) return undefined;

  const [, year, month = "01", day = "01"] = match;
  const monthNum = Number(month);
  const dayNum = Number(day);
  if (monthNum < 1 || monthNum > 12 || dayNum < 1) return undefined;

  const daysInMonth = new Date(Date.UTC(Number(year), monthNum, 0)).getUTCDate();
  if (dayNum > daysInMonth) return undefined;

  return `${year}-${month}-${day}`;
}

/**
 * Render a HumanName as one string: the text if present, otherwise
 * prefix, given, family and suffix joined with spaces.
 */
export function humanNameAsSingleString(name: HumanName): string {
  if (name.text) return name.text;
  return [...(name.prefix ?? []), ...(name.given ?? []), ...(name.family ? [name.family] : []), ...(name.suffix ?? [])]
    .filter((part) => part.length > 0)
    .join(" ");
}

export function toPatientItem(patient: Patient, position: number): PatientItem {
  // Show nothing if no values available for optional fields
  const firstName = patient.name?.[0];
  const address = patient.address?.[0];

  return {
    id: String(position),
    resourceId: patient.id ?? "",
    name: firstName ? humanNameAsSingleString(firstName) : "",
    gender: patient.gender ?? "",
    dob: toLocalDate(patient.birthDate),
    phone: patient.telecom?.[0]?.value ?? "",
    city: address?.city ?? "",
    country: address?.country ?? "",
    isActive: patient.active ?? false,
    html: patient.text?.div ?? "",
    risk: "",
  };
}
