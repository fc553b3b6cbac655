/**
 * Load test data into Aidbox
 * Creates 5 patients and up to two RiskAssessments for each
 *
 * Run: npm run load-test-data
 */

import { putResource } from "../src/aidbox";
import type { Patient, RiskAssessment } from "../src/fhir";

interface TestPatient {
  id: string;
  family: string;
  given: string[];
  gender: "male" | "female";
  birthDate: string;
  address: { line: string[]; city: string; state: string; postalCode: string };
  phone: string;
  /** Qualitative risk codes, oldest first */
  risks: string[];
}

const testPatients: TestPatient[] = [
  {
    id: "patient-1",
    family: "Smith",
    given: ["John", "Robert"],
    gender: "male",
    birthDate: "1985-03-15",
    address: { line: ["123 Main Street"], city: "Anytown", state: "CA", postalCode: "90210" },
    phone: "555-123-4567",
    risks: ["low", "moderate"],
  },
  {
    id: "patient-2",
    family: "Johnson",
    given: ["Emily", "Grace"],
    gender: "female",
    birthDate: "1990-07-22",
    address: { line: ["456 Oak Avenue"], city: "Springfield", state: "IL", postalCode: "62701" },
    phone: "555-234-5678",
    risks: ["high"],
  },
  {
    id: "patient-3",
    family: "Williams",
    given: ["Michael"],
    gender: "male",
    birthDate: "1978-11-08",
    address: { line: ["789 Pine Road"], city: "Austin", state: "TX", postalCode: "78701" },
    phone: "555-345-6789",
    risks: [],
  },
  {
    id: "patient-4",
    family: "Brown",
    given: ["Sarah", "Anne"],
    gender: "female",
    birthDate: "1995-01-30",
    address: { line: ["321 Elm Street"], city: "Seattle", state: "WA", postalCode: "98101" },
    phone: "555-456-7890",
    risks: ["moderate", "low"],
  },
  {
    id: "patient-5",
    family: "Davis",
    given: ["James", "William"],
    gender: "male",
    birthDate: "1962-09-12",
    address: { line: ["654 Maple Drive"], city: "Denver", state: "CO", postalCode: "80201" },
    phone: "555-567-8901",
    risks: ["high", "high"],
  },
];

const RISK_PROBABILITY_SYSTEM = "http://terminology.hl7.org/CodeSystem/risk-probability";

function formatDateTime(daysAgo: number, hour: number = 9): string {
  const date = new Date();
  date.setDate(date.getDate() - daysAgo);
  date.setHours(hour, 0, 0, 0);
  return date.toISOString();
}

async function loadTestData() {
  console.log("Loading test data into Aidbox...\n");

  let assessmentCount = 0;

  for (const p of testPatients) {
    await putResource<Patient>("Patient", p.id, {
      resourceType: "Patient",
      id: p.id,
      active: true,
      name: [{ family: p.family, given: p.given }],
      gender: p.gender,
      birthDate: p.birthDate,
      address: [{ ...p.address, country: "USA" }],
      telecom: [{ system: "phone", value: p.phone, use: "home" }],
    });
    console.log(`\nCreated Patient: ${p.given[0]} ${p.family} (${p.id})`);

    // The last risk gets the most recent occurrence
    for (const [i, risk] of p.risks.entries()) {
      const assessmentId = `risk-${p.id}-${i + 1}`;
      const daysAgo = (p.risks.length - i) * 30;

      await putResource<RiskAssessment>("RiskAssessment", assessmentId, {
        resourceType: "RiskAssessment",
        id: assessmentId,
        status: "final",
        subject: { reference: `Patient/${p.id}` },
        occurrenceDateTime: formatDateTime(daysAgo),
        prediction: [
          {
            qualitativeRisk: {
              coding: [{ system: RISK_PROBABILITY_SYSTEM, code: risk, display: `${risk} likelihood` }],
            },
          },
        ],
      });
      assessmentCount++;
      console.log(`  Created RiskAssessment: ${assessmentId} (${risk}, ${daysAgo} days ago)`);
    }
  }

  console.log("\n✓ Test data loaded successfully!");
  console.log(`  - ${testPatients.length} Patients`);
  console.log(`  - ${assessmentCount} RiskAssessments`);
}

loadTestData().catch((err) => {
  console.error("Error loading test data:", err);
  process.exit(1);
});
