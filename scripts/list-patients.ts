/**
 * List patients from Aidbox with their latest risk
 *
 * Run:
 *   npm run list-patients -- --name an
 *   npm run list-patients -- --given emi --family john
 */

import { parseArgs } from "node:util";
import { AidboxEngine } from "../src/engine/aidbox-engine";
import { createListModel } from "../src/patient-list/model-factory";
import type { PatientItem } from "../src/patient-list/patient-item";

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    name: { type: "string" },
    given: { type: "string" },
    family: { type: "string" },
  },
});

function formatRow(patient: PatientItem): string {
  return [
    patient.id.padStart(3),
    patient.name.padEnd(28),
    patient.gender.padEnd(8),
    (patient.dob ?? "").padEnd(10),
    patient.city.padEnd(14),
    patient.isActive ? "active  " : "inactive",
    patient.risk || "-",
  ].join("  ");
}

async function listPatients() {
  const model = createListModel("patient-list", new AidboxEngine());

  if (values.given !== undefined || values.family !== undefined) {
    if (values.name !== undefined) {
      console.log("Ignoring --name: --given/--family take precedence");
    }
    // The second setter supersedes the first refresh; only the combined request publishes
    await Promise.all([
      model.setPatientGivenName(values.given ?? ""),
      model.setPatientFamilyName(values.family ?? ""),
    ]);
  } else {
    await model.searchPatientsByName(values.name ?? "");
  }

  const { patients, patientCount } = model.getState();
  for (const patient of patients) {
    console.log(formatRow(patient));
  }
  console.log(`\nShowing ${patients.length} of ${patientCount} patients`);
  model.dispose();
}

listPatients().catch((err) => {
  console.error("Error listing patients:", err);
  process.exit(1);
});
