import type { ResourceEngine } from "../engine/resource-engine";
import { PatientListModel } from "./patient-list-model";
import { PatientListService } from "./patient-list-service";

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

const LIST_MODEL_KINDS = ["patient-list"] as const;

export type ListModelKind = (typeof LIST_MODEL_KINDS)[number];

function isListModelKind(kind: string): kind is ListModelKind {
  return LIST_MODEL_KINDS.some((k) => k === kind);
}

/**
 * Build a list model for a screen and start loading all patients; await
 * `model.ready` for the first page and count. Throws for kinds this package
 * does not provide.
 */
export function createListModel(kind: string, engine: ResourceEngine): PatientListModel {
  if (!isListModelKind(kind)) {
    throw new InvalidArgumentError(`Unknown list model: ${kind}`);
  }
  const model = new PatientListModel(new PatientListService(engine));
  model.load();
  return model;
}
