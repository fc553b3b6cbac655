/**
 * Tests for PatientListModel
 *
 * Covers:
 * - publishing patients, then the count, to subscribers
 * - given/family setters building one combined request
 * - superseded refreshes never publishing
 * - failures rejecting the refresh
 * - createListModel factory and its initial load
 */
import { describe, test, expect, vi, beforeEach } from "vitest";
import type { ResourceTypeMap, ResourceTypeName } from "../../../src/fhir";
import { InMemoryEngine } from "../../../src/engine/in-memory-engine";
import type { QueryOptions, ResourceEngine, SearchResult } from "../../../src/engine/resource-engine";
import type { SearchQuery } from "../../../src/search/search-query";
import { PatientListModel, type PatientListState } from "../../../src/patient-list/patient-list-model";
import { PatientListService } from "../../../src/patient-list/patient-list-service";
import { createListModel, InvalidArgumentError } from "../../../src/patient-list/model-factory";
import { makePatient, makeRiskAssessment } from "./helpers";

/**
 * InMemoryEngine that can hold the next Patient search until released.
 */
class GatedEngine implements ResourceEngine {
  readonly inner = new InMemoryEngine();
  private gate: Promise<void> | undefined;

  hold(): () => void {
    let release: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => release();
  }

  async search<K extends ResourceTypeName>(
    resourceType: K,
    query: SearchQuery,
    options?: QueryOptions,
  ): Promise<Array<SearchResult<ResourceTypeMap[K]>>> {
    const gate = resourceType === "Patient" ? this.gate : undefined;
    if (gate) {
      this.gate = undefined;
      await gate;
    }
    return this.inner.search(resourceType, query, options);
  }

  count<K extends ResourceTypeName>(resourceType: K, query: SearchQuery, options?: QueryOptions): Promise<number> {
    return this.inner.count(resourceType, query, options);
  }
}

describe("PatientListModel", () => {
  let engine: GatedEngine;
  let model: PatientListModel;
  let published: PatientListState[];

  beforeEach(() => {
    engine = new GatedEngine();
    engine.inner.save(
      makePatient("1", "Anna", "Smith"),
      makePatient("2", "Ben", "Jones"),
      makePatient("3", "Emily", "Johnson"),
      makeRiskAssessment("ra1", "2", "2024-01-01T00:00:00Z", "high"),
    );
    model = new PatientListModel(new PatientListService(engine));
    published = [];
    model.subscribe((state) => published.push(state));
  });

  test("starts empty with an all-patients request", () => {
    expect(model.getState()).toEqual({ request: { kind: "name" }, patients: [], patientCount: 0 });
  });

  test("publishes the patients first, then the count", async () => {
    await model.searchPatientsByName("n");

    expect(published).toHaveLength(2);
    expect(published[0]?.patients.map((p) => p.name)).toEqual(["Anna Smith", "Ben Jones", "Emily Johnson"]);
    expect(published[0]?.patientCount).toBe(0);
    expect(published[1]?.patientCount).toBe(3);
    expect(model.getState().patients[1]?.risk).toBe("high");
  });

  test("refresh re-runs the current request", async () => {
    await model.searchPatientsByName("ben");
    engine.inner.save(makePatient("4", "Benedict", "Cole"));

    await model.refresh();

    expect(model.getState().patients.map((p) => p.resourceId)).toEqual(["2", "4"]);
    expect(model.getState().patientCount).toBe(2);
  });

  test("given and family setters combine into one request", async () => {
    await model.setPatientGivenName("em");
    expect(model.getState().request).toEqual({ kind: "given-family", givenName: "em", familyName: undefined });
    expect(model.getState().patientCount).toBe(1);

    await model.setPatientFamilyName("smith");
    expect(model.getState().request).toEqual({ kind: "given-family", givenName: "em", familyName: "smith" });
    expect(model.getState().patients).toEqual([]);
    expect(model.getState().patientCount).toBe(0);

    await model.setPatientGivenName("");
    expect(model.getState().request).toEqual({ kind: "given-family", givenName: "", familyName: "smith" });
    expect(model.getState().patients.map((p) => p.resourceId)).toEqual(["1"]);
  });

  test("a name search clears given/family filters", async () => {
    await model.setPatientFamilyName("jones");
    await model.searchPatientsByName("");

    expect(model.getState().request).toEqual({ kind: "name", query: "" });
    expect(model.getState().patientCount).toBe(3);

    await model.setPatientGivenName("anna");
    expect(model.getState().request).toEqual({ kind: "given-family", givenName: "anna", familyName: undefined });
  });

  test("a superseded refresh never publishes", async () => {
    const release = engine.hold();
    const slow = model.searchPatientsByName("anna");
    const fast = model.searchPatientsByName("ben");

    await fast;
    release();
    await slow;

    expect(model.getState().patients.map((p) => p.resourceId)).toEqual(["2"]);
    expect(published.flatMap((s) => s.patients.map((p) => p.resourceId))).not.toContain("1");
    expect(published).toHaveLength(2);
  });

  test("rejects when the engine fails", async () => {
    const failure = new Error("engine unavailable");
    const failing: ResourceEngine = { search: vi.fn().mockRejectedValue(failure), count: vi.fn() };
    const failingModel = new PatientListModel(new PatientListService(failing));
    const listener = vi.fn();
    failingModel.subscribe(listener);

    await expect(failingModel.searchPatientsByName("an")).rejects.toBe(failure);
    expect(listener).not.toHaveBeenCalled();
  });

  test("unsubscribe stops notifications", async () => {
    const listener = vi.fn();
    const unsubscribe = model.subscribe(listener);

    await model.refresh();
    expect(listener).toHaveBeenCalledTimes(2);

    unsubscribe();
    await model.refresh();
    expect(listener).toHaveBeenCalledTimes(2);
  });

  test("dispose aborts the in-flight refresh and drops listeners", async () => {
    const release = engine.hold();
    const pending = model.refresh();

    model.dispose();
    release();
    await pending;

    expect(published).toEqual([]);
    expect(model.getState().patients).toEqual([]);
  });
});

describe("createListModel", () => {
  test("builds a patient list model", () => {
    expect(createListModel("patient-list", new InMemoryEngine())).toBeInstanceOf(PatientListModel);
  });

  test("loads all patients and their count without an explicit refresh", async () => {
    const engine = new InMemoryEngine();
    engine.save(
      makePatient("1", "Emily", "Johnson"),
      makePatient("2", "Anna", "Smith"),
      makeRiskAssessment("ra1", "1", "2024-01-01T00:00:00Z", "low"),
    );

    const model = createListModel("patient-list", engine);
    await model.ready;

    expect(model.getState().request).toEqual({ kind: "name" });
    expect(model.getState().patients.map((p) => p.resourceId)).toEqual(["2", "1"]);
    expect(model.getState().patients[1]?.risk).toBe("low");
    expect(model.getState().patientCount).toBe(2);
    expect(model.getState().error).toBeUndefined();
  });

  test("publishes a failed initial load as state.error", async () => {
    const failure = new Error("engine unavailable");
    const failing: ResourceEngine = { search: vi.fn().mockRejectedValue(failure), count: vi.fn() };

    const model = createListModel("patient-list", failing);
    await expect(model.ready).resolves.toBeUndefined();

    expect(model.getState().error).toBe(failure);
    expect(model.getState().patients).toEqual([]);
  });

  test("fails fast on an unknown kind", () => {
    expect(() => createListModel("observation-list", new InMemoryEngine())).toThrow(InvalidArgumentError);
    expect(() => createListModel("observation-list", new InMemoryEngine())).toThrow(
      "Unknown list model: observation-list",
    );
  });
});
