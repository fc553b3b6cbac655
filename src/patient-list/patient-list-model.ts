/**
 * Patient List Model
 *
 * Session state behind a patient list screen: the current search request,
 * the enriched page of patients and the total match count. Observers are
 * notified after each published change.
 *
 * Each refresh aborts the one still in flight, so a slow, superseded query
 * never overwrites the result of a newer one.
 */

import type { PatientItem } from "./patient-item";
import { ALL_PATIENTS, type PatientListService, type PatientSearchRequest } from "./patient-list-service";

export interface PatientListState {
  request: PatientSearchRequest;
  patients: PatientItem[];
  patientCount: number;
  /** Failure of the initial load, which has no caller to reject to. */
  error?: unknown;
}

export type PatientListListener = (state: PatientListState) => void;

export class PatientListModel {
  private state: PatientListState = { request: ALL_PATIENTS, patients: [], patientCount: 0 };
  private readonly listeners = new Set<PatientListListener>();
  private inFlight: AbortController | undefined;
  private initialLoad: Promise<void> = Promise.resolve();

  constructor(private readonly service: PatientListService) {}

  /** Settles once the load started by load() has published or failed. */
  get ready(): Promise<void> {
    return this.initialLoad;
  }

  /**
   * Start listing all patients. A failure is published as state.error;
   * ready never rejects.
   */
  load(): void {
    this.initialLoad = this.refresh().catch((error: unknown) => {
      this.publish({ error });
    });
  }

  getState(): PatientListState {
    return this.state;
  }

  subscribe(listener: PatientListListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  searchPatientsByName(query: string): Promise<void> {
    return this.setRequest({ kind: "name", query });
  }

  setPatientGivenName(givenName: string): Promise<void> {
    const familyName = this.state.request.kind === "given-family" ? this.state.request.familyName : undefined;
    return this.setRequest({ kind: "given-family", givenName, familyName });
  }

  setPatientFamilyName(familyName: string): Promise<void> {
    const givenName = this.state.request.kind === "given-family" ? this.state.request.givenName : undefined;
    return this.setRequest({ kind: "given-family", givenName, familyName });
  }

  /**
   * Re-run search and count for the current request.
   *
   * Resolves without publishing when a newer refresh supersedes this one.
   * Engine failures reject the returned promise.
   */
  async refresh(): Promise<void> {
    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;
    const { signal } = controller;
    const { request } = this.state;

    try {
      const patients = await this.service.search(request, { signal });
      if (signal.aborted) return;
      this.publish({ patients, error: undefined });

      const patientCount = await this.service.count(request, { signal });
      if (signal.aborted) return;
      this.publish({ patientCount });
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = undefined;
      }
    }
  }

  dispose(): void {
    this.inFlight?.abort();
    this.inFlight = undefined;
    this.listeners.clear();
  }

  private setRequest(request: PatientSearchRequest): Promise<void> {
    this.state = { ...this.state, request };
    return this.refresh();
  }

  private publish(change: Partial<Omit<PatientListState, "request">>): void {
    this.state = { ...this.state, ...change };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
