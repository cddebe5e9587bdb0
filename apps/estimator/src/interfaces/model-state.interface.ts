/**
 * Persisted residual sigma for a location.
 */
export interface SigmaRecord {
  sigma: number;

  /** ISO 8601 timestamp of the calibration run that produced it */
  lastUpdated: string;
}

/**
 * Per-location rolling model state: the smoothed base written by every
 * estimate and the sigma written by calibration.
 *
 * Implementations provide last-write-wins semantics per key. Callers that
 * need read-modify-write atomicity for the base must coordinate outside
 * the store.
 */
export interface ModelStateStore {
  getBase(location: string): Promise<number | null>;
  setBase(location: string, base: number): Promise<void>;
  getSigma(location: string): Promise<SigmaRecord | null>;
  setSigma(location: string, record: SigmaRecord): Promise<void>;
}

/** Injection token for the active {@link ModelStateStore} */
export const MODEL_STATE_STORE = Symbol('MODEL_STATE_STORE');

export const baseKey = (location: string): string => `base:${location}`;
export const sigmaKey = (location: string): string => `sigma:${location}`;
