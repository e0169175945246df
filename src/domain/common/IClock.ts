/**
 * Source of the current time. Injected so age and liveness checks are deterministic in tests.
 */
export interface IClock {
  now(): Date;
}
