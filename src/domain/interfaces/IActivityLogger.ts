/**
 * Activity Logger Interface
 * Layer: Domain
 *
 * Records one human-readable, timestamped line per catalog access. Kept apart
 * from the framework logger so tests can swap in a recording mock and assert
 * on exactly which accesses were logged.
 */
export interface IActivityLogger {
  log(message: string): void;
}
