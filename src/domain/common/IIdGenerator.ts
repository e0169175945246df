/**
 * Interface for generating unique IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with the given prefix.
   * @example
   * generate('notif') => 'notif_1706884823456_a1b2c3d4e'
   */
  generate(prefix: string): string;
}
