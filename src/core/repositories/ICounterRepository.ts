/**
 * Durable counter store, keyed by category name
 */
export interface ICounterRepository {
  /**
   * Atomically increment the counter (creating it at 0 first if absent)
   * and return the new value. Must be one server-side operation.
   */
  increment(name: string): Promise<number>;

  /**
   * Health check - verify the store is reachable
   */
  healthCheck(): Promise<boolean>;
}
