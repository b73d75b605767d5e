/**
 * Database Adapter Interface
 *
 * Rows come back as `unknown`; repositories validate them with zod before
 * use, so a schema drift surfaces as a validation error instead of a
 * mistyped value.
 */

export interface DatabaseAdapter {
  /**
   * Execute query returning a single row or null
   */
  queryOne(sql: string, params?: ReadonlyArray<unknown>): Promise<unknown>;

  /**
   * Execute query returning multiple rows
   */
  queryMany(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<unknown>>;

  /**
   * Execute statement (INSERT, UPDATE, DELETE)
   *
   * @returns Number of affected rows
   */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
