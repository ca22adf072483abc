/**
 * Test database utilities using better-sqlite3
 * Opens the application database in memory so repositories run unchanged
 */

import type BetterSqlite3 from 'better-sqlite3';
import { initDatabase, getDatabase, closeDatabase, flushDatabase } from '../database';

/**
 * Initialize an in-memory test database
 */
export function initTestDatabase(): BetterSqlite3.Database {
  return initDatabase(':memory:');
}

/**
 * Get the test database instance
 */
export function getTestDatabase(): BetterSqlite3.Database {
  return getDatabase();
}

/**
 * Close and reset the test database
 */
export function closeTestDatabase(): void {
  closeDatabase();
}

/**
 * Reset the test database (clear all data but keep schema)
 */
export function resetTestDatabase(): void {
  flushDatabase();
}

/**
 * Execute a SQL query that doesn't return results
 */
export function testExecute(
  query: string,
  bindValues: unknown[] = []
): { rowsAffected: number } {
  const result = getDatabase().prepare(query).run(...bindValues);
  return { rowsAffected: result.changes };
}

/**
 * Execute a SQL query that returns results
 */
export function testSelect<T>(query: string, bindValues: unknown[] = []): T[] {
  return getDatabase().prepare<unknown[], T>(query).all(...bindValues);
}

/**
 * Count rows in a table
 */
export function countRows(table: string): number {
  const rows = testSelect<{ count: number }>(`SELECT COUNT(*) AS count FROM ${table}`);
  return rows[0]?.count ?? 0;
}
