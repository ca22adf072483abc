/**
 * Employee Repository
 * Read access to the employee directory, plus the inserts the sync and tests need
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import type {
  Employee,
  EmployeeRole,
  EmployeeStatus,
  CreateEmployeeInput,
  EmployeeFilter,
} from '../../types';
import type { EmployeeRow } from '../../types/api';

const EMPLOYEE_ROLES: readonly EmployeeRole[] = ['employee', 'manager', 'admin'];

/**
 * Generate a unique ID for new employees
 */
function generateId(): string {
  return randomUUID();
}

/**
 * Get current ISO timestamp
 */
function now(): string {
  return new Date().toISOString();
}

function parseStatus(value: string): EmployeeStatus {
  return value === 'inactive' ? 'inactive' : 'active';
}

function parseRole(value: string): EmployeeRole {
  return EMPLOYEE_ROLES.find((role) => role === value) ?? 'employee';
}

/**
 * Map database row to Employee model
 */
function mapRowToEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    displayName: row.display_name,
    biometricId: row.biometric_id,
    joiningDate: row.joining_date,
    status: parseStatus(row.status),
    role: parseRole(row.role),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Get an employee by ID
 */
export async function getEmployeeById(id: string): Promise<Employee | null> {
  const rows = await select<EmployeeRow>('SELECT * FROM employees WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToEmployee(row) : null;
}

/**
 * Get an employee by the user ID enrolled on the biometric terminal
 */
export async function getEmployeeByBiometricId(biometricId: string): Promise<Employee | null> {
  const rows = await select<EmployeeRow>(
    'SELECT * FROM employees WHERE biometric_id = ?',
    [biometricId]
  );
  const row = rows[0];
  return row ? mapRowToEmployee(row) : null;
}

/**
 * List employees with optional filtering (active only by default)
 */
export async function listEmployees(filter?: EmployeeFilter): Promise<Employee[]> {
  let query = 'SELECT * FROM employees WHERE 1=1';
  const params: unknown[] = [];

  const status = filter?.status ?? 'active';
  if (status !== 'all') {
    query += ' AND status = ?';
    params.push(status);
  }

  if (filter?.role) {
    query += ' AND role = ?';
    params.push(filter.role);
  }

  if (filter?.linkedOnly) {
    query += ' AND biometric_id IS NOT NULL';
  }

  query += ' ORDER BY display_name ASC';

  const rows = await select<EmployeeRow>(query, params);
  return rows.map(mapRowToEmployee);
}

/**
 * Map of biometric ID to employee ID, for every linked employee
 */
export async function getBiometricIdMap(): Promise<Map<string, string>> {
  const rows = await select<Pick<EmployeeRow, 'id' | 'biometric_id'>>(
    'SELECT id, biometric_id FROM employees WHERE biometric_id IS NOT NULL'
  );
  const map = new Map<string, string>();
  for (const row of rows) {
    if (row.biometric_id !== null) {
      map.set(row.biometric_id, row.id);
    }
  }
  return map;
}

/**
 * IDs of active administrators, the recipients of sync failure notifications
 */
export async function listActiveAdminIds(): Promise<string[]> {
  const rows = await select<Pick<EmployeeRow, 'id'>>(
    `SELECT id FROM employees WHERE role = 'admin' AND status = 'active' ORDER BY id`
  );
  return rows.map((row) => row.id);
}

/**
 * Create a new employee
 */
export async function createEmployee(data: CreateEmployeeInput): Promise<Employee> {
  const id = generateId();
  const timestamp = now();

  await execute(
    `INSERT INTO employees (id, display_name, biometric_id, joining_date, status, role, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      id,
      data.displayName,
      data.biometricId ?? null,
      data.joiningDate ?? null,
      data.status ?? 'active',
      data.role ?? 'employee',
      timestamp,
      timestamp,
    ]
  );

  const employee = await getEmployeeById(id);
  if (!employee) {
    throw new Error('Failed to create employee');
  }
  return employee;
}

export const employeeRepository = {
  getEmployeeById,
  getEmployeeByBiometricId,
  listEmployees,
  getBiometricIdMap,
  listActiveAdminIds,
  createEmployee,
};
