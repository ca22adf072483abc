/**
 * Seed helpers for repository and service tests
 */

import { createEmployee } from '../repositories/employee.repository';
import { insertScans } from '../repositories/scan-event.repository';
import { saveDevice } from '../repositories/device.repository';
import type { CreateEmployeeInput, Device, Employee } from '../../types';

export async function seedEmployee(overrides: Partial<CreateEmployeeInput> = {}): Promise<Employee> {
  return createEmployee({
    displayName: 'Test Employee',
    joiningDate: '2020-01-01',
    ...overrides,
  });
}

export async function seedDevice(overrides: { ip?: string; port?: number; isActive?: boolean } = {}): Promise<Device> {
  return saveDevice(
    {
      name: 'Front Door',
      ip: overrides.ip ?? '192.168.1.201',
      port: overrides.port ?? 4370,
      commKey: '',
    },
    overrides.isActive ?? true
  );
}

/**
 * Insert scans at `HH:mm` times on one date
 */
export async function seedScans(
  employeeId: string,
  date: string,
  times: string[],
  deviceAddress = '192.168.1.201'
): Promise<void> {
  await insertScans(
    times.map((time) => ({ employeeId, timestamp: `${date}T${time}:00`, deviceAddress }))
  );
}
