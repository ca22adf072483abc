/**
 * Device Repository
 * Terminal configuration; the sync reads the single active device
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import type { Device, DeviceConfig, DeviceRepository } from '../../types';
import type { DeviceRow } from '../../types/api';

/**
 * Get current ISO timestamp
 */
function now(): string {
  return new Date().toISOString();
}

/**
 * Map database row to Device model
 */
function mapRowToDevice(row: DeviceRow): Device {
  return {
    id: row.id,
    name: row.name,
    ip: row.ip,
    port: row.port,
    commKey: row.comm_key,
    isActive: row.is_active === 1,
    lastSyncAt: row.last_sync_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Get a device by ID
 */
export async function getDeviceById(id: string): Promise<Device | null> {
  const rows = await select<DeviceRow>('SELECT * FROM devices WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToDevice(row) : null;
}

/**
 * The active terminal, or null when none is configured
 */
export async function getActiveDevice(): Promise<Device | null> {
  const rows = await select<DeviceRow>(
    'SELECT * FROM devices WHERE is_active = 1 ORDER BY created_at ASC LIMIT 1'
  );
  const row = rows[0];
  return row ? mapRowToDevice(row) : null;
}

/**
 * List all devices
 */
export async function listDevices(): Promise<Device[]> {
  const rows = await select<DeviceRow>('SELECT * FROM devices ORDER BY name ASC');
  return rows.map(mapRowToDevice);
}

/**
 * Save a device configuration (insert or update)
 */
export async function saveDevice(config: Partial<DeviceConfig> & Omit<DeviceConfig, 'id'>, isActive = true): Promise<Device> {
  const id = config.id || randomUUID();
  const timestamp = now();

  await execute(
    `INSERT INTO devices (id, name, ip, port, comm_key, is_active, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(id) DO UPDATE SET
       name = excluded.name,
       ip = excluded.ip,
       port = excluded.port,
       comm_key = excluded.comm_key,
       is_active = excluded.is_active,
       updated_at = excluded.updated_at`,
    [id, config.name, config.ip, config.port, config.commKey, isActive ? 1 : 0, timestamp, timestamp]
  );

  const device = await getDeviceById(id);
  if (!device) {
    throw new Error('Failed to save device');
  }
  return device;
}

/**
 * Update the last sync timestamp for a device
 */
export async function updateLastSyncAt(id: string, syncedAt: string): Promise<void> {
  await execute(
    'UPDATE devices SET last_sync_at = ?, updated_at = ? WHERE id = ?',
    [syncedAt, now(), id]
  );
}

/**
 * Device repository implementation
 */
export const deviceRepository: DeviceRepository = {
  getDeviceById,
  getActiveDevice,
  listDevices,
  updateLastSyncAt,
};
