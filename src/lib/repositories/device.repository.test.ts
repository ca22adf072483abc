/**
 * Property-based tests for Device Repository
 * Device configuration round-trip and active device lookup
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { initTestDatabase, closeTestDatabase, resetTestDatabase } from '../test-utils';
import {
  getActiveDevice,
  getDeviceById,
  listDevices,
  saveDevice,
  updateLastSyncAt,
} from './device.repository';

// Initialize test database
initTestDatabase();

const ipArb = fc
  .tuple(fc.integer({ min: 1, max: 254 }), fc.integer({ min: 0, max: 255 }), fc.integer({ min: 1, max: 254 }))
  .map(([a, b, c]) => `192.${a}.${b}.${c}`);

const deviceConfigArb = fc.record({
  name: fc.string({ minLength: 1, maxLength: 40 }),
  ip: ipArb,
  port: fc.integer({ min: 1, max: 65535 }),
  commKey: fc.stringMatching(/^[0-9]{0,6}$/),
});

describe('Device Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('round-trips a saved configuration', async () => {
    await fc.assert(
      fc.asyncProperty(deviceConfigArb, async (config) => {
        const saved = await saveDevice(config);
        const loaded = await getDeviceById(saved.id);

        expect(loaded).toEqual(saved);
        expect(loaded?.name).toBe(config.name);
        expect(loaded?.ip).toBe(config.ip);
        expect(loaded?.port).toBe(config.port);
        expect(loaded?.commKey).toBe(config.commKey);
        expect(loaded?.isActive).toBe(true);
        expect(loaded?.lastSyncAt).toBeNull();
      }),
      { numRuns: 30 }
    );
  });

  it('updates an existing device in place', async () => {
    const saved = await saveDevice({ name: 'Front Door', ip: '192.168.1.201', port: 4370, commKey: '' });
    await saveDevice({ id: saved.id, name: 'Back Door', ip: '192.168.1.202', port: 4370, commKey: '0' }, false);

    const devices = await listDevices();
    expect(devices).toHaveLength(1);
    expect(devices[0]?.name).toBe('Back Door');
    expect(devices[0]?.isActive).toBe(false);
  });

  it('returns the active device, or null when none is active', async () => {
    expect(await getActiveDevice()).toBeNull();

    await saveDevice({ name: 'Spare', ip: '192.168.1.210', port: 4370, commKey: '' }, false);
    expect(await getActiveDevice()).toBeNull();

    const active = await saveDevice({ name: 'Front Door', ip: '192.168.1.201', port: 4370, commKey: '' });
    expect((await getActiveDevice())?.id).toBe(active.id);
  });

  it('records the last sync time', async () => {
    const saved = await saveDevice({ name: 'Front Door', ip: '192.168.1.201', port: 4370, commKey: '' });

    await updateLastSyncAt(saved.id, '2024-03-04T10:00:00.000Z');

    expect((await getDeviceById(saved.id))?.lastSyncAt).toBe('2024-03-04T10:00:00.000Z');
  });
});
