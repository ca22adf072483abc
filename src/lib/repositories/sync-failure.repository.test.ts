/**
 * Tests for Sync Failure Repository
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { initTestDatabase, closeTestDatabase, resetTestDatabase } from '../test-utils';
import { listFailures, recordFailure, resolveFailure } from './sync-failure.repository';

// Initialize test database
initTestDatabase();

describe('Sync Failure Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('records a failure with its payload as JSON', async () => {
    const failure = await recordFailure({
      errorKind: 'unmatched_employee',
      message: 'No employee with biometric id 99 (1 record)',
      deviceAddress: '192.168.1.201:4370',
      rawPayload: { deviceUserId: '99', count: 1 },
    });

    expect(failure.errorKind).toBe('unmatched_employee');
    expect(failure.deviceAddress).toBe('192.168.1.201:4370');
    expect(failure.employeeId).toBeNull();
    expect(failure.rawPayload).toBe('{"deviceUserId":"99","count":1}');
    expect(failure.resolved).toBe(false);
    expect(failure.resolutionNote).toBeNull();
  });

  it('keeps string payloads as they are and stores no payload as null', async () => {
    const text = await recordFailure({ errorKind: 'sync_error', message: 'read failed', rawPayload: 'raw bytes' });
    const none = await recordFailure({ errorKind: 'config_error', message: 'No active device configured' });

    expect(text.rawPayload).toBe('raw bytes');
    expect(none.rawPayload).toBeNull();
  });

  it('lists newest first and filters by resolution', async () => {
    const first = await recordFailure({ errorKind: 'connection_error', message: 'first' });
    await recordFailure({ errorKind: 'sync_error', message: 'second' });

    await resolveFailure(first.id, 'Device was rebooted');

    expect((await listFailures()).map((failure) => failure.message)).toEqual(['second', 'first']);
    expect((await listFailures({ resolved: false })).map((failure) => failure.message)).toEqual(['second']);

    const resolved = await listFailures({ resolved: true });
    expect(resolved).toHaveLength(1);
    expect(resolved[0]?.resolutionNote).toBe('Device was rebooted');
  });

  it('filters by creation date, inclusive of the end date', async () => {
    await recordFailure({ errorKind: 'sync_error', message: 'today' });
    const today = new Date().toISOString().slice(0, 10);

    expect(await listFailures({ from: today, to: today })).toHaveLength(1);
    expect(await listFailures({ to: '2000-01-01' })).toHaveLength(0);
  });

  it('rejects resolving an unknown failure', async () => {
    await expect(resolveFailure('missing', 'n/a')).rejects.toThrow('Sync failure not found: missing');
  });
});
