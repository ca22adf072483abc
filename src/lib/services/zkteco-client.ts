/**
 * ZKTeco device client
 * Reads attendance records from ZKTeco terminals over node-zklib
 */

import type ZKLib from 'node-zklib';
import { normalizeDeviceTimestamp } from '../utils/timezone';
import type { DeviceAttendanceRecord, DeviceClient } from './device-communication';
import type { DeviceConfig, DeviceInfo } from '../../types';

type ZKLibConstructor = typeof ZKLib;

// node-zklib is CommonJS; load it on first use
let zkLibConstructor: ZKLibConstructor | null = null;

async function getZKLib(): Promise<ZKLibConstructor> {
  if (!zkLibConstructor) {
    try {
      const module = await import('node-zklib');
      zkLibConstructor = module.default;
    } catch (error) {
      throw new Error('Failed to load ZKTeco library: ' + (error instanceof Error ? error.message : String(error)));
    }
  }
  return zkLibConstructor;
}

const DEFAULT_PORT = 4370;
// UDP port node-zklib binds locally
const IN_PORT = 4000;

export class ZKTecoClient implements DeviceClient {
  private config: DeviceConfig;
  private timeoutMs: number;
  private zkInstance: ZKLib | null = null;

  constructor(config: DeviceConfig, timeoutMs: number) {
    this.config = { ...config, port: config.port || DEFAULT_PORT };
    this.timeoutMs = timeoutMs;
  }

  async connect(): Promise<void> {
    const ZK = await getZKLib();
    // Held before the socket opens so a timed-out attempt can still be disconnected
    this.zkInstance = new ZK(this.config.ip, this.config.port, this.timeoutMs, IN_PORT);
    await this.zkInstance.createSocket();
  }

  async getAttendanceRecords(): Promise<DeviceAttendanceRecord[]> {
    const result = await this.requireInstance().getAttendances();
    const records: DeviceAttendanceRecord[] = [];
    let skipped = 0;

    for (const log of result.data) {
      const timestamp = normalizeDeviceTimestamp(log.recordTime);
      if (!timestamp || !log.deviceUserId) {
        skipped++;
        continue;
      }
      records.push({
        deviceUserId: String(log.deviceUserId).trim(),
        timestamp,
        raw: {
          userSn: log.userSn,
          deviceUserId: log.deviceUserId,
          recordTime: timestamp,
          ip: log.ip ?? this.config.ip,
        },
      });
    }

    if (skipped > 0) {
      console.warn(`[ZKTecoClient] Skipped ${skipped} records without a user id or readable time`);
    }
    console.log(`[ZKTecoClient] Read ${records.length} attendance records from ${this.config.ip}`);
    return records;
  }

  async getDeviceInfo(): Promise<DeviceInfo> {
    const info = await this.requireInstance().getInfo();
    return {
      serialNumber: 'Unknown',
      firmwareVersion: 'Unknown',
      userCount: info.userCounts,
      logCount: info.logCounts,
      lastActivity: new Date().toISOString(),
    };
  }

  async disconnect(): Promise<void> {
    const instance = this.zkInstance;
    this.zkInstance = null;
    if (instance) {
      await instance.disconnect();
    }
  }

  private requireInstance(): ZKLib {
    if (!this.zkInstance) {
      throw new Error(`Not connected to ${this.config.ip}:${this.config.port}`);
    }
    return this.zkInstance;
  }
}
