/**
 * Device Communication Service
 *
 * Connects to the attendance terminal with bounded retries and maps
 * low-level failures to device error codes with friendly messages.
 */

import { AttendanceError, AttendanceErrorCodes, errorMessage } from '../errors';
import { DEFAULT_SYNC_SETTINGS } from '../repositories/settings.repository';
import type { ConnectionTestResult, DeviceConfig, DeviceInfo, SyncSettings } from '../../types';

// Error codes for device communication
export const DeviceErrorCodes = {
  CONNECTION_TIMEOUT: 'DEVICE_CONNECTION_TIMEOUT',
  AUTH_FAILED: 'DEVICE_AUTH_FAILED',
  UNREACHABLE: 'DEVICE_UNREACHABLE',
  PROTOCOL_ERROR: 'DEVICE_PROTOCOL_ERROR',
  LIBRARY_UNAVAILABLE: 'DEVICE_LIBRARY_UNAVAILABLE',
} as const;

export type DeviceErrorCode = typeof DeviceErrorCodes[keyof typeof DeviceErrorCodes];

export interface DeviceError {
  code: DeviceErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * One attendance record as read from the terminal
 */
export interface DeviceAttendanceRecord {
  /** Enrollment id on the terminal; matches Employee.biometricId */
  deviceUserId: string;
  /** Wall-clock `YYYY-MM-DDTHH:mm:ss` */
  timestamp: string;
  /** The record as the device library returned it, for failure payloads */
  raw: Record<string, unknown>;
}

export interface DeviceClient {
  connect(): Promise<void>;
  getAttendanceRecords(): Promise<DeviceAttendanceRecord[]>;
  getDeviceInfo(): Promise<DeviceInfo>;
  disconnect(): Promise<void>;
}

export type DeviceClientFactory = (config: DeviceConfig, timeoutMs: number) => DeviceClient;

/**
 * Parse error message to determine error code
 */
function parseErrorCode(message: string): DeviceErrorCode {
  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('timeout') || lowerMessage.includes('etimedout')) {
    return DeviceErrorCodes.CONNECTION_TIMEOUT;
  }
  if (lowerMessage.includes('auth') || lowerMessage.includes('password') || lowerMessage.includes('comm key')) {
    return DeviceErrorCodes.AUTH_FAILED;
  }
  if (lowerMessage.includes('unreachable') || lowerMessage.includes('econnrefused') || lowerMessage.includes('ehostunreach')) {
    return DeviceErrorCodes.UNREACHABLE;
  }
  if (lowerMessage.includes('failed to load')) {
    return DeviceErrorCodes.LIBRARY_UNAVAILABLE;
  }

  return DeviceErrorCodes.PROTOCOL_ERROR;
}

const friendlyMessages: Record<DeviceErrorCode, string> = {
  [DeviceErrorCodes.CONNECTION_TIMEOUT]: 'Connection timed out. Check that the device is powered on and the IP address is correct.',
  [DeviceErrorCodes.AUTH_FAILED]: 'Authentication failed. Verify the communication key.',
  [DeviceErrorCodes.UNREACHABLE]: 'Device is unreachable. Check the network connection and IP address.',
  [DeviceErrorCodes.PROTOCOL_ERROR]: 'Communication error with the device.',
  [DeviceErrorCodes.LIBRARY_UNAVAILABLE]: 'The device library could not be loaded.',
};

/**
 * Create a DeviceError from an error message
 */
export function createDeviceError(message: string): DeviceError {
  const code = parseErrorCode(message);
  return {
    code,
    message: friendlyMessages[code],
    details: { originalError: message },
  };
}

/**
 * Reject when `promise` has not settled within `ms`
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function defaultClientFactory(config: DeviceConfig, timeoutMs: number): Promise<DeviceClient> {
  const { ZKTecoClient } = await import('./zkteco-client');
  return new ZKTecoClient(config, timeoutMs);
}

export interface DeviceCommunicationOptions {
  /** Builds the client for one connection attempt; defaults to the ZKTeco client */
  clientFactory?: DeviceClientFactory;
  sleep?: (ms: number) => Promise<void>;
}

export function deviceAddress(config: Pick<DeviceConfig, 'ip' | 'port'>): string {
  return `${config.ip}:${config.port}`;
}

/**
 * Device Communication Service
 */
export class DeviceCommunicationService {
  private clientFactory: DeviceClientFactory | null;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: DeviceCommunicationOptions = {}) {
    this.clientFactory = options.clientFactory ?? null;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Open a connection, retrying with linear backoff. Each attempt gets
   * `connectionTimeoutMs`; after `retryAttempts` failures throws CONNECTION_ERROR.
   */
  async connect(config: DeviceConfig, settings: SyncSettings = DEFAULT_SYNC_SETTINGS): Promise<DeviceClient> {
    const attempts = Math.max(1, settings.retryAttempts);
    let lastError: DeviceError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const client = await this.createClient(config, settings.connectionTimeoutMs);
      try {
        await withTimeout(client.connect(), settings.connectionTimeoutMs, 'Connection');
        if (attempt > 1) {
          console.log(`[DeviceCommunication] Connected to ${deviceAddress(config)} on attempt ${attempt}`);
        }
        return client;
      } catch (error) {
        lastError = createDeviceError(errorMessage(error));
        console.warn(
          `[DeviceCommunication] Connection attempt ${attempt}/${attempts} to ${deviceAddress(config)} failed:`,
          errorMessage(error)
        );
        await this.safeDisconnect(client);
        if (attempt < attempts) {
          await this.sleep(settings.retryDelayMs * attempt);
        }
      }
    }

    throw new AttendanceError(
      AttendanceErrorCodes.CONNECTION_ERROR,
      `Could not connect to ${deviceAddress(config)} after ${attempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      { deviceError: lastError, attempts }
    );
  }

  /**
   * Connect, read device info and disconnect. Never throws.
   */
  async testConnection(config: DeviceConfig, settings: SyncSettings = DEFAULT_SYNC_SETTINGS): Promise<ConnectionTestResult> {
    const startTime = Date.now();
    try {
      const client = await this.connect(config, { ...settings, retryAttempts: 1 });
      try {
        const deviceInfo = await client.getDeviceInfo();
        return { success: true, deviceInfo, latency: Date.now() - startTime };
      } finally {
        await this.safeDisconnect(client);
      }
    } catch (error) {
      return { success: false, error: errorMessage(error), latency: Date.now() - startTime };
    }
  }

  async safeDisconnect(client: DeviceClient): Promise<void> {
    try {
      await client.disconnect();
    } catch (error) {
      console.warn('[DeviceCommunication] Disconnect failed:', errorMessage(error));
    }
  }

  private async createClient(config: DeviceConfig, timeoutMs: number): Promise<DeviceClient> {
    if (this.clientFactory) {
      return this.clientFactory(config, timeoutMs);
    }
    return defaultClientFactory(config, timeoutMs);
  }
}
