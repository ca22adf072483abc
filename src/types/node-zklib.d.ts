declare module 'node-zklib' {
  interface Attendance {
    userSn: number;
    deviceUserId: string;
    recordTime: Date | string;
    ip?: string;
  }

  interface DeviceCounts {
    userCounts: number;
    logCounts: number;
    logCapacity: number;
  }

  class ZKLib {
    constructor(ip: string, port: number, timeout?: number, inport?: number);
    createSocket(): Promise<boolean>;
    getAttendances(): Promise<{ data: Attendance[]; err?: unknown }>;
    getInfo(): Promise<DeviceCounts>;
    disconnect(): Promise<void>;
  }

  export = ZKLib;
}
