import os from 'os';
import { promises as fs } from 'fs';

export type UsageReading = {
  used: number;
  total: number;
};

/** Point-in-time host readings consumed by the system collector. */
export interface SystemSampler {
  /** Overall CPU utilisation readings (0-100); empty when nothing could be measured. */
  sampleCpu(): Promise<number[]>;
  sampleMemory(): Promise<UsageReading>;
  sampleDisk(mount: string): Promise<UsageReading>;
  sampleLoad(): Promise<number>;
}

type CpuTimes = {
  idle: number;
  total: number;
};

const readCpuTimes = (): CpuTimes =>
  os.cpus().reduce<CpuTimes>(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      return { idle: acc.idle + idle, total: acc.total + user + nice + sys + idle + irq };
    },
    { idle: 0, total: 0 },
  );

export class HostSampler implements SystemSampler {
  constructor(private readonly cpuSampleMs = 1000) {}

  async sampleCpu(): Promise<number[]> {
    const start = readCpuTimes();
    await new Promise((resolve) => setTimeout(resolve, this.cpuSampleMs));
    const end = readCpuTimes();
    const total = end.total - start.total;
    if (total <= 0) return [];
    const busy = total - (end.idle - start.idle);
    return [Math.min(100, Math.max(0, (busy / total) * 100))];
  }

  async sampleMemory(): Promise<UsageReading> {
    const total = os.totalmem();
    return { used: total - os.freemem(), total };
  }

  async sampleDisk(mount: string): Promise<UsageReading> {
    const stats = await fs.statfs(mount);
    const total = stats.blocks * stats.bsize;
    return { used: (stats.blocks - stats.bfree) * stats.bsize, total };
  }

  async sampleLoad(): Promise<number> {
    return os.loadavg()[0] ?? 0;
  }
}
