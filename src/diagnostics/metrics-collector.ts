/**
 * System Metrics Collector
 * Takes a single snapshot of CPU, memory, disk and OS facts.
 */

import * as si from 'systeminformation';
import { CollectionError, describeError } from '../types/errors';
import { SystemSnapshot, DiskInfo, MemoryInfo, OsInfo } from '../types/diagnostics';
import { Logger } from '../logging/error-handler';

const BYTES_PER_GB = 1024 ** 3;

// The subset of systeminformation the collector reads.
export interface HostInfoSource {
  currentLoad(): Promise<{ currentLoad: number }>;
  cpu(): Promise<{ cores: number }>;
  mem(): Promise<{ total: number; free: number; available: number; active: number }>;
  fsSize(): Promise<Array<{ mount: string; size: number; used: number; available: number; use: number }>>;
  osInfo(): Promise<{ platform: string; distro: string; release: string; kernel: string; arch: string }>;
}

export interface MetricsCollectorOptions {
  cpuSampleMs?: number;
  diskMount?: string;
  source?: HostInfoSource;
  sleep?: (ms: number) => Promise<void>;
}

const PLATFORM_NAMES: Record<string, string> = {
  linux: 'Linux',
  darwin: 'Darwin',
  win32: 'Windows',
  Windows: 'Windows',
  freebsd: 'FreeBSD',
  openbsd: 'OpenBSD',
  sunos: 'SunOS',
  aix: 'AIX'
};

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function bytesToGb(bytes: number): number {
  return round(bytes / BYTES_PER_GB, 2);
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class MetricsCollector {
  private readonly cpuSampleMs: number;
  private readonly diskMount?: string;
  private readonly source: HostInfoSource;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly logger: Logger, opts: MetricsCollectorOptions = {}) {
    this.cpuSampleMs = opts.cpuSampleMs ?? 1000;
    this.diskMount = opts.diskMount;
    this.source = opts.source ?? si;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async collect(): Promise<SystemSnapshot> {
    this.logger.debug('Collecting system information', { cpuSampleMs: this.cpuSampleMs });
    try {
      const cpuUsage = await this.sampleCpu();
      const [cpu, mem, filesystems, os] = await Promise.all([
        this.source.cpu(),
        this.source.mem(),
        this.source.fsSize(),
        this.source.osInfo()
      ]);

      const snapshot: SystemSnapshot = Object.freeze({
        cpu: Object.freeze({
          usage_percent: round(cpuUsage, 1),
          core_count: Math.max(1, cpu.cores)
        }),
        memory: Object.freeze(this.toMemory(mem)),
        disk: Object.freeze(this.toDisk(filesystems, os.platform)),
        os: Object.freeze(this.toOs(os))
      });
      this.logger.debug('System information collected', {
        cpu: snapshot.cpu.usage_percent,
        memory: snapshot.memory.usage_percent,
        disk: snapshot.disk.usage_percent
      });
      return snapshot;
    } catch (error) {
      if (error instanceof CollectionError) {
        throw error;
      }
      throw new CollectionError(describeError(error), error);
    }
  }

  // currentLoad() reports usage since its previous call, so the first call
  // only primes the counters for the sampling window.
  private async sampleCpu(): Promise<number> {
    await this.source.currentLoad();
    if (this.cpuSampleMs > 0) {
      await this.sleep(this.cpuSampleMs);
    }
    const load = await this.source.currentLoad();
    if (!Number.isFinite(load.currentLoad)) {
      throw new CollectionError('CPU load reading is not a number');
    }
    return load.currentLoad;
  }

  private toMemory(mem: { total: number; free: number; available: number; active: number }): MemoryInfo {
    if (mem.total <= 0) {
      throw new CollectionError('memory query returned no total');
    }
    const free = bytesToGb(mem.free);
    const available = bytesToGb(mem.available);
    return {
      usage_percent: round(((mem.total - mem.available) / mem.total) * 100, 1),
      total_gb: bytesToGb(mem.total),
      used_gb: bytesToGb(mem.active),
      free_gb: free,
      available_gb: available,
      cached_gb: round(available - free, 2)
    };
  }

  private toDisk(
    filesystems: Array<{ mount: string; size: number; used: number; available: number; use: number }>,
    platform: string
  ): DiskInfo {
    const wanted = this.diskMount ?? (platform === 'win32' || platform === 'Windows' ? 'C:' : '/');
    const root = filesystems.find(fs => fs.mount.toUpperCase() === wanted.toUpperCase());
    if (!root) {
      throw new CollectionError(`no filesystem mounted at ${wanted}`);
    }
    return {
      usage_percent: round(root.use, 1),
      total_gb: bytesToGb(root.size),
      used_gb: bytesToGb(root.used),
      free_gb: bytesToGb(root.available)
    };
  }

  private toOs(os: { platform: string; distro: string; release: string; kernel: string; arch: string }): OsInfo {
    const name = PLATFORM_NAMES[os.platform] ?? os.platform;
    return {
      name,
      version: [os.distro, os.release].filter(Boolean).join(' '),
      release: os.kernel,
      platform: `${name}-${os.kernel}-${os.arch}`
    };
  }
}
