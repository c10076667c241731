import { Logger } from '../src/logging/error-handler';
import { HostInfoSource } from '../src/diagnostics/metrics-collector';
import { NetworkResult, SystemSnapshot } from '../src/types/diagnostics';

export const GiB = 1024 ** 3;

export function makeLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

export function makeSnapshot(overrides: {
  cpu?: number;
  memory?: number;
  disk?: number;
} = {}): SystemSnapshot {
  return {
    cpu: { usage_percent: overrides.cpu ?? 12.3, core_count: 8 },
    memory: {
      usage_percent: overrides.memory ?? 45.6,
      total_gb: 15.5,
      used_gb: 7,
      free_gb: 2,
      available_gb: 8.5,
      cached_gb: 6.5
    },
    disk: { usage_percent: overrides.disk ?? 50, total_gb: 100, used_gb: 50, free_gb: 50 },
    os: { name: 'Linux', version: 'Ubuntu 22.04', release: '6.5.0', platform: 'Linux-6.5.0-x64' }
  };
}

export const ONLINE: NetworkResult = {
  online: true,
  host: 'google.com',
  latency_ms: 43.2,
  message: 'Online (Ping google.com: 43ms)'
};

export const ONLINE_NO_LATENCY: NetworkResult = {
  online: true,
  host: 'google.com',
  latency_ms: null,
  message: 'Online (Ping google.com: Success)'
};

export const OFFLINE: NetworkResult = {
  online: false,
  host: 'google.com',
  latency_ms: null,
  message: 'Offline (Unable to reach google.com)'
};

export function makeHostSource(): jest.Mocked<HostInfoSource> {
  return {
    currentLoad: jest.fn().mockResolvedValue({ currentLoad: 37.46 }),
    cpu: jest.fn().mockResolvedValue({ cores: 8 }),
    mem: jest.fn().mockResolvedValue({
      total: 16 * GiB,
      free: 2 * GiB,
      available: 8.5 * GiB,
      active: 7.5 * GiB
    }),
    fsSize: jest.fn().mockResolvedValue([
      { mount: '/boot', size: 1 * GiB, used: 0.2 * GiB, available: 0.8 * GiB, use: 20 },
      { mount: '/', size: 100 * GiB, used: 40 * GiB, available: 55 * GiB, use: 42.1234 }
    ]),
    osInfo: jest.fn().mockResolvedValue({
      platform: 'linux',
      distro: 'Ubuntu',
      release: '22.04',
      kernel: '6.5.0-generic',
      arch: 'x64'
    })
  };
}
