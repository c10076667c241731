export interface CpuInfo {
  usage_percent: number;
  core_count: number;
}

export interface MemoryInfo {
  usage_percent: number;
  total_gb: number;
  used_gb: number;
  free_gb: number;
  available_gb: number;
  // available_gb - free_gb; negative when the host reports available < free
  cached_gb: number;
}

export interface DiskInfo {
  usage_percent: number;
  total_gb: number;
  used_gb: number;
  free_gb: number;
}

export interface OsInfo {
  name: string;
  version: string;
  release: string;
  platform: string;
}

export interface SystemSnapshot {
  readonly cpu: Readonly<CpuInfo>;
  readonly memory: Readonly<MemoryInfo>;
  readonly disk: Readonly<DiskInfo>;
  readonly os: Readonly<OsInfo>;
}

export interface NetworkResult {
  readonly online: boolean;
  readonly host: string;
  readonly latency_ms: number | null;
  readonly message: string;
}

export interface SpeedtestServer {
  name: string;
  city: string;
  sponsor: string;
  country: string;
  distance_km: number;
  id: string;
}

export type ThroughputErrorKind = 'dependency-missing' | 'forbidden' | 'connection-error' | 'other';

export interface ThroughputSuccess {
  readonly success: true;
  readonly download_mbps: number;
  readonly upload_mbps: number;
  readonly ping_ms: number;
  readonly server: Readonly<SpeedtestServer>;
}

export interface ThroughputFailure {
  readonly success: false;
  readonly error_kind: ThroughputErrorKind;
  readonly error: string;
}

export type ThroughputResult = ThroughputSuccess | ThroughputFailure;

export type ReportMode = 'summary' | 'detailed';

export interface Report {
  readonly mode: ReportMode;
  readonly date: string;
  readonly status_line: string;
  readonly body: string;
}

export interface JsonReport {
  date: string;
  system: SystemSnapshot;
  network: NetworkResult;
}
