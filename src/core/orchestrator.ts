import { SysTrackConfig } from '../types/schemas';
import { JsonReport, NetworkResult, Report, ReportMode } from '../types/diagnostics';
import { PersistenceError } from '../types/errors';
import { Logger } from '../logging/error-handler';
import { MetricsCollector } from '../diagnostics/metrics-collector';
import { ReachabilityProbe } from '../diagnostics/reachability';
import { ThroughputProbe, defaultSpeedtestLoader } from '../diagnostics/throughput';
import { assembleReport } from '../reports/formatter';
import { ReportStore } from '../reports/report-store';
import { formatDateHeader } from '../reports/timestamps';

export type OutputFormat = 'text' | 'json';

export interface RunReportOptions {
  host?: string;
  format?: OutputFormat;
  directory?: string;
}

export interface ReportRun {
  report: Report;
  data: JsonReport;
  path: string | null;
  saveError: PersistenceError | null;
}

export interface OrchestratorParts {
  collector: MetricsCollector;
  reachability: ReachabilityProbe;
  throughput: ThroughputProbe;
  store: ReportStore;
  logger: Logger;
  now?: () => Date;
}

/**
 * Runs one report generation: collect, probe, format, persist. Nothing is
 * kept between runs.
 */
export class DiagnosticsOrchestrator {
  public readonly collector: MetricsCollector;
  public readonly reachability: ReachabilityProbe;
  public readonly throughput: ThroughputProbe;
  public readonly store: ReportStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    parts: OrchestratorParts,
    private readonly network: { host: string; timeoutSeconds: number }
  ) {
    this.collector = parts.collector;
    this.reachability = parts.reachability;
    this.throughput = parts.throughput;
    this.store = parts.store;
    this.logger = parts.logger;
    this.now = parts.now ?? (() => new Date());
  }

  get defaultHost(): string {
    return this.network.host;
  }

  async ping(host: string = this.network.host, signal?: AbortSignal): Promise<NetworkResult> {
    return this.reachability.checkReachability(host, this.network.timeoutSeconds, signal);
  }

  async runReport(mode: ReportMode, opts: RunReportOptions = {}): Promise<ReportRun> {
    this.logger.info(`Generating ${mode} report`);
    const snapshot = await this.collector.collect();
    const network = await this.ping(opts.host ?? this.network.host);

    const now = this.now();
    const report = assembleReport(snapshot, network, mode, now);
    const data: JsonReport = { date: formatDateHeader(now), system: snapshot, network };

    try {
      const path = opts.format === 'json'
        ? this.store.saveJSON(data, opts.directory)
        : this.store.saveText(report.body, opts.directory);
      return { report, data, path, saveError: null };
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.logger.error('Report generated but not saved', error);
        return { report, data, path: null, saveError: error };
      }
      throw error;
    }
  }
}

export function createOrchestrator(
  config: SysTrackConfig,
  logger: Logger,
  overrides: Partial<OrchestratorParts> = {}
): DiagnosticsOrchestrator {
  return new DiagnosticsOrchestrator(
    {
      logger,
      collector: overrides.collector ?? new MetricsCollector(logger, {
        cpuSampleMs: config.collector.cpu_sample_ms,
        diskMount: config.collector.disk_mount
      }),
      reachability: overrides.reachability ?? new ReachabilityProbe(logger, {
        graceSeconds: config.network.grace_seconds
      }),
      throughput: overrides.throughput ?? new ThroughputProbe(logger, defaultSpeedtestLoader(config.network.speedtest)),
      store: overrides.store ?? new ReportStore(logger, {
        directory: config.reports.directory,
        prefix: config.reports.prefix
      }),
      now: overrides.now
    },
    { host: config.network.host, timeoutSeconds: config.network.timeout_seconds }
  );
}
