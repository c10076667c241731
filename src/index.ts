export * from "./types/diagnostics";
export * from "./types/errors";
export * from "./types/schemas";
export { SettingsManager, loadConfig, defaultConfig } from "./config/settings";
export { ErrorHandler, ErrorLevel, Logger } from "./logging/error-handler";
export { MetricsCollector } from "./diagnostics/metrics-collector";
export { ReachabilityProbe, parseLatency } from "./diagnostics/reachability";
export { ThroughputProbe } from "./diagnostics/throughput";
export * from "./reports/formatter";
export { ReportStore } from "./reports/report-store";
export { DiagnosticsOrchestrator, createOrchestrator } from "./core/orchestrator";
export { CommandDispatcher } from "./core/dispatcher";
export { ThroughputJobs } from "./core/throughput-jobs";
export { SysTrackServer } from "./web/server";
