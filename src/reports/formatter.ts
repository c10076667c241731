/**
 * Report rendering. Everything here is pure: the same snapshot and probe
 * result always render to the same text.
 */

import {
  NetworkResult,
  Report,
  ReportMode,
  SystemSnapshot,
  ThroughputResult
} from '../types/diagnostics';
import { formatDateHeader } from './timestamps';

export const HIGH_USAGE_THRESHOLD = 80;
export const CLEAR_SCREEN = 'CLEAR_SCREEN';

const pct = (value: number) => `${value.toFixed(1)}%`;
const gb = (value: number) => `${value.toFixed(2)} GB`;

export function normalizeMode(mode: string): ReportMode {
  return mode === 'detailed' ? 'detailed' : 'summary';
}

export function usageLevel(percent: number): 'High' | 'Normal' {
  return percent >= HIGH_USAGE_THRESHOLD ? 'High' : 'Normal';
}

export function networkLevel(network: NetworkResult): string {
  if (!network.online) {
    return 'Offline';
  }
  return network.latency_ms === null ? 'Online' : `Online (${network.latency_ms.toFixed(0)}ms)`;
}

export function summaryLine(snapshot: SystemSnapshot, network: NetworkResult): string {
  return [
    `CPU: ${usageLevel(snapshot.cpu.usage_percent)}`,
    `Memory: ${usageLevel(snapshot.memory.usage_percent)}`,
    `Disk: ${usageLevel(snapshot.disk.usage_percent)}`,
    `Network: ${networkLevel(network)}`
  ].join(' | ');
}

export function formatSystemSummary(snapshot: SystemSnapshot): string {
  return [
    `OS: ${snapshot.os.name} ${snapshot.os.release}`,
    `CPU Usage: ${pct(snapshot.cpu.usage_percent)}`,
    `Memory Usage: ${pct(snapshot.memory.usage_percent)}`,
    `Disk Usage: ${pct(snapshot.disk.usage_percent)}`
  ].join('\n');
}

export function formatNetworkSummary(network: NetworkResult): string {
  const lines = [`Network: ${network.message}`];
  if (network.online && network.latency_ms !== null) {
    lines.push(`Ping Time: ${network.latency_ms.toFixed(0)} ms`);
  }
  return lines.join('\n');
}

export function formatSystemDetailed(snapshot: SystemSnapshot): string {
  const { os, cpu, memory, disk } = snapshot;
  return [
    '=== System Information ===',
    `Operating System: ${os.name} ${os.release}`,
    `OS Version: ${os.version}`,
    `Platform: ${os.platform}`,
    '',
    '=== CPU Information ===',
    `CPU Usage: ${pct(cpu.usage_percent)}`,
    `CPU Cores: ${cpu.core_count}`,
    '',
    '=== Memory Information ===',
    `Memory Usage: ${pct(memory.usage_percent)}`,
    `Total Memory: ${gb(memory.total_gb)}`,
    `Used Memory: ${gb(memory.used_gb)}`,
    `Free Memory: ${gb(memory.free_gb)}`,
    `Available Memory: ${gb(memory.available_gb)} (includes ${gb(memory.cached_gb)} cache)`,
    '',
    '=== Disk Information ===',
    `Disk Usage: ${pct(disk.usage_percent)}`,
    `Total Disk Space: ${gb(disk.total_gb)}`,
    `Used Disk Space: ${gb(disk.used_gb)}`,
    `Free Disk Space: ${gb(disk.free_gb)}`,
    'Note: Some disk space may be reserved by the system and is not counted as free.'
  ].join('\n');
}

export function formatNetworkDetailed(network: NetworkResult): string {
  const lines = [
    '=== Network Diagnostics ===',
    `Host Tested: ${network.host}`,
    `Status: ${network.online ? 'Online' : 'Offline'}`
  ];
  if (network.latency_ms !== null) {
    lines.push(`Ping Time: ${network.latency_ms.toFixed(2)} ms`);
  }
  lines.push(`Message: ${network.message}`, '');
  return lines.join('\n');
}

export function formatSummary(snapshot: SystemSnapshot, network: NetworkResult): string {
  return `${formatSystemSummary(snapshot)}\n\n${formatNetworkSummary(network)}`;
}

export function formatDetailed(snapshot: SystemSnapshot, network: NetworkResult): string {
  return `${formatSystemDetailed(snapshot)}\n\n${formatNetworkDetailed(network)}`;
}

export function formatThroughput(result: ThroughputResult): string {
  if (!result.success) {
    return `Speedtest Error: ${result.error}`;
  }
  const { server } = result;
  return [
    '=== Speedtest Results ===',
    '',
    '⚠️  DISCLAIMER: Results are estimates based on the test server selected.',
    '   Server location/provider may not reflect your actual location/ISP.',
    '',
    `Test Server: ${server.name} (id ${server.id})`,
    `Server Provider: ${server.sponsor}`,
    `Server Location: ${server.city}, ${server.country}`,
    `Distance to Server: ${server.distance_km.toFixed(2)} km`,
    '',
    'Network Performance:',
    `  Ping: ${result.ping_ms.toFixed(2)} ms`,
    `  Download Speed: ${result.download_mbps.toFixed(2)} Mbps`,
    `  Upload Speed: ${result.upload_mbps.toFixed(2)} Mbps`
  ].join('\n');
}

export function formatPingResult(network: NetworkResult): string {
  if (!network.online) {
    return `Ping ${network.host}: ${network.message}`;
  }
  if (network.latency_ms === null) {
    return `Ping ${network.host}: Success - Online`;
  }
  return `Ping ${network.host}: ${network.latency_ms.toFixed(2)}ms - Online`;
}

export function assembleReport(
  snapshot: SystemSnapshot,
  network: NetworkResult,
  mode: string = 'summary',
  now: Date = new Date()
): Report {
  const reportMode = normalizeMode(mode);
  const date = formatDateHeader(now);
  const statusLine = summaryLine(snapshot, network);
  const header = `SysTrack Diagnostic Report - ${date}`;
  const separator = '-'.repeat(header.length);
  const blocks = reportMode === 'detailed'
    ? [formatSystemDetailed(snapshot), formatNetworkDetailed(network)]
    : [formatSystemSummary(snapshot), formatNetworkSummary(network)];

  const body = [
    header,
    separator,
    '',
    `System Status: ${statusLine}`,
    '',
    separator,
    '',
    blocks[0],
    '',
    blocks[1]
  ].join('\n');

  return { mode: reportMode, date, status_line: statusLine, body };
}
