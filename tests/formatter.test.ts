import {
  assembleReport,
  formatDetailed,
  formatNetworkSummary,
  formatPingResult,
  formatSummary,
  formatSystemSummary,
  formatThroughput,
  normalizeMode,
  summaryLine
} from '../src/reports/formatter';
import { ThroughputResult } from '../src/types/diagnostics';
import { makeSnapshot, OFFLINE, ONLINE, ONLINE_NO_LATENCY } from './helpers';

const NOW = new Date(2024, 2, 5, 14, 7);

// ============================================
// STATUS LINE
// ============================================

describe('summaryLine', () => {
  it('classifies every metric in fixed order', () => {
    expect(summaryLine(makeSnapshot(), ONLINE)).toBe(
      'CPU: Normal | Memory: Normal | Disk: Normal | Network: Online (43ms)'
    );
  });

  it('treats 80.00 as High and 79.99 as Normal', () => {
    const line = summaryLine(makeSnapshot({ cpu: 79.99, memory: 80.0, disk: 99.9 }), ONLINE);
    expect(line).toBe('CPU: Normal | Memory: High | Disk: High | Network: Online (43ms)');
  });

  it('reports Online without latency and Offline', () => {
    expect(summaryLine(makeSnapshot(), ONLINE_NO_LATENCY)).toBe(
      'CPU: Normal | Memory: Normal | Disk: Normal | Network: Online'
    );
    expect(summaryLine(makeSnapshot(), OFFLINE)).toBe(
      'CPU: Normal | Memory: Normal | Disk: Normal | Network: Offline'
    );
  });

  it('returns the same string for the same inputs', () => {
    const snapshot = makeSnapshot({ cpu: 91 });
    expect(summaryLine(snapshot, OFFLINE)).toBe(summaryLine(snapshot, OFFLINE));
  });
});

// ============================================
// SUMMARY AND DETAILED TEXT
// ============================================

describe('formatSummary', () => {
  it('renders the four system lines with one decimal', () => {
    expect(formatSystemSummary(makeSnapshot({ cpu: 5, disk: 77.25 }))).toBe(
      ['OS: Linux 6.5.0', 'CPU Usage: 5.0%', 'Memory Usage: 45.6%', 'Disk Usage: 77.3%'].join('\n')
    );
  });

  it('appends the ping time only when latency is known', () => {
    expect(formatNetworkSummary(ONLINE)).toBe('Network: Online (Ping google.com: 43ms)\nPing Time: 43 ms');
    expect(formatNetworkSummary(ONLINE_NO_LATENCY)).toBe('Network: Online (Ping google.com: Success)');
    expect(formatNetworkSummary(OFFLINE)).toBe('Network: Offline (Unable to reach google.com)');
  });

  it('joins the system and network blocks with a blank line', () => {
    const text = formatSummary(makeSnapshot(), OFFLINE);
    expect(text.split('\n')).toEqual([
      'OS: Linux 6.5.0',
      'CPU Usage: 12.3%',
      'Memory Usage: 45.6%',
      'Disk Usage: 50.0%',
      '',
      'Network: Offline (Unable to reach google.com)'
    ]);
  });
});

describe('formatDetailed', () => {
  const lines = formatDetailed(makeSnapshot(), ONLINE).split('\n');

  it('emits every section header in order', () => {
    expect(lines.filter(l => l.startsWith('==='))).toEqual([
      '=== System Information ===',
      '=== CPU Information ===',
      '=== Memory Information ===',
      '=== Disk Information ===',
      '=== Network Diagnostics ==='
    ]);
  });

  it('annotates available memory with the cache size', () => {
    expect(lines).toContain('Available Memory: 8.50 GB (includes 6.50 GB cache)');
    expect(lines).toContain('Free Memory: 2.00 GB');
  });

  it('ends the disk section with the reserved-space note', () => {
    const noteIndex = lines.indexOf('Note: Some disk space may be reserved by the system and is not counted as free.');
    expect(lines[noteIndex - 1]).toBe('Free Disk Space: 50.00 GB');
  });

  it('lists network details', () => {
    expect(lines.slice(-6)).toEqual([
      '=== Network Diagnostics ===',
      'Host Tested: google.com',
      'Status: Online',
      'Ping Time: 43.20 ms',
      'Message: Online (Ping google.com: 43ms)',
      ''
    ]);
  });

  it('renders usage percentages identically to the summary', () => {
    const snapshot = makeSnapshot({ cpu: 33.35, memory: 66.65, disk: 0.05 });
    const summary = formatSummary(snapshot, ONLINE).split('\n');
    const detailed = formatDetailed(snapshot, ONLINE).split('\n');
    for (const label of ['CPU Usage', 'Memory Usage', 'Disk Usage']) {
      const inSummary = summary.find(l => l.startsWith(label));
      const inDetailed = detailed.find(l => l.startsWith(label));
      expect(inSummary).toMatch(/^[A-Za-z ]+: \d+\.\d%$/);
      expect(inDetailed).toBe(inSummary);
    }
  });
});

// ============================================
// REPORT ASSEMBLY
// ============================================

describe('assembleReport', () => {
  it('lays out header, status and summary blocks', () => {
    const report = assembleReport(makeSnapshot(), OFFLINE, 'summary', NOW);
    const header = 'SysTrack Diagnostic Report - 2024-03-05';
    const separator = '-'.repeat(header.length);

    expect(report.mode).toBe('summary');
    expect(report.date).toBe('2024-03-05');
    expect(report.status_line).toBe('CPU: Normal | Memory: Normal | Disk: Normal | Network: Offline');
    expect(report.body).toBe([
      header,
      separator,
      '',
      'System Status: CPU: Normal | Memory: Normal | Disk: Normal | Network: Offline',
      '',
      separator,
      '',
      'OS: Linux 6.5.0',
      'CPU Usage: 12.3%',
      'Memory Usage: 45.6%',
      'Disk Usage: 50.0%',
      '',
      'Network: Offline (Unable to reach google.com)'
    ].join('\n'));
  });

  it('uses the detailed blocks in detailed mode', () => {
    const report = assembleReport(makeSnapshot(), ONLINE, 'detailed', NOW);
    expect(report.mode).toBe('detailed');
    expect(report.body.split('\n')[7]).toBe('=== System Information ===');
    expect(report.body.endsWith('Message: Online (Ping google.com: 43ms)\n')).toBe(true);
  });

  it('falls back to summary for unknown modes', () => {
    expect(normalizeMode('verbose')).toBe('summary');
    const report = assembleReport(makeSnapshot(), ONLINE, 'verbose', NOW);
    expect(report.mode).toBe('summary');
    expect(report.body).toBe(assembleReport(makeSnapshot(), ONLINE, 'summary', NOW).body);
  });
});

// ============================================
// THROUGHPUT AND PING
// ============================================

describe('formatThroughput', () => {
  it('renders a failure as a single line', () => {
    const result: ThroughputResult = {
      success: false,
      error_kind: 'dependency-missing',
      error: 'Speedtest client not available'
    };
    const text = formatThroughput(result);
    expect(text).toBe('Speedtest Error: Speedtest client not available');
    expect(text.split('\n')).toHaveLength(1);
  });

  it('renders server identity and performance numbers', () => {
    const text = formatThroughput({
      success: true,
      download_mbps: 100,
      upload_mbps: 20.5,
      ping_ms: 18.46,
      server: {
        name: 'Springfield, IL',
        city: 'Springfield',
        sponsor: 'Example ISP',
        country: 'United States',
        distance_km: 12.35,
        id: '1234'
      }
    });
    const lines = text.split('\n');
    expect(lines[0]).toBe('=== Speedtest Results ===');
    expect(lines[2]).toContain('DISCLAIMER');
    expect(lines).toContain('Test Server: Springfield, IL (id 1234)');
    expect(lines).toContain('Server Provider: Example ISP');
    expect(lines).toContain('Server Location: Springfield, United States');
    expect(lines).toContain('Distance to Server: 12.35 km');
    expect(lines.slice(-3)).toEqual([
      '  Ping: 18.46 ms',
      '  Download Speed: 100.00 Mbps',
      '  Upload Speed: 20.50 Mbps'
    ]);
  });
});

describe('formatPingResult', () => {
  it('shows latency with two decimals when online', () => {
    expect(formatPingResult(ONLINE)).toBe('Ping google.com: 43.20ms - Online');
    expect(formatPingResult(ONLINE_NO_LATENCY)).toBe('Ping google.com: Success - Online');
    expect(formatPingResult(OFFLINE)).toBe('Ping google.com: Offline (Unable to reach google.com)');
  });
});
