import { Logger } from '../logging/error-handler';
import { CLEAR_SCREEN, formatPingResult, formatThroughput } from '../reports/formatter';
import { ReportMode } from '../types/diagnostics';
import { DiagnosticsOrchestrator } from './orchestrator';
import { ThroughputJobs } from './throughput-jobs';

export const HELP_TEXT = `SysTrack Terminal Commands
========================
help, ?                    - Show this help message
summary                    - Generate summary system report
detailed                   - Generate detailed system report
ping [host] [--speedtest]  - Test network connectivity (default: google.com)
speedtest [job-id]         - Run a speedtest, or check on a running one
clear, cls                 - Clear the terminal screen

Examples:
  summary
  detailed
  ping 8.8.8.8
  ping --speedtest
  clear`;

export interface DispatchResult {
  output: string;
  clear: boolean;
}

export interface ParsedCommand {
  verb: string;
  args: string[];
  flags: Set<string>;
}

export function parseCommand(commandLine: string): ParsedCommand {
  const tokens = commandLine.trim().split(/\s+/).filter(Boolean);
  const verb = (tokens.shift() ?? '').toLowerCase();
  const flags = new Set(tokens.filter(t => t.startsWith('-')).map(t => t.toLowerCase()));
  const args = tokens.filter(t => !t.startsWith('-'));
  return { verb, args, flags };
}

const text = (output: string): DispatchResult => ({ output, clear: false });

/**
 * Maps a typed command line onto the diagnostics pipeline. Collection and
 * missing-ping errors propagate to the transport; everything else is text.
 */
export class CommandDispatcher {
  constructor(
    private readonly orchestrator: DiagnosticsOrchestrator,
    private readonly logger: Logger,
    private readonly jobs?: ThroughputJobs
  ) {}

  async dispatch(commandLine: string): Promise<DispatchResult> {
    const { verb, args, flags } = parseCommand(commandLine);
    this.logger.debug(`Dispatching command: ${verb || '(empty)'}`, { args });

    switch (verb) {
      case '':
        return text('');
      case 'help':
      case '?':
        return text(HELP_TEXT);
      case 'summary':
      case 'detailed':
        return text(await this.report(verb));
      case 'ping':
        return text(await this.ping(args[0] ?? this.orchestrator.defaultHost, flags.has('--speedtest') || flags.has('-s')));
      case 'speedtest':
        return text(args[0] ? this.jobStatus(args[0]) : await this.speedtest());
      case 'clear':
      case 'cls':
        return { output: CLEAR_SCREEN, clear: true };
      default:
        return text(`Unknown command: ${verb}\nType 'help' for available commands.`);
    }
  }

  private async report(mode: ReportMode): Promise<string> {
    const run = await this.orchestrator.runReport(mode);
    if (run.saveError) {
      return `${run.report.body}\n\nWarning: ${run.saveError.message}`;
    }
    return `${run.report.body}\n\nReport saved: ${run.path}`;
  }

  private async ping(host: string, withSpeedtest: boolean): Promise<string> {
    const result = formatPingResult(await this.orchestrator.ping(host));
    if (!withSpeedtest) {
      return result;
    }
    return `${result}\n\n${await this.speedtest()}`;
  }

  private async speedtest(): Promise<string> {
    if (this.jobs) {
      const active = this.jobs.running();
      if (active) {
        return `Speedtest ${active.id} is already running (started ${active.started_at}).\nRun 'speedtest ${active.id}' to check on it.`;
      }
      const job = this.jobs.start();
      return `Speedtest started in the background (job ${job.id}).\nRun 'speedtest ${job.id}' to check on it.`;
    }
    return formatThroughput(await this.orchestrator.throughput.measureThroughput());
  }

  private jobStatus(id: string): string {
    const job = this.jobs?.get(id);
    if (!job) {
      return `Unknown speedtest job: ${id}`;
    }
    if (job.state === 'running' || !job.result) {
      return `Speedtest ${id} is still running (started ${job.started_at}).`;
    }
    return formatThroughput(job.result);
  }
}
