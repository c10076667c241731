import { NetworkResult } from '../types/diagnostics';
import { ProbeUnavailableError } from '../types/errors';
import { Logger } from '../logging/error-handler';
import { CommandRunner, execCommand } from './command-runner';

export const DEFAULT_PING_HOST = 'google.com';
export const DEFAULT_PING_TIMEOUT_SECONDS = 3;

const LATENCY_PATTERN = /time[<=](\d+\.?\d*)/i;

/** Round-trip time in ms from ping output, or null when none is printed. */
export function parseLatency(output: string): number | null {
  const match = LATENCY_PATTERN.exec(output);
  if (!match) {
    return null;
  }
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

export function pingArgs(platform: NodeJS.Platform, host: string, timeoutSeconds: number): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(timeoutSeconds * 1000), host];
  }
  if (platform === 'darwin') {
    // -W is in milliseconds on macOS; -t bounds the whole run in seconds
    return ['-c', '1', '-t', String(timeoutSeconds), host];
  }
  return ['-c', '1', '-W', String(timeoutSeconds), host];
}

const offline = (host: string, message: string): NetworkResult => ({
  online: false,
  host,
  latency_ms: null,
  message
});

export interface ReachabilityOptions {
  graceSeconds?: number;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

export class ReachabilityProbe {
  private readonly graceSeconds: number;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(private readonly logger: Logger, opts: ReachabilityOptions = {}) {
    this.graceSeconds = opts.graceSeconds ?? 1;
    this.platform = opts.platform ?? process.platform;
    this.run = opts.run ?? execCommand;
  }

  async checkReachability(
    host: string = DEFAULT_PING_HOST,
    timeoutSeconds: number = DEFAULT_PING_TIMEOUT_SECONDS,
    signal?: AbortSignal
  ): Promise<NetworkResult> {
    const args = pingArgs(this.platform, host, timeoutSeconds);
    this.logger.debug(`Pinging ${host}`, { args });

    const outcome = await this.run('ping', args, {
      timeoutMs: (timeoutSeconds + this.graceSeconds) * 1000,
      signal
    });

    switch (outcome.kind) {
      case 'missing':
        throw new ProbeUnavailableError(host);
      case 'timeout':
        this.logger.warn(`Ping to ${host} timed out after ${timeoutSeconds}s`);
        return offline(host, `Offline (Timeout connecting to ${host})`);
      case 'failed':
        this.logger.warn(`Ping to ${host} failed`, { detail: outcome.detail });
        return offline(host, `Offline (Error: ${outcome.detail})`);
      case 'exited':
        if (outcome.exitCode !== 0) {
          this.logger.info(`Ping to ${host} exited with status ${outcome.exitCode}`);
          return offline(host, `Offline (Unable to reach ${host})`);
        }
        return this.online(host, parseLatency(outcome.stdout));
    }
  }

  private online(host: string, latency: number | null): NetworkResult {
    return {
      online: true,
      host,
      latency_ms: latency,
      message: latency === null
        ? `Online (Ping ${host}: Success)`
        : `Online (Ping ${host}: ${latency.toFixed(0)}ms)`
    };
  }
}
