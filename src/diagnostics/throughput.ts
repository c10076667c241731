import axios from 'axios';
import { ThroughputErrorKind, ThroughputFailure, ThroughputResult } from '../types/diagnostics';
import { describeError, errorCode } from '../types/errors';
import type { SpeedtestConfig } from '../types/schemas';
import type { SpeedtestClient } from '../integrations/ookla';
import { Logger } from '../logging/error-handler';
import { round } from './metrics-collector';

export type SpeedtestClientLoader = () => Promise<SpeedtestClient>;

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENETUNREACH',
  'EHOSTUNREACH'
]);

export function toMbps(bytesPerSecond: number): number {
  return round((bytesPerSecond * 8) / 1_000_000, 2);
}

export function cityOf(serverName: string): string {
  const comma = serverName.indexOf(',');
  return comma === -1 ? serverName : serverName.slice(0, comma);
}

export function failure(error_kind: ThroughputErrorKind, error: string): ThroughputFailure {
  return { success: false, error_kind, error };
}

export function classifyThroughputError(error: unknown): ThroughputFailure {
  const detail = describeError(error);
  const status = axios.isAxiosError(error) ? error.response?.status : undefined;

  if (status === 403 || (status === undefined && /\b403\b|forbidden/i.test(detail))) {
    return failure(
      'forbidden',
      'HTTP 403 Forbidden - speedtest servers blocked the request. This may be temporary, please try again later.'
    );
  }

  const code = errorCode(error);
  const unanswered = axios.isAxiosError(error)
    ? error.response === undefined && error.request !== undefined
    : false;
  if ((code !== undefined && CONNECTION_CODES.has(code)) || unanswered) {
    return failure(
      'connection-error',
      `Connection error - Unable to reach speedtest servers (${detail}). Check your internet connection.`
    );
  }

  return failure('other', `Speedtest failed: ${detail}`);
}

export function defaultSpeedtestLoader(config: SpeedtestConfig): SpeedtestClientLoader {
  return async () => {
    const { OoklaSpeedtestClient } = await import('../integrations/ookla');
    return new OoklaSpeedtestClient(config);
  };
}

/**
 * Bandwidth measurement against the speedtest.net server network.
 * Takes tens of seconds; failures come back as values, never as rejections.
 */
export class ThroughputProbe {
  constructor(
    private readonly logger: Logger,
    private readonly loadClient: SpeedtestClientLoader
  ) {}

  async measureThroughput(): Promise<ThroughputResult> {
    let client: SpeedtestClient;
    try {
      client = await this.loadClient();
    } catch (error) {
      this.logger.error('Speedtest client unavailable', error);
      return failure(
        'dependency-missing',
        `Speedtest client not available (${describeError(error)}). Reinstall systrack dependencies and try again.`
      );
    }

    try {
      this.logger.info('Selecting speedtest server');
      const { server, latencyMs } = await client.selectBestServer();
      this.logger.info(`Speedtest server selected: ${server.sponsor} (${server.name})`, { id: server.id });

      const download = await client.download(server);
      const upload = await client.upload(server);

      return {
        success: true,
        download_mbps: toMbps(download),
        upload_mbps: toMbps(upload),
        ping_ms: round(latencyMs, 2),
        server: {
          name: server.name,
          city: cityOf(server.name),
          sponsor: server.sponsor,
          country: server.country,
          distance_km: round(server.distance, 2),
          id: server.id
        }
      };
    } catch (error) {
      const result = classifyThroughputError(error);
      this.logger.warn(`Speedtest failed (${result.error_kind})`, { detail: describeError(error) });
      return result;
    }
  }
}
