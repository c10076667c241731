import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import type { SpeedtestConfig } from "../types/schemas";

export const OoklaServerSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  url: z.string().url(),
  name: z.string().default("Unknown"),
  country: z.string().default("Unknown"),
  sponsor: z.string().default("Unknown"),
  distance: z.number().nonnegative().default(0),
});

export type OoklaServer = z.infer<typeof OoklaServerSchema>;

export interface ServerSelection {
  server: OoklaServer;
  latencyMs: number;
}

/** Measurement operations used by the throughput probe. */
export interface SpeedtestClient {
  selectBestServer(): Promise<ServerSelection>;
  /** Average download rate in bytes per second. */
  download(server: OoklaServer): Promise<number>;
  /** Average upload rate in bytes per second. */
  upload(server: OoklaServer): Promise<number>;
}

const LATENCY_SAMPLES = 3;

export class OoklaSpeedtestClient implements SpeedtestClient {
  private client: AxiosInstance;

  constructor(
    private readonly config: SpeedtestConfig,
    private readonly now: () => number = () => performance.now()
  ) {
    this.client = axios.create({
      timeout: config.request_timeout_ms,
      headers: {
        'User-Agent': 'systrack/1.0 (speedtest)',
        'Cache-Control': 'no-cache'
      }
    });
  }

  async getServers(): Promise<OoklaServer[]> {
    const response = await this.client.get<unknown>(this.config.servers_url);
    const servers = z.array(OoklaServerSchema).parse(response.data);
    if (servers.length === 0) {
      throw new Error('Speedtest server list is empty');
    }
    return servers;
  }

  async selectBestServer(): Promise<ServerSelection> {
    const closest = (await this.getServers())
      .sort((a, b) => a.distance - b.distance)
      .slice(0, this.config.candidate_servers);

    let best: ServerSelection | undefined;
    let lastError: unknown;
    for (const server of closest) {
      try {
        const latencyMs = await this.measureLatency(server);
        if (!best || latencyMs < best.latencyMs) {
          best = { server, latencyMs };
        }
      } catch (error) {
        lastError = error;
      }
    }
    if (!best) {
      throw lastError ?? new Error('No speedtest server answered the latency check');
    }
    return best;
  }

  async download(server: OoklaServer): Promise<number> {
    const base = serverBaseUrl(server);
    let bytes = 0;
    const started = this.now();
    for (const size of this.config.download_sizes) {
      const response = await this.client.get<ArrayBuffer>(`${base}/random${size}x${size}.jpg`, {
        responseType: 'arraybuffer',
        params: { x: Date.now() }
      });
      bytes += response.data.byteLength;
    }
    return rate(bytes, this.now() - started);
  }

  async upload(server: OoklaServer): Promise<number> {
    const payload = Buffer.alloc(this.config.upload_bytes, 'x');
    const started = this.now();
    await this.client.post(server.url, payload, {
      headers: { 'Content-Type': 'application/octet-stream' },
      params: { x: Date.now() },
      maxBodyLength: Infinity
    });
    return rate(payload.length, this.now() - started);
  }

  private async measureLatency(server: OoklaServer): Promise<number> {
    const base = serverBaseUrl(server);
    let total = 0;
    for (let i = 0; i < LATENCY_SAMPLES; i++) {
      const started = this.now();
      await this.client.get(`${base}/latency.txt`, { params: { x: Date.now() } });
      total += this.now() - started;
    }
    return total / LATENCY_SAMPLES;
  }
}

export function serverBaseUrl(server: OoklaServer): string {
  return server.url.replace(/\/[^/]*$/, '');
}

function rate(bytes: number, elapsedMs: number): number {
  return elapsedMs > 0 ? bytes / (elapsedMs / 1000) : 0;
}
