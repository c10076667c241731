/**
 * HTTP surface for the browser terminal. Exposes the command dispatcher and
 * the background speedtest jobs as JSON endpoints.
 */

import * as http from 'http';
import { z } from 'zod';
import { CommandDispatcher } from '../core/dispatcher';
import { ThroughputJobs } from '../core/throughput-jobs';
import { Logger } from '../logging/error-handler';
import { describeError } from '../types/errors';

const MAX_BODY_SIZE = 8192;

const CommandBodySchema = z.object({
  command: z.string().optional()
}).passthrough();

export interface ApiResponse {
  status: number;
  payload: unknown;
}

export async function handleCommandRequest(
  body: unknown,
  dispatcher: CommandDispatcher,
  logger: Logger
): Promise<ApiResponse> {
  const parsed = CommandBodySchema.safeParse(body);
  const command = parsed.success ? (parsed.data.command ?? '').trim() : '';
  if (!command) {
    return { status: 400, payload: { output: '', error: 'No command provided' } };
  }

  try {
    const result = await dispatcher.dispatch(command);
    return { status: 200, payload: { output: result.output, error: null } };
  } catch (error) {
    logger.error(`Command failed: ${command}`, error);
    return { status: 500, payload: { output: '', error: describeError(error) } };
  }
}

// 202 for a new measurement, 200 with the job already in flight otherwise
export function handleSpeedtestStart(jobs: ThroughputJobs): ApiResponse {
  const active = jobs.running();
  if (active) {
    return { status: 200, payload: active };
  }
  return { status: 202, payload: jobs.start() };
}

export function handleSpeedtestStatus(jobs: ThroughputJobs, id: string): ApiResponse {
  const job = jobs.get(id);
  if (!job) {
    return { status: 404, payload: { error: `Unknown speedtest job: ${id}` } };
  }
  return { status: 200, payload: job };
}

function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(error);
      }
    });
    req.on('error', reject);
  });
}

export class SysTrackServer {
  private server: http.Server | null = null;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly jobs: ThroughputJobs,
    private readonly logger: Logger
  ) {}

  async route(method: string, url: string, req: http.IncomingMessage): Promise<ApiResponse> {
    const pathname = new URL(url, 'http://localhost').pathname;

    if (method === 'POST' && pathname === '/api/command') {
      let body: unknown;
      try {
        body = await readJsonBody(req);
      } catch (error) {
        return { status: 400, payload: { output: '', error: `Invalid request body: ${describeError(error)}` } };
      }
      return handleCommandRequest(body, this.dispatcher, this.logger);
    }
    if (method === 'POST' && pathname === '/api/speedtest') {
      return handleSpeedtestStart(this.jobs);
    }
    const jobMatch = /^\/api\/speedtest\/([A-Za-z0-9-]+)$/.exec(pathname);
    if (method === 'GET' && jobMatch) {
      return handleSpeedtestStatus(this.jobs, jobMatch[1]);
    }
    return { status: 404, payload: { error: 'Not found' } };
  }

  start(port: number, bind: string): Promise<number> {
    this.server = http.createServer((req, res) => {
      this.route(req.method ?? 'GET', req.url ?? '/', req)
        .catch((error: unknown): ApiResponse => {
          this.logger.error('Unhandled request error', error);
          return { status: 500, payload: { output: '', error: describeError(error) } };
        })
        .then(({ status, payload }) => {
          res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' });
          res.end(JSON.stringify(payload));
        })
        .catch((error: unknown) => this.logger.error('Failed to write response', error));
    });

    return new Promise((resolve, reject) => {
      this.server?.once('error', reject);
      this.server?.listen(port, bind, () => {
        const address = this.server?.address();
        const actualPort = typeof address === 'object' && address ? address.port : port;
        this.logger.info(`SysTrack web API listening on http://${bind}:${actualPort}`);
        resolve(actualPort);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(error => (error ? reject(error) : resolve()));
      this.server = null;
    });
  }
}
