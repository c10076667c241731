import { randomUUID } from 'crypto';
import { ThroughputResult } from '../types/diagnostics';
import { describeError } from '../types/errors';
import { Logger } from '../logging/error-handler';
import { failure } from '../diagnostics/throughput';

export type JobState = 'running' | 'done';

export interface ThroughputJob {
  id: string;
  state: JobState;
  started_at: string;
  finished_at?: string;
  result?: ThroughputResult;
}

export interface ThroughputJobsOptions {
  maxJobs?: number;
  newId?: () => string;
  now?: () => Date;
}

/**
 * Runs speedtests in the background so a request never waits on one.
 * Callers poll with get(id). Only one measurement runs at a time: parallel
 * runs would share the link and each report a fraction of it.
 */
export class ThroughputJobs {
  private jobs: Map<string, ThroughputJob> = new Map();
  private pending: Map<string, Promise<void>> = new Map();
  private readonly maxJobs: number;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly measure: () => Promise<ThroughputResult>,
    private readonly logger: Logger,
    opts: ThroughputJobsOptions = {}
  ) {
    this.maxJobs = opts.maxJobs ?? 20;
    this.newId = opts.newId ?? (() => randomUUID());
    this.now = opts.now ?? (() => new Date());
  }

  /** Starts a measurement, or returns the one already in flight. */
  start(): ThroughputJob {
    const active = this.running();
    if (active) {
      this.logger.debug(`Speedtest job ${active.id} already running`);
      return active;
    }

    const job: ThroughputJob = {
      id: this.newId(),
      state: 'running',
      started_at: this.now().toISOString()
    };
    this.jobs.set(job.id, job);
    this.prune();
    this.logger.info(`Speedtest job ${job.id} started`);

    const settled = this.measure()
      .catch((error: unknown) => failure('other', `Speedtest failed: ${describeError(error)}`))
      .then(result => {
        job.state = 'done';
        job.result = result;
        job.finished_at = this.now().toISOString();
        this.pending.delete(job.id);
        this.logger.info(`Speedtest job ${job.id} finished`, { success: result.success });
      });
    this.pending.set(job.id, settled);

    return { ...job };
  }

  running(): ThroughputJob | undefined {
    const [id] = this.pending.keys();
    return id === undefined ? undefined : this.get(id);
  }

  get(id: string): ThroughputJob | undefined {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }

  async whenSettled(id: string): Promise<ThroughputJob | undefined> {
    await this.pending.get(id);
    return this.get(id);
  }

  list(): ThroughputJob[] {
    return Array.from(this.jobs.values(), job => ({ ...job }));
  }

  // Drops the oldest finished jobs once the registry is over capacity.
  private prune(): void {
    for (const [id, job] of this.jobs) {
      if (this.jobs.size <= this.maxJobs) {
        return;
      }
      if (job.state === 'done') {
        this.jobs.delete(id);
      }
    }
  }
}
