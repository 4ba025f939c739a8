import { Cron } from 'croner';
import { logger, errorMessage } from '../utils/logger.js';

export type JobCallback = (job: Job) => void | Promise<void>;

/**
 * One-shot trigger: an absolute instant, or a delay in seconds from now
 */
export type OneShotWhen = Date | number;

export interface JobOptions {
  /** Opaque payload handed to the callback as `job.context` */
  context?: unknown;
  name?: string;
}

export interface RepeatingJobOptions extends JobOptions {
  /** Delay before the first run, in seconds (default 0) */
  first?: number;
}

export type JobErrorReporter = (error: unknown, job: Job) => void;

// Every second; the interval option spaces the actual runs
const EVERY_SECOND = '* * * * * *';

/**
 * A scheduled unit of work backed by a croner job.
 *
 * Cancellation is cooperative: it stops future runs but never interrupts a
 * run already in progress.
 */
export class Job {
  private cron: Cron | undefined;
  private _removed = false;
  private _runs = 0;

  constructor(
    readonly name: string,
    private readonly callback: JobCallback,
    readonly context: unknown,
    readonly repeating: boolean,
    private readonly onRemoved: (job: Job) => void,
    private readonly onError: JobErrorReporter
  ) {}

  get removed(): boolean {
    return this._removed;
  }

  /** Number of runs started so far */
  get runs(): number {
    return this._runs;
  }

  /** Next planned run, or null once nothing is left to run */
  get nextRun(): Date | null {
    return this.cron?.nextRun() ?? null;
  }

  /**
   * Stop future runs and drop the job from its queue
   */
  cancel(): void {
    if (this._removed) return;
    this._removed = true;
    this.cron?.stop();
    this.cron = undefined;
    this.onRemoved(this);
  }

  /** @internal */
  startOnce(at: Date): void {
    const fire = async (): Promise<void> => {
      try {
        await this.run();
      } finally {
        this.cancel();
      }
    };

    if (at.getTime() > Date.now()) {
      this.cron = new Cron(at, { maxRuns: 1 }, fire);
      return;
    }

    // Already due: croner never schedules an instant in the past
    this.cron = new Cron(EVERY_SECOND, { paused: true, maxRuns: 1 }, fire);
    void this.cron.trigger();
  }

  /** @internal */
  startRepeating(firstSeconds: number, intervalSeconds: number): void {
    this.cron = new Cron(
      EVERY_SECOND,
      {
        interval: intervalSeconds,
        ...(firstSeconds > 0 ? { startAt: new Date(Date.now() + firstSeconds * 1000) } : {}),
      },
      () => this.run()
    );
  }

  private async run(): Promise<void> {
    if (this._removed) return;
    this._runs++;
    try {
      await this.callback(this);
    } catch (error) {
      this.onError(error, this);
    }
  }
}

function toRunDate(when: OneShotWhen): Date {
  if (when instanceof Date) {
    if (Number.isNaN(when.getTime())) {
      throw new Error('Job date is invalid');
    }
    return when;
  }
  if (!Number.isFinite(when)) {
    throw new Error(`Job delay must be a finite number of seconds, got ${String(when)}`);
  }
  return new Date(Date.now() + Math.max(0, when) * 1000);
}

/**
 * Job queue shared by every plugin, scheduled with croner.
 *
 * Jobs run independently of event dispatch and of each other, with second
 * resolution. Names are not unique: several jobs may share one, so they are
 * kept here rather than in croner's named job list.
 */
export class JobQueue {
  private readonly active = new Set<Job>();

  constructor(private readonly reportError?: JobErrorReporter) {}

  runOnce(callback: JobCallback, when: OneShotWhen, options: JobOptions = {}): Job {
    const at = toRunDate(when);
    const job = this.createJob(callback, options, false);
    job.startOnce(at);
    logger.debug('Scheduled one-shot job', { job: job.name, at: at.toISOString() });
    return job;
  }

  /**
   * Run `callback` every `intervalSeconds` (rounded up to whole seconds)
   */
  runRepeating(callback: JobCallback, intervalSeconds: number, options: RepeatingJobOptions = {}): Job {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new Error(`Job interval must be positive, got ${String(intervalSeconds)}`);
    }
    const first = options.first ?? 0;
    if (!Number.isFinite(first)) {
      throw new Error(`Job delay must be a finite number of seconds, got ${String(first)}`);
    }
    const interval = Math.ceil(intervalSeconds);
    const job = this.createJob(callback, options, true);
    job.startRepeating(Math.max(0, first), interval);
    logger.debug('Scheduled repeating job', { job: job.name, intervalSeconds: interval });
    return job;
  }

  /**
   * All scheduled jobs, in scheduling order
   */
  jobs(): Job[] {
    return Array.from(this.active);
  }

  getJobsByName(name: string): Job[] {
    return this.jobs().filter((job) => job.name === name);
  }

  /**
   * Cancel every job
   */
  stop(): void {
    for (const job of this.jobs()) {
      job.cancel();
    }
  }

  private createJob(callback: JobCallback, options: JobOptions, repeating: boolean): Job {
    const job = new Job(
      options.name || 'job',
      callback,
      options.context,
      repeating,
      (removed) => {
        this.active.delete(removed);
      },
      (error, failed) => {
        logger.error('Scheduled job failed', { job: failed.name, error: errorMessage(error) });
        this.reportError?.(error, failed);
      }
    );
    this.active.add(job);
    return job;
  }
}
