import { createLogger, type Logger } from '../utils/logger';

export type RunTask = () => Promise<unknown>;

/**
 * Repeats a producer run on a fixed interval.
 * A tick that fires while the previous run is still going is skipped, so runs never overlap.
 */
export class RunScheduler {
  private readonly task: RunTask;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private refreshTimer?: NodeJS.Timeout;
  private running = false;
  private current?: Promise<void>;

  constructor(task: RunTask, intervalMs: number) {
    this.task = task;
    this.intervalMs = intervalMs;
    this.logger = createLogger({ component: 'RunScheduler' });
  }

  /**
   * Run once immediately, then on every interval
   */
  start(): void {
    if (this.refreshTimer) {
      this.logger.warn('Scheduler already running');
      return;
    }

    this.logger.info({ intervalMs: this.intervalMs }, 'Starting scheduled runs');
    this.refreshTimer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    this.tick();
  }

  /**
   * Stop scheduling; resolves once any run in progress has finished
   */
  async stop(): Promise<void> {
    if (this.refreshTimer) {
      this.logger.info('Stopping scheduled runs');
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
    }
    await this.current;
  }

  isRunning(): boolean {
    return this.refreshTimer !== undefined;
  }

  private tick(): void {
    if (this.running) {
      this.logger.warn('Previous run still in progress, skipping this tick');
      return;
    }
    this.running = true;
    this.current = this.task()
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error({ error }, 'Scheduled run failed');
      })
      .finally(() => {
        this.running = false;
      });
  }
}
