import { enforceIntervalFloor } from '../../config/env.js';
import type { RunSummary } from '../../types/ingestion.js';
import { logger } from '../../utils/logger.js';
import { ingestionTicksSkipped } from '../../utils/metrics.js';

/**
 * Anything that performs one ingestion run
 */
export interface IngestionRunner {
  run(signal?: AbortSignal): Promise<RunSummary>;
}

export interface IngestionScheduleJobConfig {
  /** Seconds between ticks; values under the floor are clamped */
  intervalSeconds: number;
  /** Run once immediately on start (default: true) */
  runOnStart?: boolean;
}

/**
 * Background job driving the ingestion engine on a fixed interval.
 *
 * Single flight: a tick that finds a run still active is skipped, not queued.
 * A run that throws is logged and the loop keeps ticking at the same pace,
 * with no backoff and no retry ceiling; the next tick is the retry.
 */
export class IngestionScheduleJob {
  private readonly runner: IngestionRunner;
  private readonly runOnStart: boolean;
  readonly intervalMs: number;
  private intervalId: NodeJS.Timeout | null = null;
  private activeRun: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private detachSignal: (() => void) | null = null;

  constructor(runner: IngestionRunner, config: IngestionScheduleJobConfig) {
    this.runner = runner;
    this.runOnStart = config.runOnStart ?? true;
    this.intervalMs = enforceIntervalFloor(config.intervalSeconds) * 1000;
  }

  /**
   * Start the background job
   *
   * @param signal - Stops the job when aborted (e.g. on process shutdown)
   */
  start(signal?: AbortSignal): void {
    if (this.intervalId) {
      logger.warn('IngestionScheduleJob already running');
      return;
    }
    if (signal?.aborted) {
      return;
    }

    this.abortController = new AbortController();

    if (signal) {
      const onAbort = (): void => {
        this.stop().catch((error: unknown) => {
          logger.error({ err: error }, 'Error stopping ingestion schedule job');
        });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.detachSignal = () => signal.removeEventListener('abort', onAbort);
    }

    this.intervalId = setInterval(() => this.tick(), this.intervalMs);
    logger.info({ intervalSeconds: this.intervalMs / 1000 }, 'IngestionScheduleJob started');

    if (this.runOnStart) {
      this.tick();
    }
  }

  /**
   * Stop ticking and wait for the in-flight run. The run is signalled to stop
   * taking new objects; objects already in flight are finished.
   */
  async stop(): Promise<void> {
    if (!this.intervalId) {
      return;
    }

    clearInterval(this.intervalId);
    this.intervalId = null;
    this.detachSignal?.();
    this.detachSignal = null;
    this.abortController?.abort();

    if (this.activeRun) {
      logger.info('Waiting for in-flight ingestion run to finish');
      await this.activeRun;
    }

    this.abortController = null;
    logger.info('IngestionScheduleJob stopped');
  }

  isStarted(): boolean {
    return this.intervalId !== null;
  }

  isRunInProgress(): boolean {
    return this.activeRun !== null;
  }

  private tick(): void {
    if (this.activeRun) {
      ingestionTicksSkipped.inc();
      logger.warn('Previous ingestion run still in progress, skipping tick');
      return;
    }

    const signal = this.abortController?.signal;
    this.activeRun = this.runSafely(signal).finally(() => {
      this.activeRun = null;
    });
  }

  private async runSafely(signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.runner.run(signal);
    } catch (error) {
      logger.error({ err: error }, 'Ingestion run failed; retrying on next tick');
    }
  }
}
