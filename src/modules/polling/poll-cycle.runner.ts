import { Logger } from '@nestjs/common';

import {
  type IPollCycle,
  type IPollCycleRunnerOptions,
  type IPollCycleStatus,
  type ITickReport,
  PollCycleState,
} from './polling.interfaces';
import type { MetricsService } from '../../observability/metrics.service';

/**
 * Drives one cycle on a fixed interval. A tick that fires while the previous one
 * is still running is skipped, never queued.
 */
export class PollCycleRunner {
  private readonly logger: Logger;
  private state: PollCycleState = PollCycleState.IDLE;
  private stopping: boolean = false;
  private inFlight: Promise<void> | null = null;
  private initialTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private completedTicks: number = 0;
  private skippedTicks: number = 0;
  private failedTicks: number = 0;
  private lastTickStartedAt: Date | null = null;
  private lastTickFinishedAt: Date | null = null;
  private lastReport: ITickReport | null = null;

  public constructor(
    private readonly cycle: IPollCycle,
    private readonly options: IPollCycleRunnerOptions,
    private readonly metricsService: MetricsService,
  ) {
    this.logger = new Logger(`PollCycleRunner:${cycle.name}`);
  }

  public start(): void {
    if (!this.options.enabled) {
      this.state = PollCycleState.SUSPENDED;
      this.logger.log(`poll cycle suspended by config cycle=${this.cycle.name}`);
      return;
    }

    this.initialTimer = setTimeout((): void => {
      this.initialTimer = null;
      void this.trigger();
      this.intervalTimer = setInterval((): void => {
        void this.trigger();
      }, this.options.intervalMs);
    }, this.options.initialDelayMs);

    this.logger.log(
      `poll cycle scheduled cycle=${this.cycle.name} intervalMs=${String(this.options.intervalMs)} initialDelayMs=${String(this.options.initialDelayMs)}`,
    );
  }

  /** Resolves when the started tick settles, or immediately when skipped. */
  public trigger(): Promise<void> {
    if (this.stopping || this.state === PollCycleState.SUSPENDED) {
      return Promise.resolve();
    }

    if (this.state === PollCycleState.RUNNING) {
      this.skippedTicks += 1;
      this.metricsService.pollTicksTotal.inc({ cycle: this.cycle.name, outcome: 'skipped' });
      this.logger.warn(
        `poll tick skipped, previous still running cycle=${this.cycle.name} skipped=${String(this.skippedTicks)}`,
      );
      return Promise.resolve();
    }

    this.state = PollCycleState.RUNNING;
    const tick: Promise<void> = this.execute().finally((): void => {
      this.state = PollCycleState.IDLE;
      this.inFlight = null;
    });
    this.inFlight = tick;

    return tick;
  }

  /** Stops the timers and waits for an in-flight tick to settle. */
  public async stop(): Promise<void> {
    this.stopping = true;

    if (this.initialTimer !== null) {
      clearTimeout(this.initialTimer);
      this.initialTimer = null;
    }

    if (this.intervalTimer !== null) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }

    if (this.inFlight !== null) {
      this.logger.log(`waiting for in-flight tick cycle=${this.cycle.name}`);
      await this.inFlight;
    }
  }

  public getStatus(): IPollCycleStatus {
    return {
      cycle: this.cycle.name,
      state: this.state,
      intervalMs: this.options.intervalMs,
      completedTicks: this.completedTicks,
      skippedTicks: this.skippedTicks,
      failedTicks: this.failedTicks,
      lastTickStartedAt: this.lastTickStartedAt,
      lastTickFinishedAt: this.lastTickFinishedAt,
      lastReport: this.lastReport,
    };
  }

  private async execute(): Promise<void> {
    const startedAt: Date = new Date();
    const stopTimer = this.metricsService.pollTickDurationSeconds.startTimer({
      cycle: this.cycle.name,
    });
    let outcome: string = 'failed';
    this.lastTickStartedAt = startedAt;

    try {
      const report: ITickReport = await this.cycle.runTick({
        startedAt,
        isStopping: (): boolean => this.stopping,
      });
      this.lastReport = report;

      if (report.abandoned) {
        outcome = 'abandoned';
      } else {
        outcome = 'completed';
        this.completedTicks += 1;
      }
    } catch (error: unknown) {
      this.failedTicks += 1;
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`poll tick failed cycle=${this.cycle.name} reason=${errorMessage}`);
    } finally {
      stopTimer();
      this.lastTickFinishedAt = new Date();
      this.metricsService.pollTicksTotal.inc({ cycle: this.cycle.name, outcome });
    }
  }
}
