import { errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import type { AllocationJob } from './allocationJob.js';

export interface SchedulerOptions {
  intervalMinutes: number;
  runOnStartup: boolean;
}

export interface SchedulerStatus {
  active: boolean;
  intervalMinutes: number;
  lastTickAtUtc: string | null;
  skippedTicks: number;
}

export class AllocationScheduler {
  private timer: NodeJS.Timeout | null = null;
  private lastTickAtUtc: string | null = null;
  private skippedTicks = 0;

  constructor(
    private readonly job: AllocationJob,
    private readonly options: SchedulerOptions
  ) {}

  start(): () => void {
    if (!this.timer) {
      this.timer = setInterval(() => this.tick('interval'), this.options.intervalMinutes * 60_000);
      logger.info('allocation_scheduler_started', { ...this.options });
      if (this.options.runOnStartup) {
        this.tick('startup');
      }
    }
    return () => this.stop();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('allocation_scheduler_stopped');
    }
  }

  status(): SchedulerStatus {
    return {
      active: this.timer !== null,
      intervalMinutes: this.options.intervalMinutes,
      lastTickAtUtc: this.lastTickAtUtc,
      skippedTicks: this.skippedTicks
    };
  }

  tick(trigger: 'startup' | 'interval' = 'interval'): void {
    this.lastTickAtUtc = new Date().toISOString();

    if (this.job.isRunning) {
      this.skippedTicks += 1;
      logger.warn('allocation_tick_skipped', { trigger, reason: 'run_in_progress' });
      return;
    }

    this.job.runOnce().catch((error: unknown) => {
      logger.error('allocation_tick_failed', { trigger, error: errorMessage(error) });
    });
  }
}
