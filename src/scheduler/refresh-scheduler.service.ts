import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { StateStoreService } from '../state/state-store.service';
import { SnapshotCaptureError, describeError, errorMessage } from '../types/error-taxonomy';

export type SchedulerPhase = 'idle' | 'scheduled' | 'running' | 'cancelled';

/**
 * Self-rescheduling refresh loop.
 *
 * The next cycle is armed only after the current one settles, so a slow
 * refresh delays the following one instead of overlapping it. Cancellation
 * is terminal and never interrupts a cycle that is already running.
 */
@Injectable()
export class RefreshSchedulerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RefreshSchedulerService.name);
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private phase: SchedulerPhase = 'idle';
  private consecutiveFailures = 0;

  constructor(
    private readonly store: StateStoreService,
    private readonly config: ConfigService,
  ) {}

  onApplicationBootstrap() {
    if (this.config.schedulerEnabled) {
      this.start();
    } else {
      this.logger.warn('Scheduler is disabled (SCHEDULER_ENABLED=false)');
    }
  }

  async onModuleDestroy() {
    await this.stop();
  }

  get state(): SchedulerPhase {
    return this.phase;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  /**
   * Run the first cycle right away, then every interval after the previous one
   */
  start(): void {
    if (this.phase !== 'idle') {
      return;
    }

    this.logger.log(`Starting refresh loop: interval=${this.config.pollingIntervalMs}ms`);
    this.schedule(0);
  }

  /**
   * Prevent any further cycle. Safe to call repeatedly and before start().
   */
  cancel(): void {
    if (this.phase === 'cancelled') {
      return;
    }

    const wasRunning = this.phase === 'running';
    this.phase = 'cancelled';

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.logger.log(
      wasRunning
        ? 'Refresh loop cancelled, letting the running cycle finish'
        : 'Refresh loop cancelled',
    );
  }

  /**
   * Cancel and wait for the cycle in flight, if any
   */
  async stop(): Promise<void> {
    this.cancel();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private schedule(delayMs: number): void {
    this.phase = 'scheduled';
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runCycle();
    }, delayMs);
  }

  private async runCycle(): Promise<void> {
    if (this.phase !== 'scheduled') {
      return;
    }

    this.phase = 'running';
    try {
      await this.store.refresh();
      this.consecutiveFailures = 0;
    } catch (error) {
      this.consecutiveFailures++;
      if (error instanceof SnapshotCaptureError) {
        this.logger.error(describeError(error.code, error.message));
      } else {
        this.logger.error(
          `Refresh cycle failed: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
    } finally {
      this.inFlight = null;
      if (this.phase === 'running') {
        this.schedule(this.config.pollingIntervalMs);
      }
    }
  }
}
