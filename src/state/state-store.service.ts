import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DifferRegistry } from '../differs/differ-registry';
import { StateFileService } from '../persistence/state-file.service';
import { SNAPSHOT_SOURCE, SnapshotSource } from '../snapshot/snapshot-source';
import type { DiffResult, RefreshState, Snapshot } from '../types/snapshot';

const EMPTY_STATE: RefreshState = Object.freeze({ diff: Object.freeze({}) });

/**
 * Holds the published RefreshState and runs refresh cycles.
 *
 * The state is replaced by a single reference assignment at the end of a
 * cycle, so readers calling current() get either the previous or the new
 * state as a whole. This service is the only writer.
 */
@Injectable()
export class StateStoreService implements OnModuleInit {
  private readonly logger = new Logger(StateStoreService.name);
  private state: RefreshState = EMPTY_STATE;
  private refreshing = false;

  constructor(
    @Inject(SNAPSHOT_SOURCE) private readonly source: SnapshotSource,
    private readonly registry: DifferRegistry,
    private readonly stateFile: StateFileService,
  ) {}

  async onModuleInit() {
    await this.initialize();
  }

  /**
   * Seed the state from the persisted snapshot, if there is a usable one.
   * With a baseline, the first cycle compares against it instead of
   * reporting every value as newly appeared.
   */
  async initialize(): Promise<void> {
    const baseline = await this.stateFile.load();

    this.state = Object.freeze({ old: baseline, new: baseline, diff: Object.freeze({}) });

    if (baseline) {
      this.logger.log(`Loaded baseline with ${Object.keys(baseline).length} interfaces`);
    } else {
      this.logger.log('Starting without a baseline');
    }
  }

  current(): RefreshState {
    return this.state;
  }

  /**
   * Run one cycle: capture, diff, persist, publish.
   *
   * Not reentrant. If the capture fails the error propagates and the
   * published state is left untouched; a failed save is logged by the
   * state file service and does not stop publication.
   */
  async refresh(): Promise<RefreshState> {
    if (this.refreshing) {
      throw new Error('Refresh already in progress');
    }

    this.refreshing = true;
    try {
      this.logger.debug('Refreshing state');
      const previous = this.state;
      const snapshot = await this.source.capture();
      const diff = this.runDiffers(previous.new, snapshot);

      await this.stateFile.save(snapshot);

      const next: RefreshState = Object.freeze({
        old: previous.new,
        new: snapshot,
        diff,
        refreshedAt: new Date().toISOString(),
      });
      this.state = next;

      const changed = Object.keys(diff).filter((name) => diff[name] === 1);
      this.logger.log(
        changed.length > 0
          ? `Refreshed ${Object.keys(snapshot).length} interfaces, changed: ${changed.join(', ')}`
          : `Refreshed ${Object.keys(snapshot).length} interfaces, no changes`,
      );

      return next;
    } finally {
      this.refreshing = false;
    }
  }

  private runDiffers(
    oldSnapshot: Snapshot | undefined,
    newSnapshot: Snapshot,
  ): Readonly<Record<string, DiffResult>> {
    const diff: Record<string, DiffResult> = {};

    for (const differ of this.registry.differs) {
      const name = differ.name();
      const oldValue = differ.get(oldSnapshot);
      const newValue = differ.get(newSnapshot);
      const result = differ.diff(oldValue, newValue);
      diff[name] = result;

      this.logger.debug(
        `Ran differ ${name} with old value ${formatValue(oldValue)} new value ${formatValue(newValue)} and diff ${result}`,
      );
    }

    return Object.freeze(diff);
  }
}

function formatValue(value: unknown): string {
  return value === undefined ? 'none' : String(value);
}
