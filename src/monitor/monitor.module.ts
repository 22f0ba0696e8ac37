import { Module } from '@nestjs/common';
import { DifferRegistry } from '../differs/differ-registry';
import { MetricsService } from '../metrics/metrics.service';
import { StateFileService } from '../persistence/state-file.service';
import { RefreshSchedulerService } from '../scheduler/refresh-scheduler.service';
import { OsSnapshotSource } from '../snapshot/os-snapshot.source';
import { SNAPSHOT_SOURCE } from '../snapshot/snapshot-source';
import { StateStoreService } from '../state/state-store.service';
import { MonitorController } from './monitor.controller';

/**
 * Change-detection engine and its HTTP read surface.
 * Every provider is a singleton created once per application context.
 */
@Module({
  controllers: [MonitorController],
  providers: [
    {
      provide: SNAPSHOT_SOURCE,
      useClass: OsSnapshotSource,
    },
    MetricsService,
    DifferRegistry,
    StateFileService,
    StateStoreService,
    RefreshSchedulerService,
  ],
  exports: [StateStoreService, RefreshSchedulerService, MetricsService],
})
export class MonitorModule {}
