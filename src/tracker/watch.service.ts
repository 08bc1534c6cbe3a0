import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { getErrorMessage } from '../common/errors';
import { RunSummary, TrackOptions } from './interfaces/listing.interface';
import { TrackerService } from './tracker.service';

export const WATCH_INTERVAL_NAME = 'price-tracking';

/**
 * Repeats tracking runs on a fixed interval until the process is stopped.
 */
@Injectable()
export class WatchService implements OnApplicationShutdown {
  private readonly logger = new Logger(WatchService.name);

  constructor(
    private readonly trackerService: TrackerService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  /**
   * Runs once right away, then every `intervalMinutes`. When the first run
   * throws, nothing is scheduled.
   */
  async start(options: TrackOptions, intervalMinutes: number): Promise<RunSummary> {
    const summary = await this.trackerService.track(options);

    const interval = setInterval(() => {
      this.logger.log('Running scheduled tracking...');
      this.trackerService.track(options).catch((error: unknown) => {
        this.logger.error(`Scheduled tracking failed: ${getErrorMessage(error)}`);
      });
    }, intervalMinutes * 60_000);
    this.schedulerRegistry.addInterval(WATCH_INTERVAL_NAME, interval);

    this.logger.log(`Tracking every ${intervalMinutes} minute(s); stop with Ctrl+C`);
    return summary;
  }

  stop(): void {
    if (this.schedulerRegistry.doesExist('interval', WATCH_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(WATCH_INTERVAL_NAME);
      this.logger.log('Stopped scheduled tracking');
    }
  }

  onApplicationShutdown(): void {
    this.stop();
  }
}
