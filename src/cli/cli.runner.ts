import { Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from '../common/errors';
import { PlotService } from '../plot/plot.service';
import { NoDataError } from '../tracker/errors/tracker.errors';
import { RunSummary } from '../tracker/interfaces/listing.interface';
import { TrackerService } from '../tracker/tracker.service';
import { WatchService } from '../tracker/watch.service';
import { CliCommand } from './cli.options';

/**
 * Executes a parsed command and maps its outcome to a process exit code.
 */
@Injectable()
export class CliRunner {
  private readonly logger = new Logger(CliRunner.name);

  constructor(
    private readonly trackerService: TrackerService,
    private readonly watchService: WatchService,
    private readonly plotService: PlotService,
  ) {}

  async run(command: Exclude<CliCommand, { mode: 'help' }>): Promise<number> {
    try {
      switch (command.mode) {
        case 'track':
          this.logSummary(await this.trackerService.track(command.track));
          return 0;
        case 'watch':
          this.logSummary(await this.watchService.start(command.track, command.intervalMinutes));
          return 0;
        case 'plot':
          await this.plotService.plot(command.plot);
          return 0;
      }
    } catch (error) {
      if (error instanceof NoDataError) {
        this.logger.warn(error.message);
        return 0;
      }
      this.logger.error(getErrorMessage(error));
      return 1;
    }
  }

  private logSummary(summary: RunSummary): void {
    for (const result of summary.results) {
      const outcome = result.error ? `skipped (${result.error})` : `${result.recorded} listing(s)`;
      this.logger.log(`${result.keyword}: ${outcome}`);
    }
  }
}
