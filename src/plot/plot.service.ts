import { Injectable, Logger } from '@nestjs/common';
import { HistoryStore } from '../history/history.store';
import { NoDataError } from '../tracker/errors/tracker.errors';
import { HistoryRecord } from '../tracker/interfaces/listing.interface';
import { ChartRenderer } from './chart/chart.renderer';
import { buildPriceChartSpec } from './chart/price-chart';

export interface PlotOptions {
  historyFile: string;
  keyword: string;
  chartFile: string;
  filteredOutput?: string;
}

export interface PlotResult {
  points: HistoryRecord[];
  chartFile: string;
}

/**
 * Records whose keyword or title contains `keyword`, ignoring case, in their
 * original order.
 */
export function selectRecords(records: readonly HistoryRecord[], keyword: string): HistoryRecord[] {
  const needle = keyword.trim().toLowerCase();
  return records.filter(
    (record) =>
      record.keyword.toLowerCase().includes(needle) || record.title.toLowerCase().includes(needle),
  );
}

@Injectable()
export class PlotService {
  private readonly logger = new Logger(PlotService.name);

  constructor(
    private readonly historyStore: HistoryStore,
    private readonly chartRenderer: ChartRenderer,
  ) {}

  /**
   * @throws NoDataError when no recorded listing matches the keyword
   */
  async plot(options: PlotOptions): Promise<PlotResult> {
    const records = await this.historyStore.readAll(options.historyFile);
    const points = selectRecords(records, options.keyword).sort(
      (a, b) => a.capturedAt.getTime() - b.capturedAt.getTime(),
    );
    if (points.length === 0) {
      throw new NoDataError(options.keyword);
    }
    this.logger.log(`${points.length} of ${records.length} record(s) match '${options.keyword}'`);

    if (options.filteredOutput) {
      await this.historyStore.writeRecords(options.filteredOutput, points);
      this.logger.log(`Filtered data saved to ${options.filteredOutput}`);
    }

    await this.chartRenderer.render(buildPriceChartSpec(options.keyword, points), options.chartFile);
    this.logger.log(`Price history chart written to ${options.chartFile}`);
    return { points, chartFile: options.chartFile };
  }
}
