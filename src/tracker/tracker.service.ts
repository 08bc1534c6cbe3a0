import { Inject, Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from '../common/errors';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { HistoryStore } from '../history/history.store';
import { FetchError } from './errors/tracker.errors';
import { MarketplaceFetcher } from './fetcher/marketplace.fetcher';
import { ProductListReader } from './input/product-list.reader';
import {
  DelayPolicy,
  KeywordResult,
  ProductQuery,
  RunSummary,
  TrackOptions,
} from './interfaces/listing.interface';
import { BaseParser } from './parsers/base.parser';

@Injectable()
export class TrackerService {
  private readonly logger = new Logger(TrackerService.name);
  private isTracking = false;

  constructor(
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
    private readonly productListReader: ProductListReader,
    private readonly fetcher: MarketplaceFetcher,
    private readonly parser: BaseParser,
    private readonly historyStore: HistoryStore,
  ) {}

  /**
   * Fetch, parse and record every product of the input list, one keyword at
   * a time. A failing keyword is logged and skipped; only an unreadable
   * product list aborts the run, before anything is fetched.
   */
  async track(options: TrackOptions): Promise<RunSummary> {
    const capturedAt = new Date();
    if (this.isTracking) {
      this.logger.warn('Tracking already in progress, skipping...');
      return { capturedAt, results: [], totalRecorded: 0 };
    }

    this.isTracking = true;
    try {
      let queries = await this.productListReader.read(
        options.inputFile,
        options.resultLimit ?? this.config.tracking.defaultResultLimit,
      );
      if (options.maxProducts !== undefined && options.maxProducts < queries.length) {
        queries = queries.slice(0, options.maxProducts);
        this.logger.log(`Limiting run to the first ${options.maxProducts} product(s)`);
      }
      if (queries.length === 0) {
        this.logger.warn(`No products to track in ${options.inputFile}`);
      }

      const results: KeywordResult[] = [];
      for (const [index, query] of queries.entries()) {
        this.logger.log(
          `(${index + 1}/${queries.length}) Tracking '${query.keyword}' on ${this.parser.marketplace}`,
        );
        results.push(await this.trackKeyword(query, options.outputFile, capturedAt));

        if (index < queries.length - 1) {
          await this.delay(this.delayMs(options.delay));
        }
      }

      const totalRecorded = results.reduce((sum, result) => sum + result.recorded, 0);
      this.logger.log(
        `Recorded ${totalRecorded} listing(s) for ${results.length} keyword(s) in ${options.outputFile}`,
      );
      return { capturedAt, results, totalRecorded };
    } finally {
      this.isTracking = false;
    }
  }

  private async trackKeyword(
    query: ProductQuery,
    outputFile: string,
    capturedAt: Date,
  ): Promise<KeywordResult> {
    const { keyword } = query;
    try {
      const html = await this.fetcher.fetchSearchPage(keyword);
      const listings = this.parser.parse(html, query.resultLimit);
      if (listings.length === 0) {
        this.logger.log(`No current listings for '${keyword}'`);
        return { keyword, recorded: 0 };
      }

      const recorded = await this.historyStore.append(outputFile, keyword, listings, capturedAt);
      const cheapest = Math.min(...listings.map((listing) => listing.price));
      this.logger.log(`Recorded ${recorded} listing(s) for '${keyword}', lowest price ${cheapest}`);
      return { keyword, recorded };
    } catch (error) {
      const message = getErrorMessage(error);
      if (error instanceof FetchError) {
        this.logger.warn(`Skipping '${keyword}': ${message}`);
      } else {
        this.logger.error(`Failed to track '${keyword}': ${message}`);
      }
      return { keyword, recorded: 0, error: message };
    }
  }

  private delayMs(policy: DelayPolicy): number {
    if (policy.kind === 'fixed') return policy.ms;
    return policy.minMs + Math.random() * (policy.maxMs - policy.minMs);
  }

  /**
   * Pause between keywords to keep the request rate low.
   */
  protected delay(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    this.logger.debug(`Waiting ${(ms / 1000).toFixed(2)}s before the next keyword`);
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
