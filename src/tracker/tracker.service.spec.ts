import { Test } from '@nestjs/testing';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TRACKER_CONFIG, trackerConfig } from '../config/tracker.config';
import { HistoryStore } from '../history/history.store';
import { FetchError, InputFileError } from './errors/tracker.errors';
import { MarketplaceFetcher } from './fetcher/marketplace.fetcher';
import { ProductListReader } from './input/product-list.reader';
import { TrackOptions } from './interfaces/listing.interface';
import { BaseParser } from './parsers/base.parser';
import { EbaySearchParser } from './parsers/ebay.parser';
import { TrackerService } from './tracker.service';

const page = readFileSync(join(__dirname, 'parsers', 'fixtures', 'ebay-search.html'), 'utf8');

describe('TrackerService', () => {
  let service: TrackerService;
  let historyStore: HistoryStore;
  let fetchSearchPage: jest.Mock<Promise<string>, [string]>;
  let dir: string;
  let options: TrackOptions;

  const writeProducts = (content: string) => writeFileSync(options.inputFile, content);

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'tracker-'));
    options = {
      inputFile: join(dir, 'products.csv'),
      outputFile: join(dir, 'history.csv'),
      delay: { kind: 'fixed', ms: 0 },
    };
    fetchSearchPage = jest.fn<Promise<string>, [string]>().mockResolvedValue(page);

    const moduleRef = await Test.createTestingModule({
      providers: [
        TrackerService,
        ProductListReader,
        HistoryStore,
        { provide: BaseParser, useClass: EbaySearchParser },
        { provide: MarketplaceFetcher, useValue: { fetchSearchPage } },
        { provide: TRACKER_CONFIG, useValue: trackerConfig },
      ],
    }).compile();

    service = moduleRef.get(TrackerService);
    historyStore = moduleRef.get(HistoryStore);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('records exactly the requested number of listings stamped with the run time', async () => {
    writeProducts('keyword,limit\nair max,3\n');
    const before = Date.now();

    const summary = await service.track(options);

    expect(summary.results).toEqual([{ keyword: 'air max', recorded: 3 }]);
    expect(summary.totalRecorded).toBe(3);
    expect(summary.capturedAt.getTime()).toBeGreaterThanOrEqual(before);

    const records = await historyStore.readAll(options.outputFile);
    expect(records.map(({ title, price }) => [title, price])).toEqual([
      ["Nike Air Max 90 Men's Shoes White", 89.99],
      ['Nike Air Max 270 Black', 120],
      ['Nike Air Max Plus Size 10', 75.5],
    ]);
    for (const record of records) {
      expect(record.keyword).toBe('air max');
      expect(record.price).toBeGreaterThanOrEqual(0);
      expect(record.capturedAt).toEqual(summary.capturedAt);
    }
  });

  it('uses the run-wide result limit when a row has none', async () => {
    writeProducts('product\nair max\n');

    const summary = await service.track({ ...options, resultLimit: 2 });

    expect(summary.results).toEqual([{ keyword: 'air max', recorded: 2 }]);
  });

  it('falls back to the configured default limit', async () => {
    writeProducts('keyword\nair max\n');

    const summary = await service.track(options);

    expect(summary.totalRecorded).toBe(trackerConfig.tracking.defaultResultLimit);
  });

  it('keeps going after a keyword whose fetch fails', async () => {
    writeProducts('keyword,limit\nblocked,2\nair max,2\n');
    fetchSearchPage.mockRejectedValueOnce(
      new FetchError('Request returned HTTP 503', 'https://www.ebay.com/sch/i.html?_nkw=blocked', 503),
    );

    const summary = await service.track(options);

    expect(fetchSearchPage.mock.calls).toEqual([['blocked'], ['air max']]);
    expect(summary.results).toEqual([
      { keyword: 'blocked', recorded: 0, error: 'Request returned HTTP 503' },
      { keyword: 'air max', recorded: 2 },
    ]);
    const records = await historyStore.readAll(options.outputFile);
    expect(records.map((record) => record.keyword)).toEqual(['air max', 'air max']);
  });

  it('treats a page without listings as zero results', async () => {
    writeProducts('keyword\nnothing here\n');
    fetchSearchPage.mockResolvedValueOnce('<html><body>No exact matches found</body></html>');

    const summary = await service.track(options);

    expect(summary.results).toEqual([{ keyword: 'nothing here', recorded: 0 }]);
    await expect(historyStore.readAll(options.outputFile)).resolves.toEqual([]);
  });

  it('appends on every run instead of overwriting', async () => {
    writeProducts('keyword,limit\nair max,2\nair max 97,1\n');

    await service.track(options);
    const afterFirst = (await historyStore.readAll(options.outputFile)).length;
    await service.track(options);
    const afterSecond = (await historyStore.readAll(options.outputFile)).length;

    expect(afterFirst).toBe(3);
    expect(afterSecond).toBe(6);
  });

  it('only tracks the first products when maxProducts is set', async () => {
    writeProducts('keyword\nfirst\nsecond\nthird\n');

    const summary = await service.track({ ...options, maxProducts: 2 });

    expect(summary.results.map((result) => result.keyword)).toEqual(['first', 'second']);
    expect(fetchSearchPage).toHaveBeenCalledTimes(2);
  });

  it('fails before fetching when the product list is missing', async () => {
    await expect(service.track(options)).rejects.toBeInstanceOf(InputFileError);
    expect(fetchSearchPage).not.toHaveBeenCalled();
  });

  it('refuses to start a second run while one is in progress', async () => {
    writeProducts('keyword\nair max\n');
    let release: (html: string) => void = () => undefined;
    fetchSearchPage.mockReturnValueOnce(
      new Promise<string>((resolve) => {
        release = resolve;
      }),
    );

    const first = service.track(options);
    const second = await service.track(options);
    release(page);

    expect(second.results).toEqual([]);
    await expect(first).resolves.toMatchObject({ totalRecorded: 1 });
  });
});
