import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { HistoryModule } from '../history/history.module';
import { MarketplaceFetcher } from './fetcher/marketplace.fetcher';
import { ProductListReader } from './input/product-list.reader';
import { BaseParser } from './parsers/base.parser';
import { EbaySearchParser } from './parsers/ebay.parser';
import { TrackerService } from './tracker.service';
import { WatchService } from './watch.service';

@Module({
  imports: [ScheduleModule.forRoot(), HistoryModule],
  providers: [
    MarketplaceFetcher,
    ProductListReader,
    { provide: BaseParser, useClass: EbaySearchParser },
    TrackerService,
    WatchService,
  ],
  exports: [TrackerService, WatchService],
})
export class TrackerModule {}
