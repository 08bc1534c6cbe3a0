import { Module } from '@nestjs/common';
import { HistoryModule } from '../history/history.module';
import { ChartRenderer, VegaChartRenderer } from './chart/chart.renderer';
import { PlotService } from './plot.service';

@Module({
  imports: [HistoryModule],
  providers: [PlotService, { provide: ChartRenderer, useClass: VegaChartRenderer }],
  exports: [PlotService],
})
export class PlotModule {}
