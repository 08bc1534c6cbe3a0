import { DynamicModule, Module } from '@nestjs/common';
import { CliRunner } from './cli/cli.runner';
import { TrackerConfigModule } from './config/tracker-config.module';
import { TrackerConfig } from './config/tracker.config';
import { PlotModule } from './plot/plot.module';
import { TrackerModule } from './tracker/tracker.module';

@Module({})
export class AppModule {
  static register(config: TrackerConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [TrackerConfigModule.forRoot(config), TrackerModule, PlotModule],
      providers: [CliRunner],
    };
  }
}
