import { DynamicModule, Global, Module } from '@nestjs/common';
import { TRACKER_CONFIG, TrackerConfig } from './tracker.config';

@Global()
@Module({})
export class TrackerConfigModule {
  static forRoot(config: TrackerConfig): DynamicModule {
    return {
      module: TrackerConfigModule,
      providers: [{ provide: TRACKER_CONFIG, useValue: config }],
      exports: [TRACKER_CONFIG],
    };
  }
}
