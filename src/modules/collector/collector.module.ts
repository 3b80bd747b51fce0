import { Module } from '@nestjs/common';
import { ChangeDetectionModule } from '../change-detection/change-detection.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { SinksModule } from '../sinks/sinks.module';
import { SourcesModule } from '../sources/sources.module';
import { CollectorScheduler } from './services/collector.scheduler';

@Module({
  imports: [SourcesModule, SinksModule, RateLimitModule, ChangeDetectionModule],
  providers: [CollectorScheduler],
  exports: [CollectorScheduler],
})
export class CollectorModule {}
