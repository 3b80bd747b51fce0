import { Module } from '@nestjs/common';
import { SinksModule } from '../sinks/sinks.module';
import { RateLimitGovernor } from './rate-limit.governor';

@Module({
  imports: [SinksModule],
  providers: [RateLimitGovernor],
  exports: [RateLimitGovernor],
})
export class RateLimitModule {}
