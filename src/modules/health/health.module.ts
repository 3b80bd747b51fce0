import { Module } from '@nestjs/common';
import { CollectorModule } from '../collector/collector.module';
import { SinksModule } from '../sinks/sinks.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CollectorModule, SinksModule],
  controllers: [HealthController],
})
export class HealthModule {}
