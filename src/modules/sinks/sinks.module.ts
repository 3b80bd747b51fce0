import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChangelogRecord, Measurement, RateLimitWindow, ShadowState, SourceStatus } from '../../entities';
import { RELATIONAL_SINK, TIME_SERIES_SINK } from './interfaces/sink.interface';
import { TypeOrmRelationalSink } from './services/typeorm-relational.sink';
import { TypeOrmTimeSeriesSink } from './services/typeorm-time-series.sink';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Measurement,
      ShadowState,
      ChangelogRecord,
      RateLimitWindow,
      SourceStatus,
    ]),
  ],
  providers: [
    { provide: TIME_SERIES_SINK, useClass: TypeOrmTimeSeriesSink },
    { provide: RELATIONAL_SINK, useClass: TypeOrmRelationalSink },
  ],
  exports: [TIME_SERIES_SINK, RELATIONAL_SINK],
})
export class SinksModule {}
