import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { toPersistenceFailure } from '../../../common/errors';
import { Measurement } from '../../../entities';
import { FieldValue, TimeSeriesSink } from '../interfaces/sink.interface';

/**
 * Cold store for every reading, derived metric and health event.
 * INSERT only; points are never updated.
 */
@Injectable()
export class TypeOrmTimeSeriesSink implements TimeSeriesSink {
  private readonly logger = new Logger(TypeOrmTimeSeriesSink.name);

  constructor(
    @InjectRepository(Measurement)
    private readonly measurementRepo: Repository<Measurement>,
  ) {}

  async write(
    measurement: string,
    tags: Record<string, string>,
    fields: Record<string, FieldValue>,
    timestamp: Date,
  ): Promise<void> {
    try {
      await this.measurementRepo.insert({ measurement, tags, fields, timestamp });
    } catch (error) {
      throw toPersistenceFailure(`Failed to write ${measurement} point`, error);
    }
    this.logger.verbose(`Wrote ${measurement} @ ${timestamp.toISOString()}`);
  }
}
