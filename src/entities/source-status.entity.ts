import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import { HealthStatus } from '../modules/sinks/interfaces/sink.interface';
import { SourceName } from '../modules/sources/interfaces/readings.interface';

/**
 * Hot store for source health: only the latest event per source is kept,
 * so the health endpoint never scans the time-series table.
 */
@Entity('source_status')
export class SourceStatus {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  service!: SourceName;

  @Column({ type: 'enum', enum: ['ok', 'error', 'rate_limited'] })
  status!: HealthStatus;

  @Column({ type: 'text' })
  message!: string;

  @Column({ type: 'boolean', default: false })
  fatal!: boolean;

  @Column({ type: 'timestamptz' })
  lastEventAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
