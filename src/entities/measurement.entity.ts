import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { FieldValue } from '../modules/sinks/interfaces/sink.interface';

/**
 * Time-series store: one row per written point.
 *
 * Append-only. Tags and fields are kept as jsonb so each measurement can
 * carry its own field set; a null field stays null.
 */
@Entity('measurements')
@Index('idx_measurements_measurement_timestamp', ['measurement', 'timestamp'])
export class Measurement {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64 })
  measurement!: string;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  tags!: Record<string, string>;

  @Column({ type: 'jsonb' })
  fields!: Record<string, FieldValue>;

  /**
   * Instant the point describes (reading time, not write time)
   */
  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  @CreateDateColumn({ type: 'timestamptz' })
  ingestedAt!: Date;
}
