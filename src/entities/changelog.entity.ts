import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { ChangelogSource } from '../modules/sinks/interfaces/sink.interface';

/**
 * Append-only record of configuration changes
 */
@Entity('changelog')
@Index('idx_changelog_timestamp', ['timestamp'])
export class ChangelogRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  @Column({ type: 'enum', enum: ['system', 'user'], default: 'system' })
  source!: ChangelogSource;

  @Column({ type: 'varchar', length: 32 })
  category!: string;

  @Column({ type: 'varchar', length: 128 })
  @Index('idx_changelog_item')
  item!: string;

  /**
   * Canonical JSON, null on the first observation
   */
  @Column({ type: 'text', nullable: true })
  oldValue!: string | null;

  @Column({ type: 'text', nullable: true })
  newValue!: string | null;

  @Column({ type: 'text' })
  description!: string;
}
