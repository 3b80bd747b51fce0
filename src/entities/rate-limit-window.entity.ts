import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

/**
 * Persisted call window of a quota-constrained API, one row per API
 */
@Entity('rate_limit_window')
export class RateLimitWindow {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  api!: string;

  /**
   * ISO-8601 call instants, oldest first
   */
  @Column({ type: 'jsonb', default: () => "'[]'" })
  calls!: string[];

  @Column({ type: 'timestamptz', nullable: true })
  cooldownUntil!: Date | null;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
