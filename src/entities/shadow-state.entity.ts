import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

/**
 * Last confirmed canonical value per configuration feature. Rows are never deleted.
 */
@Entity('shadow_state')
export class ShadowState {
  @PrimaryColumn({ type: 'varchar', length: 128 })
  key!: string;

  /**
   * Canonical JSON of the value; the hash is computed over exactly this text
   */
  @Column({ type: 'text' })
  canonicalValue!: string;

  @Column({ type: 'char', length: 64 })
  hash!: string;

  @Column({ type: 'timestamptz' })
  lastConfirmedAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
