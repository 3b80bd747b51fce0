import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { describeError, toPersistenceFailure } from '../../../common/errors';
import { ChangelogRecord, RateLimitWindow, ShadowState, SourceStatus } from '../../../entities';
import { canonicalJson, parseCanonicalJson } from '../../change-detection/canonicalize';
import {
  ChangelogEntry,
  RateLimitWindowState,
  RelationalSink,
  ShadowStateEntry,
  SourceStatusRecord,
} from '../interfaces/sink.interface';

// Only the heat pump API is quota-constrained
const RATE_LIMITED_API = 'heat_pump';

/**
 * PostgreSQL store for change detection, the rate-limit window and source status.
 *
 * Every method resolves only after the statement has completed; any driver
 * error is rethrown as a PersistenceFailure.
 */
@Injectable()
export class TypeOrmRelationalSink implements RelationalSink {
  private readonly logger = new Logger(TypeOrmRelationalSink.name);

  constructor(
    @InjectRepository(ShadowState)
    private readonly shadowRepo: Repository<ShadowState>,

    @InjectRepository(RateLimitWindow)
    private readonly rateLimitRepo: Repository<RateLimitWindow>,

    @InjectRepository(SourceStatus)
    private readonly sourceStatusRepo: Repository<SourceStatus>,

    private readonly dataSource: DataSource,
  ) {}

  /**
   * Changelog insert and shadow upsert share one transaction, so a restart
   * never finds a changelog entry without its shadow row.
   */
  async recordObservation(changelog: ChangelogEntry | null, entry: ShadowStateEntry): Promise<void> {
    const queryRunner = this.dataSource.createQueryRunner();

    try {
      await queryRunner.connect();
      await queryRunner.startTransaction();

      if (changelog) {
        await queryRunner.manager.insert(ChangelogRecord, {
          timestamp: changelog.timestamp,
          source: changelog.source,
          category: changelog.category,
          item: changelog.item,
          oldValue: changelog.oldValue === null ? null : canonicalJson(changelog.oldValue),
          newValue: changelog.newValue === null ? null : canonicalJson(changelog.newValue),
          description: changelog.description,
        });
      }
      await queryRunner.manager.upsert(
        ShadowState,
        {
          key: entry.key,
          canonicalValue: canonicalJson(entry.canonicalValue),
          hash: entry.hash,
          lastConfirmedAt: entry.lastConfirmedAt,
        },
        ['key'],
      );

      await queryRunner.commitTransaction();
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction().catch((rollbackError: unknown) => {
          this.logger.error(`Rollback for ${entry.key} failed: ${describeError(rollbackError)}`);
        });
      }
      throw toPersistenceFailure(`Failed to record shadow state ${entry.key}`, error);
    } finally {
      await queryRunner.release();
    }
  }

  async loadShadowState(): Promise<ShadowStateEntry[]> {
    let rows: ShadowState[];
    try {
      rows = await this.shadowRepo.find({ order: { key: 'ASC' } });
    } catch (error) {
      throw toPersistenceFailure('Failed to load shadow state', error);
    }
    return rows.map((row) => ({
      key: row.key,
      canonicalValue: parseCanonicalJson(row.canonicalValue),
      hash: row.hash,
      lastConfirmedAt: row.lastConfirmedAt,
    }));
  }

  async persistRateLimitWindow(state: RateLimitWindowState): Promise<void> {
    try {
      await this.rateLimitRepo.upsert(
        {
          api: RATE_LIMITED_API,
          calls: state.calls.map((call) => call.toISOString()),
          cooldownUntil: state.cooldownUntil,
        },
        ['api'],
      );
    } catch (error) {
      throw toPersistenceFailure('Failed to persist rate limit window', error);
    }
  }

  async loadRateLimitWindow(): Promise<RateLimitWindowState | null> {
    let row: RateLimitWindow | null;
    try {
      row = await this.rateLimitRepo.findOneBy({ api: RATE_LIMITED_API });
    } catch (error) {
      throw toPersistenceFailure('Failed to load rate limit window', error);
    }
    if (!row) {
      return null;
    }
    return {
      calls: row.calls.map((call) => new Date(call)),
      cooldownUntil: row.cooldownUntil,
    };
  }

  async upsertSourceStatus(status: SourceStatusRecord): Promise<void> {
    try {
      await this.sourceStatusRepo.upsert(
        {
          service: status.service,
          status: status.status,
          message: status.message,
          fatal: status.fatal,
          lastEventAt: status.lastEventAt,
        },
        ['service'],
      );
    } catch (error) {
      throw toPersistenceFailure(`Failed to upsert ${status.service} status`, error);
    }
  }

  async getSourceStatuses(): Promise<SourceStatusRecord[]> {
    let rows: SourceStatus[];
    try {
      rows = await this.sourceStatusRepo.find({ order: { service: 'ASC' } });
    } catch (error) {
      throw toPersistenceFailure('Failed to load source status', error);
    }
    return rows.map((row) => ({
      service: row.service,
      status: row.status,
      message: row.message,
      fatal: row.fatal,
      lastEventAt: row.lastEventAt,
    }));
  }
}
