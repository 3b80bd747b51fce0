import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial collector schema
 *
 * Creates the following tables:
 * - measurements (time-series points, append-only)
 * - shadow_state (last confirmed value per configuration feature)
 * - changelog (append-only configuration changes)
 * - rate_limit_window (persisted heat pump API call window)
 * - source_status (latest health event per source)
 */
export class InitialSchema1768435200000 implements MigrationInterface {
  name = 'InitialSchema1768435200000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE EXTENSION IF NOT EXISTS "uuid-ossp"
    `);

    await queryRunner.query(`
      CREATE TYPE "public"."changelog_source_enum" AS ENUM('system', 'user')
    `);

    await queryRunner.query(`
      CREATE TYPE "public"."source_status_status_enum" AS ENUM('ok', 'error', 'rate_limited')
    `);

    // ============================================================
    // TIME SERIES: one row per point, tags and fields as jsonb
    // ============================================================
    await queryRunner.query(`
      CREATE TABLE "measurements" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "measurement" varchar(64) NOT NULL,
        "tags" jsonb NOT NULL DEFAULT '{}',
        "fields" jsonb NOT NULL,
        "timestamp" TIMESTAMP WITH TIME ZONE NOT NULL,
        "ingestedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_measurements" PRIMARY KEY ("id")
      )
    `);

    // Dashboards always query one measurement over a time range
    await queryRunner.query(`
      CREATE INDEX "idx_measurements_measurement_timestamp"
      ON "measurements" ("measurement", "timestamp")
    `);

    // ============================================================
    // CHANGE DETECTION
    // ============================================================
    await queryRunner.query(`
      CREATE TABLE "shadow_state" (
        "key" varchar(128) NOT NULL,
        "canonicalValue" text NOT NULL,
        "hash" char(64) NOT NULL,
        "lastConfirmedAt" TIMESTAMP WITH TIME ZONE NOT NULL,
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_shadow_state" PRIMARY KEY ("key")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "changelog" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "timestamp" TIMESTAMP WITH TIME ZONE NOT NULL,
        "source" "public"."changelog_source_enum" NOT NULL DEFAULT 'system',
        "category" varchar(32) NOT NULL,
        "item" varchar(128) NOT NULL,
        "oldValue" text,
        "newValue" text,
        "description" text NOT NULL,
        CONSTRAINT "PK_changelog" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_changelog_timestamp" ON "changelog" ("timestamp")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_changelog_item" ON "changelog" ("item")
    `);

    // ============================================================
    // COLLECTOR STATE
    // ============================================================
    await queryRunner.query(`
      CREATE TABLE "rate_limit_window" (
        "api" varchar(32) NOT NULL,
        "calls" jsonb NOT NULL DEFAULT '[]',
        "cooldownUntil" TIMESTAMP WITH TIME ZONE,
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_rate_limit_window" PRIMARY KEY ("api")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "source_status" (
        "service" varchar(32) NOT NULL,
        "status" "public"."source_status_status_enum" NOT NULL,
        "message" text NOT NULL,
        "fatal" boolean NOT NULL DEFAULT false,
        "lastEventAt" TIMESTAMP WITH TIME ZONE NOT NULL,
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_source_status" PRIMARY KEY ("service")
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "source_status"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "rate_limit_window"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "changelog"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "shadow_state"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "measurements"`);

    await queryRunner.query(`DROP TYPE IF EXISTS "public"."source_status_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "public"."changelog_source_enum"`);
  }
}
