import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validate } from './config/environment';
import { InitialSchema1768435200000 } from './database/migrations/1768435200000-InitialSchema';
import {
  ChangelogRecord,
  Measurement,
  RateLimitWindow,
  ShadowState,
  SourceStatus,
} from './entities';
import { CollectorModule } from './modules/collector/collector.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      validate,
    }),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: configService.get<number>('DB_PORT', 5432),
        username: configService.get<string>('DB_USERNAME', 'postgres'),
        password: configService.get<string>('DB_PASSWORD', 'postgres'),
        database: configService.get<string>('DB_NAME', 'heatpump_collector'),
        entities: [Measurement, ShadowState, ChangelogRecord, RateLimitWindow, SourceStatus],
        migrations: [InitialSchema1768435200000],
        migrationsRun: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') === 'development' ? ['error', 'warn'] : false,
        ssl: configService.get<boolean>('DB_SSL', false) ? { rejectUnauthorized: false } : false,
        // Two polling loops and the health endpoint share the pool
        extra: {
          max: 10,
          idleTimeoutMillis: 30000,
          connectionTimeoutMillis: 5000,
        },
      }),
      inject: [ConfigService],
    }),

    CollectorModule,
    HealthModule,
  ],
})
export class AppModule {}
