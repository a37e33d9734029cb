import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@tokengate/database';
import { AuthModule } from './auth';
import { EnvironmentVariables, validateEnv } from './config/env.validation';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      validate: validateEnv,
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) => ({
        type: 'postgres' as const,
        host: configService.get('POSTGRES_HOST', { infer: true }),
        port: configService.get('POSTGRES_PORT', { infer: true }),
        username: configService.get('POSTGRES_USER', { infer: true }),
        password: configService.get('POSTGRES_PASSWORD', { infer: true }),
        database: configService.get<EnvironmentVariables, 'POSTGRES_DB'>('POSTGRES_DB', { infer: true }),
        entities: [...DatabaseModule.entities],
        migrations: [...DatabaseModule.migrations],
        migrationsRun: true,
        synchronize: false,
        logging: configService.get('NODE_ENV', { infer: true }) !== 'production',
      }),
    }),

    // ── Users store ───────────────────────────────────────
    DatabaseModule.forFeature(),

    // ── Feature Modules ───────────────────────────────────
    AuthModule,
  ],
})
export class AppModule {}
