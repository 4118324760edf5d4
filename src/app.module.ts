import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { EnvConfig, validateEnv } from './config/env.validation';
import { ENTITIES } from './entities';
import { AssetsModule } from './modules/assets/assets.module';
import { AuthModule } from './modules/auth/auth.module';
import { ContactModule } from './modules/contact/contact.module';
import { HomeModule } from './modules/home/home.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';
import { NewsModule } from './modules/news/news.module';
import { PredictionsModule } from './modules/predictions/predictions.module';
import { ProfileModule } from './modules/profile/profile.module';
import { StatsModule } from './modules/stats/stats.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),

    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvConfig, true>) => {
        const isProduction = configService.get('NODE_ENV', { infer: true }) === 'production';

        return {
          type: 'postgres',
          host: configService.get('DATABASE_HOST', { infer: true }),
          port: configService.get('DATABASE_PORT', { infer: true }),
          username: configService.get('DATABASE_USERNAME', { infer: true }),
          password: configService.get('DATABASE_PASSWORD', { infer: true }),
          database: configService.get('DATABASE_NAME', { infer: true }),
          entities: ENTITIES,
          synchronize: !isProduction,
          logging: false,
          ssl: configService.get('DATABASE_SSL', { infer: true }) ? { rejectUnauthorized: false } : false,
          extra: {
            max: 10,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
            statement_timeout: 25000,
            application_name: 'asset_insights_api',
          },
          retryAttempts: 10,
          retryDelay: 2000,
        };
      },
    }),

    ScheduleModule.forRoot(),

    AuthModule,
    AssetsModule,
    PredictionsModule,
    NewsModule,
    StatsModule,
    ProfileModule,
    HomeModule,
    ContactModule,
    IngestionModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
