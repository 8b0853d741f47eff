import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validateEnv } from './config/env.validation';
import { Site } from './database/entities/site.entity';
import { SiteTelemetry } from './database/entities/site-telemetry.entity';
import { ComponentTelemetry } from './database/entities/component-telemetry.entity';
import { HealthModule } from './health/health.module';
import { FinancialModule } from './financial/financial.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { TelemetryModule } from './telemetry/telemetry.module';
import { SitesModule } from './sites/sites.module';
import { DiagnosticsModule } from './diagnostics/diagnostics.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST'),
        port: configService.get<number>('DB_PORT'),
        username: configService.get<string>('DB_USERNAME'),
        password: configService.get<string>('DB_PASSWORD'),
        database: configService.get<string>('DB_DATABASE'),
        ssl: configService.get<boolean>('DB_SSL')
          ? { rejectUnauthorized: false }
          : false,
        entities: [Site, SiteTelemetry, ComponentTelemetry],
        // Warehouse schema is owned upstream; never alter it from here
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') === 'development',
      }),
      inject: [ConfigService],
    }),
    HealthModule,
    FinancialModule,
    AnalyticsModule,
    TelemetryModule,
    SitesModule,
    DiagnosticsModule,
  ],
})
export class AppModule {}
