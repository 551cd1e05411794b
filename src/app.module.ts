import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AnalysisModule } from './analysis/analysis.module';
import { CalibrationModule } from './calibration/calibration.module';
import { CollectorModule } from './collector/collector.module';
import { ConfigurationModule } from './config/configuration.module';
import { Reading } from './database/entities/reading.entity';
import { DevicesModule } from './devices/devices.module';
import { ReportsModule } from './reports/reports.module';

function databaseOptions(configService: ConfigService): TypeOrmModuleOptions {
  const logging = configService.get('NODE_ENV') === 'development';
  if (configService.get('DB_TYPE', 'postgres') === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: configService.get<string>('SQLITE_PATH', 'data/readings.db'),
      entities: [Reading],
      synchronize: true,
      logging,
    };
  }
  return {
    type: 'postgres',
    host: configService.get('DB_HOST'),
    port: Number(configService.get('DB_PORT', '5432')),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: [Reading],
    synchronize: configService.get('NODE_ENV') !== 'production',
    logging,
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: databaseOptions,
      inject: [ConfigService],
    }),
    ConfigurationModule,
    DevicesModule,
    CollectorModule,
    CalibrationModule,
    AnalysisModule,
    ReportsModule,
  ],
})
export class AppModule {}
