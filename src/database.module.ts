import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppConfig } from './configs/app.config';
import { DatabaseConfig } from './configs/database.config';
import appConfig from './configs/app.config';
import databaseConfig from './configs/database.config';
import embeddingConfig from './configs/embedding.config';
import pipelineConfig from './configs/pipeline.config';
import { Airline } from './entities/airline.entity';
import { Airport } from './entities/airport.entity';

/** Configuration and the MariaDB connection, shared by the server and the seeding CLI. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, embeddingConfig, pipelineConfig],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const db = configService.getOrThrow<DatabaseConfig>('database');
        const app = configService.getOrThrow<AppConfig>('app');

        return {
          type: 'mariadb',
          host: db.host,
          port: db.port,
          username: db.username,
          password: db.password,
          database: db.database,
          poolSize: db.poolSize,
          connectTimeout: db.connectTimeout,
          charset: 'utf8mb4',
          entities: [Airport, Airline],
          synchronize: false,
          logging: app.logSql,
          // the store connects on first use; stages without SQL never need MariaDB
          manualInitialization: true,
        };
      },
      inject: [ConfigService],
    }),
  ],
})
export class DatabaseModule {}
