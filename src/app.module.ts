import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import { AllConfigType } from './config/config.type';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import accessRequestsConfig from './access-requests/config/access-requests.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { AuthModule } from './auth/auth.module';
import { AuditModule } from './audit/audit.module';
import { CatalogModule } from './catalog/catalog.module';
import { AccessRequestsModule } from './access-requests/access-requests.module';

const infrastructureDatabaseModule = TypeOrmModule.forRootAsync({
  useClass: TypeOrmConfigService,
  dataSourceFactory: async (options?: DataSourceOptions) => {
    if (!options) {
      throw new Error('TypeORM options were not provided');
    }
    return new DataSource(options).initialize();
  },
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        authConfig,
        databaseConfig,
        accessRequestsConfig,
        throttlerConfig,
      ],
      envFilePath: ['.env'],
    }),
    infrastructureDatabaseModule,
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    AuditModule,
    AuthModule,
    CatalogModule,
    AccessRequestsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
