import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import databaseConfig from './config/database.config';
import storageConfig from './config/storage.config';
import authConfig from './config/auth.config';
import { AuthModule } from './modules/auth/auth.module';
import { UsersModule } from './modules/users/users.module';
import { OrganizationsModule } from './modules/organizations/organizations.module';
import { LedgerModule } from './modules/ledger/ledger.module';
import { AttachmentsModule } from './modules/attachments/attachments.module';
import { FulfillmentModule } from './modules/fulfillment/fulfillment.module';
import { ReportsModule } from './modules/reports/reports.module';
import { AuditLogsModule } from './modules/audit-logs/audit-logs.module';
import { AppBootstrapService } from './bootstrap/app-bootstrap.service';
import { TimeoutInterceptor } from './common/interceptors/timeout.interceptor';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, storageConfig, authConfig],
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...configService.getOrThrow<PostgresConnectionOptions>('database'),
        autoLoadEntities: true,
      }),
    }),
    AuthModule,
    UsersModule,
    OrganizationsModule,
    LedgerModule,
    AttachmentsModule,
    FulfillmentModule,
    ReportsModule,
    AuditLogsModule,
  ],
  providers: [
    AppBootstrapService,
    {
      provide: APP_INTERCEPTOR,
      useClass: TimeoutInterceptor,
    },
  ],
})
export class AppModule {}
