import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './interface/http/health.controller';
import { LedgerModule } from './ledger.module';
import { typeOrmPersistenceProviders } from './infrastructure/persistence/persistence.providers';
import { createDataSourceOptions } from './data-source';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createDataSourceOptions((key) => configService.get<string>(key)),
    }),
    TerminusModule,
    LedgerModule.register({ persistence: typeOrmPersistenceProviders }),
  ],
  controllers: [HealthController],
})
export class AppModule {}
