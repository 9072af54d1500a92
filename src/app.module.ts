import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { appConfig, ledgerConfig } from './config/configuration';
import { validateEnvironment } from './config/env.validation';
import { TaxRunModule } from './tax-run/tax-run.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, ledgerConfig],
      validate: validateEnvironment,
    }),
    TaxRunModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
