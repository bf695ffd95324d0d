import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import pino from 'pino';
import { CliModule } from './cli/cli.module';
import { validateEnvironment } from './config/env.validation';
import { ExtractorConfigModule } from './config/extractor-config.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnvironment }),
    // stdout carries the JSON result, so logs go to stderr
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: [{ level: configService.get<string>('LOG_LEVEL', 'info') }, pino.destination(2)],
      }),
    }),
    ExtractorConfigModule,
    CliModule,
  ],
})
export class AppModule {}
