// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';
import type { Options } from 'pino-http';

@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        return {
          pinoHttp: {
            level: configService.get<string>('logger.level', 'info'),
            transport: configService.get<Options['transport']>('logger.transport'),
            redact: configService.get<string[]>('logger.redactFields', []),
            customProps: configService.get<Options['customProps']>('logger.customProps'),
            customLogLevel: configService.get<Options['customLogLevel']>('logger.customLogLevel'),
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
