import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { initGraphQLSchema } from '@src/adapters/graphql/schema/schema.init';

/**
 * 应用程序启动函数
 * 使用 NestJS ConfigService 获取配置信息
 */
async function bootstrap() {
  // 在 NestFactory.create 之前初始化 GraphQL Schema
  // 确保所有枚举类型在 Nest 应用启动前已注册
  const schemaResult = initGraphQLSchema();

  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));

  const configService = app.get<ConfigService>(ConfigService);
  const logger = app.get(Logger);

  logger.debug(
    {
      fingerprint: schemaResult.fingerprint,
      enums: schemaResult.enums,
      scalars: schemaResult.scalars,
    },
    'GraphQL Schema 已初始化',
  );

  if (configService.get<boolean>('server.cors.enabled', true)) {
    const origins = configService
      .get<string>('server.cors.origins', '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0);
    app.enableCors({ origin: origins.length > 0 ? origins : true });
  }

  const host = configService.get<string>('server.host', '127.0.0.1');
  const port = configService.get<number>('server.port', 3000);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  await app.listen(port, host);

  logger.log(`🚀 报表服务在 http://${host}:${port}/graphql 上以 ${nodeEnv} 模式启动成功`);
}

void bootstrap();
