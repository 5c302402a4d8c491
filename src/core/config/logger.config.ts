// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';

function headerValue(raw: string | string[] | undefined): string | null {
  if (raw === undefined) return null;
  return Array.isArray(raw) ? raw.join(',') : raw;
}

// 只给 4xx 请求附加来源信息，便于排查被拒绝的报表查询
const customPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode < 400 || statusCode >= 500) return {};
  return {
    remoteAddress: req.socket?.remoteAddress ?? null,
    xForwardedFor: headerValue(req.headers['x-forwarded-for']),
    method: req.method ?? null,
    url: req.url ?? null,
    userAgent: headerValue(req.headers['user-agent']),
  };
};

/**
 * 按响应状态决定 HTTP 访问日志级别
 * 只记录 POST /graphql 的成功请求，其余 2xx 静默
 */
export const customLogLevel = (req: IncomingMessage, res: ServerResponse, err?: Error) => {
  if (req.url === '/favicon.ico') return 'silent';
  if (res.statusCode >= 500 || err) return 'error';
  if (res.statusCode >= 400) return 'warn';
  if (res.statusCode === 200 && req.method === 'POST' && req.url === '/graphql') return 'info';
  return 'silent';
};

const loggerConfig: ConfigFactory = () => {
  const isDev = process.env.NODE_ENV !== 'production';
  const logPath = process.env.LOG_PATH || (isDev ? './logs' : '/var/log/report-service');

  return {
    logger: {
      level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
      redactFields: ['req.headers.authorization', 'req.headers.cookie'],
      customProps: customPropsFor4xx,
      customLogLevel,
      transport: isDev
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:dd HH:MM:ss',
              messageFormat: '{time} - [{context}] {msg}',
              ignore: 'hostname,pid,req,context',
            },
          }
        : {
            targets: [
              {
                target: 'pino/file',
                options: { destination: `${logPath}/app.log`, mkdir: true },
                level: 'info',
              },
              {
                target: 'pino/file',
                options: { destination: `${logPath}/error.log`, mkdir: true },
                level: 'error',
              },
            ],
          },
    },
  };
};

export default loggerConfig;
