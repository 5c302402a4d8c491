// src/core/config/database.config.ts
import { ConfigFactory } from '@nestjs/config';

/**
 * 数据库配置工厂函数
 * 报表只执行原生只读查询，不注册实体，也不同步表结构
 */
const databaseConfig: ConfigFactory = () => ({
  mysql: {
    type: 'mysql',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USER,
    password: process.env.DB_PASS,
    database: process.env.DB_NAME,
    timezone: process.env.DB_TIMEZONE || '+08:00',
    logging: process.env.DB_LOGGING === 'true',
    charset: 'utf8mb4',
    extra: {
      connectionLimit: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      // 连接超时时间（毫秒）
      connectTimeout: 60000,
      waitForConnections: true,
      queueLimit: 0,
    },
  },
});

export default databaseConfig;
