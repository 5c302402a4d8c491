// src/core/config/report.config.ts
// 报表默认配置：页大小、页码窗口、总数统计策略与请求参数名
import { ConfigFactory } from '@nestjs/config';

const reportConfig: ConfigFactory = () => ({
  report: {
    pageSize: parseInt(process.env.REPORT_PAGE_SIZE || '25', 10),
    windowSize: parseInt(process.env.REPORT_WINDOW_SIZE || '5', 10),
    // MySQL 4 及以上使用 FOUND_ROWS；否则改为 COUNT_QUERY
    countStrategy: process.env.REPORT_COUNT_STRATEGY || 'FOUND_ROWS',
    columnSortDefault: process.env.REPORT_COLUMN_SORT_DEFAULT !== 'false',
    params: {
      page: process.env.REPORT_PAGE_PARAM || 'page',
      sort: process.env.REPORT_SORT_PARAM || 'sort',
      direction: process.env.REPORT_DIRECTION_PARAM || 'dir',
    },
  },
});

export default reportConfig;
