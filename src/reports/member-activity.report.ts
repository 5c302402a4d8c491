// src/reports/member-activity.report.ts
// 示例报表：会员活跃度（简写列与详细列混用）

import type { ReportDefinitionInput } from '@core/report/report.types';

export const memberActivityReport: ReportDefinitionInput = {
  name: 'member-activity',
  sqlFragment: `FROM members m
    LEFT JOIN member_logins l ON l.member_id = m.id
    WHERE m.deleted_at IS NULL
    GROUP BY m.id, m.nickname, m.email, m.created_at`,
  columns: [
    { key: 'id', sql: 'm.id', display: '编号', sortable: true },
    { key: 'nickname', sql: 'm.nickname', display: '昵称', sortable: true },
    // 邮箱不参与排序
    { key: 'email', sql: 'm.email', display: '邮箱' },
    {
      key: 'joined',
      sql: "DATE_FORMAT(m.created_at, '%Y-%m-%d') AS joined",
      display: '注册日期',
      sortable: true,
      order: 'm.created_at',
    },
    { key: 'logins', sql: 'COUNT(l.id) AS logins', display: '登录次数', sortable: true },
  ],
  defaultSort: 'id',
  countStrategy: 'COUNT_QUERY',
};
