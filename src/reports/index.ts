// src/reports/index.ts
import type { ReportDefinitionInput } from '@core/report/report.types';
import { memberActivityReport } from './member-activity.report';

export const REPORT_DEFINITIONS: ReadonlyArray<ReportDefinitionInput> = [memberActivityReport];
