export {
  SqliteReportStore,
  createReportStore,
  type ReportStore,
  type ReportSummary,
  type ListReportsOptions,
} from './report_store.js';
