/**
 * Terminal output and the run report
 */

export {
  buildRunReport,
  listFailures,
  REPORT_VERSION,
  type RunReport,
  type RunReportInput,
  writeRunReport,
} from './report.ts';
export {
  type DashboardHandle,
  type DashboardRow,
  formatStaticDashboard,
  renderDashboard,
  summarizeRows,
} from './ui.tsx';
