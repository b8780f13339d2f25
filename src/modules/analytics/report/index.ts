export {
  buildAnalyticsReport,
  INSUFFICIENT_MOVING_AVERAGE_DATA,
  NO_PRICE_DATA,
} from './buildReport';
export { formatReportSummary } from './formatSummary';
