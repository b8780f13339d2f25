/**
 * Series input exports
 */

export {
  getSeriesFileName,
  getSeriesFilePath,
  loadSeries,
  loadSeriesFile,
  parseSeriesCsv,
  parseSeriesJson,
} from './loadSeries';
export { parseCalendarDate, toPricePoint } from './parseRows';
