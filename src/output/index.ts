/**
 * Output module exports - type display and error reports
 */

export { formatType, formatCall, formatSignature } from './formatter.js';
export type { FormatOptions } from './formatter.js';

export {
  buildReport,
  formatHeader,
  formatReport,
  formatReportJSON,
} from './report.js';

export type { Report, ReportFailure, ReportOptions } from './report.js';
