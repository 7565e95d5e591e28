export {
  validateReport,
  validateReportOrThrow,
  type ReportValidationResult,
  type ReportValidationIssue,
} from './ajv-validator.js';
