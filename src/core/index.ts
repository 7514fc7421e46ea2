/**
 * Core module exports
 */

export { AuthManager, authManager } from './auth';
export { GraphClient } from './graph';
export { CsvMailboxSource, CsvLogonSource, parseCsv } from './sources';
export { resolveSkus, matchTargetSkus, licenseNames, DEFAULT_TARGET_SKUS } from './sku';
export { buildMailboxIndex, classifyMailbox, normalizeKey, toRecipientKind } from './mailbox';
export { mergeSignIn, parseTimestamp, parseFileTime } from './signin';
export { buildReport, emptyCounters } from './report';
export { runReport } from './pipeline';
export {
  REPORT_COLUMNS,
  renderRow,
  sortRows,
  toCsv,
  reportFileName,
  writeReport,
} from './export';
export {
  loadAzureConfig,
  validateAzureConfig,
  resolveOutputDir,
  parseInactiveDays,
  parseTargetSkus,
} from './config';
export type { MailboxIndex } from './mailbox';
export type { RowCallback } from './report';
export type {
  ReportProviders,
  PipelineOptions,
  PipelineProgress,
  PipelineProgressCallback,
  PipelineResult,
} from './pipeline';
export type { ReportColumn } from './export';
