/**
 * Batch Module
 *
 * Sequential multi-URL capture with a pass/fail summary.
 */

export {
  batchCapture,
  summarizeBatch,
  formatBatchSummary,
  writeBatchReport,
  REPORT_FILENAME,
  type UrlCapturer,
  type BatchOptions,
  type BatchSummary,
} from './runner.js';
