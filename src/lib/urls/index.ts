/**
 * URLs Module
 *
 * Loads capture targets from text and CSV files.
 */

export {
  loadUrlsFromFile,
  parseUrlList,
  readCsvRecords,
  detectListKind,
  isHttpUrl,
  UrlFileNotFoundError,
  type UrlListKind,
} from './loader.js';
