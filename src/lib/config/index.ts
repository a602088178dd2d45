/**
 * Config Module
 *
 * Provides:
 * - Capture configuration defaults and merging
 * - YAML and JSON config file parsing
 * - Zod-checked file schema
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  buildConfig,
  DEFAULT_CONFIG,
  DEFAULT_JPEG_QUALITY,
  FileConfigSchema,
  IMAGE_FORMATS,
  LOAD_STATES,
  type ImageFormat,
  type LoadState,
  type FileConfig,
  type LazyLoadTimings,
  type ScreenshotConfig,
  type ConfigOverrides,
  type OutputSettings,
} from './parser.js';
