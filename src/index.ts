/**
 * pagesnap - full-page screenshot capture
 *
 * Drives headless Chromium through Playwright to capture one URL or a whole
 * list, with ad blocking, frozen animations and lazy-load scrolling.
 */

// Capture configuration and config files
export * from './lib/config/index.js';

// URL list loading
export * from './lib/urls/index.js';

// Screenshot capture
export * from './lib/screenshot/index.js';

// Batch capture and summaries
export * from './lib/batch/index.js';

// Command-line program
export * from './lib/cli/index.js';

export { VERSION } from './lib/version.js';
