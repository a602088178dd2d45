/**
 * Screenshot Module
 *
 * Provides:
 * - Playwright-based full-page capture
 * - Ad and tracker blocking
 * - Animation freezing and lazy-load scrolling
 * - Output filename templating
 */

export {
  ScreenshotCapturer,
  createScreenshotCapturer,
  type CapturerOptions,
  type CaptureResult,
} from './capture.js';

export {
  CHROMIUM_ARGS,
  launchChromium,
  type BrowserLauncher,
  type CaptureBrowser,
  type CapturePage,
  type InterceptedRequest,
  type InterceptedRoute,
  type LaunchSettings,
  type PageOptions,
  type PageScreenshotOptions,
} from './browser.js';

export { BLOCKED_DOMAINS, blockAdsHandler, isBlockedUrl } from './ad-blocker.js';

export {
  DEFAULT_NAME_TEMPLATE,
  domainForUrl,
  filenameForUrl,
  formatTimestamp,
  renderFilename,
  type FilenameFields,
} from './filename.js';

export {
  DISABLE_ANIMATIONS_CSS,
  disableAnimationsScript,
  scrollToBottomScript,
  SCROLL_TO_TOP_SCRIPT,
} from './page-scripts.js';
