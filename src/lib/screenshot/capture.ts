/**
 * Screenshot Capture Module
 *
 * Uses Playwright to capture full-page screenshots. One browser is
 * launched per run and every URL gets a fresh page, closed afterwards.
 */

import { stat } from 'fs/promises';
import type { ScreenshotConfig } from '../config/index.js';
import { blockAdsHandler } from './ad-blocker.js';
import {
  CHROMIUM_ARGS,
  launchChromium,
  type BrowserLauncher,
  type CaptureBrowser,
  type CapturePage,
  type PageScreenshotOptions,
} from './browser.js';
import {
  disableAnimationsScript,
  scrollToBottomScript,
  SCROLL_TO_TOP_SCRIPT,
} from './page-scripts.js';

// ============================================================================
// Types
// ============================================================================

export interface CapturerOptions {
  /** Starts the browser; defaults to headless Chromium */
  launcher?: BrowserLauncher;
}

export interface CaptureResult {
  url: string;
  outputPath: string;
  success: boolean;
  /** File size in bytes, on success */
  bytes?: number;
  /** Error text, on failure */
  error?: string;
  elapsedMs: number;
}

// ============================================================================
// Screenshot Capturer
// ============================================================================

export class ScreenshotCapturer {
  private browser: CaptureBrowser | null = null;
  private readonly launcher: BrowserLauncher;

  constructor(
    private readonly config: Readonly<ScreenshotConfig>,
    options: CapturerOptions = {}
  ) {
    this.launcher = options.launcher ?? launchChromium;
  }

  /**
   * Launch the browser
   */
  async init(): Promise<void> {
    if (this.browser) return;

    console.log('[Screenshot] Launching browser...');
    this.browser = await this.launcher({
      headless: true,
      args: [...CHROMIUM_ARGS],
    });
  }

  /**
   * Close the browser
   */
  async close(): Promise<void> {
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close();
    }
  }

  /**
   * Capture one URL to outputPath. Never throws: any failure along the way
   * is logged and reported as an unsuccessful result.
   */
  async captureScreenshot(url: string, outputPath: string): Promise<CaptureResult> {
    const startTime = Date.now();
    let page: CapturePage | null = null;

    try {
      await this.init();
      page = await this.openPage();

      console.log(`🌐 Loading ${url}...`);
      await this.loadPage(page, url);

      console.log('📸 Capturing screenshot...');
      await page.screenshot(this.screenshotOptions(outputPath));

      const { size } = await stat(outputPath);
      console.log(`✅ Screenshot saved: ${outputPath} (${(size / (1024 * 1024)).toFixed(1)} MB)`);

      return {
        url,
        outputPath,
        success: true,
        bytes: size,
        elapsedMs: Date.now() - startTime,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ Error capturing ${url}: ${message}`);

      return {
        url,
        outputPath,
        success: false,
        error: message,
        elapsedMs: Date.now() - startTime,
      };
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => {
          console.error('[Screenshot] Failed to close page:', error instanceof Error ? error.message : error);
        });
      }
    }
  }

  // --------------------------------------------------------------------------
  // Steps
  // --------------------------------------------------------------------------

  private async openPage(): Promise<CapturePage> {
    if (!this.browser) {
      throw new Error('Browser is not running');
    }

    const page = await this.browser.newPage({
      viewport: {
        width: this.config.viewportWidth,
        height: this.config.viewportHeight,
      },
      deviceScaleFactor: this.config.deviceScaleFactor,
      isMobile: this.config.mobile,
      userAgent: this.config.userAgent,
    });

    try {
      if (this.config.blockAds) {
        await page.route('**/*', blockAdsHandler);
      }
      if (this.config.disableAnimations) {
        await page.addInitScript(disableAnimationsScript());
      }
    } catch (error) {
      await page.close();
      throw error;
    }

    return page;
  }

  /**
   * Navigate, then nudge lazy-loaded content into view before capture
   */
  private async loadPage(page: CapturePage, url: string): Promise<void> {
    const { waitTimeout, waitForSelector, waitForLoadState, lazyLoad } = this.config;

    await page.goto(url, { waitUntil: waitForLoadState, timeout: waitTimeout });

    if (waitForSelector) {
      await page.waitForSelector(waitForSelector, { timeout: waitTimeout });
    }

    await page.waitForTimeout(lazyLoad.initialDelay);

    await page.evaluate(scrollToBottomScript(lazyLoad.scrollStepDelay));
    await page.waitForLoadState('networkidle');

    await page.evaluate(SCROLL_TO_TOP_SCRIPT);
    await page.waitForTimeout(lazyLoad.settleDelay);
  }

  private screenshotOptions(outputPath: string): PageScreenshotOptions {
    const options: PageScreenshotOptions = {
      path: outputPath,
      fullPage: this.config.fullPage,
      type: this.config.outputFormat,
      omitBackground: false,
    };

    if (this.config.outputFormat === 'jpeg' && this.config.outputQuality) {
      options.quality = this.config.outputQuality;
    }

    return options;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScreenshotCapturer(
  config: Readonly<ScreenshotConfig>,
  options?: CapturerOptions
): ScreenshotCapturer {
  return new ScreenshotCapturer(config, options);
}
