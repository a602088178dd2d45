/**
 * Screenshot Capture Tests
 *
 * A fake browser stands in for Chromium; see helpers/fake-browser.ts.
 */

import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import { buildConfig } from '../src/lib/config/index.js';
import {
  CHROMIUM_ARGS,
  createScreenshotCapturer,
  disableAnimationsScript,
  scrollToBottomScript,
  SCROLL_TO_TOP_SCRIPT,
  blockAdsHandler,
} from '../src/lib/screenshot/index.js';
import { FakeBrowser, FAKE_IMAGE } from './helpers/fake-browser.js';
import { mkdir, readFile, rm } from 'fs/promises';
import { join } from 'path';

const TEST_OUTPUT_DIR = './test-capture';

describe('ScreenshotCapturer', () => {
  let browser: FakeBrowser;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await mkdir(TEST_OUTPUT_DIR, { recursive: true });
    browser = new FakeBrowser();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(async () => {
    await rm(TEST_OUTPUT_DIR, { recursive: true, force: true });
  });

  describe('init / close', () => {
    it('should launch headless Chromium once with the fixed flags', async () => {
      const capturer = createScreenshotCapturer(buildConfig(), { launcher: browser.launcher });

      await capturer.init();
      await capturer.init();

      expect(browser.launchCount).toBe(1);
      expect(browser.launchSettings).toEqual({ headless: true, args: [...CHROMIUM_ARGS] });
      expect(CHROMIUM_ARGS).toContain('--hide-scrollbars');
    });

    it('should close the browser', async () => {
      const capturer = createScreenshotCapturer(buildConfig(), { launcher: browser.launcher });
      await capturer.init();
      await capturer.close();
      await capturer.close();

      expect(browser.closed).toBe(true);
    });
  });

  describe('captureScreenshot', () => {
    it('should run the capture steps in order and write the image', async () => {
      const capturer = createScreenshotCapturer(buildConfig(), { launcher: browser.launcher });
      const outputPath = join(TEST_OUTPUT_DIR, 'example.png');

      const result = await capturer.captureScreenshot('https://example.com', outputPath);

      expect(result.success).toBe(true);
      expect(result.url).toBe('https://example.com');
      expect(result.outputPath).toBe(outputPath);
      expect(result.bytes).toBe(FAKE_IMAGE.length);
      expect(await readFile(outputPath)).toEqual(FAKE_IMAGE);

      const page = browser.pages[0];
      expect(page.methods()).toEqual([
        'route',
        'addInitScript',
        'goto',
        'waitForTimeout',
        'evaluate',
        'waitForLoadState',
        'evaluate',
        'waitForTimeout',
        'screenshot',
        'close',
      ]);
      expect(page.calls[0].args).toEqual(['**/*']);
      expect(page.calls[1].args).toEqual([disableAnimationsScript()]);
      expect(page.calls[2].args).toEqual([
        'https://example.com',
        { waitUntil: 'networkidle', timeout: 30000 },
      ]);
      expect(page.calls[3].args).toEqual([2000]);
      expect(page.calls[4].args).toEqual([scrollToBottomScript(100)]);
      expect(page.calls[5].args).toEqual(['networkidle']);
      expect(page.calls[6].args).toEqual([SCROLL_TO_TOP_SCRIPT]);
      expect(page.calls[7].args).toEqual([500]);
      expect(page.calls[8].args).toEqual([{
        path: outputPath,
        fullPage: true,
        type: 'png',
        omitBackground: false,
      }]);
      expect(page.closed).toBe(true);
    });

    it('should open the page with the configured viewport', async () => {
      const config = buildConfig({
        viewportWidth: 375,
        viewportHeight: 812,
        deviceScaleFactor: 3,
        mobile: true,
        userAgent: 'test-agent',
      });
      const capturer = createScreenshotCapturer(config, { launcher: browser.launcher });

      await capturer.captureScreenshot('https://example.com', join(TEST_OUTPUT_DIR, 'mobile.png'));

      expect(browser.pages[0].options).toEqual({
        viewport: { width: 375, height: 812 },
        deviceScaleFactor: 3,
        isMobile: true,
        userAgent: 'test-agent',
      });
    });

    it('should install the ad blocking route handler', async () => {
      const capturer = createScreenshotCapturer(buildConfig(), { launcher: browser.launcher });
      await capturer.captureScreenshot('https://example.com', join(TEST_OUTPUT_DIR, 'ads.png'));

      expect(browser.pages[0].routeHandler).toBe(blockAdsHandler);
    });

    it('should skip ad blocking and animation freezing when turned off', async () => {
      const config = buildConfig({ blockAds: false, disableAnimations: false });
      const capturer = createScreenshotCapturer(config, { launcher: browser.launcher });

      await capturer.captureScreenshot('https://example.com', join(TEST_OUTPUT_DIR, 'plain.png'));

      const methods = browser.pages[0].methods();
      expect(methods).not.toContain('route');
      expect(methods).not.toContain('addInitScript');
      expect(methods[0]).toBe('goto');
    });

    it('should wait for the selector after navigation', async () => {
      const config = buildConfig({
        waitForSelector: '.main-content',
        waitTimeout: 5000,
        waitForLoadState: 'domcontentloaded',
      });
      const capturer = createScreenshotCapturer(config, { launcher: browser.launcher });

      await capturer.captureScreenshot('https://example.com', join(TEST_OUTPUT_DIR, 'selector.png'));

      const page = browser.pages[0];
      expect(page.calls[2]).toEqual({
        method: 'goto',
        args: ['https://example.com', { waitUntil: 'domcontentloaded', timeout: 5000 }],
      });
      expect(page.calls[3]).toEqual({
        method: 'waitForSelector',
        args: ['.main-content', { timeout: 5000 }],
      });
    });

    it('should use configured lazy-load timings', async () => {
      const config = buildConfig({
        lazyLoad: { initialDelay: 10, scrollStepDelay: 20, settleDelay: 30 },
      });
      const capturer = createScreenshotCapturer(config, { launcher: browser.launcher });

      await capturer.captureScreenshot('https://example.com', join(TEST_OUTPUT_DIR, 'timings.png'));

      const page = browser.pages[0];
      const waits = page.calls.filter(call => call.method === 'waitForTimeout').map(call => call.args[0]);
      expect(waits).toEqual([10, 30]);
      expect(page.calls[4].args).toEqual([scrollToBottomScript(20)]);
    });

    it('should pass quality for jpeg and capture the viewport only when asked', async () => {
      const config = buildConfig({ outputFormat: 'jpeg', outputQuality: 80, fullPage: false });
      const capturer = createScreenshotCapturer(config, { launcher: browser.launcher });
      const outputPath = join(TEST_OUTPUT_DIR, 'example.jpeg');

      await capturer.captureScreenshot('https://example.com', outputPath);

      const screenshot = browser.pages[0].calls.find(call => call.method === 'screenshot');
      expect(screenshot?.args).toEqual([{
        path: outputPath,
        fullPage: false,
        type: 'jpeg',
        omitBackground: false,
        quality: 80,
      }]);
    });

    it('should report a navigation failure without throwing', async () => {
      browser.failOn('https://unreachable.example', 'goto', 'net::ERR_NAME_NOT_RESOLVED');
      const capturer = createScreenshotCapturer(buildConfig(), { launcher: browser.launcher });

      const result = await capturer.captureScreenshot(
        'https://unreachable.example',
        join(TEST_OUTPUT_DIR, 'unreachable.png')
      );

      expect(result.success).toBe(false);
      expect(result.error).toBe('net::ERR_NAME_NOT_RESOLVED');
      expect(result.bytes).toBeUndefined();
      expect(browser.pages[0].closed).toBe(true);
      expect(console.error).toHaveBeenCalledWith(
        '❌ Error capturing https://unreachable.example: net::ERR_NAME_NOT_RESOLVED'
      );
    });

    it('should report a selector timeout as a failure', async () => {
      browser.failOn('https://slow.example', 'waitForSelector', 'Timeout 5000ms exceeded');
      const config = buildConfig({ waitForSelector: '#never', waitTimeout: 5000 });
      const capturer = createScreenshotCapturer(config, { launcher: browser.launcher });

      const result = await capturer.captureScreenshot('https://slow.example', join(TEST_OUTPUT_DIR, 'slow.png'));

      expect(result.success).toBe(false);
      expect(result.error).toBe('Timeout 5000ms exceeded');
      expect(browser.pages[0].methods()).not.toContain('screenshot');
    });

    it('should report a failed file write as a failure', async () => {
      const capturer = createScreenshotCapturer(buildConfig(), { launcher: browser.launcher });

      const result = await capturer.captureScreenshot(
        'https://example.com',
        join(TEST_OUTPUT_DIR, 'missing-dir', 'example.png')
      );

      expect(result.success).toBe(false);
      expect(result.error).toContain('ENOENT');
    });

    it('should report a launch failure as a failure', async () => {
      const capturer = createScreenshotCapturer(buildConfig(), {
        launcher: async () => {
          throw new Error('Executable does not exist');
        },
      });

      const result = await capturer.captureScreenshot('https://example.com', join(TEST_OUTPUT_DIR, 'x.png'));

      expect(result.success).toBe(false);
      expect(result.error).toBe('Executable does not exist');
    });
  });
});
