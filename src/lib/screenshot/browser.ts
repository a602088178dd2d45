/**
 * Browser seam
 *
 * The slice of the Playwright API the capturer drives. Playwright's
 * Browser, Page and Route satisfy these shapes, so tests can hand the
 * capturer an in-process stand-in.
 */

import { chromium } from 'playwright-core';
import type { ImageFormat, LoadState } from '../config/index.js';

export interface InterceptedRequest {
  url(): string;
  resourceType(): string;
}

export interface InterceptedRoute {
  request(): InterceptedRequest;
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export interface PageOptions {
  viewport: { width: number; height: number };
  deviceScaleFactor: number;
  isMobile: boolean;
  userAgent?: string;
}

export interface PageScreenshotOptions {
  path: string;
  fullPage: boolean;
  type: ImageFormat;
  omitBackground: boolean;
  quality?: number;
}

export interface CapturePage {
  route(url: string, handler: (route: InterceptedRoute) => Promise<void>): Promise<void>;
  addInitScript(script: string): Promise<void>;
  goto(url: string, options: { waitUntil: LoadState; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  waitForLoadState(state: LoadState): Promise<void>;
  evaluate(script: string): Promise<unknown>;
  screenshot(options: PageScreenshotOptions): Promise<unknown>;
  close(): Promise<void>;
}

export interface CaptureBrowser {
  newPage(options: PageOptions): Promise<CapturePage>;
  close(): Promise<void>;
}

export interface LaunchSettings {
  headless: boolean;
  args: string[];
}

export type BrowserLauncher = (settings: LaunchSettings) => Promise<CaptureBrowser>;

export const CHROMIUM_ARGS: readonly string[] = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--no-first-run',
  '--no-zygote',
  '--disable-gpu',
  '--hide-scrollbars',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
  '--mute-audio',
];

export const launchChromium: BrowserLauncher = (settings) => chromium.launch(settings);
