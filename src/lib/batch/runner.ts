/**
 * Batch Runner
 *
 * Captures a list of URLs one after another with a single capturer and
 * reports which ones failed.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import type { CaptureResult } from '../screenshot/index.js';
import { DEFAULT_NAME_TEMPLATE, filenameForUrl } from '../screenshot/index.js';
import type { ImageFormat } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

/** What the runner needs from a capturer */
export interface UrlCapturer {
  captureScreenshot(url: string, outputPath: string): Promise<CaptureResult>;
}

export interface BatchOptions {
  format: ImageFormat;
  /** Filename template with {domain}, {timestamp} and {index} */
  nameTemplate?: string;
  /** Pause between captures in ms */
  delay?: number;
  /** Clock used for {timestamp} */
  now?: () => Date;
}

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  failedUrls: string[];
}

export const REPORT_FILENAME = 'capture-report.json';

// ============================================================================
// Runner
// ============================================================================

export async function batchCapture(
  capturer: UrlCapturer,
  urls: string[],
  outputDir: string,
  options: BatchOptions
): Promise<CaptureResult[]> {
  const template = options.nameTemplate ?? DEFAULT_NAME_TEMPLATE;
  const delay = options.delay ?? 1000;
  const now = options.now ?? (() => new Date());
  const results: CaptureResult[] = [];

  await mkdir(outputDir, { recursive: true });

  for (const [offset, url] of urls.entries()) {
    const index = offset + 1;
    console.log(`\n📊 Processing ${index}/${urls.length}: ${url}`);

    const filename = filenameForUrl(url, options.format, { template, index, now: now() });
    results.push(await capturer.captureScreenshot(url, join(outputDir, filename)));

    if (index < urls.length && delay > 0) {
      await sleep(delay);
    }
  }

  return results;
}

export function summarizeBatch(results: CaptureResult[]): BatchSummary {
  const failedUrls = results.filter(result => !result.success).map(result => result.url);
  return {
    total: results.length,
    successful: results.length - failedUrls.length,
    failed: failedUrls.length,
    failedUrls,
  };
}

export function formatBatchSummary(summary: BatchSummary): string[] {
  const lines = [
    '📊 Batch Results:',
    `   ✅ Successful: ${summary.successful}/${summary.total}`,
    `   ❌ Failed: ${summary.failed}/${summary.total}`,
  ];

  if (summary.failed > 0) {
    lines.push('', '❌ Failed URLs:');
    for (const url of summary.failedUrls) {
      lines.push(`   • ${url}`);
    }
  }

  return lines;
}

/**
 * Write the per-URL results and summary as JSON beside the screenshots
 */
export async function writeBatchReport(
  outputDir: string,
  results: CaptureResult[]
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const reportPath = join(outputDir, REPORT_FILENAME);
  const report = {
    generatedAt: new Date().toISOString(),
    summary: summarizeBatch(results),
    results,
  };
  await writeFile(reportPath, JSON.stringify(report, null, 2));
  return reportPath;
}
