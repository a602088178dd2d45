/**
 * Command-line program
 *
 * Parses flags into a capture config, loads the URL list and runs either a
 * single capture or a batch. Returns the process exit code instead of
 * exiting so callers and tests decide what to do with it.
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import {
  buildConfig,
  createConfigParser,
  IMAGE_FORMATS,
  LOAD_STATES,
  type ConfigOverrides,
  type FileConfig,
  type ImageFormat,
  type LoadState,
} from '../config/index.js';
import { loadUrlsFromFile, isHttpUrl } from '../urls/index.js';
import {
  createScreenshotCapturer,
  filenameForUrl,
  type BrowserLauncher,
  type CaptureResult,
} from '../screenshot/index.js';
import {
  batchCapture,
  formatBatchSummary,
  summarizeBatch,
  writeBatchReport,
} from '../batch/index.js';
import { VERSION } from '../version.js';

// ============================================================================
// Types
// ============================================================================

export type CliOptions = {
  url?: string;
  file?: string;
  output?: string;
  format?: ImageFormat;
  quality?: number;
  width?: number;
  height?: number;
  scale?: number;
  mobile?: boolean;
  waitTimeout?: number;
  waitSelector?: string;
  waitState?: LoadState;
  /** Set by the always-on --no-animations compatibility flag; not read */
  animations: boolean;
  /** Set by the always-on --no-ads compatibility flag; not read */
  ads: boolean;
  keepAnimations?: boolean;
  allowAds?: boolean;
  userAgent?: string;
  viewportOnly?: boolean;
  nameTemplate?: string;
  config?: string;
  json?: boolean;
};

export interface CliDeps {
  /** Browser factory; headless Chromium when omitted */
  launcher?: BrowserLauncher;
  /** Clock for filenames */
  now?: () => Date;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

export const DEFAULT_OUTPUT_DIR = './screenshots';

// ============================================================================
// Program
// ============================================================================

// The whole value must be a number: "10px" and "12.7" are not integers.
function parseInteger(value: string): number {
  if (!/^\s*[+-]?\d+\s*$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value);
}

function parseDecimal(value: string): number {
  const n = value.trim() === '' ? Number.NaN : Number(value);
  if (!Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command()
    .name('pagesnap')
    .description('High-quality full-page screenshot capture')
    .version(VERSION)
    // Input
    .addOption(new Option('-u, --url <url>', 'single URL to capture').conflicts('file'))
    .addOption(new Option('-f, --file <path>', 'file containing URLs (txt or csv)'))
    // Output
    .option('-o, --output <dir>', `output directory (default: ${DEFAULT_OUTPUT_DIR})`)
    .addOption(new Option('--format <format>', 'output format (default: png)').choices(IMAGE_FORMATS))
    .addOption(new Option('--quality <number>', 'JPEG quality 1-100 (default: 90)').argParser(parseInteger))
    .option('--name-template <template>', 'filename template using {domain}, {timestamp} and {index}')
    .option('--viewport-only', 'capture the viewport instead of the full page')
    .option('--json', 'write capture-report.json to the output directory')
    // Viewport
    .addOption(new Option('--width <number>', 'viewport width (default: 1920)').argParser(parseInteger))
    .addOption(new Option('--height <number>', 'viewport height (default: 1080)').argParser(parseInteger))
    .addOption(new Option('--scale <number>', 'device pixel ratio (default: 2)').argParser(parseDecimal))
    .option('--mobile', 'use mobile viewport')
    .option('--user-agent <ua>', 'custom user agent')
    // Waiting
    .addOption(new Option('--wait-timeout <ms>', 'wait timeout in ms (default: 30000)').argParser(parseInteger))
    .option('--wait-selector <selector>', 'wait for CSS selector before screenshot')
    .addOption(new Option('--wait-state <state>', 'wait for load state (default: networkidle)').choices(LOAD_STATES))
    // Page quality. --no-animations and --no-ads are kept for compatibility:
    // both behaviours are on by default and only the keep/allow flags turn them off.
    .option('--no-animations', 'disable animations (default: on)')
    .option('--no-ads', 'block ads and trackers (default: on)')
    .option('--keep-animations', 'leave CSS animations and transitions running')
    .option('--allow-ads', 'do not block ads and trackers')
    .option('-c, --config <path>', 'YAML or JSON config file')
    .addHelpText('after', `
Examples:
  pagesnap -u https://example.com
  pagesnap -f urls.txt -o screenshots/
  pagesnap -u https://example.com --mobile --width 375 --height 812
  pagesnap -u https://example.com --scale 3 --wait-selector ".main-content"
`)
    .exitOverride();

  if (deps.writeOut || deps.writeErr) {
    program.configureOutput({
      writeOut: deps.writeOut ?? ((text) => process.stdout.write(text)),
      writeErr: deps.writeErr ?? ((text) => process.stderr.write(text)),
    });
  }

  return program;
}

/**
 * Parse argv (user arguments only). Throws CommanderError on usage errors.
 */
export function parseCliArgs(program: Command, argv: string[]): CliOptions {
  program.parse(argv, { from: 'user' });
  const opts = program.opts<CliOptions>();

  if (!opts.url && !opts.file) {
    program.error("error: one of the options '-u, --url <url>' or '-f, --file <path>' is required");
  }

  return opts;
}

/**
 * CLI flags as config overrides. Flags that were not given stay undefined
 * so config file values show through.
 */
export function toConfigOverrides(opts: CliOptions): ConfigOverrides {
  return {
    viewportWidth: opts.width,
    viewportHeight: opts.height,
    deviceScaleFactor: opts.scale,
    mobile: opts.mobile,
    waitTimeout: opts.waitTimeout,
    waitForSelector: opts.waitSelector,
    waitForLoadState: opts.waitState,
    outputFormat: opts.format,
    outputQuality: opts.quality,
    fullPage: opts.viewportOnly ? false : undefined,
    userAgent: opts.userAgent,
    disableAnimations: opts.keepAnimations ? false : undefined,
    blockAds: opts.allowAds ? false : undefined,
  };
}

// ============================================================================
// Run
// ============================================================================

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps);

  let opts: CliOptions;
  try {
    opts = parseCliArgs(program, argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const parser = createConfigParser();
  let fileConfig: FileConfig = {};
  if (opts.config) {
    try {
      fileConfig = await parser.loadFile(opts.config);
    } catch (error) {
      console.error(`❌ Error loading config: ${errorMessage(error)}`);
      return 1;
    }
  }

  const config = buildConfig(parser.toOverrides(fileConfig), toConfigOverrides(opts));
  const fileOutput = parser.toOutputSettings(fileConfig);
  const outputDir = opts.output ?? fileOutput.outputDir ?? DEFAULT_OUTPUT_DIR;
  const nameTemplate = opts.nameTemplate ?? fileOutput.nameTemplate;
  const now = deps.now ?? (() => new Date());

  let urls: string[];
  if (opts.url) {
    if (!isHttpUrl(opts.url)) {
      console.error('❌ URL must start with http:// or https://');
      return 1;
    }
    urls = [opts.url];
  } else {
    const file = opts.file ?? '';
    try {
      urls = await loadUrlsFromFile(file);
      console.log(`📄 Loaded ${urls.length} URLs from ${file}`);
    } catch (error) {
      console.error(`❌ Error loading URLs: ${errorMessage(error)}`);
      return 1;
    }
  }

  if (urls.length === 0) {
    console.error('❌ No valid URLs found');
    return 1;
  }

  const capturer = createScreenshotCapturer(config, { launcher: deps.launcher });
  const startTime = Date.now();
  let exitCode = 0;

  try {
    try {
      await capturer.init();
    } catch (error) {
      console.error(`❌ Failed to launch browser: ${errorMessage(error)}`);
      return 1;
    }

    let results: CaptureResult[];

    if (urls.length === 1) {
      const url = urls[0];
      const filename = filenameForUrl(url, config.outputFormat, {
        template: nameTemplate,
        index: 1,
        now: now(),
      });

      await mkdir(outputDir, { recursive: true });
      const result = await capturer.captureScreenshot(url, join(outputDir, filename));
      results = [result];

      if (result.success) {
        console.log('\n✅ Screenshot completed successfully!');
      } else {
        console.error('\n❌ Screenshot failed!');
        exitCode = 1;
      }
    } else {
      results = await batchCapture(capturer, urls, outputDir, {
        format: config.outputFormat,
        nameTemplate,
        delay: config.batchDelay,
        now,
      });

      console.log('');
      for (const line of formatBatchSummary(summarizeBatch(results))) {
        console.log(line);
      }
    }

    if (opts.json) {
      const reportPath = await writeBatchReport(outputDir, results);
      console.log(`📄 Capture report saved to ${reportPath}`);
    }
  } finally {
    await capturer.close();
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n⏱️  Total time: ${elapsed} seconds`);

  return exitCode;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
