/**
 * Configuration
 *
 * Builds the immutable capture configuration from defaults, an optional
 * .pagesnap.yml / .json file and CLI values, in that order of precedence.
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

export const IMAGE_FORMATS = ['png', 'jpeg'] as const;
export const LOAD_STATES = ['load', 'domcontentloaded', 'networkidle'] as const;

// Shape checks only. Range checking is left to the browser.
const ViewportSchema = z.object({
  width: z.number().optional(),
  height: z.number().optional(),
  scale: z.number().optional(),
  mobile: z.boolean().optional(),
});

const WaitSchema = z.object({
  timeout: z.number().optional(),
  selector: z.string().optional(),
  state: z.enum(LOAD_STATES).optional(),
});

const OutputSchema = z.object({
  dir: z.string().optional(),
  format: z.enum(IMAGE_FORMATS).optional(),
  quality: z.number().optional(),
  full_page: z.boolean().optional(),
  name_template: z.string().optional(),
});

const LazyLoadSchema = z.object({
  initial_delay: z.number().optional(),
  scroll_step_delay: z.number().optional(),
  settle_delay: z.number().optional(),
});

export const FileConfigSchema = z.object({
  viewport: ViewportSchema.optional(),
  wait: WaitSchema.optional(),
  output: OutputSchema.optional(),
  user_agent: z.string().optional(),
  block_ads: z.boolean().optional(),
  disable_animations: z.boolean().optional(),
  lazy_load: LazyLoadSchema.optional(),
  batch_delay: z.number().optional(),
});

// ============================================================================
// Types
// ============================================================================

export type ImageFormat = (typeof IMAGE_FORMATS)[number];
export type LoadState = (typeof LOAD_STATES)[number];
export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface LazyLoadTimings {
  /** Unconditional wait after navigation, in ms */
  initialDelay: number;
  /** Interval between scroll steps inside the page, in ms */
  scrollStepDelay: number;
  /** Wait after scrolling back to the top, in ms */
  settleDelay: number;
}

export interface ScreenshotConfig {
  viewportWidth: number;
  viewportHeight: number;
  deviceScaleFactor: number;
  fullPage: boolean;
  waitTimeout: number;
  waitForSelector?: string;
  waitForLoadState: LoadState;
  disableAnimations: boolean;
  blockAds: boolean;
  outputFormat: ImageFormat;
  /** Only ever set for jpeg */
  outputQuality?: number;
  mobile: boolean;
  userAgent?: string;
  lazyLoad: LazyLoadTimings;
  /** Pause between batch captures, in ms */
  batchDelay: number;
}

export type ConfigOverrides = Partial<Omit<ScreenshotConfig, 'lazyLoad'>> & {
  lazyLoad?: Partial<LazyLoadTimings>;
};

/** Output settings that live beside the capture config in a config file */
export interface OutputSettings {
  outputDir?: string;
  nameTemplate?: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_JPEG_QUALITY = 90;

export const DEFAULT_CONFIG: Readonly<ScreenshotConfig> = Object.freeze({
  viewportWidth: 1920,
  viewportHeight: 1080,
  deviceScaleFactor: 2,
  fullPage: true,
  waitTimeout: 30000,
  waitForLoadState: 'networkidle',
  disableAnimations: true,
  blockAds: true,
  outputFormat: 'png',
  mobile: false,
  lazyLoad: Object.freeze({
    initialDelay: 2000,
    scrollStepDelay: 100,
    settleDelay: 500,
  }),
  batchDelay: 1000,
});

/**
 * Merge overrides onto the defaults. Later overrides win; undefined values
 * never replace an earlier value.
 */
export function buildConfig(...overrides: ConfigOverrides[]): Readonly<ScreenshotConfig> {
  const merged = overrides.reduce<ScreenshotConfig>(applyOverride, {
    ...DEFAULT_CONFIG,
    lazyLoad: { ...DEFAULT_CONFIG.lazyLoad },
  });

  if (merged.outputFormat !== 'jpeg') {
    delete merged.outputQuality;
  } else if (merged.outputQuality === undefined) {
    merged.outputQuality = DEFAULT_JPEG_QUALITY;
  }

  Object.freeze(merged.lazyLoad);
  return Object.freeze(merged);
}

function applyOverride(base: ScreenshotConfig, o: ConfigOverrides): ScreenshotConfig {
  return {
    viewportWidth: o.viewportWidth ?? base.viewportWidth,
    viewportHeight: o.viewportHeight ?? base.viewportHeight,
    deviceScaleFactor: o.deviceScaleFactor ?? base.deviceScaleFactor,
    fullPage: o.fullPage ?? base.fullPage,
    waitTimeout: o.waitTimeout ?? base.waitTimeout,
    waitForSelector: o.waitForSelector ?? base.waitForSelector,
    waitForLoadState: o.waitForLoadState ?? base.waitForLoadState,
    disableAnimations: o.disableAnimations ?? base.disableAnimations,
    blockAds: o.blockAds ?? base.blockAds,
    outputFormat: o.outputFormat ?? base.outputFormat,
    outputQuality: o.outputQuality ?? base.outputQuality,
    mobile: o.mobile ?? base.mobile,
    userAgent: o.userAgent ?? base.userAgent,
    lazyLoad: {
      initialDelay: o.lazyLoad?.initialDelay ?? base.lazyLoad.initialDelay,
      scrollStepDelay: o.lazyLoad?.scrollStepDelay ?? base.lazyLoad.scrollStepDelay,
      settleDelay: o.lazyLoad?.settleDelay ?? base.lazyLoad.settleDelay,
    },
    batchDelay: o.batchDelay ?? base.batchDelay,
  };
}

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<FileConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content. JSON when the name ends in .json,
   * YAML otherwise. An empty document is an empty config.
   */
  parse(content: string, filename: string = 'config'): FileConfig {
    const parsed: unknown = filename.endsWith('.json')
      ? JSON.parse(content)
      : parseYaml(content);

    return this.validate(parsed ?? {});
  }

  validate(config: unknown): FileConfig {
    return FileConfigSchema.parse(config);
  }

  /**
   * Map the file layout onto capture config fields
   */
  toOverrides(config: FileConfig): ConfigOverrides {
    return {
      viewportWidth: config.viewport?.width,
      viewportHeight: config.viewport?.height,
      deviceScaleFactor: config.viewport?.scale,
      mobile: config.viewport?.mobile,
      waitTimeout: config.wait?.timeout,
      waitForSelector: config.wait?.selector,
      waitForLoadState: config.wait?.state,
      outputFormat: config.output?.format,
      outputQuality: config.output?.quality,
      fullPage: config.output?.full_page,
      userAgent: config.user_agent,
      blockAds: config.block_ads,
      disableAnimations: config.disable_animations,
      lazyLoad: {
        initialDelay: config.lazy_load?.initial_delay,
        scrollStepDelay: config.lazy_load?.scroll_step_delay,
        settleDelay: config.lazy_load?.settle_delay,
      },
      batchDelay: config.batch_delay,
    };
  }

  toOutputSettings(config: FileConfig): OutputSettings {
    return {
      outputDir: config.output?.dir,
      nameTemplate: config.output?.name_template,
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# pagesnap configuration
# Every key is optional; command-line flags take precedence.

viewport:
  width: 1920
  height: 1080
  scale: 2
  mobile: false

wait:
  timeout: 30000
  state: networkidle
  # selector: ".main-content"

output:
  dir: ./screenshots
  format: png
  quality: 90        # jpeg only
  full_page: true
  name_template: "{domain}_{timestamp}"

block_ads: true
disable_animations: true

lazy_load:
  initial_delay: 2000
  scroll_step_delay: 100
  settle_delay: 500

batch_delay: 1000
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<FileConfig> {
  return new ConfigParser().loadFile(path);
}
