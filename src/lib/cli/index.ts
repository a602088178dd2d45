/**
 * CLI Module
 */

export {
  createProgram,
  parseCliArgs,
  toConfigOverrides,
  runCli,
  DEFAULT_OUTPUT_DIR,
  type CliOptions,
  type CliDeps,
} from './program.js';
