/**
 * mdadf CLI
 *
 * Converts document JSON to annotated Markdown and back, and checks that a
 * document survives the trip unchanged.
 */

import { toMdCommand } from './commands/to-md';
import { toAdfCommand } from './commands/to-adf';
import { checkCommand } from './commands/check';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { getFlag } from './flags';
import { SchemaValidationError } from '@mdadf/core';
import type { MdAdfConfig } from '@mdadf/core';
import { MdAdfError } from '@mdadf/markdown';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

const HELP = `
mdadf - lossless document JSON <-> Markdown conversion

Usage:
  mdadf to-md <input.json> [-o <out.md>]
                                   Write a document as annotated Markdown
  mdadf to-adf <input.md> [-o <out.json>]
                                   Read annotated or plain Markdown into a document
  mdadf check <input.json>         Verify a document round-trips through Markdown
  mdadf --help                     Show this help
  mdadf --version                  Show version

  Use - as the input path to read from stdin.

Options:
  --config <path>    Path to config file (default: .mdadf.json)
  --format <type>    Report format: text, json (default: text)
  --strict           Exit non-zero when the parser reports warnings
  -o, --output <path>
                     Write the converted result to a file instead of stdout
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  CONVERSION_FAILURE: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Print an error that escaped `run` and return the exit code it maps to.
 * Schema mismatches list one issue per line; engine errors are conversion
 * failures.
 */
export function reportError(err: unknown): number {
  if (err instanceof CLIError) {
    console.error(`mdadf: ${err.message}`);
    return err.exitCode;
  }
  if (err instanceof SchemaValidationError) {
    console.error(`mdadf: Invalid ${err.label}:`);
    for (const issue of err.issues) {
      console.error(`  ${issue}`);
    }
    return EXIT_CODE.RUNTIME_ERROR;
  }
  if (err instanceof MdAdfError) {
    console.error(`mdadf: ${err.name}: ${err.message}`);
    return EXIT_CODE.CONVERSION_FAILURE;
  }

  const msg = err instanceof Error ? err.message : String(err);
  console.error(`mdadf: ${msg}`);
  return EXIT_CODE.RUNTIME_ERROR;
}

export interface CLIOptions {
  configPath: string;
  format: 'text' | 'json';
  strict: boolean;
  config: MdAdfConfig;
}

export async function run(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`mdadf v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  const configPath = getFlag(args, '--config') || DEFAULT_CONFIG_PATH;
  const config = loadConfig(configPath);
  const rawFormat = getFlag(args, '--format') || config.format;

  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const options: CLIOptions = {
    configPath,
    format: rawFormat,
    strict: args.includes('--strict') || config.strict,
    config,
  };

  if (args.length === 0 || args[0].startsWith('-')) {
    console.log(HELP);
    return EXIT_CODE.RUNTIME_ERROR;
  }

  const command = args[0];
  const restArgs = args.slice(1);

  switch (command) {
    case 'to-md':
      return toMdCommand(options, restArgs);
    case 'to-adf':
      return toAdfCommand(options, restArgs);
    case 'check':
      return checkCommand(options, restArgs);
    default:
      throw new CLIError(`Unknown command: ${command}\n${HELP}`);
  }
}
