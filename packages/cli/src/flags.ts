/**
 * Shared CLI flag helpers.
 *
 * Centralized utilities for parsing flags, reading the input a command was
 * pointed at and writing its result.
 */

import * as fs from 'node:fs';
import { CLIError } from './index';

/** Flags that consume the argument after them. */
const VALUE_FLAGS = new Set(['--config', '--format', '--output', '-o']);

/**
 * Extract a named flag's value from an argument array.
 * Returns the string following `flag`, or undefined if not present.
 */
export function getFlag(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx !== -1 && idx + 1 < args.length) {
      return args[idx + 1];
    }
  }
  return undefined;
}

/**
 * Positional arguments: everything that is not a flag or a flag's value.
 * A lone `-` is positional (stdin).
 */
export function getPositionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (arg === '-' || !arg.startsWith('-')) {
      out.push(arg);
    }
  }
  return out;
}

/**
 * Read the input file of a command, or stdin for `-`, throwing CLIError if missing.
 */
export function readInput(filePath: string): string {
  if (filePath === '-') {
    return fs.readFileSync(0, 'utf-8');
  }
  if (!fs.existsSync(filePath)) {
    throw new CLIError(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Write command output to a file, or to stdout when no path is given.
 */
export function writeOutput(content: string, filePath: string | undefined): void {
  if (filePath === undefined || filePath === '-') {
    process.stdout.write(content);
    return;
  }
  fs.writeFileSync(filePath, content);
}
