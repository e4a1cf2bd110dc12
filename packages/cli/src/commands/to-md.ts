/**
 * mdadf to-md
 *
 * Writes a document JSON file as annotated Markdown.
 */

import { AdfDocumentSchema, AdfNodeSchema, parseWithSchema } from '@mdadf/core';
import { StructuralViolationError, formatPath, serializeAdf } from '@mdadf/markdown';
import type { AdfNode } from '@mdadf/types';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals, readInput, writeOutput } from '../flags';

/**
 * Read and validate a document JSON file. Unreadable JSON is a CLIError and a
 * schema mismatch a SchemaValidationError; structural problems are left to
 * the serializer.
 */
export function readDocument(options: CLIOptions, inputPath: string): AdfNode {
  const raw = readInput(inputPath);
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CLIError(`Invalid JSON in ${inputPath}: ${msg}`);
  }

  const schema = options.config.requireDocRoot ? AdfDocumentSchema : AdfNodeSchema;
  return parseWithSchema(schema, value, `document in ${inputPath}`);
}

export function toMdCommand(options: CLIOptions, args: string[]): number {
  const [inputPath] = getPositionals(args);
  if (!inputPath) {
    throw new CLIError('Usage: mdadf to-md <input.json> [-o <out.md>]');
  }
  const outputPath = getFlag(args, '-o', '--output');
  const doc = readDocument(options, inputPath);

  let markdown: string;
  try {
    markdown = serializeAdf(doc);
  } catch (err: unknown) {
    if (!(err instanceof StructuralViolationError)) throw err;
    if (options.format === 'json') {
      console.log(JSON.stringify({
        input: inputPath,
        converted: false,
        violations: err.violations.map(v => ({ path: formatPath(v.path), nodeType: v.nodeType, message: v.message })),
      }, null, 2));
    } else {
      console.error(`mdadf: ${err.message}`);
      for (const v of err.violations) {
        console.error(`  [${formatPath(v.path)}] ${v.message}`);
      }
    }
    return EXIT_CODE.CONVERSION_FAILURE;
  }

  if (options.format === 'json') {
    if (outputPath) writeOutput(markdown, outputPath);
    console.log(JSON.stringify({
      input: inputPath,
      output: outputPath ?? null,
      converted: true,
      markdown: outputPath ? undefined : markdown,
    }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  writeOutput(markdown, outputPath);
  if (outputPath) {
    console.log(`  Wrote ${outputPath}`);
  }
  return EXIT_CODE.SUCCESS;
}
