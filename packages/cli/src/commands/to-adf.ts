/**
 * mdadf to-adf
 *
 * Reads Markdown (annotated or hand-written) into document JSON. Parser
 * warnings are reported; under --strict they fail the command.
 */

import { parseMarkdown } from '@mdadf/markdown';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals, readInput, writeOutput } from '../flags';

export function toAdfCommand(options: CLIOptions, args: string[]): number {
  const [inputPath] = getPositionals(args);
  if (!inputPath) {
    throw new CLIError('Usage: mdadf to-adf <input.md> [-o <out.json>]');
  }
  const outputPath = getFlag(args, '-o', '--output');

  const { document, warnings } = parseMarkdown(readInput(inputPath));
  const exitCode = options.strict && warnings.length > 0 ? EXIT_CODE.CONVERSION_FAILURE : EXIT_CODE.SUCCESS;

  if (options.format === 'json') {
    const written = outputPath !== undefined && exitCode === EXIT_CODE.SUCCESS;
    if (written) {
      writeOutput(`${JSON.stringify(document, null, options.config.jsonIndent)}\n`, outputPath);
    }
    console.log(JSON.stringify({
      input: inputPath,
      output: written ? outputPath : null,
      strict: options.strict,
      warnings,
      document: outputPath ? undefined : document,
    }, null, 2));
    return exitCode;
  }

  for (const w of warnings) {
    console.error(`mdadf: warning line ${w.line} [${w.code}]: ${w.message}`);
  }
  if (exitCode !== EXIT_CODE.SUCCESS) {
    console.error(`mdadf: ${warnings.length} warning(s) in strict mode; no output written`);
    return exitCode;
  }

  writeOutput(`${JSON.stringify(document, null, options.config.jsonIndent)}\n`, outputPath);
  if (outputPath) {
    console.log(`  Wrote ${outputPath}`);
  }
  return exitCode;
}
