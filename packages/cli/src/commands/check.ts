/**
 * mdadf check
 *
 * Verifies that a document survives Markdown and back: the parsed tree must
 * equal the canonical input, and writing it again must give the same text.
 */

import { canonicalizeAdf, formatPath, parseMarkdown, serializeAdf, StructuralViolationError } from '@mdadf/markdown';
import type { AdfNode, ConversionWarning, NodePath } from '@mdadf/types';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getPositionals } from '../flags';
import { readDocument } from './to-md';

interface CheckReport {
  input: string;
  passed: boolean;
  violations: string[];
  warnings: ConversionWarning[];
  mismatch: { path: string; expected: unknown; actual: unknown } | null;
  idempotent: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Path of the first value that differs between two JSON trees, or undefined
 * when they are equal. Object keys are compared without regard to order.
 */
export function firstDifference(expected: unknown, actual: unknown, path: NodePath = []): NodePath | undefined {
  if (Array.isArray(expected) && Array.isArray(actual)) {
    const length = Math.max(expected.length, actual.length);
    for (let i = 0; i < length; i++) {
      if (i >= expected.length || i >= actual.length) return [...path, i];
      const diff = firstDifference(expected[i], actual[i], [...path, i]);
      if (diff) return diff;
    }
    return undefined;
  }
  if (isRecord(expected) && isRecord(actual)) {
    const keys = [...new Set([...Object.keys(expected), ...Object.keys(actual)])].sort();
    for (const key of keys) {
      const diff = firstDifference(expected[key], actual[key], [...path, key]);
      if (diff) return diff;
    }
    return undefined;
  }
  return Object.is(expected, actual) ? undefined : path;
}

function valueAt(root: unknown, path: NodePath): unknown {
  let current = root;
  for (const segment of path) {
    if (typeof segment === 'number') {
      current = Array.isArray(current) ? current[segment] : undefined;
    } else {
      current = isRecord(current) ? current[segment] : undefined;
    }
  }
  return current;
}

export function checkCommand(options: CLIOptions, args: string[]): number {
  const [inputPath] = getPositionals(args);
  if (!inputPath) {
    throw new CLIError('Usage: mdadf check <input.json>');
  }
  const doc = readDocument(options, inputPath);
  const report: CheckReport = {
    input: inputPath,
    passed: false,
    violations: [],
    warnings: [],
    mismatch: null,
    idempotent: false,
  };

  let markdown: string | undefined;
  try {
    markdown = serializeAdf(doc);
  } catch (err: unknown) {
    if (!(err instanceof StructuralViolationError)) throw err;
    report.violations = err.violations.map(v => `${formatPath(v.path)}: ${v.message}`);
  }

  if (markdown !== undefined) {
    const { document, warnings } = parseMarkdown(markdown);
    const rooted: AdfNode = doc.type === 'doc' ? doc : { type: 'doc', content: [doc] };
    const expected = canonicalizeAdf(rooted);
    const diff = firstDifference(expected, document);

    report.warnings = warnings;
    if (diff) {
      report.mismatch = { path: formatPath(diff), expected: valueAt(expected, diff), actual: valueAt(document, diff) };
    }
    report.idempotent = serializeAdf(document) === markdown;
    report.passed = !diff && report.idempotent && (!options.strict || warnings.length === 0);
  }

  if (options.format === 'json') {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }
  return report.passed ? EXIT_CODE.SUCCESS : EXIT_CODE.CONVERSION_FAILURE;
}

function printReport(report: CheckReport): void {
  if (report.violations.length > 0) {
    console.log(`  [fail] ${report.input}: document breaks structural rules`);
    for (const line of report.violations) {
      console.log(`    ${line}`);
    }
    return;
  }
  for (const w of report.warnings) {
    console.log(`  [warn] line ${w.line} [${w.code}]: ${w.message}`);
  }
  if (report.mismatch) {
    console.log(`  [fail] ${report.input}: round trip differs at ${report.mismatch.path}`);
    console.log(`    expected: ${JSON.stringify(report.mismatch.expected)}`);
    console.log(`    actual:   ${JSON.stringify(report.mismatch.actual)}`);
  }
  if (!report.idempotent) {
    console.log(`  [fail] ${report.input}: writing the parsed document again gives different Markdown`);
  }
  if (!report.passed && !report.mismatch && report.idempotent) {
    console.log(`  [fail] ${report.input}: parser reported warnings in strict mode`);
  }
  if (report.passed) {
    console.log(`  [ok] ${report.input} round-trips losslessly`);
  }
}
