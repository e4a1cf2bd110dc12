/**
 * Conversion error types.
 *
 * Parser problems are reported as warnings on the parse result; only the
 * serializer throws, and only for trees that break the structural rules.
 */

import type { NodePath, StructuralViolation } from '@mdadf/types';

export class MdAdfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MdAdfError';
  }
}

export function formatPath(path: NodePath): string {
  let out = '';
  for (const segment of path) {
    out += typeof segment === 'number' ? `[${segment}]` : out === '' ? segment : `.${segment}`;
  }
  return out === '' ? '(root)' : out;
}

export class StructuralViolationError extends MdAdfError {
  public readonly violations: StructuralViolation[];
  public readonly path: NodePath;

  constructor(violations: StructuralViolation[]) {
    const first = violations[0];
    const where = first ? formatPath(first.path) : '(root)';
    const detail = first ? first.message : 'invalid structure';
    const more = violations.length > 1 ? ` (+${violations.length - 1} more)` : '';
    super(`Structural violation at ${where}: ${detail}${more}`);
    this.name = 'StructuralViolationError';
    this.violations = violations;
    this.path = first ? first.path : [];
  }
}
