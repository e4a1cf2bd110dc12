/**
 * Structural validation of a document tree before serialization.
 */

import type { AdfNode, NodePath, StructuralViolation } from '@mdadf/types';
import { StructuralViolationError } from './errors';
import type { ChildRule } from './model';
import { childRule, isBlockNodeType, isInlineNodeType, isKnownNodeType } from './model';
import { isValidSpan, layoutTable } from './table';

/** Kinds that only exist under one specific parent rule. */
const NESTED_ONLY: Record<string, ChildRule> = {
  listItem: 'listItems',
  tableRow: 'rows',
  tableCell: 'cells',
  tableHeader: 'cells',
};

export function findStructuralViolations(root: AdfNode): StructuralViolation[] {
  const violations: StructuralViolation[] = [];
  visit(root, [], true, false, violations);
  return violations;
}

export function assertValidStructure(root: AdfNode): void {
  const violations = findStructuralViolations(root);
  if (violations.length > 0) throw new StructuralViolationError(violations);
}

function visit(node: AdfNode, path: NodePath, isRoot: boolean, inCell: boolean, out: StructuralViolation[]): void {
  const report = (message: string, at: NodePath = path, nodeType: string = node.type): void => {
    out.push({ message, path: at, nodeType });
  };

  if (node.type === 'doc' && !isRoot) report('"doc" is only allowed at the root');
  if (node.type === 'heading') checkHeading(node, report);
  if (node.type === 'table' && inCell) report('"table" cannot be nested inside a table cell');
  if (node.type === 'table') checkTable(node, path, out);

  const content = node.content ?? [];
  const kind = node.type;
  if (isKnownNodeType(kind)) {
    const rule = childRule(kind);
    content.forEach((child, index) => {
      const message = childProblem(kind, rule, child);
      if (message) report(message, [...path, 'content', index], child.type);
    });
  } else {
    const inline = content.some(child => isInlineNodeType(child.type));
    const block = content.some(child => isBlockNodeType(child.type));
    if (inline && block) report(`"${kind}" mixes inline and block children`);
  }

  const childInCell = inCell || kind === 'tableCell' || kind === 'tableHeader';
  content.forEach((child, index) => visit(child, [...path, 'content', index], false, childInCell, out));
}

function childProblem(parent: string, rule: ChildRule, child: AdfNode): string | undefined {
  const type = child.type;
  const misplaced = `"${type}" is not allowed inside "${parent}"`;
  const only = NESTED_ONLY[type];
  if (only !== undefined && only !== rule) return misplaced;

  switch (rule) {
    case 'blocks':
      return isInlineNodeType(type) ? misplaced : undefined;
    case 'inline':
      return isBlockNodeType(type) ? misplaced : undefined;
    case 'listItems':
      return type === 'listItem' ? undefined : misplaced;
    case 'rows':
      return type === 'tableRow' ? undefined : misplaced;
    case 'cells':
      return type === 'tableCell' || type === 'tableHeader' ? undefined : misplaced;
    case 'text':
      if (type !== 'text') return misplaced;
      return (child.marks ?? []).length > 0 ? `text inside "${parent}" cannot carry marks` : undefined;
    case 'leaf':
      return `"${parent}" cannot have children`;
  }
}

function checkHeading(node: AdfNode, report: (message: string) => void): void {
  const level = node.attrs?.level;
  if (typeof level !== 'number' || !Number.isInteger(level) || level < 1 || level > 6) {
    report(`heading level must be an integer from 1 to 6, got ${JSON.stringify(level ?? null)}`);
  }
}

function checkTable(table: AdfNode, path: NodePath, out: StructuralViolation[]): void {
  const rows = table.content ?? [];
  rows.forEach((row, rowIndex) => {
    (row.content ?? []).forEach((cell, cellIndex) => {
      for (const name of ['colspan', 'rowspan']) {
        if (!isValidSpan(cell.attrs?.[name])) {
          out.push({
            message: `${name} must be a positive integer`,
            path: [...path, 'content', rowIndex, 'content', cellIndex],
            nodeType: cell.type,
          });
        }
      }
    });
  });

  for (const problem of layoutTable(rows).problems) {
    const row = rows[problem.row];
    const cell = problem.cell === undefined ? undefined : row.content?.[problem.cell];
    const at: NodePath = [...path, 'content', problem.row];
    if (problem.cell !== undefined) at.push('content', problem.cell);
    out.push({ message: problem.message, path: at, nodeType: cell ? cell.type : row.type });
  }
}
