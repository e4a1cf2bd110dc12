/**
 * Table Transformer.
 *
 * Pipe tables have no span syntax, so every cell carries its own
 * tableHeader/tableCell tag and the columns a span covers are written as empty
 * placeholder cells. Both directions walk the same grid: `pending[col]` counts
 * the rows a rowspan still holds below the current one.
 */

import type { AdfNode, ConversionWarning, JsonValue } from '@mdadf/types';
import type { DecodedTag } from './annotation';
import { closeTag, openTag, scanTag } from './annotation';
import type { SourceLine } from './inline-parser';
import { findClose, nodeFromTag, parseInline, reportTagWarnings } from './inline-parser';

export const SEPARATOR_RE = /^\|(?:\s*:?-+:?\s*\|)+\s*$/;

// ============================================================================
// Layout
// ============================================================================

/** A cell of the tree, or null for a placeholder covered by a span. */
export type TableSlot = { cell: AdfNode; index: number } | null;

export interface LayoutProblem {
  message: string;
  row: number;
  cell?: number;
}

export interface TableLayout {
  rows: TableSlot[][];
  problems: LayoutProblem[];
}

export function isValidSpan(value: JsonValue | undefined): boolean {
  return value === undefined || (typeof value === 'number' && Number.isInteger(value) && value >= 1);
}

function spanOf(value: JsonValue | undefined): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : 1;
}

export function layoutTable(rows: readonly AdfNode[]): TableLayout {
  const pending: number[] = [];
  const problems: LayoutProblem[] = [];
  const out: TableSlot[][] = [];

  rows.forEach((row, rowIndex) => {
    const slots: TableSlot[] = [];
    let col = 0;

    (row.content ?? []).forEach((cell, index) => {
      while ((pending[col] ?? 0) > 0) {
        slots.push(null);
        pending[col]--;
        col++;
      }
      const colspan = spanOf(cell.attrs?.colspan);
      const rowspan = spanOf(cell.attrs?.rowspan);
      slots.push({ cell, index });
      for (let k = 0; k < colspan; k++) {
        if (k > 0) {
          if ((pending[col + k] ?? 0) > 0) {
            problems.push({ message: 'colspan overlaps a rowspan from an earlier row', row: rowIndex, cell: index });
          }
          slots.push(null);
        }
        pending[col + k] = rowspan - 1;
      }
      col += colspan;
    });

    let last = -1;
    for (let c = col; c < pending.length; c++) {
      if ((pending[c] ?? 0) > 0) last = c;
    }
    for (let c = col; c <= last; c++) {
      if ((pending[c] ?? 0) > 0) {
        slots.push(null);
        pending[c]--;
      } else {
        problems.push({ message: `column ${c} is left uncovered before a rowspan continues`, row: rowIndex });
      }
    }
    out.push(slots);
  });

  pending.forEach((count, col) => {
    if (count > 0) {
      problems.push({ message: `rowspan in column ${col} extends past the last row`, row: rows.length - 1 });
    }
  });

  return { rows: out, problems };
}

// ============================================================================
// Cell Text
// ============================================================================

/** Put block text on one line: newlines become `<br/>`, pipes are escaped. */
export function encodeCellText(text: string): string {
  return text
    .replace(/<br(\\*)\/>/g, '<br\\$1/>')
    .replace(/\n/g, '<br/>')
    .replace(/\|/g, '\\|');
}

/** Inverse of encodeCellText after splitRow has removed the pipe escapes. */
export function decodeCellBreaks(text: string): string {
  return text.replace(/<br(\\*)\/>/g, (_match, slashes: string) =>
    slashes === '' ? '\n' : `<br${slashes.slice(1)}/>`,
  );
}

/** Split a row line on unescaped pipes; undefined when it is not a row line. */
export function splitRow(line: string): string[] | undefined {
  if (line === '|') return [];
  if (line.length < 2 || !line.startsWith('|') || !line.endsWith('|')) return undefined;
  const inner = line.slice(1, -1);
  const cells: string[] = [];
  let current = '';
  for (let i = 0; i < inner.length; i++) {
    if (inner[i] === '|' && inner[i - 1] !== '\\') {
      cells.push(current);
      current = '';
    } else {
      current += inner[i];
    }
  }
  cells.push(current);
  return cells.map(cell => cell.replace(/\\\|/g, '|'));
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeTable(table: AdfNode, renderBlocks: (nodes: readonly AdfNode[]) => string): string {
  const rows = table.content ?? [];
  const layout = layoutTable(rows);
  const lines = [openTag('table', table.attrs, table.marks)];

  layout.rows.forEach((slots, rowIndex) => {
    const cells = slots.map(slot => (slot === null ? null : renderCell(slot.cell, renderBlocks)));
    let line = cells.length === 0 ? '|' : `|${cells.map(cell => (cell === null ? '' : ` ${cell} `)).join('|')}|`;
    const row = rows[rowIndex];
    if (hasTagData(row)) {
      line = `${openTag('tableRow', row.attrs, row.marks)} ${line} ${closeTag('tableRow')}`;
    }
    lines.push(line);
    if (rowIndex === 0 && slots.length > 0) {
      lines.push(`|${slots.map(() => ' --- ').join('|')}|`);
    }
  });

  lines.push(closeTag('table'));
  return lines.join('\n');
}

function hasTagData(node: AdfNode): boolean {
  return Object.keys(node.attrs ?? {}).length > 0 || (node.marks ?? []).length > 0;
}

function renderCell(cell: AdfNode, renderBlocks: (nodes: readonly AdfNode[]) => string): string {
  const body = encodeCellText(renderBlocks(cell.content ?? []));
  return `${openTag(cell.type, cell.attrs, cell.marks)}${body}${closeTag(cell.type)}`;
}

// ============================================================================
// Parsing
// ============================================================================

export interface TableParseOptions {
  warnings: ConversionWarning[];
  /** Parses the decoded block text of one cell. */
  parseBlocks: (lines: SourceLine[]) => AdfNode[];
}

/** Rows of an annotated table: the body lines between the table tags. */
export function parseAnnotatedTable(tag: DecodedTag, lines: readonly SourceLine[], options: TableParseOptions): AdfNode {
  return nodeFromTag(tag, parseRows(lines, true, options));
}

/** A hand-written pipe table: the first row holds header cells. */
export function parsePipeTable(lines: readonly SourceLine[], options: TableParseOptions): AdfNode {
  return { type: 'table', content: parseRows(lines, false, options) };
}

interface SpanContext {
  pending: number[];
}

function parseRows(lines: readonly SourceLine[], annotated: boolean, options: TableParseOptions): AdfNode[] {
  const { warnings } = options;
  const context: SpanContext = { pending: [] };
  const rows: AdfNode[] = [];
  let lastLine = 0;

  for (const source of lines) {
    let text = source.text.trim();
    if (text === '' || SEPARATOR_RE.test(text)) continue;
    lastLine = source.line;

    let rowTag: DecodedTag | undefined;
    const tag = text.startsWith('<!--') ? scanTag(text, 0) : undefined;
    if (tag && tag.form === 'open' && tag.kind === 'tableRow') {
      const close = findClose(text, tag.end, 'tableRow');
      if (close && close.end === text.length) {
        reportTagWarnings(tag, warnings, source.line);
        rowTag = tag;
        text = text.slice(tag.end, close.start).trim();
      }
    }

    const slots = splitRow(text);
    if (!slots) {
      warnings.push({ code: 'grammar-mismatch', message: 'line inside a table is not a table row', line: source.line });
      continue;
    }
    const cells = parseRowCells(slots, rows.length === 0, annotated, context, source.line, options);
    rows.push(rowTag ? nodeFromTag(rowTag, cells) : { type: 'tableRow', content: cells });
  }

  context.pending.forEach((count, col) => {
    if (count > 0) {
      warnings.push({ code: 'span-mismatch', message: `rowspan in column ${col} extends past the last row`, line: lastLine });
    }
  });
  return rows;
}

function parseRowCells(
  slots: readonly string[],
  firstRow: boolean,
  annotated: boolean,
  context: SpanContext,
  line: number,
  options: TableParseOptions,
): AdfNode[] {
  const { pending } = context;
  const cells: AdfNode[] = [];
  let col = 0;
  let colspanLeft = 0;

  for (const slot of slots) {
    const content = annotated ? stripPad(slot) : slot.trim();
    const held = colspanLeft > 0 || (pending[col] ?? 0) > 0;

    if (content.trim() === '' && held) {
      if (colspanLeft > 0) {
        colspanLeft--;
      } else {
        pending[col]--;
      }
      col++;
      continue;
    }

    if (held) {
      options.warnings.push({ code: 'span-mismatch', message: `column ${col} holds content inside a span`, line });
      colspanLeft = 0;
      pending[col] = 0;
    } else if (content.trim() === '' && annotated) {
      options.warnings.push({ code: 'span-mismatch', message: `empty cell in column ${col} is not covered by a span`, line });
    }

    const cell = parseCell(content, firstRow && !annotated, line, options);
    const colspan = spanOf(cell.attrs?.colspan);
    const rowspan = spanOf(cell.attrs?.rowspan);
    for (let k = 0; k < colspan; k++) {
      pending[col + k] = rowspan - 1;
    }
    colspanLeft = colspan - 1;
    cells.push(cell);
    col++;
  }

  for (let c = col; c < pending.length; c++) {
    if ((pending[c] ?? 0) > 0) {
      options.warnings.push({ code: 'span-mismatch', message: `row ends inside the rowspan of column ${c}`, line });
      pending[c]--;
    }
  }
  return cells;
}

function stripPad(slot: string): string {
  const start = slot.startsWith(' ') ? 1 : 0;
  const end = slot.length > start && slot.endsWith(' ') ? slot.length - 1 : slot.length;
  return slot.slice(start, end);
}

function parseCell(content: string, header: boolean, line: number, options: TableParseOptions): AdfNode {
  const text = content.trim();
  const tag = text.startsWith('<!--') ? scanTag(text, 0) : undefined;
  if (tag && tag.form === 'open' && (tag.kind === 'tableCell' || tag.kind === 'tableHeader')) {
    const close = findClose(text, tag.end, tag.kind);
    if (close && close.end === text.length) {
      reportTagWarnings(tag, options.warnings, line);
      const body = decodeCellBreaks(text.slice(tag.end, close.start));
      return nodeFromTag(tag, options.parseBlocks(body.split('\n').map(part => ({ text: part, line }))));
    }
  }
  const inline = parseInline(text, { warnings: options.warnings, line });
  return {
    type: header ? 'tableHeader' : 'tableCell',
    content: inline.length > 0 ? [{ type: 'paragraph', content: inline }] : [],
  };
}
