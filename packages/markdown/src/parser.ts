/**
 * Markdown → document tree.
 *
 * A line-based block splitter: each block kind is recognized by its first
 * line, and nested bodies (list items, quotes, tag bodies, table cells) are
 * parsed again with the same splitter. The parser never throws; anything it
 * cannot read is kept as literal text and reported as a warning.
 */

import type { AdfDoc, AdfNode, ConversionWarning, ParseResult } from '@mdadf/types';
import type { DecodedTag, ScannedTag } from './annotation';
import { scanTag } from './annotation';
import { canonicalizeAdf } from './canonical';
import type { SourceLine } from './inline-parser';
import { findClose, isLeafKind, nodeFromTag, parseInline, parseParagraphLines, reportTagWarnings } from './inline-parser';
import { isInlineNodeType } from './model';
import type { TableParseOptions } from './table';
import { SEPARATOR_RE, parseAnnotatedTable, parsePipeTable } from './table';

const FENCE_RE = /^(`{3,})([^`]*)$/;
const LIST_MARKER_RE = /^(-|(\d+)\.)(?: (.*)|$)/;
const HEADING_RE = /^(#{1,6})(?: (.*))?$/;
const RULE_RE = /^-{3,}$/;
const LABEL_RE = /^\*\*.*\*\*$/;

/** Tagged kinds whose body is read natively and then takes the tag's data. */
const NATIVE_BODY_KINDS = new Set([
  'paragraph',
  'heading',
  'blockquote',
  'codeBlock',
  'bulletList',
  'orderedList',
]);

// ============================================================================
// Entry Points
// ============================================================================

/** Parse Markdown into a canonical document tree plus recoverable warnings. */
export function parseMarkdown(text: string): ParseResult {
  const warnings: ConversionWarning[] = [];
  const lines = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line, index): SourceLine => ({ text: line, line: index + 1 }));

  const blocks = new BlockParser(warnings).parse(lines);
  const root = blocks.length === 1 && blocks[0].type === 'doc' ? blocks[0] : { type: 'doc', content: blocks };
  return { document: toDoc(canonicalizeAdf(root)), warnings };
}

export function markdownToAdf(text: string): AdfDoc {
  return parseMarkdown(text).document;
}

function toDoc(node: AdfNode): AdfDoc {
  return { ...node, type: 'doc', content: node.content ?? [] };
}

// ============================================================================
// Line Helpers
// ============================================================================

function isBlank(source: SourceLine): boolean {
  return source.text.trim() === '';
}

/** A tag at column 0 whose kind is not an inline kind. */
function blockTagAt(text: string): Exclude<ScannedTag, { form: 'boundary' }> | undefined {
  if (!text.startsWith('<!--')) return undefined;
  const tag = scanTag(text, 0);
  if (!tag || tag.form === 'boundary' || isInlineNodeType(tag.kind)) return undefined;
  return tag;
}

function isTableStart(lines: readonly SourceLine[], index: number): boolean {
  const next = lines[index + 1];
  return lines[index].text.trim().startsWith('|') && next !== undefined && SEPARATOR_RE.test(next.text.trim());
}

function isBlockStart(lines: readonly SourceLine[], index: number): boolean {
  const text = lines[index].text;
  return (
    FENCE_RE.test(text) ||
    blockTagAt(text) !== undefined ||
    text.startsWith('>') ||
    LIST_MARKER_RE.test(text) ||
    HEADING_RE.test(text) ||
    RULE_RE.test(text) ||
    isTableStart(lines, index)
  );
}

function dequote(source: SourceLine): SourceLine {
  const { text } = source;
  const stripped = text.startsWith('> ') ? text.slice(2) : text.startsWith('>') ? text.slice(1) : text;
  return { text: stripped, line: source.line };
}

function dedent(source: SourceLine): SourceLine {
  return { text: source.text.startsWith('  ') ? source.text.slice(2) : '', line: source.line };
}

/** Drop a `**label**` line and the blank line after it. */
function dropLabel(lines: readonly SourceLine[]): SourceLine[] {
  if (lines.length === 0 || !LABEL_RE.test(lines[0].text.trim())) return [...lines];
  const start = lines.length > 1 && isBlank(lines[1]) ? 2 : 1;
  return lines.slice(start);
}

function literalParagraph(source: SourceLine): AdfNode {
  return { type: 'paragraph', content: [{ type: 'text', text: source.text.trim() }] };
}

// ============================================================================
// Block Parser
// ============================================================================

class BlockParser {
  private readonly tableOptions: TableParseOptions;

  constructor(private readonly warnings: ConversionWarning[]) {
    this.tableOptions = { warnings, parseBlocks: lines => this.parse(lines) };
  }

  parse(lines: readonly SourceLine[]): AdfNode[] {
    const blocks: AdfNode[] = [];
    let i = 0;
    while (i < lines.length) {
      if (isBlank(lines[i])) {
        i++;
        continue;
      }
      const [node, next] = this.parseBlock(lines, i);
      blocks.push(node);
      i = next;
    }
    return blocks;
  }

  /** One block starting at `index`; returns the node and the index after it. */
  private parseBlock(lines: readonly SourceLine[], index: number): [AdfNode, number] {
    const text = lines[index].text;

    const fence = text.match(FENCE_RE);
    if (fence) return this.parseFence(lines, index, fence[1].length, fence[2]);

    const tag = blockTagAt(text);
    if (tag) {
      const annotated = this.parseAnnotation(lines, index, tag);
      if (annotated) return annotated;
    }

    if (text.startsWith('>')) return this.parseQuote(lines, index);

    const marker = text.match(LIST_MARKER_RE);
    if (marker) return this.parseList(lines, index, marker[2] !== undefined);

    const heading = text.match(HEADING_RE);
    if (heading) {
      const content = parseInline((heading[2] ?? '').trim(), { warnings: this.warnings, line: lines[index].line });
      return [{ type: 'heading', attrs: { level: heading[1].length }, content }, index + 1];
    }

    if (RULE_RE.test(text)) return [{ type: 'rule' }, index + 1];

    if (isTableStart(lines, index)) {
      let end = index;
      while (end < lines.length && lines[end].text.trim().startsWith('|')) end++;
      return [parsePipeTable(lines.slice(index, end), this.tableOptions), end];
    }

    return this.parseParagraph(lines, index);
  }

  private parseParagraph(lines: readonly SourceLine[], index: number): [AdfNode, number] {
    let end = index + 1;
    while (end < lines.length && !isBlank(lines[end]) && !isBlockStart(lines, end)) end++;
    const content = parseParagraphLines(lines.slice(index, end), this.warnings);
    return [{ type: 'paragraph', content }, end];
  }

  private parseFence(lines: readonly SourceLine[], index: number, width: number, info: string): [AdfNode, number] {
    const closing = new RegExp(`^\`{${width},}\\s*$`);
    const body: string[] = [];
    let end = index + 1;
    while (end < lines.length && !closing.test(lines[end].text)) {
      body.push(lines[end].text);
      end++;
    }
    const text = body.join('\n');
    const language = info.trim().split(/\s+/)[0];
    const node: AdfNode = { type: 'codeBlock', content: text === '' ? [] : [{ type: 'text', text }] };
    if (language !== '') node.attrs = { language };
    return [node, Math.min(end + 1, lines.length)];
  }

  private parseQuote(lines: readonly SourceLine[], index: number): [AdfNode, number] {
    let end = index;
    while (end < lines.length && lines[end].text.startsWith('>')) end++;
    const content = this.parse(lines.slice(index, end).map(dequote));
    return [{ type: 'blockquote', content }, end];
  }

  private parseList(lines: readonly SourceLine[], index: number, ordered: boolean): [AdfNode, number] {
    const items: AdfNode[] = [];
    let start: number | undefined;
    let i = index;

    while (i < lines.length) {
      const marker = lines[i].text.match(LIST_MARKER_RE);
      if (!marker || (marker[2] !== undefined) !== ordered) break;
      if (start === undefined && marker[2] !== undefined) start = Number(marker[2]);

      const body: SourceLine[] = [{ text: marker[3] ?? '', line: lines[i].line }];
      let end = i + 1;
      while (end < lines.length) {
        if (lines[end].text.startsWith('  ')) {
          end++;
          continue;
        }
        let after = end;
        while (after < lines.length && isBlank(lines[after])) after++;
        if (after > end && after < lines.length && lines[after].text.startsWith('  ')) {
          end = after;
          continue;
        }
        break;
      }
      body.push(...lines.slice(i + 1, end).map(dedent));
      items.push(this.listItem(body));
      i = end;
    }

    const list: AdfNode = { type: ordered ? 'orderedList' : 'bulletList', content: items };
    if (start !== undefined && start !== 1) list.attrs = { order: start };
    return [list, i];
  }

  private listItem(body: readonly SourceLine[]): AdfNode {
    const blocks = this.parse(body);
    // A tagged item wraps its own blocks; it stands for the item itself.
    if (blocks.length === 1 && blocks[0].type === 'listItem') return blocks[0];
    return { type: 'listItem', content: blocks };
  }

  // ==========================================================================
  // Annotations
  // ==========================================================================

  /** Undefined when the line is an ordinary paragraph that starts with a tag. */
  private parseAnnotation(
    lines: readonly SourceLine[],
    index: number,
    tag: Exclude<ScannedTag, { form: 'boundary' }>,
  ): [AdfNode, number] | undefined {
    const source = lines[index];
    const text = source.text.trimEnd();

    if (tag.form === 'close') {
      this.warnings.push({ code: 'grammar-mismatch', message: `unmatched close tag "${tag.kind}"`, line: source.line });
      return [literalParagraph(source), index + 1];
    }

    if (tag.form === 'self-closing') {
      if (tag.end !== text.length) return undefined;
      reportTagWarnings(tag, this.warnings, source.line);
      return [nodeFromTag(tag), index + 1];
    }

    if (tag.end === text.length) {
      const closeIndex = findCloseLine(lines, index + 1, tag.kind);
      if (closeIndex === -1) {
        this.warnings.push({ code: 'grammar-mismatch', message: `unclosed tag "${tag.kind}"`, line: source.line });
        return [literalParagraph(source), index + 1];
      }
      reportTagWarnings(tag, this.warnings, source.line);
      return [this.buildBlock(tag, lines.slice(index + 1, closeIndex), source.line), closeIndex + 1];
    }

    const close = findClose(text, tag.end, tag.kind);
    if (!close || close.end !== text.length) return undefined;
    reportTagWarnings(tag, this.warnings, source.line);
    if (isLeafKind(tag.kind)) return [nodeFromTag(tag), index + 1];
    const body = text.slice(tag.end, close.start);
    return [nodeFromTag(tag, parseInline(body, { warnings: this.warnings, line: source.line })), index + 1];
  }

  private buildBlock(tag: DecodedTag, body: readonly SourceLine[], line: number): AdfNode {
    switch (tag.kind) {
      case 'doc': {
        const { version, ...attrs } = tag.attrs;
        const node = nodeFromTag({ ...tag, attrs: typeof version === 'number' ? attrs : tag.attrs }, this.parse(body));
        if (typeof version === 'number') node.version = version;
        return node;
      }
      case 'table':
        return parseAnnotatedTable(tag, body, this.tableOptions);
      case 'panel':
        return nodeFromTag(tag, this.parse(dropLabel(body.map(dequote))));
      case 'expand':
      case 'nestedExpand':
        return nodeFromTag(tag, this.parse(dropLabel(body)));
    }

    if (isLeafKind(tag.kind)) return nodeFromTag(tag);

    const blocks = this.parse(body);
    if (NATIVE_BODY_KINDS.has(tag.kind)) {
      const only = blocks.length === 1 ? blocks[0] : undefined;
      if (only && only.type === tag.kind) return nodeFromTag(tag, only.content ?? []);
      if (blocks.length > 0) this.warnings.push({
        code: 'grammar-mismatch',
        message: `body of "${tag.kind}" tag is not a single ${tag.kind}`,
        line,
      });
    }
    return nodeFromTag(tag, blocks);
  }
}

/**
 * Index of the column-0 close line for `kind`, counting nested opens of the
 * same kind; fenced code is skipped. -1 when there is none.
 */
function findCloseLine(lines: readonly SourceLine[], from: number, kind: string): number {
  let depth = 1;
  let i = from;
  while (i < lines.length) {
    const text = lines[i].text.trimEnd();
    const fence = text.match(FENCE_RE);
    if (fence) {
      const closing = new RegExp(`^\`{${fence[1].length},}\\s*$`);
      i++;
      while (i < lines.length && !closing.test(lines[i].text)) i++;
      i++;
      continue;
    }
    const tag = text.startsWith('<!--') ? scanTag(text, 0) : undefined;
    if (tag && tag.form !== 'boundary' && tag.kind === kind) {
      if (tag.form === 'open' && tag.end === text.length) {
        depth++;
      } else if (tag.form === 'close' && tag.end === text.length) {
        depth--;
        if (depth === 0) return i;
      }
    }
    i++;
  }
  return -1;
}
