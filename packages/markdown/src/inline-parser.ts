/**
 * Markdown inline content → nodes.
 *
 * Code spans bind tightest; star and tilde delimiters pair by exact run
 * length; tag bodies are scanned recursively so marks from a `text` tag
 * stack on top of the native ones found inside it.
 */

import type { AdfMark, AdfNode, ConversionWarning } from '@mdadf/types';
import type { DecodedTag } from './annotation';
import { scanTag } from './annotation';
import { ESCAPABLE_RE } from './escape';
import { childRule, isContainerType, isInlineNodeType, isKnownNodeType, marksEqual } from './model';

export interface InlineContext {
  warnings: ConversionWarning[];
  /** 1-based source line reported with warnings. */
  line: number;
}

const ENTITY_RE = /&#(?:([0-9]{1,7})|[xX]([0-9A-Fa-f]{1,6}));/y;

// ============================================================================
// Entry Points
// ============================================================================

export function parseInline(src: string, ctx: InlineContext): AdfNode[] {
  const out: AdfNode[] = [];
  scan(src, [], ctx, out);
  return mergeText(out);
}

export interface SourceLine {
  text: string;
  /** 1-based line number in the parsed text. */
  line: number;
}

/**
 * Paragraph lines: two or more trailing spaces make a hard break, any other
 * line end is a soft break read as one space.
 */
export function parseParagraphLines(lines: readonly SourceLine[], warnings: ConversionWarning[]): AdfNode[] {
  const out: AdfNode[] = [];
  let previousHard = true;
  for (const source of lines) {
    const hard = / {2,}$/.test(source.text);
    if (!previousHard) out.push({ type: 'text', text: ' ' });
    scan(source.text.trim(), [], { warnings, line: source.line }, out);
    if (hard) out.push({ type: 'hardBreak' });
    previousHard = hard;
  }
  return mergeText(out);
}

// ============================================================================
// Tags
// ============================================================================

export function nodeFromTag(tag: DecodedTag, content?: AdfNode[]): AdfNode {
  const node: AdfNode = { type: tag.kind };
  if (Object.keys(tag.attrs).length > 0) node.attrs = tag.attrs;
  if (tag.marks && tag.marks.length > 0) node.marks = tag.marks;
  if (content !== undefined) {
    node.content = content;
  } else if (isContainerType(tag.kind)) {
    node.content = [];
  }
  return node;
}

export function reportTagWarnings(tag: DecodedTag, warnings: ConversionWarning[], line: number): void {
  for (const message of tag.warnings) {
    warnings.push({ code: 'attribute-decode', message: `${tag.kind}: ${message}`, line });
  }
}

export function isLeafKind(kind: string): boolean {
  return isKnownNodeType(kind) && childRule(kind) === 'leaf';
}

/** Matching close of `kind` at or after `from`, counting nested opens of the same kind. */
export function findClose(src: string, from: number, kind: string): { start: number; end: number } | undefined {
  let depth = 1;
  let pos = from;
  while (pos < src.length) {
    if (src.startsWith('<!--', pos)) {
      const tag = scanTag(src, pos);
      if (tag) {
        if (tag.form === 'open' && tag.kind === kind) {
          depth++;
        } else if (tag.form === 'close' && tag.kind === kind) {
          depth--;
          if (depth === 0) return { start: pos, end: tag.end };
        }
        pos = tag.end;
        continue;
      }
    }
    pos = skipToken(src, pos);
  }
  return undefined;
}

// ============================================================================
// Scanner
// ============================================================================

function scan(src: string, marks: readonly AdfMark[], ctx: InlineContext, out: AdfNode[]): void {
  let text = '';
  const flush = (): void => {
    if (text !== '') out.push(textNode(text, marks));
    text = '';
  };

  let pos = 0;
  while (pos < src.length) {
    const ch = src[pos];

    if (ch === '\\' && pos + 1 < src.length && ESCAPABLE_RE.test(src[pos + 1])) {
      text += src[pos + 1];
      pos += 2;
      continue;
    }

    if (ch === '&') {
      ENTITY_RE.lastIndex = pos;
      const entity = ENTITY_RE.exec(src);
      const code = entity ? parseInt(entity[1] ?? entity[2], entity[1] !== undefined ? 10 : 16) : NaN;
      if (entity && code <= 0x10ffff) {
        text += String.fromCodePoint(code);
        pos += entity[0].length;
        continue;
      }
    }

    if (ch === '`') {
      const span = codeSpanAt(src, pos);
      if (span) {
        flush();
        out.push(textNode(span.content, [...marks, { type: 'code' }]));
        pos = span.end;
      } else {
        const run = runLength(src, pos, '`');
        text += src.slice(pos, pos + run);
        pos += run;
      }
      continue;
    }

    if (ch === '<') {
      const tag = scanTag(src, pos);
      if (tag) {
        if (tag.form === 'boundary') {
          pos = tag.end;
          continue;
        }
        if (tag.form === 'close') {
          ctx.warnings.push({ code: 'grammar-mismatch', message: `unmatched close tag "${tag.kind}"`, line: ctx.line });
          text += src.slice(pos, tag.end);
          pos = tag.end;
          continue;
        }
        reportTagWarnings(tag, ctx.warnings, ctx.line);
        if (tag.form === 'self-closing') {
          flush();
          if (tag.kind !== 'text') out.push(nodeFromTag(tag));
          pos = tag.end;
          continue;
        }
        const close = findClose(src, tag.end, tag.kind);
        if (!close) {
          ctx.warnings.push({ code: 'grammar-mismatch', message: `unclosed tag "${tag.kind}"`, line: ctx.line });
          text += src.slice(pos, tag.end);
          pos = tag.end;
          continue;
        }
        flush();
        tagContent(tag, src.slice(tag.end, close.start), marks, ctx, out);
        pos = close.end;
        continue;
      }
    }

    if (ch === '[') {
      const link = linkAt(src, pos);
      if (link) {
        flush();
        linkContent(link, marks, ctx, out);
        pos = link.end;
        continue;
      }
    }

    if (ch === '*' || ch === '~') {
      const run = runLength(src, pos, ch);
      const added = delimiterMarks(ch, run);
      const close = added ? findRun(src, pos + run, ch, run) : -1;
      if (added && close > pos + run) {
        flush();
        scan(src.slice(pos + run, close), [...marks, ...added], ctx, out);
        pos = close + run;
      } else {
        text += src.slice(pos, pos + run);
        pos += run;
      }
      continue;
    }

    text += ch;
    pos++;
  }
  flush();
}

function delimiterMarks(ch: string, run: number): AdfMark[] | undefined {
  if (ch === '~') return run === 2 ? [{ type: 'strike' }] : undefined;
  switch (run) {
    case 1:
      return [{ type: 'em' }];
    case 2:
      return [{ type: 'strong' }];
    case 3:
      return [{ type: 'em' }, { type: 'strong' }];
    default:
      return undefined;
  }
}

function tagContent(tag: DecodedTag, body: string, marks: readonly AdfMark[], ctx: InlineContext, out: AdfNode[]): void {
  if (tag.kind === 'text') {
    const inner: AdfNode[] = [];
    scan(body, [...marks, ...(tag.marks ?? [])], ctx, inner);
    const hasAttrs = Object.keys(tag.attrs).length > 0;
    for (const node of inner) {
      out.push(hasAttrs && node.type === 'text' ? { ...node, attrs: tag.attrs } : node);
    }
    return;
  }
  if (isInlineNodeType(tag.kind) || isLeafKind(tag.kind)) {
    out.push(nodeFromTag(tag));
    return;
  }
  out.push(nodeFromTag(tag, parseInline(body, ctx)));
}

// ============================================================================
// Links
// ============================================================================

interface LinkMatch {
  label: string;
  href: string;
  angle: boolean;
  end: number;
}

function linkAt(src: string, pos: number): LinkMatch | undefined {
  const labelEnd = findLabelEnd(src, pos + 1);
  if (labelEnd === -1 || src[labelEnd + 1] !== '(') return undefined;
  const dest = readDestination(src, labelEnd + 2);
  if (!dest) return undefined;
  return { label: src.slice(pos + 1, labelEnd), ...dest };
}

function linkContent(link: LinkMatch, marks: readonly AdfMark[], ctx: InlineContext, out: AdfNode[]): void {
  const label = parseInline(link.label, ctx);
  const only = label.length === 1 ? label[0] : undefined;
  const isCard =
    !link.angle &&
    marks.length === 0 &&
    only !== undefined &&
    only.type === 'text' &&
    only.attrs === undefined &&
    (only.marks ?? []).length === 0 &&
    only.text === link.href;
  if (isCard) {
    out.push({ type: 'inlineCard', attrs: { url: link.href } });
    return;
  }
  const linkMark: AdfMark = { type: 'link', attrs: { href: link.href } };
  for (const node of label) {
    out.push(node.type === 'text' ? { ...node, marks: [...marks, ...(node.marks ?? []), linkMark] } : node);
  }
}

function findLabelEnd(src: string, from: number): number {
  let depth = 0;
  let pos = from;
  while (pos < src.length) {
    const ch = src[pos];
    if (ch === '[') {
      depth++;
      pos++;
    } else if (ch === ']') {
      if (depth === 0) return pos;
      depth--;
      pos++;
    } else {
      pos = skipToken(src, pos);
    }
  }
  return -1;
}

function readDestination(src: string, from: number): { href: string; angle: boolean; end: number } | undefined {
  let href = '';
  let pos = from;
  const angle = src[pos] === '<';
  if (angle) pos++;
  let depth = 0;
  while (pos < src.length) {
    const ch = src[pos];
    if (ch === '\\' && pos + 1 < src.length && ESCAPABLE_RE.test(src[pos + 1])) {
      href += src[pos + 1];
      pos += 2;
      continue;
    }
    if (angle) {
      if (ch === '>') break;
      if (ch === '<') return undefined;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      if (depth === 0) break;
      depth--;
    }
    href += ch;
    pos++;
  }
  if (angle) {
    return src[pos] === '>' && src[pos + 1] === ')' ? { href, angle, end: pos + 2 } : undefined;
  }
  return src[pos] === ')' ? { href, angle, end: pos + 1 } : undefined;
}

// ============================================================================
// Tokens
// ============================================================================

function runLength(src: string, pos: number, ch: string): number {
  let end = pos;
  while (src[end] === ch) end++;
  return end - pos;
}

function codeSpanAt(src: string, pos: number): { content: string; end: number } | undefined {
  const run = runLength(src, pos, '`');
  let search = pos + run;
  while (search < src.length) {
    const next = src.indexOf('`', search);
    if (next === -1) return undefined;
    const closeRun = runLength(src, next, '`');
    if (closeRun === run) {
      let content = src.slice(pos + run, next);
      if (content.length > 1 && content.startsWith(' ') && content.endsWith(' ') && content.trim() !== '') {
        content = content.slice(1, -1);
      }
      return { content, end: next + closeRun };
    }
    search = next + closeRun;
  }
  return undefined;
}

/** Index just past the atomic token at `pos`: an escape, a code span, a tag or one character. */
function skipToken(src: string, pos: number): number {
  const ch = src[pos];
  if (ch === '\\' && pos + 1 < src.length && ESCAPABLE_RE.test(src[pos + 1])) return pos + 2;
  if (ch === '`') {
    const span = codeSpanAt(src, pos);
    return span ? span.end : pos + runLength(src, pos, '`');
  }
  if (ch === '<') {
    const tag = scanTag(src, pos);
    if (tag) return tag.end;
  }
  return pos + 1;
}

/** Start of the next run of exactly `length` `ch` characters, or -1. */
function findRun(src: string, from: number, ch: string, length: number): number {
  let pos = from;
  while (pos < src.length) {
    if (src[pos] === ch) {
      const run = runLength(src, pos, ch);
      if (run === length) return pos;
      pos += run;
      continue;
    }
    pos = skipToken(src, pos);
  }
  return -1;
}

// ============================================================================
// Text Nodes
// ============================================================================

function textNode(text: string, marks: readonly AdfMark[]): AdfNode {
  return marks.length > 0 ? { type: 'text', text, marks: [...marks] } : { type: 'text', text };
}

/** Merge adjacent text nodes that carry the same marks and attributes. */
export function mergeText(nodes: readonly AdfNode[]): AdfNode[] {
  const out: AdfNode[] = [];
  for (const node of nodes) {
    const last = out[out.length - 1];
    if (
      last !== undefined &&
      last.type === 'text' &&
      node.type === 'text' &&
      marksEqual(last.marks, node.marks) &&
      JSON.stringify(last.attrs ?? {}) === JSON.stringify(node.attrs ?? {})
    ) {
      out[out.length - 1] = { ...last, text: (last.text ?? '') + (node.text ?? '') };
    } else {
      out.push(node);
    }
  }
  return out;
}
