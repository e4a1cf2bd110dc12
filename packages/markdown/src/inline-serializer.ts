/**
 * Inline content → Markdown.
 *
 * Text runs use native delimiters for code, em, strong, strike and plain
 * links; every other mark, attribute and inline kind is carried by tags.
 */

import type { AdfAttrs, AdfMark, AdfNode, JsonValue } from '@mdadf/types';
import { BOUNDARY, closeTag, openTag, selfClosingTag } from './annotation';
import { codeSpan, escapeHref, escapeText, finishLine } from './escape';
import { isInlineNodeType } from './model';

/**
 * `lines`: hard breaks end the line (paragraphs).
 * `single`: one line; hard breaks are written as tags (headings, tag bodies).
 */
export type InlineMode = 'lines' | 'single';

const HARD_BREAK_SUFFIX = '  ';
const FUSING_CHARS = '*~`';

export function serializeInline(nodes: readonly AdfNode[], mode: InlineMode): string {
  const lines: string[] = [];
  let current = '';
  let previous = '';

  for (const node of nodes) {
    if (mode === 'lines' && node.type === 'hardBreak' && isBare(node)) {
      lines.push(current);
      current = '';
      previous = '';
      continue;
    }
    const piece = renderInlineNode(node);
    if (needsBoundary(previous, piece)) current += BOUNDARY;
    current += piece;
    previous = piece;
  }
  lines.push(current);

  // A trailing hard break leaves the last line ending in the suffix.
  const trailingBreak = lines.length > 1 && lines[lines.length - 1] === '';
  if (trailingBreak) lines.pop();

  return lines
    .map((line, index) => {
      let out = finishLine(line);
      if (index < lines.length - 1 || trailingBreak) {
        if (out === '') out = BOUNDARY;
        out += HARD_BREAK_SUFFIX;
      }
      return out;
    })
    .join('\n');
}

function isBare(node: AdfNode): boolean {
  return !hasEntries(node.attrs) && !(node.marks && node.marks.length > 0);
}

function hasEntries(attrs: AdfAttrs | undefined): attrs is AdfAttrs {
  return attrs !== undefined && Object.keys(attrs).length > 0;
}

function needsBoundary(previous: string, next: string): boolean {
  if (previous === '' || next === '') return false;
  const last = previous[previous.length - 1];
  const first = next[0];
  if (FUSING_CHARS.includes(last) && FUSING_CHARS.includes(first)) return true;
  return last === '&' && first === '#';
}

// ============================================================================
// Nodes
// ============================================================================

export function renderInlineNode(node: AdfNode): string {
  const kind = node.type;
  if (!isInlineNodeType(kind)) return renderGenericInline(node);

  switch (kind) {
    case 'text':
      return renderText(node);
    case 'hardBreak':
      return selfClosingTag('hardBreak', node.attrs, node.marks);
    case 'inlineCard':
      return renderInlineCard(node);
    case 'date':
      return tagged(node, escapeText(formatTimestamp(node.attrs?.timestamp)));
    case 'status':
      return tagged(node, escapeText(stringAttr(node.attrs, 'text') ?? ''));
    case 'mention':
      return tagged(node, escapeText(stringAttr(node.attrs, 'text') ?? `@mention(${plain(node.attrs?.id)})`));
    case 'emoji':
      return tagged(node, escapeText(stringAttr(node.attrs, 'text') ?? stringAttr(node.attrs, 'shortName') ?? ''));
    case 'mediaInline':
      return tagged(node, mediaLink(node.attrs));
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

function tagged(node: AdfNode, body: string): string {
  return `${openTag(node.type, node.attrs, node.marks)}${body}${closeTag(node.type)}`;
}

/** Unknown kinds (and block kinds met in inline position) keep their kind and attributes. */
function renderGenericInline(node: AdfNode): string {
  if (node.content === undefined) return selfClosingTag(node.type, node.attrs, node.marks);
  return tagged(node, serializeInline(node.content, 'single'));
}

function renderInlineCard(node: AdfNode): string {
  const url = stringAttr(node.attrs, 'url');
  const native =
    url !== undefined &&
    url !== '' &&
    !/[\r\n]/.test(url) &&
    Object.keys(node.attrs ?? {}).length === 1 &&
    !(node.marks && node.marks.length > 0);
  if (native) return `[${escapeText(url)}](${escapeHref(url)})`;
  return tagged(node, url === undefined ? '' : escapeText(url));
}

// ============================================================================
// Text
// ============================================================================

interface SplitMarks {
  code: boolean;
  em: boolean;
  strong: boolean;
  strike: boolean;
  href: string | undefined;
  extra: AdfMark[];
}

function nativeHref(mark: AdfMark): string | undefined {
  const attrs = mark.attrs ?? {};
  const keys = Object.keys(attrs);
  const href = attrs.href;
  if (keys.length !== 1 || typeof href !== 'string' || /[\r\n]/.test(href)) return undefined;
  return href;
}

/**
 * Native syntax reads back after the marks of the enclosing text tag, so only
 * the last mark of each kind may be written natively.
 */
function splitMarks(text: string, marks: readonly AdfMark[]): SplitMarks {
  const split: SplitMarks = { code: false, em: false, strong: false, strike: false, href: undefined, extra: [] };
  marks.forEach((mark, index) => {
    const last = !marks.slice(index + 1).some(later => later.type === mark.type);
    const bare = !hasEntries(mark.attrs);
    if (mark.type === 'code' && last && bare && !/[\r\n]/.test(text)) {
      split.code = true;
    } else if (mark.type === 'em' && last && bare) {
      split.em = true;
    } else if (mark.type === 'strong' && last && bare) {
      split.strong = true;
    } else if (mark.type === 'strike' && last && bare) {
      split.strike = true;
    } else if (mark.type === 'link' && last && nativeHref(mark) !== undefined) {
      split.href = nativeHref(mark);
    } else {
      split.extra.push(mark);
    }
  });
  return split;
}

export function renderText(node: AdfNode): string {
  const text = node.text ?? '';
  const split = splitMarks(text, node.marks ?? []);

  let body = split.code ? codeSpan(text) : escapeText(text);
  if (split.em) body = `*${body}*`;
  if (split.strong) body = `**${body}**`;
  if (split.strike) body = `~~${body}~~`;
  if (split.href !== undefined) {
    // `[x](x)` reads back as an inline card; the angle form stays a link.
    const plainLabel = !split.code && !split.em && !split.strong && !split.strike;
    body =
      plainLabel && text === split.href
        ? `[${body}](<${escapeHref(split.href)}>)`
        : `[${body}](${escapeHref(split.href)})`;
  }

  if (split.extra.length > 0 || hasEntries(node.attrs)) {
    return `${openTag('text', node.attrs, split.extra)}${body}${closeTag('text')}`;
  }
  return body;
}

// ============================================================================
// Fallback Bodies
// ============================================================================

function stringAttr(attrs: AdfAttrs | undefined, name: string): string | undefined {
  const value = attrs?.[name];
  return typeof value === 'string' ? value : undefined;
}

function plain(value: JsonValue | undefined): string {
  if (value === undefined) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** ISO-8601 UTC, whole seconds; the raw value when it is not a millisecond timestamp. */
export function formatTimestamp(value: JsonValue | undefined): string {
  const ms =
    typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return plain(value);
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** `[alt](fileId:id)` placeholder for media. */
export function mediaLink(attrs: AdfAttrs | undefined): string {
  const alt = stringAttr(attrs, 'alt') ?? '';
  return `[${escapeText(alt)}](${escapeHref(`fileId:${plain(attrs?.id)}`)})`;
}
