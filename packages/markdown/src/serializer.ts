/**
 * Document tree → Markdown.
 *
 * Blocks are separated by one blank line and the output ends with a single
 * newline. Kinds with a native form keep it; whatever the native form cannot
 * hold goes into a tag wrapped around it.
 */

import type { AdfAttrs, AdfNode, BlockNodeType } from '@mdadf/types';
import { closeTag, openTag, selfClosingTag } from './annotation';
import { canonicalizeAdf } from './canonical';
import { backtickFence, escapeText } from './escape';
import { mediaLink, serializeInline } from './inline-serializer';
import { isBlockNodeType, isKnownNodeType, usesInlineBody } from './model';
import { assertValidStructure } from './structure';
import { serializeTable } from './table';

/**
 * Serialize a document tree to Markdown.
 *
 * @throws StructuralViolationError when the tree breaks the structural rules
 */
export function serializeAdf(node: AdfNode): string {
  assertValidStructure(node);
  const canonical = canonicalizeAdf(node);
  return renderRoot(canonical) + '\n';
}

function renderRoot(node: AdfNode): string {
  if (node.type !== 'doc') return renderBlock(node);

  const body = renderBlocks(node.content ?? []);
  const attrs: AdfAttrs = node.version !== undefined ? { version: node.version, ...node.attrs } : { ...node.attrs };
  if (Object.keys(attrs).length === 0 && (node.marks ?? []).length === 0) return body;
  return wrapLines(node, body, attrs);
}

export function renderBlocks(nodes: readonly AdfNode[]): string {
  return nodes.map(renderBlock).join('\n\n');
}

// ============================================================================
// Dispatch
// ============================================================================

function renderBlock(node: AdfNode): string {
  const kind = node.type;
  if (!isKnownNodeType(kind)) return renderGeneric(node);
  if (!isBlockNodeType(kind)) return serializeInline([node], 'single');
  return renderKnownBlock(node, kind);
}

function renderKnownBlock(node: AdfNode, kind: BlockNodeType): string {
  switch (kind) {
    case 'paragraph':
      return renderParagraph(node);
    case 'heading':
      return renderHeading(node);
    case 'blockquote':
      return withTag(node, quoteLines(renderBlocks(node.content ?? [])), hasTagData(node));
    case 'codeBlock':
      return renderCodeBlock(node);
    case 'bulletList':
    case 'orderedList':
      return renderList(node);
    case 'rule':
      return withTag(node, '---', hasTagData(node));
    case 'table':
      return serializeTable(node, renderBlocks);
    case 'panel':
      return renderPanel(node);
    case 'expand':
    case 'nestedExpand':
      return renderExpand(node);
    case 'media':
      return `${openTag('media', node.attrs, node.marks)}${mediaLink(node.attrs)}${closeTag('media')}`;
    case 'caption':
      return inlineBody(node);
    case 'doc':
    case 'listItem':
    case 'tableRow':
    case 'tableCell':
    case 'tableHeader':
    case 'mediaSingle':
    case 'mediaGroup':
      return renderGeneric(node);
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

// ============================================================================
// Tag Forms
// ============================================================================

function hasTagData(node: AdfNode): boolean {
  return Object.keys(node.attrs ?? {}).length > 0 || (node.marks ?? []).length > 0;
}

/** Attributes beyond those the native form writes. */
function hasExtraData(node: AdfNode, native: readonly string[]): boolean {
  const extra = Object.keys(node.attrs ?? {}).some(name => !native.includes(name));
  return extra || (node.marks ?? []).length > 0;
}

/** Open tag line, body lines, close tag line. */
function wrapLines(node: AdfNode, body: string, attrs: AdfAttrs | undefined = node.attrs): string {
  const lines = [openTag(node.type, attrs, node.marks)];
  if (body !== '') lines.push(body);
  lines.push(closeTag(node.type));
  return lines.join('\n');
}

function withTag(node: AdfNode, body: string, tagged: boolean): string {
  return tagged ? wrapLines(node, body) : body;
}

function inlineBody(node: AdfNode): string {
  return `${openTag(node.type, node.attrs, node.marks)}${serializeInline(node.content ?? [], 'single')}${closeTag(node.type)}`;
}

/** Unknown kinds, and known kinds out of their usual place. */
function renderGeneric(node: AdfNode): string {
  if (node.content === undefined) return selfClosingTag(node.type, node.attrs, node.marks);
  if (usesInlineBody(node)) return inlineBody(node);
  return wrapLines(node, renderBlocks(node.content));
}

// ============================================================================
// Blocks
// ============================================================================

function renderParagraph(node: AdfNode): string {
  const content = node.content ?? [];
  if (hasTagData(node) || content.length === 0) return inlineBody(node);
  return serializeInline(content, 'lines');
}

function renderHeading(node: AdfNode): string {
  const level = node.attrs?.level;
  const hashes = '#'.repeat(typeof level === 'number' ? level : 1);
  const inline = serializeInline(node.content ?? [], 'single');
  const line = inline === '' ? hashes : `${hashes} ${inline}`;
  return withTag(node, line, hasExtraData(node, ['level']));
}

function quoteLines(body: string): string {
  return body
    .split('\n')
    .map(line => (line === '' ? '>' : `> ${line}`))
    .join('\n');
}

const FENCE_LANGUAGE_RE = /^[^\s`]+$/;

function renderCodeBlock(node: AdfNode): string {
  const text = (node.content ?? []).map(child => child.text ?? '').join('');
  const language = node.attrs?.language;
  const fenceLanguage = typeof language === 'string' && FENCE_LANGUAGE_RE.test(language) ? language : '';
  const native = !hasExtraData(node, ['language']) && (language === undefined || fenceLanguage !== '');

  const fence = backtickFence(text, 3);
  const lines = [fence + fenceLanguage];
  if (text !== '') lines.push(...text.split('\n'));
  lines.push(fence);
  return withTag(node, lines.join('\n'), !native);
}

function isListStart(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function renderList(node: AdfNode): string {
  const items = node.content ?? [];
  const ordered = node.type === 'orderedList';
  const order = node.attrs?.order;
  const start = ordered && isListStart(order) ? order : 1;

  // An ordered list starting at 1 reads back without `order`, so an explicit 1 needs the tag.
  const nativeAttrs = ordered
    ? !hasExtraData(node, ['order']) && (order === undefined || (isListStart(order) && order !== 1))
    : !hasTagData(node);
  const native = items.length > 0 && nativeAttrs;

  const body = items.map((item, index) => renderListItem(item, ordered ? `${start + index}.` : '-')).join('\n');
  return withTag(node, body, !native);
}

function renderListItem(item: AdfNode, marker: string): string {
  let body = renderItemBlocks(item.content ?? []);
  if (hasTagData(item)) body = wrapLines(item, body);
  if (body === '') return marker;

  const [first, ...rest] = body.split('\n');
  return [`${marker} ${first}`, ...rest.map(line => (line === '' ? '' : `  ${line}`))].join('\n');
}

function renderItemBlocks(blocks: readonly AdfNode[]): string {
  let out = '';
  blocks.forEach((block, index) => {
    if (index > 0) {
      // A nested list sits directly under the text it belongs to.
      const tight = isList(block) && !isList(blocks[index - 1]);
      out += tight ? '\n' : '\n\n';
    }
    out += renderBlock(block);
  });
  return out;
}

function isList(node: AdfNode): boolean {
  return node.type === 'bulletList' || node.type === 'orderedList';
}

function renderPanel(node: AdfNode): string {
  const panelType = node.attrs?.panelType;
  const label = `**${escapeText(typeof panelType === 'string' && panelType !== '' ? panelType.toUpperCase() : 'PANEL')}**`;
  const body = renderBlocks(node.content ?? []);
  return wrapLines(node, quoteLines(body === '' ? label : `${label}\n\n${body}`));
}

function renderExpand(node: AdfNode): string {
  const title = node.attrs?.title;
  const label = `**${escapeText(typeof title === 'string' && title !== '' ? title : node.type)}**`;
  const body = renderBlocks(node.content ?? []);
  return wrapLines(node, body === '' ? label : `${label}\n\n${body}`);
}
