/**
 * Document Model tables.
 *
 * Node/mark kind sets, declared attribute types and child rules shared by the
 * annotation grammar, serializer, parser and structural validator.
 */

import type { AdfMark, AdfNode, BlockNodeType, InlineNodeType, KnownMarkType, KnownNodeType } from '@mdadf/types';

// ============================================================================
// Kinds
// ============================================================================

export const INLINE_NODE_TYPES: readonly InlineNodeType[] = [
  'text',
  'hardBreak',
  'inlineCard',
  'date',
  'status',
  'mention',
  'emoji',
  'mediaInline',
];

export const BLOCK_NODE_TYPES: readonly BlockNodeType[] = [
  'doc',
  'paragraph',
  'heading',
  'blockquote',
  'codeBlock',
  'bulletList',
  'orderedList',
  'listItem',
  'rule',
  'table',
  'tableRow',
  'tableCell',
  'tableHeader',
  'panel',
  'media',
  'mediaSingle',
  'mediaGroup',
  'caption',
  'expand',
  'nestedExpand',
];

/** Canonical mark order; marks not listed sort after these, keeping their relative order. */
export const CANONICAL_MARK_ORDER: readonly KnownMarkType[] = [
  'code',
  'em',
  'strong',
  'strike',
  'link',
  'underline',
  'subsup',
  'textColor',
  'backgroundColor',
];

const KNOWN_MARK_TYPES: readonly KnownMarkType[] = [
  ...CANONICAL_MARK_ORDER,
  'border',
  'alignment',
  'indentation',
];

const inlineSet = new Set<string>(INLINE_NODE_TYPES);
const blockSet = new Set<string>(BLOCK_NODE_TYPES);
const markSet = new Set<string>(KNOWN_MARK_TYPES);

export function isKnownNodeType(type: string): type is KnownNodeType {
  return inlineSet.has(type) || blockSet.has(type);
}

export function isInlineNodeType(type: string): type is InlineNodeType {
  return inlineSet.has(type);
}

export function isBlockNodeType(type: string): type is BlockNodeType {
  return blockSet.has(type);
}

export function isKnownMarkType(type: string): type is KnownMarkType {
  return markSet.has(type);
}

// ============================================================================
// Attribute Types
// ============================================================================

export type AttrType = 'string' | 'number' | 'boolean' | 'number[]' | 'string[]';

type AttrTable = Record<string, AttrType>;

const CELL_ATTRS: AttrTable = {
  colspan: 'number',
  rowspan: 'number',
  colwidth: 'number[]',
  background: 'string',
};

const MEDIA_ATTRS: AttrTable = {
  id: 'string',
  type: 'string',
  collection: 'string',
  alt: 'string',
  width: 'number',
  height: 'number',
  occurrenceKey: 'string',
};

const NODE_ATTR_TYPES: Record<KnownNodeType, AttrTable> = {
  doc: { version: 'number' },
  text: {},
  paragraph: {},
  heading: { level: 'number' },
  blockquote: {},
  codeBlock: { language: 'string' },
  bulletList: {},
  orderedList: { order: 'number' },
  listItem: {},
  hardBreak: { text: 'string' },
  rule: {},
  inlineCard: { url: 'string' },
  date: { timestamp: 'string' },
  status: { text: 'string', color: 'string', style: 'string' },
  mention: { id: 'string', text: 'string', accessLevel: 'string', userType: 'string' },
  emoji: { shortName: 'string', id: 'string', text: 'string' },
  table: { isNumberColumnEnabled: 'boolean', width: 'number', layout: 'string', displayMode: 'string' },
  tableRow: {},
  tableCell: CELL_ATTRS,
  tableHeader: CELL_ATTRS,
  panel: {
    panelType: 'string',
    panelIcon: 'string',
    panelIconId: 'string',
    panelIconText: 'string',
    panelColor: 'string',
  },
  media: MEDIA_ATTRS,
  mediaInline: MEDIA_ATTRS,
  mediaSingle: { layout: 'string', width: 'number', widthType: 'string' },
  mediaGroup: {},
  caption: {},
  expand: { title: 'string' },
  nestedExpand: { title: 'string' },
};

const MARK_ATTR_TYPES: Record<KnownMarkType, AttrTable> = {
  code: {},
  em: {},
  strong: {},
  strike: {},
  link: { href: 'string', title: 'string', id: 'string', collection: 'string', occurrenceKey: 'string' },
  underline: {},
  subsup: { type: 'string' },
  textColor: { color: 'string' },
  backgroundColor: { color: 'string' },
  border: { size: 'number', color: 'string' },
  alignment: { align: 'string' },
  indentation: { level: 'number' },
};

/** Attribute written as `kind=value` in a `marks` list item. */
export const MARK_PRIMARY_ATTR: Partial<Record<KnownMarkType, string>> = {
  link: 'href',
  subsup: 'type',
  textColor: 'color',
  backgroundColor: 'color',
  alignment: 'align',
  indentation: 'level',
};

export function nodeAttrType(kind: string, name: string): AttrType | undefined {
  if (name === 'localId') return 'string';
  return isKnownNodeType(kind) ? NODE_ATTR_TYPES[kind][name] : undefined;
}

export function markAttrType(kind: string, name: string): AttrType | undefined {
  return isKnownMarkType(kind) ? MARK_ATTR_TYPES[kind][name] : undefined;
}

export function markPrimaryAttr(kind: string): string | undefined {
  return isKnownMarkType(kind) ? MARK_PRIMARY_ATTR[kind] : undefined;
}

// ============================================================================
// Marks
// ============================================================================

export function markRank(type: string): number {
  const idx = CANONICAL_MARK_ORDER.findIndex(known => known === type);
  return idx === -1 ? CANONICAL_MARK_ORDER.length : idx;
}

/** Stable sort into canonical mark order. */
export function sortMarks(marks: AdfMark[]): AdfMark[] {
  return marks
    .map((mark, index) => ({ mark, index }))
    .sort((a, b) => markRank(a.mark.type) - markRank(b.mark.type) || a.index - b.index)
    .map(entry => entry.mark);
}

export function marksEqual(a: AdfMark[] | undefined, b: AdfMark[] | undefined): boolean {
  return JSON.stringify(a ?? []) === JSON.stringify(b ?? []);
}

// ============================================================================
// Child Rules
// ============================================================================

export type ChildRule = 'blocks' | 'inline' | 'listItems' | 'rows' | 'cells' | 'text' | 'leaf';

const CHILD_RULES: Record<KnownNodeType, ChildRule> = {
  doc: 'blocks',
  text: 'leaf',
  paragraph: 'inline',
  heading: 'inline',
  blockquote: 'blocks',
  codeBlock: 'text',
  bulletList: 'listItems',
  orderedList: 'listItems',
  listItem: 'blocks',
  hardBreak: 'leaf',
  rule: 'leaf',
  inlineCard: 'leaf',
  date: 'leaf',
  status: 'leaf',
  mention: 'leaf',
  emoji: 'leaf',
  table: 'rows',
  tableRow: 'cells',
  tableCell: 'blocks',
  tableHeader: 'blocks',
  panel: 'blocks',
  media: 'leaf',
  mediaInline: 'leaf',
  mediaSingle: 'blocks',
  mediaGroup: 'blocks',
  caption: 'inline',
  expand: 'blocks',
  nestedExpand: 'blocks',
};

export function childRule(kind: KnownNodeType): ChildRule {
  return CHILD_RULES[kind];
}

/** Known kinds that always carry a `content` array in canonical form. */
export function isContainerType(type: string): boolean {
  if (!isKnownNodeType(type)) return false;
  return CHILD_RULES[type] !== 'leaf';
}

/**
 * Whether a generic container is written as one line of inline content: it
 * has a known inline child and no known block child.
 */
export function usesInlineBody(node: AdfNode): boolean {
  const content = node.content ?? [];
  return content.some(child => isInlineNodeType(child.type)) && !content.some(child => isBlockNodeType(child.type));
}
