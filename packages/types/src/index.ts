/**
 * @mdadf/types: Shared type definitions for the ADF <-> Markdown bridge.
 *
 * The document tree mirrors Atlassian Document Format JSON: every node is
 * `{ type, attrs?, content?, text?, marks? }` and the root `doc` carries a
 * top-level `version`. Node and mark kinds are open strings so that kinds
 * this package does not know about still pass through a conversion.
 */

// ============================================================================
// Attribute Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type AdfAttrs = Record<string, JsonValue>;

// ============================================================================
// Node Kinds
// ============================================================================

export type InlineNodeType =
  | 'text'
  | 'hardBreak'
  | 'inlineCard'
  | 'date'
  | 'status'
  | 'mention'
  | 'emoji'
  | 'mediaInline';

export type BlockNodeType =
  | 'doc'
  | 'paragraph'
  | 'heading'
  | 'blockquote'
  | 'codeBlock'
  | 'bulletList'
  | 'orderedList'
  | 'listItem'
  | 'rule'
  | 'table'
  | 'tableRow'
  | 'tableCell'
  | 'tableHeader'
  | 'panel'
  | 'media'
  | 'mediaSingle'
  | 'mediaGroup'
  | 'caption'
  | 'expand'
  | 'nestedExpand';

export type KnownNodeType = InlineNodeType | BlockNodeType;

export type KnownMarkType =
  | 'code'
  | 'em'
  | 'strong'
  | 'strike'
  | 'link'
  | 'underline'
  | 'subsup'
  | 'textColor'
  | 'backgroundColor'
  | 'border'
  | 'alignment'
  | 'indentation';

// ============================================================================
// Tree
// ============================================================================

export interface AdfMark {
  type: string;
  attrs?: AdfAttrs;
}

export interface AdfNode {
  type: string;
  attrs?: AdfAttrs;
  content?: AdfNode[];
  /** Literal payload; text nodes only. */
  text?: string;
  marks?: AdfMark[];
  /** Format version; root doc only. */
  version?: number;
}

export interface AdfDoc extends AdfNode {
  type: 'doc';
  content: AdfNode[];
}

// ============================================================================
// Diagnostics
// ============================================================================

export type ConversionWarningCode = 'grammar-mismatch' | 'attribute-decode' | 'span-mismatch';

export interface ConversionWarning {
  code: ConversionWarningCode;
  message: string;
  /** 1-based line in the parsed text. */
  line: number;
}

export interface ParseResult {
  document: AdfDoc;
  warnings: ConversionWarning[];
}

export type NodePath = Array<string | number>;

export interface StructuralViolation {
  message: string;
  path: NodePath;
  nodeType: string;
}
