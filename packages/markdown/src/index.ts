/**
 * @mdadf/markdown: lossless conversion between document trees and Markdown.
 */

export { serializeAdf } from './serializer';
export { parseMarkdown, markdownToAdf } from './parser';
export { canonicalizeAdf } from './canonical';
export { findStructuralViolations, assertValidStructure } from './structure';
export { MdAdfError, StructuralViolationError, formatPath } from './errors';
export {
  BOUNDARY,
  closeTag,
  decodeMarkList,
  decodeTag,
  encodeMarkList,
  encodeTag,
  escapeValue,
  openTag,
  selfClosingTag,
  unescapeValue,
} from './annotation';
export type { DecodedTag } from './annotation';
export {
  BLOCK_NODE_TYPES,
  CANONICAL_MARK_ORDER,
  INLINE_NODE_TYPES,
  isBlockNodeType,
  isInlineNodeType,
  isKnownMarkType,
  isKnownNodeType,
  sortMarks,
} from './model';
