/**
 * Canonical form of a document tree.
 *
 * Two trees that serialize to the same text have the same canonical form;
 * the parser only ever returns canonical trees.
 */

import type { AdfMark, AdfNode } from '@mdadf/types';
import { isContainerType, sortMarks } from './model';

export function canonicalizeAdf(node: AdfNode): AdfNode {
  const out: AdfNode = { type: node.type };
  if (node.attrs && Object.keys(node.attrs).length > 0) out.attrs = { ...node.attrs };
  if (node.text !== undefined) out.text = node.text;
  if (node.marks && node.marks.length > 0) out.marks = sortMarks(node.marks.map(canonicalMark));
  if (node.version !== undefined) out.version = node.version;

  if (node.type === 'codeBlock') {
    const text = (node.content ?? []).map(child => child.text ?? '').join('');
    out.content = text === '' ? [] : [{ type: 'text', text }];
  } else if (node.content !== undefined) {
    out.content = mergeChildren(node.content.map(child => canonicalizeAdf(child)));
  } else if (isContainerType(node.type)) {
    out.content = [];
  }
  return out;
}

function canonicalMark(mark: AdfMark): AdfMark {
  return mark.attrs && Object.keys(mark.attrs).length > 0 ? { type: mark.type, attrs: { ...mark.attrs } } : { type: mark.type };
}

function sameTextFormat(a: AdfNode, b: AdfNode): boolean {
  return JSON.stringify([a.marks ?? [], a.attrs ?? {}]) === JSON.stringify([b.marks ?? [], b.attrs ?? {}]);
}

function mergeChildren(children: AdfNode[]): AdfNode[] {
  const out: AdfNode[] = [];
  for (const child of children) {
    if (child.type === 'text' && (child.text ?? '') === '') continue;
    const last = out[out.length - 1];
    if (last !== undefined && last.type === 'text' && child.type === 'text' && sameTextFormat(last, child)) {
      out[out.length - 1] = { ...last, text: (last.text ?? '') + (child.text ?? '') };
    } else {
      out.push(child);
    }
  }
  return out;
}
