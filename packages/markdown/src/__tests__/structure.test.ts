import { describe, it, expect } from 'vitest';
import type { AdfNode } from '@mdadf/types';
import { assertValidStructure, findStructuralViolations } from '../structure';
import { StructuralViolationError, formatPath } from '../errors';
import { canonicalizeAdf } from '../canonical';

const para = (text: string): AdfNode => ({ type: 'paragraph', content: [{ type: 'text', text }] });

function table(...rows: AdfNode[][]): AdfNode {
  return { type: 'doc', content: [{ type: 'table', content: rows.map(cells => ({ type: 'tableRow', content: cells })) }] };
}

describe('findStructuralViolations', () => {
  it('accepts a well-formed document', () => {
    expect(findStructuralViolations({ type: 'doc', content: [para('ok')] })).toEqual([]);
  });

  it('allows doc only at the root', () => {
    expect(findStructuralViolations({ type: 'doc', content: [{ type: 'doc', content: [] }] })).toEqual([
      { message: '"doc" is only allowed at the root', path: ['content', 0], nodeType: 'doc' },
    ]);
  });

  it('keeps list items inside lists', () => {
    expect(findStructuralViolations({ type: 'doc', content: [{ type: 'listItem', content: [] }] })).toEqual([
      { message: '"listItem" is not allowed inside "doc"', path: ['content', 0], nodeType: 'listItem' },
    ]);
  });

  it('rejects marks on code block text', () => {
    const input: AdfNode = {
      type: 'doc',
      content: [{ type: 'codeBlock', content: [{ type: 'text', text: 'x', marks: [{ type: 'strong' }] }] }],
    };
    expect(findStructuralViolations(input)).toEqual([
      { message: 'text inside "codeBlock" cannot carry marks', path: ['content', 0, 'content', 0], nodeType: 'text' },
    ]);
  });

  it('requires positive integer spans', () => {
    const input = table([{ type: 'tableCell', attrs: { colspan: 0 }, content: [para('a')] }]);
    expect(findStructuralViolations(input)).toEqual([
      {
        message: 'colspan must be a positive integer',
        path: ['content', 0, 'content', 0, 'content', 0],
        nodeType: 'tableCell',
      },
    ]);
  });

  it('rejects a rowspan past the last row', () => {
    const input = table([{ type: 'tableCell', attrs: { rowspan: 2 }, content: [para('a')] }]);
    expect(findStructuralViolations(input)).toEqual([
      { message: 'rowspan in column 0 extends past the last row', path: ['content', 0, 'content', 0], nodeType: 'tableRow' },
    ]);
  });

  it('leaves unknown kinds alone unless they mix inline and block children', () => {
    expect(findStructuralViolations({ type: 'doc', content: [{ type: 'widget', content: [para('a')] }] })).toEqual([]);
  });
});

describe('assertValidStructure', () => {
  it('reports parent-level problems before descending, with a count of the rest', () => {
    const input: AdfNode = {
      type: 'doc',
      content: [
        { type: 'heading', attrs: { level: 9 }, content: [] },
        { type: 'tableRow', content: [] },
      ],
    };
    expect(() => assertValidStructure(input)).toThrow(StructuralViolationError);
    expect(() => assertValidStructure(input)).toThrow(
      'Structural violation at content[1]: "tableRow" is not allowed inside "doc" (+1 more)',
    );
  });

  it('formats paths for messages', () => {
    expect(formatPath([])).toBe('(root)');
    expect(formatPath(['content', 2, 'content', 0])).toBe('content[2].content[0]');
  });
});

describe('canonicalizeAdf', () => {
  it('merges adjacent text with the same marks and drops empty text', () => {
    const input: AdfNode = {
      type: 'paragraph',
      content: [
        { type: 'text', text: 'a' },
        { type: 'text', text: '' },
        { type: 'text', text: 'b' },
        { type: 'text', text: 'c', marks: [{ type: 'em' }] },
      ],
    };
    expect(canonicalizeAdf(input)).toEqual({
      type: 'paragraph',
      content: [
        { type: 'text', text: 'ab' },
        { type: 'text', text: 'c', marks: [{ type: 'em' }] },
      ],
    });
  });

  it('sorts marks and keeps unknown ones last in their order', () => {
    const input: AdfNode = {
      type: 'text',
      text: 'x',
      marks: [{ type: 'glow' }, { type: 'link', attrs: { href: 'u' } }, { type: 'shine' }, { type: 'strong' }],
    };
    expect(canonicalizeAdf(input).marks).toEqual([
      { type: 'strong' },
      { type: 'link', attrs: { href: 'u' } },
      { type: 'glow' },
      { type: 'shine' },
    ]);
  });

  it('removes empty attributes and fills missing container content', () => {
    expect(canonicalizeAdf({ type: 'rule', attrs: {} })).toEqual({ type: 'rule' });
    expect(canonicalizeAdf({ type: 'bulletList' })).toEqual({ type: 'bulletList', content: [] });
  });

  it('joins code block text into one node', () => {
    const input: AdfNode = {
      type: 'codeBlock',
      content: [
        { type: 'text', text: 'a\n' },
        { type: 'text', text: 'b' },
      ],
    };
    expect(canonicalizeAdf(input)).toEqual({ type: 'codeBlock', content: [{ type: 'text', text: 'a\nb' }] });
  });
});
