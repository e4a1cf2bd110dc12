import { describe, it, expect } from 'vitest';
import { markdownToAdf, parseMarkdown } from '../parser';

describe('parseMarkdown', () => {
  it('reads hand-written CommonMark blocks', () => {
    const doc = markdownToAdf('# Title\n\nSome *emphasis* and **bold**.\n\n---\n');
    expect(doc).toEqual({
      type: 'doc',
      content: [
        { type: 'heading', attrs: { level: 1 }, content: [{ type: 'text', text: 'Title' }] },
        {
          type: 'paragraph',
          content: [
            { type: 'text', text: 'Some ' },
            { type: 'text', text: 'emphasis', marks: [{ type: 'em' }] },
            { type: 'text', text: ' and ' },
            { type: 'text', text: 'bold', marks: [{ type: 'strong' }] },
            { type: 'text', text: '.' },
          ],
        },
        { type: 'rule' },
      ],
    });
  });

  it('joins soft-wrapped lines with a space', () => {
    expect(markdownToAdf('line one\r\nline two\n').content).toEqual([
      { type: 'paragraph', content: [{ type: 'text', text: 'line one line two' }] },
    ]);
  });

  it('reads two trailing spaces as a hard break', () => {
    expect(markdownToAdf('a  \nb').content).toEqual([
      { type: 'paragraph', content: [{ type: 'text', text: 'a' }, { type: 'hardBreak' }, { type: 'text', text: 'b' }] },
    ]);
  });

  it('reads the start number of an ordered list', () => {
    expect(markdownToAdf('3. a\n4. b\n').content).toEqual([
      {
        type: 'orderedList',
        attrs: { order: 3 },
        content: [
          { type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'a' }] }] },
          { type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'b' }] }] },
        ],
      },
    ]);
  });

  it('nests indented lists inside the item above', () => {
    expect(markdownToAdf('- a\n  - b\n').content).toEqual([
      {
        type: 'bulletList',
        content: [
          {
            type: 'listItem',
            content: [
              { type: 'paragraph', content: [{ type: 'text', text: 'a' }] },
              {
                type: 'bulletList',
                content: [{ type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'b' }] }] }],
              },
            ],
          },
        ],
      },
    ]);
  });

  it('reads fenced code verbatim', () => {
    expect(markdownToAdf('```python extra\nx = "*a*"\n\n  y\n```\n').content).toEqual([
      { type: 'codeBlock', attrs: { language: 'python' }, content: [{ type: 'text', text: 'x = "*a*"\n\n  y' }] },
    ]);
  });

  it('reads a link whose text equals its address as an inline card', () => {
    expect(markdownToAdf('[https://example.com](https://example.com)').content).toEqual([
      { type: 'paragraph', content: [{ type: 'inlineCard', attrs: { url: 'https://example.com' } }] },
    ]);
  });

  it('keeps the angle form as a link', () => {
    expect(markdownToAdf('[https://example.com](<https://example.com>)').content).toEqual([
      {
        type: 'paragraph',
        content: [
          {
            type: 'text',
            text: 'https://example.com',
            marks: [{ type: 'link', attrs: { href: 'https://example.com' } }],
          },
        ],
      },
    ]);
  });

  it('stacks tag marks on native ones in canonical order', () => {
    expect(markdownToAdf('<!-- ADF:text:marks="underline" -->**text**<!-- /ADF:text -->').content).toEqual([
      { type: 'paragraph', content: [{ type: 'text', text: 'text', marks: [{ type: 'strong' }, { type: 'underline' }] }] },
    ]);
  });

  it('reads a hand-written pipe table with a header row', () => {
    expect(markdownToAdf('| a | b |\n| --- | --- |\n| 1 | 2 |\n').content).toEqual([
      {
        type: 'table',
        content: [
          {
            type: 'tableRow',
            content: [
              { type: 'tableHeader', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'a' }] }] },
              { type: 'tableHeader', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'b' }] }] },
            ],
          },
          {
            type: 'tableRow',
            content: [
              { type: 'tableCell', content: [{ type: 'paragraph', content: [{ type: 'text', text: '1' }] }] },
              { type: 'tableCell', content: [{ type: 'paragraph', content: [{ type: 'text', text: '2' }] }] },
            ],
          },
        ],
      },
    ]);
  });

  it('moves the doc version out of the attributes', () => {
    const doc = markdownToAdf('<!-- ADF:doc:version="1",layout="wide" -->\nx\n<!-- /ADF:doc -->\n');
    expect(doc).toEqual({
      type: 'doc',
      version: 1,
      attrs: { layout: 'wide' },
      content: [{ type: 'paragraph', content: [{ type: 'text', text: 'x' }] }],
    });
  });

  describe('warnings', () => {
    it('keeps an unclosed block tag as text', () => {
      const result = parseMarkdown('<!-- ADF:panel -->\ntext\n');
      expect(result.warnings).toEqual([{ code: 'grammar-mismatch', message: 'unclosed tag "panel"', line: 1 }]);
      expect(result.document.content).toEqual([
        { type: 'paragraph', content: [{ type: 'text', text: '<!-- ADF:panel -->' }] },
        { type: 'paragraph', content: [{ type: 'text', text: 'text' }] },
      ]);
    });

    it('keeps an unmatched close tag as text', () => {
      const result = parseMarkdown('a\n\n<!-- /ADF:panel -->\n');
      expect(result.warnings).toEqual([{ code: 'grammar-mismatch', message: 'unmatched close tag "panel"', line: 3 }]);
      expect(result.document.content[1]).toEqual({
        type: 'paragraph',
        content: [{ type: 'text', text: '<!-- /ADF:panel -->' }],
      });
    });

    it('drops an attribute it cannot decode and says so', () => {
      const result = parseMarkdown('<!-- ADF:status:text="a%zz",color="green" /-->');
      expect(result.warnings).toEqual([
        { code: 'attribute-decode', message: 'status: cannot decode value of attribute "text"', line: 1 },
      ]);
      expect(result.document.content).toEqual([
        { type: 'paragraph', content: [{ type: 'status', attrs: { color: 'green' } }] },
      ]);
    });

    it('reports a rowspan that runs past the table', () => {
      const md = [
        '<!-- ADF:table -->',
        '| <!-- ADF:tableCell:rowspan="2" -->a<!-- /ADF:tableCell --> |',
        '| --- |',
        '<!-- /ADF:table -->',
      ].join('\n');
      const result = parseMarkdown(md);
      expect(result.warnings).toEqual([
        { code: 'span-mismatch', message: 'rowspan in column 0 extends past the last row', line: 2 },
      ]);
    });

    it('reports content inside a span', () => {
      const md = [
        '<!-- ADF:table -->',
        '| <!-- ADF:tableCell:colspan="2" -->a<!-- /ADF:tableCell --> | b |',
        '| --- | --- |',
        '<!-- /ADF:table -->',
      ].join('\n');
      const result = parseMarkdown(md);
      expect(result.warnings).toEqual([
        { code: 'span-mismatch', message: 'column 1 holds content inside a span', line: 2 },
      ]);
      expect(result.document.content[0].content?.[0].content).toHaveLength(2);
    });
  });
});
