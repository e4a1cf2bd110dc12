import { describe, it, expect } from 'vitest';
import type { AdfMark, AdfNode } from '@mdadf/types';
import { canonicalizeAdf } from '../canonical';
import { markdownToAdf, parseMarkdown } from '../parser';
import { serializeAdf } from '../serializer';

// Small seeded generator: the same seed always builds the same tree.
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const ALPHABET = ['a', 'b', 'z', ' ', '*', '_', '`', '~', '[', ']', '(', ')', '<', '>', '|', '\\', '#', '-', '&', '\n', '1', '.', ':', '!', '='];

class TreeGenerator {
  private readonly next: () => number;

  constructor(seed: number) {
    this.next = mulberry32(seed);
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)];
  }

  string(maxLength: number): string {
    let out = '';
    const length = this.int(1, maxLength);
    for (let i = 0; i < length; i++) out += this.pick(ALPHABET);
    return out;
  }

  marks(): AdfMark[] {
    if (this.chance(0.15)) {
      const marks: AdfMark[] = [{ type: 'code' }];
      if (this.chance(0.5)) marks.push({ type: 'link', attrs: { href: this.string(8) } });
      return marks;
    }
    const marks: AdfMark[] = [];
    if (this.chance(0.3)) marks.push({ type: 'em' });
    if (this.chance(0.3)) marks.push({ type: 'strong' });
    if (this.chance(0.15)) marks.push({ type: 'strike' });
    if (this.chance(0.15)) marks.push({ type: 'underline' });
    if (this.chance(0.1)) marks.push({ type: 'textColor', attrs: { color: '#00aa00' } });
    if (this.chance(0.25)) marks.push({ type: 'link', attrs: { href: this.string(8) } });
    return marks;
  }

  text(): AdfNode {
    const marks = this.marks();
    const node: AdfNode = { type: 'text', text: this.string(6) };
    if (marks.length > 0) node.marks = marks;
    return node;
  }

  inlineNode(): AdfNode {
    switch (this.int(0, 9)) {
      case 0:
        return { type: 'hardBreak' };
      case 1:
        return { type: 'mention', attrs: { id: this.string(4), text: this.string(6) } };
      case 2:
        return { type: 'inlineCard', attrs: { url: this.string(10) } };
      case 3:
        return { type: 'mediaInline', attrs: { id: this.string(6), type: 'file' } };
      case 4:
        return { type: 'status', attrs: { text: this.string(5), color: 'blue' } };
      default:
        return this.text();
    }
  }

  inline(max: number): AdfNode[] {
    const nodes: AdfNode[] = [this.text()];
    const extra = this.int(0, max - 1);
    for (let i = 0; i < extra; i++) {
      nodes.splice(this.int(0, nodes.length), 0, this.inlineNode());
    }
    return nodes;
  }

  paragraph(): AdfNode {
    return { type: 'paragraph', content: this.inline(4) };
  }

  listItem(depth: number): AdfNode {
    const content: AdfNode[] = [this.paragraph()];
    if (depth > 0 && this.chance(0.3)) content.push(this.list(depth - 1));
    return { type: 'listItem', content };
  }

  list(depth: number): AdfNode {
    const items: AdfNode[] = [];
    const count = this.int(1, 3);
    for (let i = 0; i < count; i++) items.push(this.listItem(depth));
    if (this.chance(0.5)) return { type: 'bulletList', content: items };
    return { type: 'orderedList', attrs: { order: this.int(1, 4) }, content: items };
  }

  table(): AdfNode {
    const cols = this.int(1, 3);
    const rows: AdfNode[] = [];
    const rowCount = this.int(1, 3);
    for (let r = 0; r < rowCount; r++) {
      const cells: AdfNode[] = [];
      for (let c = 0; c < cols; c++) {
        cells.push({ type: r === 0 ? 'tableHeader' : 'tableCell', content: [this.paragraph()] });
      }
      rows.push({ type: 'tableRow', content: cells });
    }
    return { type: 'table', content: rows };
  }

  block(depth: number): AdfNode {
    switch (this.int(0, 9)) {
      case 0:
        return { type: 'heading', attrs: { level: this.int(1, 6) }, content: this.inline(3) };
      case 1:
        return { type: 'codeBlock', attrs: { language: 'ts' }, content: [{ type: 'text', text: this.string(12) }] };
      case 2:
        return this.list(depth);
      case 3:
        return depth > 0 ? { type: 'blockquote', content: this.blocks(depth - 1) } : this.paragraph();
      case 4:
        return depth > 0 ? { type: 'panel', attrs: { panelType: 'info' }, content: this.blocks(depth - 1) } : this.paragraph();
      case 5:
        return { type: 'rule' };
      case 6:
        return {
          type: 'mediaSingle',
          attrs: { layout: 'center' },
          content: [{ type: 'media', attrs: { id: this.string(6), type: 'file', alt: this.string(4) } }],
        };
      case 7:
        return this.table();
      default:
        return this.paragraph();
    }
  }

  blocks(depth: number): AdfNode[] {
    const out: AdfNode[] = [];
    const count = this.int(1, 3);
    for (let i = 0; i < count; i++) out.push(this.block(depth));
    return out;
  }

  doc(): AdfNode {
    return { type: 'doc', content: this.blocks(2) };
  }
}

describe('generated trees', () => {
  for (let seed = 1; seed <= 120; seed++) {
    it(`round-trips the tree for seed ${seed}`, () => {
      const input = new TreeGenerator(seed).doc();
      const md = serializeAdf(input);
      const result = parseMarkdown(md);
      expect(result.warnings).toEqual([]);
      expect(result.document).toEqual(canonicalizeAdf(input));
      expect(serializeAdf(markdownToAdf(md))).toBe(md);
    });
  }
});
