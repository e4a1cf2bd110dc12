/**
 * Markdown text escaping.
 *
 * Everything the inline scanner would read as syntax is backslash-escaped;
 * characters the line-based block splitter would lose (newlines, edge
 * whitespace) become numeric character references.
 */

import { BOUNDARY, scanTag } from './annotation';
import { isInlineNodeType } from './model';

const TEXT_SPECIALS = new Set(['\\', '*', '`', '~', '[', ']', '<', '|']);

/** Backslash before ASCII punctuation is an escape; anything else is literal. */
export const ESCAPABLE_RE = /[!-/:-@[-`{-~]/;

export function escapeText(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (TEXT_SPECIALS.has(ch)) {
      out += '\\' + ch;
    } else if (ch === '&' && text[i + 1] === '#') {
      out += '\\&';
    } else if (ch === '\n') {
      out += '&#10;';
    } else if (ch === '\r') {
      out += '&#13;';
    } else {
      out += ch;
    }
  }
  return out;
}

const HREF_SPECIALS = new Set([...TEXT_SPECIALS, '(', ')', '>']);

/**
 * Link destination escaping. Every token the inline scanner skips over
 * (code spans, tags, escapes) is neutralized so a destination never pairs
 * with syntax outside it; line breaks become character references.
 */
export function escapeHref(href: string): string {
  let out = '';
  for (const ch of href) {
    if (HREF_SPECIALS.has(ch)) {
      out += '\\' + ch;
    } else if (ch === '\n') {
      out += '&#10;';
    } else if (ch === '\r') {
      out += '&#13;';
    } else {
      out += ch;
    }
  }
  return out;
}

/** Shortest backtick fence that does not occur in `text`, never under `min`. */
export function backtickFence(text: string, min: number): string {
  let longest = 0;
  for (const run of text.match(/`+/g) ?? []) {
    longest = Math.max(longest, run.length);
  }
  return '`'.repeat(Math.max(min, longest + 1));
}

export function codeSpan(text: string): string {
  const fence = backtickFence(text, 1);
  const pad =
    text.startsWith('`') ||
    text.endsWith('`') ||
    (text.startsWith(' ') && text.endsWith(' ') && text.trim() !== '');
  return pad ? `${fence} ${text} ${fence}` : `${fence}${text}${fence}`;
}

function whitespaceEntities(run: string): string {
  return run.replace(/[ \t]/g, ch => (ch === ' ' ? '&#32;' : '&#9;'));
}

/**
 * Finish one rendered inline line: edge whitespace becomes character
 * references, and a start that reads as block syntax is neutralized.
 */
export function finishLine(line: string): string {
  let out = line
    .replace(/^[ \t]+/, whitespaceEntities)
    .replace(/[ \t]+$/, whitespaceEntities);

  if (/^[#>+-]/.test(out)) return '\\' + out;
  const ordinal = out.match(/^(\d+)\.( |$)/);
  if (ordinal) return `${ordinal[1]}\\.${out.slice(ordinal[1].length + 1)}`;
  if (out.startsWith('```')) return BOUNDARY + out;
  const tag = scanTag(out, 0);
  if (tag && tag.form !== 'boundary' && !isInlineNodeType(tag.kind)) {
    out = BOUNDARY + out;
  }
  return out;
}
