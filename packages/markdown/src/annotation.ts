/**
 * Annotation Grammar: encode/decode of `<!-- ADF:kind:attr="value" -->` tags.
 *
 * Tag forms:
 *   open          <!-- ADF:kind:a="1",b=true -->
 *   close         <!-- /ADF:kind -->
 *   self-closing  <!-- ADF:kind:a="1" /-->
 *   boundary      <!-- -->
 *
 * Values are percent-escaped over ESCAPED_CHARS, so a tag never spans lines
 * and never contains its own delimiters. Quoted values are typed by the
 * declared attribute type of the kind; unquoted values are escaped JSON.
 * The reserved `marks` attribute carries a mark list (see encodeMarkList).
 */

import type { AdfAttrs, AdfMark, JsonValue } from '@mdadf/types';
import type { AttrType } from './model';
import { markAttrType, markPrimaryAttr, nodeAttrType } from './model';

// ============================================================================
// Value Escaping
// ============================================================================

const ESCAPED_CHARS = new Set(['%', '"', ',', '=', ';', ':', '|', '<', '>', '\n', '\r', '\t']);

export function escapeValue(value: string): string {
  let out = '';
  for (const ch of value) {
    out += ESCAPED_CHARS.has(ch) ? '%' + ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0') : ch;
  }
  return out;
}

/** Inverse of escapeValue; undefined when a `%` is not followed by two hex digits. */
export function unescapeValue(value: string): string | undefined {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== '%') {
      out += ch;
      continue;
    }
    const hex = value.slice(i + 1, i + 3);
    if (!/^[0-9A-Fa-f]{2}$/.test(hex)) return undefined;
    out += String.fromCharCode(parseInt(hex, 16));
    i += 2;
  }
  return out;
}

const RESERVED_MARKS_ATTR = 'marks';

function encodeName(name: string): string {
  // An attribute literally named `marks` must not read back as the mark list.
  return name === RESERVED_MARKS_ATTR ? '%6Darks' : escapeValue(name);
}

// ============================================================================
// Typed Values
// ============================================================================

function isExactNumber(value: JsonValue): value is number {
  return typeof value === 'number' && Number.isFinite(value) && Object.is(Number(String(value)), value);
}

function matchesType(value: JsonValue, type: AttrType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return isExactNumber(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'number[]':
      return Array.isArray(value) && value.length > 0 && value.every(isExactNumber);
    case 'string[]':
      return Array.isArray(value) && value.length > 0 && value.every(item => typeof item === 'string');
  }
}

/** Whether a value is written in the quoted (typed) form. */
function isQuotedForm(value: JsonValue, declared: AttrType | undefined): boolean {
  return declared === undefined ? typeof value === 'string' : matchesType(value, declared);
}

function quotedText(value: JsonValue): string {
  if (Array.isArray(value)) {
    return value.map(item => escapeValue(typeof item === 'string' ? item : String(item))).join(',');
  }
  return escapeValue(typeof value === 'string' ? value : String(value));
}

function jsonText(value: JsonValue): string {
  return escapeValue(JSON.stringify(value));
}

function convertScalar(text: string, type: AttrType | undefined): JsonValue | undefined {
  switch (type) {
    case undefined:
    case 'string':
    case 'string[]':
      return text;
    case 'number':
    case 'number[]': {
      if (text.trim() === '') return undefined;
      const num = Number(text);
      return Number.isFinite(num) ? num : undefined;
    }
    case 'boolean':
      return text === 'true' ? true : text === 'false' ? false : undefined;
  }
}

function decodeQuoted(raw: string, declared: AttrType | undefined): JsonValue | undefined {
  if (declared === 'number[]' || declared === 'string[]') {
    const items: JsonValue[] = [];
    for (const part of raw.split(',')) {
      const text = unescapeValue(part);
      if (text === undefined) return undefined;
      const item = convertScalar(text, declared);
      if (item === undefined) return undefined;
      items.push(item);
    }
    return items;
  }
  const text = unescapeValue(raw);
  return text === undefined ? undefined : convertScalar(text, declared);
}

function decodeJson(raw: string): JsonValue | undefined {
  const text = unescapeValue(raw);
  if (text === undefined) return undefined;
  try {
    return toJsonValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      out[key] = converted;
    }
    return out;
  }
  return undefined;
}

// ============================================================================
// Mark Lists
// ============================================================================

function scalarMatches(value: JsonValue, declared: AttrType | undefined): boolean {
  if (declared === 'number[]' || declared === 'string[]') return false;
  return isQuotedForm(value, declared);
}

function encodeMarkAttr(kind: string, name: string, value: JsonValue): string {
  return scalarMatches(value, markAttrType(kind, name))
    ? `;${escapeValue(name)}=${quotedText(value)}`
    : `;${escapeValue(name)}:=${jsonText(value)}`;
}

/**
 * Encode marks as `kind[=primary][;name=value|;name:=json]...`, comma-joined.
 * The result is already escaped and goes inside a quoted `marks` value.
 */
export function encodeMarkList(marks: readonly AdfMark[]): string {
  return marks
    .map(mark => {
      let item = escapeValue(mark.type);
      const attrs = mark.attrs ?? {};
      const primary = markPrimaryAttr(mark.type);
      let primaryUsed = false;
      if (primary !== undefined && primary in attrs) {
        const value = attrs[primary];
        if (scalarMatches(value, markAttrType(mark.type, primary))) {
          item += `=${quotedText(value)}`;
          primaryUsed = true;
        }
      }
      for (const [name, value] of Object.entries(attrs)) {
        if (primaryUsed && name === primary) continue;
        item += encodeMarkAttr(mark.type, name, value);
      }
      return item;
    })
    .join(',');
}

export function decodeMarkList(raw: string, warnings: string[]): AdfMark[] {
  const marks: AdfMark[] = [];
  if (raw === '') return marks;
  for (const item of raw.split(',')) {
    const [head, ...extras] = item.split(';');
    const eq = head.indexOf('=');
    const kind = unescapeValue(eq === -1 ? head : head.slice(0, eq));
    if (kind === undefined || kind === '') {
      warnings.push(`cannot decode mark "${item}"`);
      continue;
    }
    const attrs: AdfAttrs = {};
    if (eq !== -1) {
      const primary = markPrimaryAttr(kind);
      const value = primary === undefined ? undefined : decodeQuoted(head.slice(eq + 1), markAttrType(kind, primary));
      if (primary === undefined || value === undefined) {
        warnings.push(`cannot decode primary attribute of mark "${kind}"`);
      } else {
        attrs[primary] = value;
      }
    }
    for (const extra of extras) {
      const jsonSep = extra.indexOf(':=');
      const plainSep = extra.indexOf('=');
      const isJson = jsonSep !== -1 && jsonSep < plainSep;
      const sep = isJson ? jsonSep : plainSep;
      const name = sep === -1 ? undefined : unescapeValue(extra.slice(0, sep));
      const rawValue = extra.slice(sep + (isJson ? 2 : 1));
      const value =
        name === undefined ? undefined : isJson ? decodeJson(rawValue) : decodeQuoted(rawValue, markAttrType(kind, name));
      if (name === undefined || value === undefined) {
        warnings.push(`cannot decode attribute "${extra}" of mark "${kind}"`);
        continue;
      }
      attrs[name] = value;
    }
    marks.push(Object.keys(attrs).length > 0 ? { type: kind, attrs } : { type: kind });
  }
  return marks;
}

// ============================================================================
// Tags
// ============================================================================

/** `ADF:kind` plus `:name="value",...` in attribute insertion order. */
export function encodeTag(kind: string, attrs?: AdfAttrs, marks?: readonly AdfMark[]): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(attrs ?? {})) {
    const declared = nodeAttrType(kind, name);
    parts.push(
      isQuotedForm(value, declared)
        ? `${encodeName(name)}="${quotedText(value)}"`
        : `${encodeName(name)}=${jsonText(value)}`,
    );
  }
  if (marks && marks.length > 0) {
    parts.push(`${RESERVED_MARKS_ATTR}="${encodeMarkList(marks)}"`);
  }
  const head = `ADF:${encodeURIComponent(kind)}`;
  return parts.length > 0 ? `${head}:${parts.join(',')}` : head;
}

export function openTag(kind: string, attrs?: AdfAttrs, marks?: readonly AdfMark[]): string {
  return `<!-- ${encodeTag(kind, attrs, marks)} -->`;
}

export function closeTag(kind: string): string {
  return `<!-- /ADF:${encodeURIComponent(kind)} -->`;
}

export function selfClosingTag(kind: string, attrs?: AdfAttrs, marks?: readonly AdfMark[]): string {
  return `<!-- ${encodeTag(kind, attrs, marks)} /-->`;
}

export const BOUNDARY = '<!-- -->';

export interface DecodedTag {
  kind: string;
  attrs: AdfAttrs;
  marks?: AdfMark[];
  warnings: string[];
}

const TAG_BODY_RE = /^ADF:([^:\s]+)(?::(.*))?$/s;

/** Decode a tag body (`ADF:kind:...`); undefined when it is not an ADF tag. */
export function decodeTag(body: string): DecodedTag | undefined {
  const match = body.trim().match(TAG_BODY_RE);
  if (!match) return undefined;
  const kind = decodeKind(match[1]);
  if (kind === undefined) return undefined;

  const warnings: string[] = [];
  const attrs: AdfAttrs = {};
  let marks: AdfMark[] | undefined;
  const list = match[2] ?? '';

  let pos = 0;
  while (pos < list.length) {
    const eq = list.indexOf('=', pos);
    if (eq === -1) {
      warnings.push(`attribute "${list.slice(pos)}" has no value`);
      break;
    }
    const rawName = list.slice(pos, eq);
    let rawValue: string;
    let quoted = false;
    if (list[eq + 1] === '"') {
      const end = list.indexOf('"', eq + 2);
      if (end === -1) {
        warnings.push(`unterminated quote in attribute "${rawName}"`);
        break;
      }
      rawValue = list.slice(eq + 2, end);
      quoted = true;
      pos = end + 1;
      if (pos < list.length && list[pos] !== ',') {
        warnings.push(`unexpected text after attribute "${rawName}"`);
        const next = list.indexOf(',', pos);
        pos = next === -1 ? list.length : next + 1;
        continue;
      }
      pos += 1;
    } else {
      const next = list.indexOf(',', eq + 1);
      const end = next === -1 ? list.length : next;
      rawValue = list.slice(eq + 1, end);
      pos = end + 1;
    }

    if (rawName === RESERVED_MARKS_ATTR && quoted) {
      marks = decodeMarkList(rawValue, warnings);
      continue;
    }
    const name = unescapeValue(rawName);
    if (name === undefined || name === '') {
      warnings.push(`cannot decode attribute name "${rawName}"`);
      continue;
    }
    const value = quoted ? decodeQuoted(rawValue, nodeAttrType(kind, name)) : decodeJson(rawValue);
    if (value === undefined) {
      warnings.push(`cannot decode value of attribute "${name}"`);
      continue;
    }
    attrs[name] = value;
  }

  return marks === undefined ? { kind, attrs, warnings } : { kind, attrs, marks, warnings };
}

function decodeKind(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Tag Scanning
// ============================================================================

export type ScannedTag =
  | { form: 'boundary'; end: number }
  | { form: 'close'; kind: string; end: number }
  | ({ form: 'open' | 'self-closing'; end: number } & DecodedTag);

const CLOSE_BODY_RE = /^\/ADF:([^:\s]+)$/;

/**
 * Read the comment tag starting at `pos`; undefined when the text there is not
 * an ADF tag or boundary. `end` is the index just past `-->`.
 */
export function scanTag(text: string, pos: number): ScannedTag | undefined {
  if (!text.startsWith('<!--', pos)) return undefined;
  const close = text.indexOf('-->', pos + 4);
  if (close === -1) return undefined;
  const end = close + 3;
  const body = text.slice(pos + 4, close).trim();
  if (body === '') return { form: 'boundary', end };

  const closeMatch = body.match(CLOSE_BODY_RE);
  if (closeMatch) {
    const kind = decodeKind(closeMatch[1]);
    return kind === undefined ? undefined : { form: 'close', kind, end };
  }

  const selfClosing = body.endsWith('/');
  const decoded = decodeTag(selfClosing ? body.slice(0, -1) : body);
  if (!decoded) return undefined;
  return { form: selfClosing ? 'self-closing' : 'open', end, ...decoded };
}
