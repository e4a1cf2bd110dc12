import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SchemaValidationError } from '@mdadf/core';
import { StructuralViolationError } from '@mdadf/markdown';
import { CLIError, reportError, run } from '../index';
import { DEFAULT_CONFIG, loadConfig } from '../config';
import { getFlag, getPositionals } from '../flags';

describe('run', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdadf-run-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prints the version', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['--version'])).toBe(0);
    expect(log).toHaveBeenCalledWith('mdadf v0.1.0');
  });

  it('rejects an unknown format', async () => {
    const configPath = path.join(tempDir, 'none.json');
    await expect(run(['check', 'x.json', '--config', configPath, '--format', 'xml'])).rejects.toThrow(
      'Invalid --format value: xml. Use text or json.'
    );
  });

  it('rejects an unknown command', async () => {
    const configPath = path.join(tempDir, 'none.json');
    await expect(run(['convert', '--config', configPath])).rejects.toBeInstanceOf(CLIError);
  });

  it('takes the report format from the config file', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const configPath = path.join(tempDir, 'mdadf.json');
    fs.writeFileSync(configPath, JSON.stringify({ format: 'json' }));
    const input = path.join(tempDir, 'doc.json');
    fs.writeFileSync(input, JSON.stringify({ type: 'doc', content: [] }));

    expect(await run(['check', input, '--config', configPath])).toBe(0);
    expect(JSON.parse(String(log.mock.calls[0][0])).passed).toBe(true);
  });
});

describe('reportError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the exit code a CLIError carries', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(reportError(new CLIError('File not found: a.md', 1))).toBe(1);
    expect(error).toHaveBeenCalledWith('mdadf: File not found: a.md');
  });

  it('lists schema issues one per line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const err = new SchemaValidationError('document in a.json', ['type: Required', 'content: Expected array, received string']);
    expect(reportError(err)).toBe(2);
    expect(error.mock.calls).toEqual([
      ['mdadf: Invalid document in a.json:'],
      ['  type: Required'],
      ['  content: Expected array, received string'],
    ]);
  });

  it('treats engine errors as conversion failures', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const err = new StructuralViolationError([{ message: '"doc" is only allowed at the root', path: ['content', 0], nodeType: 'doc' }]);
    expect(reportError(err)).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'mdadf: StructuralViolationError: Structural violation at content[0]: "doc" is only allowed at the root'
    );
  });

  it('maps anything else to a runtime error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(reportError('boom')).toBe(2);
    expect(error).toHaveBeenCalledWith('mdadf: boom');
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdadf-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('returns defaults when the file is missing', () => {
    expect(loadConfig(path.join(tempDir, 'missing.json'))).toEqual(DEFAULT_CONFIG);
  });

  it('merges provided values over defaults', () => {
    const file = path.join(tempDir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ strict: true }));
    expect(loadConfig(file)).toEqual({ ...DEFAULT_CONFIG, strict: true });
  });

  it('warns and falls back on an invalid file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = path.join(tempDir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ jsonIndent: 'wide' }));

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledWith(`mdadf: warning: ${file}: jsonIndent: Expected number, received string`);
    expect(warn).toHaveBeenCalledWith(`mdadf: warning: invalid config in ${file}, using defaults`);
  });

  it('warns and falls back on unparseable JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = path.join(tempDir, 'config.json');
    fs.writeFileSync(file, '{ strict: ');

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledWith(`mdadf: warning: failed to parse ${file}, using defaults`);
  });
});

describe('flags', () => {
  it('reads the first matching flag value', () => {
    expect(getFlag(['-o', 'a.md'], '-o', '--output')).toBe('a.md');
    expect(getFlag(['--output', 'b.md'], '-o', '--output')).toBe('b.md');
    expect(getFlag(['-o'], '-o')).toBeUndefined();
  });

  it('skips flags and their values when collecting positionals', () => {
    expect(getPositionals(['in.json', '--config', 'c.json', '--strict', '-o', 'out.md'])).toEqual(['in.json']);
    expect(getPositionals(['-', '--format', 'json'])).toEqual(['-']);
  });
});
