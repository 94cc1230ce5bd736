/**
 * ftl-check argument parsing and output formatting
 */

import { describe, it, expect } from 'vitest';
import {
  exitCodeFor,
  formatDiagnostics,
  parseCheckArgs,
} from '../../src/cli-check.js';
import {
  createDefaultConfig,
  parse,
  validateResource,
  type CheckDiagnostic,
} from '../../src/index.js';

function diagnosticsFor(source: string): CheckDiagnostic[] {
  return validateResource(parse(source), source, createDefaultConfig());
}

describe('parseCheckArgs', () => {
  it('parses a file with defaults', () => {
    expect(parseCheckArgs(['app.ftl'])).toEqual({
      mode: 'check',
      file: 'app.ftl',
      verbose: false,
      format: 'text',
    });
  });

  it('parses format and verbose flags in any position', () => {
    expect(parseCheckArgs(['--format', 'json', 'app.ftl', '--verbose'])).toEqual({
      mode: 'check',
      file: 'app.ftl',
      verbose: true,
      format: 'json',
    });
  });

  it('gives help and version precedence', () => {
    expect(parseCheckArgs(['app.ftl', '--help'])).toEqual({ mode: 'help' });
    expect(parseCheckArgs(['-v'])).toEqual({ mode: 'version' });
  });

  it.each([
    [['--format'], '--format requires argument: text or json'],
    [['--format', '--verbose', 'a.ftl'], '--format requires argument: text or json'],
    [['--format', 'xml', 'a.ftl'], 'Invalid format: xml. Expected text or json'],
    [['--fix', 'a.ftl'], 'Unknown option: --fix'],
    [[], 'Missing file argument'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCheckArgs(argv)).toThrow(message);
  });
});

describe('formatDiagnostics', () => {
  const source = 'a = { b }\n-t = x\n';

  it('writes one line per diagnostic in text format', () => {
    expect(formatDiagnostics('app.ftl', diagnosticsFor(source), 'text', false)).toBe(
      [
        "app.ftl:1:7: warning: Message 'b' is not defined (undefined-message-reference)",
        "app.ftl:2:1: info: Term '-t' is never used (unused-term)",
      ].join('\n')
    );
  });

  it('writes errors and a summary in JSON format', () => {
    const output: unknown = JSON.parse(
      formatDiagnostics('app.ftl', diagnosticsFor(source), 'json', false)
    );

    expect(output).toEqual({
      file: 'app.ftl',
      errors: [
        {
          location: { line: 1, column: 7, offset: 6 },
          severity: 'warning',
          code: 'undefined-message-reference',
          message: "Message 'b' is not defined",
          context: 'a = { b }',
        },
        {
          location: { line: 2, column: 1, offset: 10 },
          severity: 'info',
          code: 'unused-term',
          message: "Term '-t' is never used",
          context: '-t = x',
        },
      ],
      summary: { total: 2, errors: 0, warnings: 1, info: 1 },
    });
  });

  it('adds rule categories in verbose JSON output', () => {
    const output: unknown = JSON.parse(
      formatDiagnostics('app.ftl', diagnosticsFor(source), 'json', true)
    );

    expect(output).toMatchObject({
      errors: [{ category: 'references' }, { category: 'usage' }],
    });
  });

  it('writes an empty JSON report for a clean file', () => {
    expect(JSON.parse(formatDiagnostics('ok.ftl', [], 'json', false))).toEqual({
      file: 'ok.ftl',
      errors: [],
      summary: { total: 0, errors: 0, warnings: 0, info: 0 },
    });
  });
});

describe('exitCodeFor', () => {
  it('returns 0 for a clean file', () => {
    expect(exitCodeFor([])).toBe(0);
  });

  it('returns 1 for findings without syntax errors', () => {
    expect(exitCodeFor(diagnosticsFor('-t = x\n'))).toBe(1);
  });

  it('returns 3 when the file has syntax errors', () => {
    expect(exitCodeFor(diagnosticsFor('ok = Fine\nbad = {\n'))).toBe(3);
  });
});
