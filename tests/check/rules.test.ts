/**
 * Check rules and the validator that runs them
 */

import { describe, it, expect } from 'vitest';
import {
  VALIDATION_RULES,
  createDefaultConfig,
  isRuleEnabled,
  parse,
  parseConfig,
  validateResource,
  type CheckConfig,
  type CheckDiagnostic,
} from '../../src/index.js';

function check(
  source: string,
  config: CheckConfig = createDefaultConfig()
): CheckDiagnostic[] {
  return validateResource(parse(source), source, config);
}

/** code, line, column and message of each diagnostic */
function summarize(diagnostics: CheckDiagnostic[]): [string, number, number, string][] {
  return diagnostics.map((d) => [
    d.code,
    d.location.line,
    d.location.column,
    d.message,
  ]);
}

describe('check rules', () => {
  it('registers every rule once', () => {
    expect(VALIDATION_RULES.map((rule) => rule.code)).toEqual([
      'syntax-error',
      'duplicate-id',
      'undefined-message-reference',
      'undefined-term-reference',
      'circular-reference',
      'unused-term',
    ]);
  });

  it('finds nothing in a clean resource', () => {
    expect(check('-brand = Firefox\nhello = Hi from { -brand }\n')).toEqual([]);
  });

  describe('syntax-error', () => {
    it('reports junk at the position where parsing stopped', () => {
      const [diagnostic] = check('bad = {');

      expect(diagnostic).toEqual({
        location: { line: 1, column: 8, offset: 7 },
        severity: 'error',
        code: 'syntax-error',
        message:
          'Unexpected end of input, expected $variable or "string" or number or -term or message or FUNCTION() or {',
        context: 'bad = {',
      });
    });
  });

  describe('duplicate-id', () => {
    it('flags the second definition', () => {
      const diagnostics = check('a = 1\na = 2\n');

      expect(summarize(diagnostics)).toEqual([
        [
          'duplicate-id',
          2,
          1,
          "Message 'a' is already defined; this definition overrides it",
        ],
      ]);
      expect(diagnostics[0]?.severity).toBe('warning');
      expect(diagnostics[0]?.context).toBe('a = 2');
    });

    it('keeps messages and terms in separate namespaces', () => {
      expect(check('a = 1\n-a = 2\nm = { -a }\n')).toEqual([]);
    });

    it('flags duplicate terms with their dash', () => {
      expect(summarize(check('-t = 1\n-t = 2\nm = { -t }\n'))).toEqual([
        [
          'duplicate-id',
          2,
          1,
          "Term '-t' is already defined; this definition overrides it",
        ],
      ]);
    });
  });

  describe('undefined references', () => {
    it('flags references to missing messages and terms', () => {
      expect(summarize(check('a = { b } { -c }\n'))).toEqual([
        ['undefined-message-reference', 1, 7, "Message 'b' is not defined"],
        ['undefined-term-reference', 1, 13, "Term '-c' is not defined"],
      ]);
    });

    it('accepts forward references', () => {
      expect(check('a = { b }\nb = B\n')).toEqual([]);
    });
  });

  describe('circular-reference', () => {
    it('reports a mutual cycle once', () => {
      expect(summarize(check('a = { b }\nb = { a }\n'))).toEqual([
        ['circular-reference', 1, 1, 'Circular reference: a -> b -> a'],
      ]);
    });

    it('reports a self-referencing term', () => {
      expect(summarize(check('-t = { -t }\nm = { -t }\n'))).toEqual([
        ['circular-reference', 1, 1, 'Circular reference: -t -> -t'],
      ]);
    });

    it('follows cycles between messages and terms', () => {
      expect(summarize(check('a = { -t }\n-t = { a }\n'))).toEqual([
        ['circular-reference', 1, 1, 'Circular reference: a -> -t -> a'],
      ]);
    });

    it('does not treat a reference to its own attribute as a cycle', () => {
      expect(check('foo = Foo { foo.title }\n    .title = Title\n')).toEqual([]);
    });
  });

  describe('unused-term', () => {
    it('reports terms nothing references', () => {
      const diagnostics = check('-t = x\n');

      expect(summarize(diagnostics)).toEqual([
        ['unused-term', 1, 1, "Term '-t' is never used"],
      ]);
      expect(diagnostics[0]?.severity).toBe('info');
    });

    it('counts references from term arguments and attributes', () => {
      expect(
        check('-a = A\n-b = { $x }\nm = M\n    .label = { -b(x: "1") } { -a }\n')
      ).toEqual([]);
    });
  });

  it('sorts diagnostics by line, then column', () => {
    expect(
      summarize(check('-unused = x\na = { -missing } { nope }\n')).map(
        ([code, line, column]) => [code, line, column]
      )
    ).toEqual([
      ['unused-term', 1, 1],
      ['undefined-term-reference', 2, 7],
      ['undefined-message-reference', 2, 20],
    ]);
  });

  describe('configuration', () => {
    it('skips rules that are turned off', () => {
      const config = parseConfig({ rules: { 'unused-term': 'off' } });

      expect(check('-t = x\n', config)).toEqual([]);
      expect(isRuleEnabled('unused-term', config)).toBe(false);
      expect(isRuleEnabled('duplicate-id', config)).toBe(true);
    });

    it('applies severity overrides', () => {
      const config = parseConfig({ severity: { 'duplicate-id': 'error' } });

      expect(check('a = 1\na = 2\n', config)[0]?.severity).toBe('error');
    });

    it('caps errors at warning for rules in warn state', () => {
      const config = parseConfig({ rules: { 'syntax-error': 'warn' } });

      expect(check('bad = {', config)[0]?.severity).toBe('warning');
    });
  });
});
