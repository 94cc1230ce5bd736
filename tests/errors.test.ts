/**
 * Error registry, diagnostics and error classes
 */

import { describe, it, expect } from 'vitest';
import {
  CursorEofError,
  ERROR_REGISTRY,
  FtlError,
  FtlParsingError,
  FtlReferenceError,
  FtlResolutionError,
  FtlSyntaxError,
  createDiagnostic,
  diagnosticNumber,
  formatDiagnostic,
  getHelpUrl,
  renderMessage,
  toError,
} from '../src/index.js';

describe('error registry', () => {
  it('numbers codes by category', () => {
    for (const [code, definition] of ERROR_REGISTRY.entries()) {
      const range = {
        reference: 1000,
        resolution: 2000,
        syntax: 3000,
        parsing: 4000,
      }[definition.category];
      expect(definition.number, code).toBeGreaterThan(range);
      expect(definition.number, code).toBeLessThan(range + 1000);
    }
  });

  it('looks up definitions by code', () => {
    expect(ERROR_REGISTRY.has('CYCLIC_REFERENCE')).toBe(true);
    expect(ERROR_REGISTRY.get('CYCLIC_REFERENCE')?.number).toBe(2001);
    expect(ERROR_REGISTRY.get('NOPE')).toBeUndefined();
  });

  it('builds help URLs from guide pages', () => {
    expect(getHelpUrl('TERM_NOT_FOUND')).toBe(
      'https://projectfluent.org/fluent/guide/terms.html'
    );
    expect(getHelpUrl('UNKNOWN_EXPRESSION')).toBe('');
    expect(getHelpUrl('NOPE')).toBe('');
  });

  describe('renderMessage', () => {
    it('fills placeholders', () => {
      expect(renderMessage("Message '{id}' not found", { id: 'hello' })).toBe(
        "Message 'hello' not found"
      );
    });

    it('joins arrays and drops missing keys', () => {
      expect(renderMessage('{list}|{missing}|', { list: ['A', 'B'] })).toBe(
        'A, B||'
      );
    });

    it('keeps escaped and unclosed braces', () => {
      expect(renderMessage('{{literal', {})).toBe('{literal');
      expect(renderMessage('open {id', { id: 'x' })).toBe('open {id');
    });
  });
});

describe('diagnostics', () => {
  it('creates frozen diagnostics from the registry', () => {
    const diagnostic = createDiagnostic('VARIABLE_NOT_PROVIDED', { name: 'count' });

    expect(diagnostic).toEqual({
      code: 'VARIABLE_NOT_PROVIDED',
      category: 'reference',
      message: "Variable '$count' not provided",
      span: undefined,
      hint: "Pass 'count' in the arguments object",
      helpUrl: 'https://projectfluent.org/fluent/guide/variables.html',
    });
    expect(Object.isFrozen(diagnostic)).toBe(true);
    expect(diagnosticNumber(diagnostic)).toBe(1005);
  });

  it('formats a diagnostic in compiler style', () => {
    const diagnostic = createDiagnostic(
      'MESSAGE_NOT_FOUND',
      { id: 'hello' },
      { start: 12, end: 17, line: 2, column: 5 }
    );

    expect(formatDiagnostic(diagnostic)).toBe(
      [
        "error[MESSAGE_NOT_FOUND]: Message 'hello' not found",
        '  --> line 2, column 5',
        '  = help: Check that the message is defined in the loaded resources',
        '  = note: see https://projectfluent.org/fluent/guide/messages.html',
      ].join('\n')
    );
  });

  it('omits missing parts when formatting', () => {
    const diagnostic = createDiagnostic('EXPECTED_TOKEN', { reason: 'Broken' });

    expect(formatDiagnostic(diagnostic)).toBe('error[EXPECTED_TOKEN]: Broken');
  });
});

describe('error classes', () => {
  it('raises each category as its own class', () => {
    expect(toError(createDiagnostic('TERM_NOT_FOUND', { id: 't' }))).toBeInstanceOf(
      FtlReferenceError
    );
    expect(
      toError(createDiagnostic('CYCLIC_REFERENCE', { path: 'a -> a' }))
    ).toBeInstanceOf(FtlResolutionError);
    expect(
      toError(createDiagnostic('EXPECTED_TOKEN', { reason: 'x' }))
    ).toBeInstanceOf(FtlSyntaxError);
    expect(
      toError(createDiagnostic('DATE_PARSE_FAILED', { value: 'x', locale: 'en' }))
    ).toBeInstanceOf(FtlParsingError);
  });

  it('appends the location to the message', () => {
    const error = new FtlReferenceError(
      createDiagnostic('TERM_NOT_FOUND', { id: 't' }, {
        start: 0,
        end: 2,
        line: 3,
        column: 7,
      })
    );

    expect(error).toBeInstanceOf(FtlError);
    expect(error.name).toBe('FtlReferenceError');
    expect(error.message).toBe("Term '-t' not found at 3:7");
    expect(error.code).toBe('TERM_NOT_FOUND');
    expect(error.helpUrl).toBe('https://projectfluent.org/fluent/guide/terms.html');
  });

  it('formats through a custom formatter', () => {
    const error = toError(createDiagnostic('TERM_NOT_FOUND', { id: 't' }));

    expect(error.format()).toBe("Term '-t' not found");
    expect(error.format((data) => `${data.code}: ${data.message}`)).toBe(
      "TERM_NOT_FOUND: Term '-t' not found"
    );
  });

  it('rejects a diagnostic of another category', () => {
    expect(
      () => new FtlSyntaxError(createDiagnostic('TERM_NOT_FOUND', { id: 't' }))
    ).toThrow('Expected syntax diagnostic, got: TERM_NOT_FOUND');
  });

  it('reports the position of a cursor read past the end', () => {
    const error = new CursorEofError(4);

    expect(error.message).toBe('Cursor read past end of input at position 4');
    expect(error.position).toBe(4);
  });
});
