/**
 * Function registry, built-in functions, plural rules and value formatting
 */

import { describe, it, expect } from 'vitest';
import {
  BUILTIN_FUNCTIONS,
  FluentDateTime,
  FluentNumber,
  FunctionRegistry,
  createDefaultRegistry,
  formatValue,
  normalizeLocale,
  selectPluralCategory,
  type FluentValue,
} from '../../src/index.js';

/** Call a built-in and format its result in a locale */
function callBuiltin(
  name: string,
  positional: FluentValue[],
  named: Record<string, FluentValue> = {},
  locale = 'en-US'
): string {
  const registry = createDefaultRegistry();
  return formatValue(registry.call(name, positional, named, locale), locale);
}

describe('FunctionRegistry', () => {
  it('starts with the built-ins in a default registry', () => {
    const registry = createDefaultRegistry();

    expect(registry.names()).toEqual(['CURRENCY', 'DATETIME', 'NUMBER']);
    expect(registry.isBuiltin('NUMBER')).toBe(true);
    expect(registry.get('NUMBER')?.description).toBe(
      BUILTIN_FUNCTIONS['NUMBER']?.description
    );
  });

  it('registers functions with descriptions', () => {
    const registry = new FunctionRegistry().register('UPPER', ([v]) => String(v), {
      description: 'Upper case',
    });

    expect(registry.hasFunction('UPPER')).toBe(true);
    expect(registry.get('UPPER')?.description).toBe('Upper case');
    expect(registry.isBuiltin('UPPER')).toBe(false);
  });

  it('rejects names that FTL cannot call', () => {
    const registry = new FunctionRegistry();

    expect(() => registry.register('lower', () => '')).toThrow(
      "Invalid function name 'lower': must match [A-Z][A-Z0-9_-]*"
    );
  });

  it('stops treating a replaced built-in as built-in', () => {
    const registry = createDefaultRegistry();
    registry.register('NUMBER', () => 'custom');

    expect(registry.isBuiltin('NUMBER')).toBe(false);
    expect(registry.call('NUMBER', [1], {})).toBe('custom');
  });

  it('throws when calling an unregistered function', () => {
    expect(() => new FunctionRegistry().call('NOPE', [], {})).toThrow(
      "Function 'NOPE' is not registered"
    );
  });

  it('clones independently', () => {
    const original = createDefaultRegistry();
    const copy = original.clone();
    copy.register('EXTRA', () => 'x');

    expect(original.hasFunction('EXTRA')).toBe(false);
    expect(copy.isBuiltin('DATETIME')).toBe(true);
  });
});

describe('built-in functions', () => {
  describe('NUMBER', () => {
    it('groups digits by default', () => {
      expect(callBuiltin('NUMBER', [1234.5])).toBe('1,234.5');
    });

    it('applies formatting options', () => {
      expect(callBuiltin('NUMBER', [1234.5], { useGrouping: 'false' })).toBe(
        '1234.5'
      );
      expect(callBuiltin('NUMBER', [0.25], { style: 'percent' })).toBe('25%');
      expect(callBuiltin('NUMBER', [3], { minimumFractionDigits: 2 })).toBe(
        '3.00'
      );
    });

    it('accepts numeric strings', () => {
      expect(callBuiltin('NUMBER', ['42'])).toBe('42');
    });

    it('keeps options of a wrapped number', () => {
      const registry = createDefaultRegistry();
      const inner = registry.call('NUMBER', [2], { minimumFractionDigits: 1 }, 'en');
      const outer = registry.call('NUMBER', [inner], { type: 'ordinal' }, 'en');

      expect(outer).toBeInstanceOf(FluentNumber);
      expect(outer instanceof FluentNumber && outer.pluralType).toBe('ordinal');
      expect(formatValue(outer, 'en')).toBe('2.0');
    });

    it('rejects values that are not numbers', () => {
      expect(() => callBuiltin('NUMBER', ['abc'])).toThrow(
        'NUMBER() expects a number, got "abc"'
      );
    });

    it('rejects unknown option values', () => {
      expect(() => callBuiltin('NUMBER', [1], { style: 'fancy' })).toThrow(
        "Invalid value for 'style': fancy (expected decimal, percent, currency)"
      );
    });
  });

  describe('CURRENCY', () => {
    it('formats an amount in the given currency', () => {
      expect(callBuiltin('CURRENCY', [5], { currency: 'EUR' })).toBe('€5.00');
    });

    it('requires a currency', () => {
      expect(() => callBuiltin('CURRENCY', [5])).toThrow(
        "CURRENCY() requires a 'currency' option"
      );
    });
  });

  describe('DATETIME', () => {
    const date = new Date(Date.UTC(2024, 0, 15, 12, 0));

    it('formats dates with options', () => {
      expect(
        callBuiltin('DATETIME', [date], { dateStyle: 'long', timeZone: 'UTC' })
      ).toBe('January 15, 2024');
    });

    it('accepts ISO strings', () => {
      expect(
        callBuiltin('DATETIME', ['2024-01-15T12:00:00Z'], {
          year: 'numeric',
          timeZone: 'UTC',
        })
      ).toBe('2024');
    });

    it('rejects invalid dates', () => {
      expect(() => callBuiltin('DATETIME', ['not a date'])).toThrow(
        'DATETIME() expects a date, got "not a date"'
      );
    });

    it('rejects a Date whose time is not a number', () => {
      expect(() => callBuiltin('DATETIME', [new Date(Number.NaN)])).toThrow(
        'DATETIME() expects a valid date, got an invalid Date'
      );
    });
  });
});

describe('plural rules', () => {
  it.each([
    [1, 'en', 'one'],
    [5, 'en', 'other'],
    [2, 'pl', 'few'],
    [5, 'pl', 'many'],
    [0, 'ar', 'zero'],
  ])('selects the cardinal category of %d in %s', (value, locale, category) => {
    expect(selectPluralCategory(value, locale)).toBe(category);
  });

  it('selects ordinal categories', () => {
    expect(selectPluralCategory(3, 'en', 'ordinal')).toBe('few');
    expect(selectPluralCategory(11, 'en', 'ordinal')).toBe('other');
  });

  it('returns other for non-finite numbers', () => {
    expect(selectPluralCategory(Number.NaN, 'en')).toBe('other');
    expect(selectPluralCategory(Number.POSITIVE_INFINITY, 'en')).toBe('other');
  });

  it('normalizes locale codes', () => {
    expect(normalizeLocale('en_US')).toBe('en-US');
    expect(normalizeLocale('not a locale!')).toBe('en');
  });
});

describe('formatValue', () => {
  it('formats primitives', () => {
    expect(formatValue('text', 'en')).toBe('text');
    expect(formatValue(1.5, 'en')).toBe('1.5');
    expect(formatValue(false, 'en')).toBe('false');
    expect(formatValue(null, 'en')).toBe('');
    expect(formatValue(undefined, 'en')).toBe('');
  });

  it('formats wrappers in the given locale', () => {
    expect(formatValue(new FluentNumber(1234.5), 'de')).toBe('1.234,5');
    expect(
      formatValue(
        new FluentDateTime(new Date(Date.UTC(2024, 5, 1)), {
          month: 'long',
          timeZone: 'UTC',
        }),
        'en'
      )
    ).toBe('June');
  });

  it('formats invalid dates without throwing', () => {
    const invalid = new Date(Number.NaN);

    expect(formatValue(invalid, 'en')).toBe('Invalid Date');
    expect(formatValue(new FluentDateTime(invalid), 'en')).toBe('Invalid Date');
  });
});
