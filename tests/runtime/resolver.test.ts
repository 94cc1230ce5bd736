/**
 * Resolver: patterns, references, functions, selection and fallbacks
 */

import { describe, it, expect, vi } from 'vitest';
import {
  FSI,
  PDI,
  FluentNumber,
  FunctionRegistry,
  Resolver,
  createDefaultRegistry,
  type MessageNode,
} from '../../src/index.js';
import { createResolver, customRegistry } from '../helpers/ftl.js';

describe('Resolver', () => {
  describe('text and variables', () => {
    it('returns plain text unchanged', () => {
      const { resolver, message } = createResolver('hello = Hello, world!');

      expect(resolver.resolve(message('hello'))).toEqual({
        value: 'Hello, world!',
        diagnostics: [],
      });
    });

    it('wraps placeables in isolation marks by default', () => {
      const { resolver, message } = createResolver('hello = Hello, { $name }!', {
        useIsolating: true,
      });

      expect(resolver.resolve(message('hello'), { name: 'Ada' }).value).toBe(
        `Hello, ${FSI}Ada${PDI}!`
      );
    });

    it('falls back to {$name} for a missing variable', () => {
      const { resolver, message } = createResolver('greet = Hi { $missing }');
      const result = resolver.resolve(message('greet'));

      expect(result.value).toBe('Hi {$missing}');
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        code: 'VARIABLE_NOT_PROVIDED',
        category: 'reference',
        message: "Variable '$missing' not provided",
      });
    });

    it('does not isolate fallbacks', () => {
      const { resolver, message } = createResolver('greet = Hi { $missing }', {
        useIsolating: true,
      });

      expect(resolver.resolve(message('greet')).value).toBe('Hi {$missing}');
    });

    it('ignores inherited object properties as arguments', () => {
      const { resolver, message } = createResolver('m = { $toString }');

      expect(resolver.resolve(message('m')).value).toBe('{$toString}');
    });

    it('stringifies argument values', () => {
      const { resolver, message } = createResolver(
        'm = { $flag } { $count } { $when } [{ $nothing }]'
      );
      const when = new Date(Date.UTC(2024, 0, 15, 12, 30));

      expect(
        resolver.resolve(message('m'), {
          flag: true,
          count: 2.5,
          when,
          nothing: null,
        }).value
      ).toBe('true 2.5 2024-01-15T12:30:00.000Z []');
    });

    it('resolves string and number literals', () => {
      const { resolver, message } = createResolver('m = { "{" } { 42 }');

      expect(resolver.resolve(message('m')).value).toBe('{ 42');
    });
  });

  describe('attributes', () => {
    const source = 'button = Save\n    .tooltip = Click to save';

    it('resolves an attribute', () => {
      const { resolver, message } = createResolver(source);

      expect(resolver.resolve(message('button'), {}, 'tooltip')).toEqual({
        value: 'Click to save',
        diagnostics: [],
      });
    });

    it('falls back to {id.attr} for a missing attribute', () => {
      const { resolver, message } = createResolver(source);
      const result = resolver.resolve(message('button'), {}, 'missing');

      expect(result.value).toBe('{button.missing}');
      expect(result.diagnostics[0]).toMatchObject({
        code: 'ATTRIBUTE_NOT_FOUND',
        message: "Attribute 'missing' not found in message 'button'",
      });
    });

    it('falls back to {id} for a message without a value', () => {
      const { resolver, message } = createResolver(
        'login =\n    .placeholder = Email'
      );
      const result = resolver.resolve(message('login'));

      expect(result.value).toBe('{login}');
      expect(result.diagnostics.map((d) => d.code)).toEqual(['MESSAGE_NO_VALUE']);
    });
  });

  describe('message and term references', () => {
    it('resolves message references and their attributes', () => {
      const { resolver, message } = createResolver(
        'title = Settings\n    .short = Prefs\nm = { title } / { title.short }'
      );

      expect(resolver.resolve(message('m')).value).toBe('Settings / Prefs');
    });

    it('falls back for missing messages and terms', () => {
      const { resolver, message } = createResolver('m = { nope } { -gone }');
      const result = resolver.resolve(message('m'));

      expect(result.value).toBe('{nope} {-gone}');
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "Message 'nope' not found",
        "Term '-gone' not found",
      ]);
    });

    it('falls back for a missing term attribute', () => {
      const { resolver, message } = createResolver(
        '-brand = Firefox\nm = { -brand.gender }'
      );
      const result = resolver.resolve(message('m'));

      expect(result.value).toBe('{-brand.gender}');
      expect(result.diagnostics[0]).toMatchObject({
        code: 'TERM_ATTRIBUTE_NOT_FOUND',
        message: "Attribute 'gender' not found in term '-brand'",
      });
    });

    it('resolves term attributes', () => {
      const { resolver, message } = createResolver(
        '-brand = Firefox\n    .gender = masculine\nm = { -brand.gender }'
      );

      expect(resolver.resolve(message('m')).value).toBe('masculine');
    });

    it('passes named term arguments in place of the caller arguments', () => {
      const { resolver, message } = createResolver(
        [
          '-brand = { $case ->',
          '    [gen] Firefoxes',
          '   *[nom] Firefox',
          '}',
          'gen = { -brand(case: "gen") }',
          'plain = { -brand }',
        ].join('\n')
      );

      expect(resolver.resolve(message('gen'), { case: 'nom' }).value).toBe(
        'Firefoxes'
      );
      expect(resolver.resolve(message('plain'), { case: 'gen' }).value).toBe(
        'Firefoxes'
      );
    });

    it('uses the default variant when a term selector variable is missing', () => {
      const { resolver, message } = createResolver(
        '-brand = { $case ->\n    [gen] Firefoxes\n   *[nom] Firefox\n}\nplain = { -brand }'
      );
      const result = resolver.resolve(message('plain'));

      expect(result.value).toBe('Firefox');
      expect(result.diagnostics.map((d) => d.code)).toEqual([
        'VARIABLE_NOT_PROVIDED',
      ]);
    });

    it('merges diagnostics from nested references in order', () => {
      const { resolver, message } = createResolver(
        'a = { b } and { $x }\nb = { $y }'
      );
      const result = resolver.resolve(message('a'));

      expect(result.value).toBe('{$y} and {$x}');
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "Variable '$y' not provided",
        "Variable '$x' not provided",
      ]);
    });
  });

  describe('cycles', () => {
    it('stops a self reference with one diagnostic', () => {
      const { resolver, message } = createResolver('hello = { hello }');
      const result = resolver.resolve(message('hello'));

      expect(result.value).toBe('{hello}');
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        code: 'CYCLIC_REFERENCE',
        category: 'resolution',
        message: 'Circular reference detected: hello -> hello',
      });
    });

    it('reports the whole path of a mutual cycle', () => {
      const { resolver, message } = createResolver('a = { b }\nb = { a }');
      const result = resolver.resolve(message('a'));

      expect(result.value).toBe('{a}');
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        'Circular reference detected: a -> b -> a',
      ]);
    });

    it('treats a message and its own attribute as different keys', () => {
      const { resolver, message } = createResolver(
        'foo = Foo { foo.title }\n    .title = Title'
      );

      expect(resolver.resolve(message('foo'))).toEqual({
        value: 'Foo Title',
        diagnostics: [],
      });
    });

    it('detects term cycles', () => {
      const { resolver, message } = createResolver('-t = { -t }\nm = { -t }');
      const result = resolver.resolve(message('m'));

      expect(result.value).toBe('{-t}');
      expect(result.diagnostics[0]?.message).toBe(
        'Circular reference detected: m -> -t -> -t'
      );
    });

    it('allows the same message twice in one pattern', () => {
      const { resolver, message } = createResolver('x = X\nm = { x }{ x }');

      expect(resolver.resolve(message('m'))).toEqual({
        value: 'XX',
        diagnostics: [],
      });
    });
  });

  describe('select expressions', () => {
    const count = 'count = { $n -> [one] One *[other] { $n } items }';

    it('selects plural categories', () => {
      const { resolver, message } = createResolver(count);

      expect(resolver.resolve(message('count'), { n: 1 })).toEqual({
        value: 'One',
        diagnostics: [],
      });
      expect(resolver.resolve(message('count'), { n: 5 })).toEqual({
        value: '5 items',
        diagnostics: [],
      });
    });

    it('prefers an exact number key over the plural category', () => {
      const { resolver, message } = createResolver(
        'm = { $n -> [0] none [one] one *[other] many }'
      );

      expect(resolver.resolve(message('m'), { n: 0 }).value).toBe('none');
      expect(resolver.resolve(message('m'), { n: 1 }).value).toBe('one');
    });

    it('matches identifier keys against string values', () => {
      const { resolver, message } = createResolver(
        'm = { $g -> [male] he [female] she *[other] they }'
      );

      expect(resolver.resolve(message('m'), { g: 'female' }).value).toBe('she');
      expect(resolver.resolve(message('m'), { g: 'unknown' }).value).toBe('they');
    });

    it('does not match number keys against numeric strings', () => {
      const { resolver, message } = createResolver(
        'm = { $n -> [1] number *[other] text }'
      );

      expect(resolver.resolve(message('m'), { n: '1' }).value).toBe('text');
    });

    it('selects ordinal categories through NUMBER type', () => {
      const { resolver, message } = createResolver(
        'm = { NUMBER($n, type: "ordinal") -> [one] st [two] nd [few] rd *[other] th }'
      );

      expect(resolver.resolve(message('m'), { n: 2 }).value).toBe('nd');
      expect(resolver.resolve(message('m'), { n: 3 }).value).toBe('rd');
      expect(resolver.resolve(message('m'), { n: 11 }).value).toBe('th');
    });

    it('uses the configured plural category selector', () => {
      const pluralCategory = vi.fn(() => 'few');
      const { resolver, message } = createResolver(
        'm = { $n -> [few] a few *[other] lots }',
        { pluralCategory, locale: 'pl' }
      );

      expect(resolver.resolve(message('m'), { n: 3 }).value).toBe('a few');
      expect(pluralCategory).toHaveBeenCalledWith(3, 'pl', 'cardinal');
    });

    it('reports a select expression without variants', () => {
      const span = { start: 0, end: 0 };
      const message: MessageNode = {
        type: 'Message',
        id: { type: 'Identifier', name: 'broken', span },
        value: {
          type: 'Pattern',
          elements: [
            {
              type: 'Placeable',
              expression: {
                type: 'SelectExpression',
                selector: { type: 'NumberLiteral', raw: '1', value: 1, span },
                variants: [],
                span,
              },
              span,
            },
          ],
          span,
        },
        attributes: [],
        comment: null,
        span,
      };
      const resolver = new Resolver({
        locale: 'en',
        messages: new Map(),
        terms: new Map(),
        functions: createDefaultRegistry(),
      });
      const result = resolver.resolve(message);

      expect(result.value).toBe('{???}');
      expect(result.diagnostics.map((d) => d.code)).toEqual(['NO_VARIANTS']);
    });
  });

  describe('functions', () => {
    it('formats with NUMBER in the resolver locale', () => {
      const { resolver, message } = createResolver(
        'price = { NUMBER($n, minimumFractionDigits: 2) }'
      );

      expect(resolver.resolve(message('price'), { n: 3 }).value).toBe('3.00');
    });

    it('falls back for an unknown function and lists the built-ins', () => {
      const { resolver, message } = createResolver('m = { NOPE($n) }');
      const result = resolver.resolve(message('m'), { n: 1 });

      expect(result.value).toBe('{NOPE(...)}');
      expect(result.diagnostics[0]).toMatchObject({
        code: 'FUNCTION_NOT_FOUND',
        message: "Function 'NOPE' not found",
        hint: 'Built-in functions: CURRENCY, DATETIME, NUMBER. Check spelling.',
      });
    });

    it('does not call a function whose argument failed', () => {
      const fn = vi.fn(() => 'called');
      const { resolver, message } = createResolver('m = { FN($missing) }', {
        functions: customRegistry({ FN: fn }),
      });
      const result = resolver.resolve(message('m'));

      expect(result.value).toBe('{FN(...)}');
      expect(result.diagnostics.map((d) => d.code)).toEqual([
        'VARIABLE_NOT_PROVIDED',
      ]);
      expect(fn).not.toHaveBeenCalled();
    });

    it('turns a thrown error into a diagnostic', () => {
      const { resolver, message } = createResolver('m = { FAIL() }', {
        functions: customRegistry({
          FAIL: () => {
            throw new Error('boom');
          },
        }),
      });
      const result = resolver.resolve(message('m'));

      expect(result.value).toBe('{FAIL(...)}');
      expect(result.diagnostics[0]).toMatchObject({
        code: 'FUNCTION_FAILED',
        message: "Function 'FAIL' failed: boom",
      });
    });

    it('passes the locale to built-ins only', () => {
      const show = (
        _positional: unknown[],
        _named: unknown,
        locale?: string
      ): string => locale ?? 'none';
      const registry = new FunctionRegistry(
        new Map([['SHOW', { name: 'SHOW', fn: show }]])
      );
      registry.register('CUSTOM', show);
      const { resolver, message } = createResolver('m = { SHOW() } { CUSTOM() }', {
        functions: registry,
        locale: 'de',
      });

      expect(resolver.resolve(message('m')).value).toBe('de none');
    });

    it('does not pass the locale to a replacement of a built-in', () => {
      const registry = createDefaultRegistry();
      registry.register('NUMBER', (_positional, _named, locale) =>
        locale === undefined ? 'no-locale' : locale
      );
      const { resolver, message } = createResolver('m = { NUMBER(1) }', {
        functions: registry,
      });

      expect(resolver.resolve(message('m')).value).toBe('no-locale');
    });

    it('passes evaluated arguments and reports the call', () => {
      const onFunctionCall = vi.fn();
      const fn = vi.fn(() => 'ok');
      const { resolver, message } = createResolver(
        'm = { FN($a, "lit", 7, mode: "x") }',
        { functions: customRegistry({ FN: fn }), onFunctionCall }
      );
      resolver.resolve(message('m'), { a: 'A' });

      expect(fn).toHaveBeenCalledWith(['A', 'lit', 7], { mode: 'x' });
      expect(onFunctionCall).toHaveBeenCalledWith({
        name: 'FN',
        positional: ['A', 'lit', 7],
        named: { mode: 'x' },
      });
    });

    it('selects on a FluentNumber returned by a function', () => {
      const { resolver, message } = createResolver(
        'm = { WRAP($n) -> [one] single *[other] several }',
        {
          functions: customRegistry({
            WRAP: ([value]) =>
              new FluentNumber(typeof value === 'number' ? value : 0),
          }),
        }
      );

      expect(resolver.resolve(message('m'), { n: 1 }).value).toBe('single');
    });
  });

  describe('values that cannot be formatted', () => {
    const invalid = new Date(Number.NaN);

    it('falls back to {$name} for an invalid date', () => {
      const { resolver, message } = createResolver(
        'd = On { $when } and { $name }'
      );
      const result = resolver.resolve(message('d'), {
        when: invalid,
        name: 'Ada',
      });

      expect(result.value).toBe('On {$when} and Ada');
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        code: 'FORMAT_FAILED',
        message: "Formatting '$when' failed: Invalid time value",
      });
    });

    it('selects the default variant for an invalid date', () => {
      const { resolver, message } = createResolver(
        'd = { $when ->\n    [today] Today\n   *[other] Some day\n}'
      );

      expect(resolver.resolve(message('d'), { when: invalid })).toEqual({
        value: 'Some day',
        diagnostics: [],
      });
    });

    it('reports DATETIME on an invalid date as a failed call', () => {
      const { resolver, message } = createResolver('d = { DATETIME($when) }');
      const result = resolver.resolve(message('d'), { when: invalid });

      expect(result.value).toBe('{DATETIME(...)}');
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "Function 'DATETIME' failed: DATETIME() expects a valid date, got an invalid Date",
      ]);
    });

    it('falls back when a custom function returns an unformattable value', () => {
      const { resolver, message } = createResolver('m = [{ PRICE() }]', {
        functions: customRegistry({
          PRICE: () => new FluentNumber(1, { style: 'currency' }),
        }),
      });
      const result = resolver.resolve(message('m'));

      expect(result.value).toBe('[{PRICE(...)}]');
      expect(result.diagnostics.map((d) => d.code)).toEqual(['FORMAT_FAILED']);
    });
  });

  describe('determinism', () => {
    it('returns equal results for equal inputs', () => {
      const { resolver, message } = createResolver(
        'm = { $n -> [one] { $missing } *[other] { $n } }'
      );

      const first = resolver.resolve(message('m'), { n: 1 });
      const second = resolver.resolve(message('m'), { n: 1 });

      expect(second).toEqual(first);
      expect(first.diagnostics).toHaveLength(1);
    });
  });
});
