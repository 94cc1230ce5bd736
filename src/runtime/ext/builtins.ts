/**
 * Built-in Functions
 *
 * NUMBER, DATETIME and CURRENCY, formatting through Intl.
 * Each returns a wrapper value that formats lazily with the bundle locale.
 */

import { normalizeLocale } from '../core/plural-rules.js';
import type { FluentFunction } from '../core/types.js';
import {
  FluentDateTime,
  FluentNumber,
  type FluentValue,
  isValidDate,
} from '../core/values.js';

export interface BuiltinDefinition {
  readonly fn: FluentFunction;
  readonly description: string;
}

type NamedArgs = Readonly<Record<string, FluentValue>>;

// ============================================================
// OPTION READERS
// ============================================================

/** A named option restricted to a fixed set of strings */
function pickOption<T extends string>(
  named: NamedArgs,
  key: string,
  allowed: readonly T[]
): T | undefined {
  const value = named[key];
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new TypeError(
      `Invalid value for '${key}': ${String(value)} (expected ${allowed.join(', ')})`
    );
  }
  return match;
}

function integerOption(named: NamedArgs, key: string): number | undefined {
  const value = named[key];
  if (value === undefined) return undefined;
  const number = typeof value === 'string' ? Number(value) : value;
  if (typeof number !== 'number' || !Number.isInteger(number)) {
    throw new TypeError(`Invalid value for '${key}': expected an integer`);
  }
  return number;
}

function booleanOption(named: NamedArgs, key: string): boolean | undefined {
  const value = named[key];
  if (value === undefined) return undefined;
  if (value === true || value === 'true') return true;
  if (value === false || value === 'false') return false;
  throw new TypeError(`Invalid value for '${key}': expected true or false`);
}

function stringOption(named: NamedArgs, key: string): string | undefined {
  const value = named[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new TypeError(`Invalid value for '${key}': expected a string`);
  }
  return value;
}

/** Drop undefined entries so they do not override inherited options */
function defined<T extends object>(options: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(options)) {
    if (!isKeyOf(options, key)) continue;
    if (options[key] !== undefined) result[key] = options[key];
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

// ============================================================
// ARGUMENT CONVERSION
// ============================================================

function toFluentNumber(value: FluentValue, fnName: string): FluentNumber {
  if (value instanceof FluentNumber) return value;
  if (typeof value === 'number') return new FluentNumber(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return new FluentNumber(parsed);
  }
  throw new TypeError(
    `${fnName}() expects a number, got ${describeValue(value)}`
  );
}

function toDate(value: FluentValue): Date {
  if (value instanceof FluentDateTime || value instanceof Date) {
    const date = value instanceof FluentDateTime ? value.value : value;
    if (isValidDate(date)) return date;
    throw new RangeError('DATETIME() expects a valid date, got an invalid Date');
  }
  if (typeof value === 'number' || typeof value === 'string') {
    const date = new Date(value);
    if (isValidDate(date)) return date;
  }
  throw new TypeError(`DATETIME() expects a date, got ${describeValue(value)}`);
}

function describeValue(value: FluentValue): string {
  if (value === null) return 'null';
  if (value === undefined) return 'nothing';
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'object') return value.constructor.name;
  return `${typeof value} ${String(value)}`;
}

/** Build the formatter once so that bad options fail at call time */
function checkNumberOptions(
  options: Intl.NumberFormatOptions,
  locale: string | undefined
): void {
  new Intl.NumberFormat(normalizeLocale(locale ?? 'en'), options);
}

// ============================================================
// NUMBER
// ============================================================

const NUMBER: FluentFunction = (positional, named, locale) => {
  const base = toFluentNumber(positional[0], 'NUMBER');
  const options: Intl.NumberFormatOptions = {
    ...base.options,
    ...defined({
      style: pickOption(named, 'style', ['decimal', 'percent', 'currency'] as const),
      currency: stringOption(named, 'currency'),
      currencyDisplay: pickOption(named, 'currencyDisplay', [
        'symbol',
        'code',
        'name',
      ] as const),
      useGrouping: booleanOption(named, 'useGrouping'),
      minimumIntegerDigits: integerOption(named, 'minimumIntegerDigits'),
      minimumFractionDigits: integerOption(named, 'minimumFractionDigits'),
      maximumFractionDigits: integerOption(named, 'maximumFractionDigits'),
    }),
  };
  const type =
    pickOption(named, 'type', ['cardinal', 'ordinal'] as const) ??
    base.pluralType;

  checkNumberOptions(options, locale);
  return new FluentNumber(base.value, options, type);
};

// ============================================================
// CURRENCY
// ============================================================

const CURRENCY: FluentFunction = (positional, named, locale) => {
  const base = toFluentNumber(positional[0], 'CURRENCY');
  const currency = stringOption(named, 'currency');
  if (currency === undefined) {
    throw new TypeError("CURRENCY() requires a 'currency' option");
  }
  const options: Intl.NumberFormatOptions = {
    ...base.options,
    style: 'currency',
    currency,
    ...defined({
      currencyDisplay: pickOption(named, 'currencyDisplay', [
        'symbol',
        'code',
        'name',
      ] as const),
    }),
  };

  checkNumberOptions(options, locale);
  return new FluentNumber(base.value, options, base.pluralType);
};

// ============================================================
// DATETIME
// ============================================================

const STYLES = ['full', 'long', 'medium', 'short'] as const;
const NUMERIC = ['numeric', '2-digit'] as const;

const DATETIME: FluentFunction = (positional, named) => {
  const value = positional[0];
  const date = toDate(value);
  const inherited = value instanceof FluentDateTime ? value.options : {};
  const options: Intl.DateTimeFormatOptions = {
    ...inherited,
    ...defined({
      dateStyle: pickOption(named, 'dateStyle', STYLES),
      timeStyle: pickOption(named, 'timeStyle', STYLES),
      weekday: pickOption(named, 'weekday', ['long', 'short', 'narrow'] as const),
      year: pickOption(named, 'year', NUMERIC),
      month: pickOption(named, 'month', [
        ...NUMERIC,
        'long',
        'short',
        'narrow',
      ] as const),
      day: pickOption(named, 'day', NUMERIC),
      hour: pickOption(named, 'hour', NUMERIC),
      minute: pickOption(named, 'minute', NUMERIC),
      second: pickOption(named, 'second', NUMERIC),
      hour12: booleanOption(named, 'hour12'),
      timeZone: stringOption(named, 'timeZone'),
    }),
  };

  new Intl.DateTimeFormat('en', options);
  return new FluentDateTime(date, options);
};

// ============================================================
// REGISTRY TABLE
// ============================================================

export const BUILTIN_FUNCTIONS: Readonly<Record<string, BuiltinDefinition>> = {
  NUMBER: {
    fn: NUMBER,
    description: 'Format a number with Intl.NumberFormat options',
  },
  DATETIME: {
    fn: DATETIME,
    description: 'Format a date with Intl.DateTimeFormat options',
  },
  CURRENCY: {
    fn: CURRENCY,
    description: 'Format a number as an amount of the given currency',
  },
};
