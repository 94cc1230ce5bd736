/**
 * Runtime Values
 *
 * Values that flow through resolution: caller arguments, literals and
 * function results, plus their conversion to display text.
 */

import { normalizeLocale } from './plural-rules.js';

// ============================================================
// FORMATTED WRAPPERS
// ============================================================

/**
 * A number carrying formatting options.
 * Keeps the raw value so that selection on `NUMBER($n)` still matches
 * numeric keys and plural categories.
 */
export class FluentNumber {
  constructor(
    readonly value: number,
    readonly options: Intl.NumberFormatOptions = {},
    readonly pluralType: Intl.PluralRuleType = 'cardinal'
  ) {}

  format(locale: string): string {
    return new Intl.NumberFormat(normalizeLocale(locale), this.options).format(
      this.value
    );
  }
}

/** A date carrying formatting options */
export class FluentDateTime {
  constructor(
    readonly value: Date,
    readonly options: Intl.DateTimeFormatOptions = {}
  ) {}

  format(locale: string): string {
    if (!isValidDate(this.value)) return INVALID_DATE_TEXT;
    return new Intl.DateTimeFormat(normalizeLocale(locale), this.options).format(
      this.value
    );
  }
}

const INVALID_DATE_TEXT = 'Invalid Date';

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/** True for a Date, or a wrapped one, whose time is NaN */
export function isInvalidDate(value: FluentValue): boolean {
  if (value instanceof Date) return !isValidDate(value);
  if (value instanceof FluentDateTime) return !isValidDate(value.value);
  return false;
}

function dateText(date: Date): string {
  return isValidDate(date) ? date.toISOString() : INVALID_DATE_TEXT;
}

// ============================================================
// VALUE TYPES
// ============================================================

export type FluentPrimitive = string | number | boolean | Date | null | undefined;

/** Any value an argument, literal or function call can produce */
export type FluentValue = FluentPrimitive | FluentNumber | FluentDateTime;

/** Variables passed to a format call, keyed by name without `$` */
export type FluentArgs = Readonly<Record<string, FluentValue>>;

// ============================================================
// CONVERSIONS
// ============================================================

/**
 * Display text for a resolved value.
 * Wrappers format through Intl; plain numbers use String().
 */
export function formatValue(value: FluentValue, locale: string): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) return dateText(value);
  return value.format(locale);
}

/**
 * Text a value is compared against when matching identifier variant keys.
 * Unlike formatValue this is locale-independent.
 */
export function selectorText(value: FluentValue): string {
  if (value instanceof FluentNumber) return String(value.value);
  if (value instanceof FluentDateTime) return dateText(value.value);
  return formatValue(value, 'en');
}

/** The number behind a value, or null when it is not numeric */
export function numericValue(value: FluentValue): number | null {
  if (typeof value === 'number') return value;
  if (value instanceof FluentNumber) return value.value;
  return null;
}

/** Plural rule type to use when selecting on a value */
export function pluralTypeOf(value: FluentValue): Intl.PluralRuleType {
  return value instanceof FluentNumber ? value.pluralType : 'cardinal';
}
