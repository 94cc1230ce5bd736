/**
 * Value Parsing
 *
 * The inverse of NUMBER, CURRENCY and DATETIME: reads locale-formatted
 * display text back into numbers, decimal strings, currency amounts and
 * dates. Separators and month names come from Intl for the given locale.
 * Failures come back as diagnostics, never as exceptions.
 */

import { createDiagnostic, type Diagnostic } from '../../diagnostics.js';
import type { ParsingCode } from '../../error-registry.js';
import { normalizeLocale } from '../core/plural-rules.js';

// ============================================================
// RESULTS
// ============================================================

export interface ValueParsed<T> {
  readonly value: T;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ValueParseFailed {
  readonly value: null;
  readonly diagnostics: readonly Diagnostic[];
}

/** A parsed value with no diagnostics, or null with at least one */
export type ValueParseResult<T> = ValueParsed<T> | ValueParseFailed;

export function hasParseErrors<T>(
  result: ValueParseResult<T>
): result is ValueParseFailed {
  return result.diagnostics.length > 0;
}

function parsed<T>(value: T): ValueParsed<T> {
  return { value, diagnostics: [] };
}

function failure(
  code: ParsingCode,
  context: Record<string, unknown>
): ValueParseFailed {
  return { value: null, diagnostics: [createDiagnostic(code, context)] };
}

// ============================================================
// NUMBERS
// ============================================================

interface NumberSymbols {
  readonly group: string;
  readonly decimal: string;
  readonly minus: string;
}

/** Users type a plain space where a locale groups with a no-break space */
const SPACE_GROUPS = new Set([' ', '\u00a0', '\u202f']);

const DECIMAL_TEXT = /^([+-]?)(\d+)?(?:\.(\d+)?)?$/;

const symbolCache = new Map<string, NumberSymbols>();

function numberSymbols(locale: string): NumberSymbols {
  const tag = normalizeLocale(locale);
  const cached = symbolCache.get(tag);
  if (cached) return cached;

  const parts = new Intl.NumberFormat(tag, { useGrouping: true }).formatToParts(
    -12345.6
  );
  const part = (type: Intl.NumberFormatPartTypes, fallback: string): string =>
    parts.find((p) => p.type === type)?.value ?? fallback;

  const symbols: NumberSymbols = {
    group: part('group', ','),
    decimal: part('decimal', '.'),
    minus: part('minusSign', '-'),
  };
  symbolCache.set(tag, symbols);
  return symbols;
}

/**
 * Canonical decimal text (`-1234.5`) for a locale-formatted number,
 * or null when the text is not one.
 */
function canonicalDecimal(text: string, symbols: NumberSymbols): string | null {
  const spaceGrouped = SPACE_GROUPS.has(symbols.group);
  let plain = '';
  for (const char of text.trim()) {
    if (char === symbols.decimal) {
      plain += '.';
    } else if (
      char === symbols.group ||
      (spaceGrouped && SPACE_GROUPS.has(char))
    ) {
      continue;
    } else if (char === symbols.minus) {
      plain += '-';
    } else {
      plain += char;
    }
  }

  const match = DECIMAL_TEXT.exec(plain);
  if (!match) return null;
  const [, sign, whole, fraction] = match;
  if (whole === undefined && fraction === undefined) return null;

  const integer = whole ?? '0';
  return `${sign === '-' ? '-' : ''}${integer}${fraction ? `.${fraction}` : ''}`;
}

function numberFailure(text: string, locale: string): ValueParseFailed {
  const symbols = numberSymbols(locale);
  return failure('NUMBER_PARSE_FAILED', {
    value: text,
    locale,
    group: symbols.group,
    decimal: symbols.decimal,
  });
}

/**
 * Read a locale-formatted number as exact decimal text, keeping every
 * digit (`"1.234,50"` in de-DE gives `"1234.50"`).
 *
 * @example
 * ```typescript
 * parseDecimal('1 234,56', 'lv-LV').value; // '1234.56'
 * ```
 */
export function parseDecimal(
  text: string,
  locale: string
): ValueParseResult<string> {
  const decimal = canonicalDecimal(text, numberSymbols(locale));
  return decimal === null ? numberFailure(text, locale) : parsed(decimal);
}

/** Read a locale-formatted number as a JavaScript number */
export function parseNumber(
  text: string,
  locale: string
): ValueParseResult<number> {
  const decimal = parseDecimal(text, locale);
  if (decimal.value === null) return decimal;
  return parsed(Number(decimal.value));
}

// ============================================================
// CURRENCY
// ============================================================

export interface CurrencyAmount {
  /** Exact decimal text, as returned by parseDecimal */
  readonly amount: string;
  /** ISO 4217 code */
  readonly currency: string;
}

export interface CurrencyParseOptions {
  /** Code to use when the text carries an ambiguous symbol such as `$` */
  readonly defaultCurrency?: string | undefined;
  /** Resolve an ambiguous symbol through the region of the locale */
  readonly inferFromLocale?: boolean | undefined;
}

/** Symbols that stand for several currencies, with the ones they may mean */
const AMBIGUOUS_SYMBOLS: ReadonlyMap<string, readonly string[]> = new Map([
  ['$', ['USD', 'CAD', 'AUD', 'NZD', 'SGD', 'HKD', 'MXN']],
  ['¢', ['USD', 'CAD']],
  ['₨', ['INR', 'PKR', 'NPR', 'LKR']],
  ['₱', ['PHP', 'CUP']],
  ['kr', ['SEK', 'NOK', 'DKK', 'ISK']],
]);

const SYMBOL_CURRENCIES: ReadonlyMap<string, string> = new Map([
  ['€', 'EUR'],
  ['£', 'GBP'],
  ['¥', 'JPY'],
  ['₹', 'INR'],
  ['₽', 'RUB'],
  ['₡', 'CRC'],
  ['₦', 'NGN'],
  ['₩', 'KRW'],
  ['₪', 'ILS'],
  ['₫', 'VND'],
  ['₴', 'UAH'],
  ['₵', 'GHS'],
  ['₸', 'KZT'],
  ['₺', 'TRY'],
  ['₼', 'AZN'],
  ['₾', 'GEL'],
]);

/** Currency of each region whose currency writes an ambiguous symbol */
const REGION_CURRENCIES: ReadonlyMap<string, string> = new Map([
  ['US', 'USD'],
  ['CA', 'CAD'],
  ['AU', 'AUD'],
  ['NZ', 'NZD'],
  ['SG', 'SGD'],
  ['HK', 'HKD'],
  ['MX', 'MXN'],
  ['IN', 'INR'],
  ['PK', 'PKR'],
  ['NP', 'NPR'],
  ['LK', 'LKR'],
  ['PH', 'PHP'],
  ['CU', 'CUP'],
  ['SE', 'SEK'],
  ['NO', 'NOK'],
  ['DK', 'DKK'],
  ['IS', 'ISK'],
]);

const CURRENCY_TOKEN =
  /[€$£¥₹₽¢₡₦₩₪₫₱₴₵₸₺₼₾₨]|(?<![A-Za-z])(?:[A-Z]{3}|kr)(?![A-Za-z])/u;

let knownCurrencies: ReadonlySet<string> | undefined;

function isKnownCurrency(code: string): boolean {
  knownCurrencies ??= new Set(Intl.supportedValuesOf('currency'));
  return knownCurrencies.has(code);
}

function regionCurrency(locale: string): string | undefined {
  const region = new Intl.Locale(normalizeLocale(locale)).maximize().region;
  return region === undefined ? undefined : REGION_CURRENCIES.get(region);
}

function currencyFor(
  token: string,
  text: string,
  locale: string,
  options: CurrencyParseOptions
): ValueParseResult<string> {
  const candidates = AMBIGUOUS_SYMBOLS.get(token);
  if (candidates) {
    if (options.defaultCurrency !== undefined) {
      return knownCode(options.defaultCurrency, text);
    }
    if (options.inferFromLocale) {
      const inferred = regionCurrency(locale);
      if (inferred !== undefined && candidates.includes(inferred)) {
        return parsed(inferred);
      }
    }
    return failure('CURRENCY_AMBIGUOUS', {
      symbol: token,
      value: text,
      candidates,
    });
  }

  const mapped = SYMBOL_CURRENCIES.get(token);
  return mapped === undefined ? knownCode(token, text) : parsed(mapped);
}

function knownCode(code: string, text: string): ValueParseResult<string> {
  const upper = code.toUpperCase();
  if (isKnownCurrency(upper)) return parsed(upper);
  return failure('CURRENCY_PARSE_FAILED', {
    value: text,
    reason: `unknown currency code '${code}'`,
  });
}

/**
 * Read a currency amount and its ISO code from display text such as
 * `€100.50`, `100,50 €` or `USD 1,234.56`.
 *
 * Symbols shared by several currencies (`$`, `¢`, `₨`, `₱`, `kr`) need
 * `defaultCurrency` or `inferFromLocale`; otherwise they are reported
 * as CURRENCY_AMBIGUOUS.
 */
export function parseCurrency(
  text: string,
  locale: string,
  options: CurrencyParseOptions = {}
): ValueParseResult<CurrencyAmount> {
  const match = CURRENCY_TOKEN.exec(text);
  if (!match) {
    return failure('CURRENCY_PARSE_FAILED', {
      value: text,
      reason: 'no currency symbol or code found',
    });
  }

  const token = match[0];
  const currency = currencyFor(token, text, locale, options);
  if (currency.value === null) return currency;

  const amountText = (
    text.slice(0, match.index) + text.slice(match.index + token.length)
  ).trim();
  const amount = canonicalDecimal(amountText, numberSymbols(locale));
  if (amount === null) {
    return failure('CURRENCY_PARSE_FAILED', {
      value: text,
      reason: `invalid amount '${amountText}'`,
    });
  }

  return parsed({ amount, currency: currency.value });
}

// ============================================================
// DATES
// ============================================================

type DateField = 'day' | 'month' | 'year';

interface DateFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const NUMERIC_DATE = /^(\d{1,4})([./-])(\d{1,2})\2(\d{1,4})\.?$/;
const MONTH_FIRST = /^(\p{L}+)\.?\s+(\d{1,2}),?\s+(\d{4})$/u;
const DAY_FIRST = /^(\d{1,2})\.?\s+(\p{L}+)\.?,?\s+(\d{4})$/u;

const MDY: readonly DateField[] = ['month', 'day', 'year'];
const DMY: readonly DateField[] = ['day', 'month', 'year'];
const YMD: readonly DateField[] = ['year', 'month', 'day'];

/** Orders tried after the locale's own, by separator */
const FALLBACK_ORDERS: Readonly<Record<string, readonly (readonly DateField[])[]>> =
  {
    '/': [MDY, DMY],
    '.': [DMY],
    '-': [YMD, DMY],
  };

const orderCache = new Map<string, readonly DateField[]>();
const monthCache = new Map<string, ReadonlyMap<string, number>>();

/** Field order of the locale's numeric date format */
function localeDateOrder(locale: string): readonly DateField[] {
  const tag = normalizeLocale(locale);
  const cached = orderCache.get(tag);
  if (cached) return cached;

  const order: DateField[] = [];
  const parts = new Intl.DateTimeFormat(tag, {
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    timeZone: 'UTC',
  }).formatToParts(new Date(Date.UTC(2025, 0, 28)));
  for (const part of parts) {
    if (part.type === 'day' || part.type === 'month' || part.type === 'year') {
      order.push(part.type);
    }
  }

  const result = order.length === 3 ? order : MDY;
  orderCache.set(tag, result);
  return result;
}

function monthKey(name: string): string {
  return name.toLocaleLowerCase().replace(/\.$/, '');
}

/** Long and short month names of the locale, then of English, to 1-12 */
function monthNumbers(locale: string): ReadonlyMap<string, number> {
  const tag = normalizeLocale(locale);
  const cached = monthCache.get(tag);
  if (cached) return cached;

  const names = new Map<string, number>();
  for (const source of [tag, 'en']) {
    for (const month of ['long', 'short'] as const) {
      const format = new Intl.DateTimeFormat(source, { month, timeZone: 'UTC' });
      for (let index = 0; index < 12; index++) {
        const key = monthKey(format.format(new Date(Date.UTC(2000, index, 15))));
        if (!names.has(key)) names.set(key, index + 1);
      }
    }
  }
  monthCache.set(tag, names);
  return names;
}

/** Two-digit years 69-99 fall in the 1900s, 00-68 in the 2000s */
function expandYear(digits: string): number | null {
  const year = Number(digits);
  if (digits.length === 4) return year;
  if (digits.length === 2) return year < 69 ? 2000 + year : 1900 + year;
  return null;
}

function validFields(
  year: number | null,
  month: number,
  day: number
): DateFields | null {
  if (year === null) return null;
  const date = utcDate({ year, month, day }, 0, 0, 0);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return { year, month, day };
}

function utcDate(
  fields: DateFields,
  hour: number,
  minute: number,
  second: number
): Date {
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
}

function numericFields(
  tokens: readonly string[],
  order: readonly DateField[]
): DateFields | null {
  const byField: Partial<Record<DateField, string>> = {};
  order.forEach((field, index) => {
    byField[field] = tokens[index];
  });
  const { year, month, day } = byField;
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }
  if (month.length > 2 || day.length > 2) return null;
  return validFields(expandYear(year), Number(month), Number(day));
}

function dateFields(text: string, locale: string): DateFields | null {
  const iso = ISO_DATE.exec(text);
  if (iso) {
    const [, year, month, day] = iso;
    return validFields(Number(year), Number(month), Number(day));
  }

  const numeric = NUMERIC_DATE.exec(text);
  if (numeric) {
    const [, first, separator, second, third] = numeric;
    if (
      first === undefined ||
      separator === undefined ||
      second === undefined ||
      third === undefined
    ) {
      return null;
    }
    const tokens = [first, second, third];
    const orders = [localeDateOrder(locale), ...(FALLBACK_ORDERS[separator] ?? [])];
    for (const order of orders) {
      const fields = numericFields(tokens, order);
      if (fields) return fields;
    }
    return null;
  }

  const months = monthNumbers(locale);
  const monthFirst = MONTH_FIRST.exec(text);
  if (monthFirst) {
    const [, name, day, year] = monthFirst;
    const month = name === undefined ? undefined : months.get(monthKey(name));
    if (month === undefined) return null;
    return validFields(Number(year), month, Number(day));
  }
  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    const [, day, name, year] = dayFirst;
    const month = name === undefined ? undefined : months.get(monthKey(name));
    if (month === undefined) return null;
    return validFields(Number(year), month, Number(day));
  }

  return null;
}

/**
 * Read a date written as ISO (`2025-01-28`), in the locale's numeric
 * order (`1/28/25` in en-US, `28.01.2025` in de-DE) or with a month name
 * (`Jan 28, 2025`, `28 January 2025`). The result is midnight UTC.
 */
export function parseDate(text: string, locale: string): ValueParseResult<Date> {
  const fields = dateFields(text.trim(), locale);
  if (!fields) return failure('DATE_PARSE_FAILED', { value: text, locale });
  return parsed(utcDate(fields, 0, 0, 0));
}

// ============================================================
// DATE AND TIME
// ============================================================

const ISO_DATETIME =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?(Z|[+-]\d{2}:?\d{2})?$/;
const TIME_SUFFIX =
  /^(.*?)(?:,\s*|\s+)(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AaPp])\.?\s*[Mm]\.?)?$/;

/** Minutes east of UTC for `Z`, `+02:00` or `-0530` */
function offsetMinutes(zone: string): number {
  if (zone === 'Z') return 0;
  const digits = zone.slice(1).replace(':', '');
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return zone.startsWith('-') ? -minutes : minutes;
}

function clockHour(hour: number, meridiem: string | undefined): number | null {
  if (meridiem === undefined) return hour < 24 ? hour : null;
  if (hour < 1 || hour > 12) return null;
  const pm = meridiem.toLowerCase() === 'p';
  return (hour % 12) + (pm ? 12 : 0);
}

function isoDatetime(text: string): Date | null {
  const match = ISO_DATETIME.exec(text);
  if (!match) return null;
  const [, date, hour, minute, second, millis, zone] = match;
  const fields = date === undefined ? null : dateFields(date, 'en');
  if (!fields || Number(hour) > 23 || Number(minute) > 59 || Number(second ?? 0) > 59) {
    return null;
  }

  const result = utcDate(fields, Number(hour), Number(minute), Number(second ?? 0));
  result.setUTCMilliseconds(Number((millis ?? '0').padEnd(3, '0')));
  if (zone !== undefined) {
    result.setTime(result.getTime() - offsetMinutes(zone) * 60_000);
  }
  return result;
}

function localDatetime(text: string, locale: string): Date | null {
  const match = TIME_SUFFIX.exec(text);
  if (!match) return null;
  const [, datePart, hourText, minute, second, meridiem] = match;
  if (datePart === undefined) return null;

  const fields = dateFields(datePart.trim(), locale);
  const hour = clockHour(Number(hourText), meridiem);
  if (!fields || hour === null || Number(minute) > 59 || Number(second ?? 0) > 59) {
    return null;
  }
  return utcDate(fields, hour, Number(minute), Number(second ?? 0));
}

/**
 * Read a date and time of day. ISO text may carry `Z` or an offset;
 * other forms are a date as accepted by parseDate followed by `HH:MM`,
 * `HH:MM:SS` or `h:MM AM`. Times without an offset are taken as UTC.
 */
export function parseDatetime(
  text: string,
  locale: string
): ValueParseResult<Date> {
  const trimmed = text.trim();
  const date = isoDatetime(trimmed) ?? localDatetime(trimmed, locale);
  if (!date) return failure('DATETIME_PARSE_FAILED', { value: text, locale });
  return parsed(date);
}
