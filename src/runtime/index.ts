/**
 * FTL Runtime
 *
 * Public API for formatting messages.
 *
 * Module Structure:
 * - core/: Resolution and the objects built on it
 *   - types.ts: Public types (callbacks, events, results)
 *   - values.ts: FluentValue, FluentNumber, FluentDateTime, formatting
 *   - plural-rules.ts: Cached Intl.PluralRules lookup
 *   - functions.ts: FunctionRegistry
 *   - resolve/: The Resolver and its resolution steps
 *   - bundle.ts: FluentBundle
 *   - localization.ts: FluentLocalization fallback chain
 * - ext/: Self-contained extensions
 *   - builtins.ts: NUMBER, DATETIME, CURRENCY
 *   - loaders.ts: Filesystem loader and YAML manifests
 *   - parsing.ts: Reading formatted numbers, amounts and dates back
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  AddResourceOptions,
  DiagnosticEvent,
  FluentFunction,
  FormatEvent,
  FormatOptions,
  FormatResult,
  FunctionCallEvent,
  JunkEvent,
  ObservabilityCallbacks,
  ResourceAddedEvent,
  ValidationResult,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export {
  FluentDateTime,
  FluentNumber,
  formatValue,
  type FluentArgs,
  type FluentPrimitive,
  type FluentValue,
} from './core/values.js';

export { normalizeLocale, selectPluralCategory } from './core/plural-rules.js';

// ============================================================
// FUNCTIONS
// ============================================================

export {
  FunctionRegistry,
  createDefaultRegistry,
  type FunctionOptions,
  type RegisteredFunction,
} from './core/functions.js';

export { BUILTIN_FUNCTIONS, type BuiltinDefinition } from './ext/builtins.js';

export {
  hasParseErrors,
  parseCurrency,
  parseDate,
  parseDatetime,
  parseDecimal,
  parseNumber,
  type CurrencyAmount,
  type CurrencyParseOptions,
  type ValueParseFailed,
  type ValueParseResult,
  type ValueParsed,
} from './ext/parsing.js';

// ============================================================
// RESOLUTION
// ============================================================

export {
  FSI,
  PDI,
  Resolver,
  type PluralCategorySelector,
  type ResolveResult,
  type ResolverOptions,
} from './core/resolve/index.js';

export { FluentBundle, type BundleOptions } from './core/bundle.js';

export {
  FluentLocalization,
  type LocalizationOptions,
  type ResourceLoader,
} from './core/localization.js';

export {
  PathResourceLoader,
  loadLocalizationManifest,
  readLocalizationManifest,
  type LocalizationManifest,
} from './ext/loaders.js';
