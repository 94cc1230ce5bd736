/**
 * Error Registry
 * Central diagnostic definition registry with template rendering and help URL generation.
 */

// ============================================================
// ERROR CATEGORIES AND CODES
// ============================================================

/** Error category, mirrored by the numeric range of the code */
export type ErrorCategory = 'reference' | 'resolution' | 'syntax' | 'parsing';

/** Reference errors (1000-1999): missing messages, terms, attributes, variables */
export type ReferenceCode =
  | 'MESSAGE_NOT_FOUND'
  | 'ATTRIBUTE_NOT_FOUND'
  | 'TERM_NOT_FOUND'
  | 'TERM_ATTRIBUTE_NOT_FOUND'
  | 'VARIABLE_NOT_PROVIDED'
  | 'MESSAGE_NO_VALUE';

/** Resolution errors (2000-2999): failures while evaluating a pattern */
export type ResolutionCode =
  | 'CYCLIC_REFERENCE'
  | 'NO_VARIANTS'
  | 'FUNCTION_NOT_FOUND'
  | 'FUNCTION_FAILED'
  | 'UNKNOWN_EXPRESSION'
  | 'FORMAT_FAILED';

/** Syntax errors (3000-3999): grammar violations, reported through Junk */
export type SyntaxCode = 'UNEXPECTED_EOF' | 'INVALID_CHARACTER' | 'EXPECTED_TOKEN';

/** Parsing errors (4000-4999): display text that cannot be read back as a value */
export type ParsingCode =
  | 'NUMBER_PARSE_FAILED'
  | 'DATE_PARSE_FAILED'
  | 'DATETIME_PARSE_FAILED'
  | 'CURRENCY_PARSE_FAILED'
  | 'CURRENCY_AMBIGUOUS';

export type DiagnosticCode =
  | ReferenceCode
  | ResolutionCode
  | SyntaxCode
  | ParsingCode;

/** Registry entry containing all metadata for a single diagnostic code */
export interface ErrorDefinition {
  readonly errorId: DiagnosticCode;
  /** Stable numeric code (1001, 2001, 3001, ...) */
  readonly number: number;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** Suggestion template with {placeholder} syntax */
  readonly hintTemplate?: string | undefined;
  /** Page name under the Fluent syntax guide */
  readonly helpPage?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all diagnostic definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Reference errors (1xxx)
  {
    errorId: 'MESSAGE_NOT_FOUND',
    number: 1001,
    category: 'reference',
    description: 'Message not found',
    messageTemplate: "Message '{id}' not found{scope}",
    hintTemplate: 'Check that the message is defined in the loaded resources',
    helpPage: 'messages',
  },
  {
    errorId: 'ATTRIBUTE_NOT_FOUND',
    number: 1002,
    category: 'reference',
    description: 'Message attribute not found',
    messageTemplate: "Attribute '{attribute}' not found in message '{id}'",
    hintTemplate: "Check that message '{id}' has an attribute '.{attribute}'",
    helpPage: 'attributes',
  },
  {
    errorId: 'TERM_NOT_FOUND',
    number: 1003,
    category: 'reference',
    description: 'Term not found',
    messageTemplate: "Term '-{id}' not found",
    hintTemplate: 'Terms must be defined before they are referenced',
    helpPage: 'terms',
  },
  {
    errorId: 'TERM_ATTRIBUTE_NOT_FOUND',
    number: 1004,
    category: 'reference',
    description: 'Term attribute not found',
    messageTemplate: "Attribute '{attribute}' not found in term '-{id}'",
    hintTemplate: "Check that term '-{id}' has an attribute '.{attribute}'",
    helpPage: 'terms',
  },
  {
    errorId: 'VARIABLE_NOT_PROVIDED',
    number: 1005,
    category: 'reference',
    description: 'Variable not provided',
    messageTemplate: "Variable '${name}' not provided",
    hintTemplate: "Pass '{name}' in the arguments object",
    helpPage: 'variables',
  },
  {
    errorId: 'MESSAGE_NO_VALUE',
    number: 1006,
    category: 'reference',
    description: 'Message has no value',
    messageTemplate: "Message '{id}' has no value",
    hintTemplate:
      'Message has only attributes; specify which attribute to format',
    helpPage: 'messages',
  },

  // Resolution errors (2xxx)
  {
    errorId: 'CYCLIC_REFERENCE',
    number: 2001,
    category: 'resolution',
    description: 'Circular reference',
    messageTemplate: 'Circular reference detected: {path}',
    hintTemplate:
      'Break the circular dependency by removing one of the references',
    helpPage: 'references',
  },
  {
    errorId: 'NO_VARIANTS',
    number: 2002,
    category: 'resolution',
    description: 'Select expression without variants',
    messageTemplate: 'No variants in select expression',
    hintTemplate: 'Select expressions must have at least one variant',
    helpPage: 'selectors',
  },
  {
    errorId: 'FUNCTION_NOT_FOUND',
    number: 2003,
    category: 'resolution',
    description: 'Function not found',
    messageTemplate: "Function '{name}' not found",
    hintTemplate: 'Built-in functions: {builtins}. Check spelling.',
    helpPage: 'functions',
  },
  {
    errorId: 'FUNCTION_FAILED',
    number: 2004,
    category: 'resolution',
    description: 'Function call failed',
    messageTemplate: "Function '{name}' failed: {reason}",
    hintTemplate: 'Check the function arguments and their types',
    helpPage: 'functions',
  },
  {
    errorId: 'UNKNOWN_EXPRESSION',
    number: 2005,
    category: 'resolution',
    description: 'Unknown expression type',
    messageTemplate: 'Unknown expression type: {kind}',
    hintTemplate: 'The tree was not produced by the parser',
  },
  {
    errorId: 'FORMAT_FAILED',
    number: 2006,
    category: 'resolution',
    description: 'Formatting raised an error',
    messageTemplate: "Formatting '{id}' failed: {reason}",
    hintTemplate: 'Check custom functions and the values they return',
    helpPage: 'functions',
  },

  // Syntax errors (3xxx)
  {
    errorId: 'UNEXPECTED_EOF',
    number: 3001,
    category: 'syntax',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of input, expected {expected}',
    hintTemplate: 'Check for unclosed braces or incomplete syntax',
  },
  {
    errorId: 'INVALID_CHARACTER',
    number: 3002,
    category: 'syntax',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected {found}, expected {expected}',
  },
  {
    errorId: 'EXPECTED_TOKEN',
    number: 3003,
    category: 'syntax',
    description: 'Malformed construct',
    messageTemplate: '{reason}',
  },

  // Parsing errors (4xxx)
  {
    errorId: 'NUMBER_PARSE_FAILED',
    number: 4001,
    category: 'parsing',
    description: 'Text is not a number',
    messageTemplate: "Failed to parse number '{value}' for locale '{locale}'",
    hintTemplate:
      "Expected digits, optionally grouped with '{group}', and '{decimal}' before the fraction",
  },
  {
    errorId: 'DATE_PARSE_FAILED',
    number: 4002,
    category: 'parsing',
    description: 'Text is not a date',
    messageTemplate: "Failed to parse date '{value}' for locale '{locale}'",
    hintTemplate:
      'Use an ISO date (2025-01-28), the numeric form of the locale or a month name',
  },
  {
    errorId: 'DATETIME_PARSE_FAILED',
    number: 4003,
    category: 'parsing',
    description: 'Text is not a date and time',
    messageTemplate: "Failed to parse datetime '{value}' for locale '{locale}'",
    hintTemplate: 'Write a date followed by HH:MM, HH:MM:SS or h:MM AM/PM',
  },
  {
    errorId: 'CURRENCY_PARSE_FAILED',
    number: 4004,
    category: 'parsing',
    description: 'Text is not a currency amount',
    messageTemplate: "Failed to parse currency '{value}': {reason}",
  },
  {
    errorId: 'CURRENCY_AMBIGUOUS',
    number: 4005,
    category: 'parsing',
    description: 'Currency symbol used by several currencies',
    messageTemplate:
      "Ambiguous currency symbol '{symbol}' in '{value}' (one of {candidates})",
    hintTemplate:
      'Pass defaultCurrency, set inferFromLocale, or write an ISO code such as USD',
  },
];

/** Global diagnostic registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template by replacing {placeholder} with context values.
 * Missing keys render as empty text, `{{` produces a literal brace, and an
 * unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("Message '{id}' not found", { id: "hello" })
 * // Returns: "Message 'hello' not found"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char !== '{') {
      result += char;
      i++;
      continue;
    }

    if (template.charAt(i + 1) === '{') {
      result += '{';
      i += 2;
      continue;
    }

    const close = template.indexOf('}', i + 1);
    if (close === -1) {
      return template;
    }

    const key = template.slice(i + 1, close);
    result += formatContextValue(context[key]);
    i = close + 1;
  }

  return result;
}

function formatContextValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) return value.map(String).join(', ');
  return String(value);
}

// ============================================================
// HELP URLS
// ============================================================

const DOCS_BASE = 'https://projectfluent.org/fluent/guide';

/**
 * Documentation URL for a diagnostic code.
 * Returns an empty string for unknown codes and for codes without a guide page.
 *
 * @example
 * getHelpUrl("TERM_NOT_FOUND")
 * // Returns: "https://projectfluent.org/fluent/guide/terms.html"
 */
export function getHelpUrl(errorId: string): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition?.helpPage) {
    return '';
  }
  return `${DOCS_BASE}/${definition.helpPage}.html`;
}
