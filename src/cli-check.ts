#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for ftl-check.
 * Reports syntax errors and lint findings for a single FTL file.
 */

import type { CheckDiagnostic } from './check/index.js';
import {
  VALIDATION_RULES,
  loadConfig,
  createDefaultConfig,
  validateResource,
} from './check/index.js';
import { parse } from './parser/index.js';
import {
  formatError,
  readSourceFile,
  readVersion,
  shouldRunMain,
} from './cli-shared.js';

/**
 * Parsed command-line arguments for ftl-check
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      file: string;
      verbose: boolean;
      format: 'text' | 'json';
    }
  | { mode: 'help' }
  | { mode: 'version' };

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--verbose',
  '--format',
]);

/**
 * Parse command-line arguments for ftl-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const verbose = argv.includes('--verbose');

  let format: 'text' | 'json' = 'text';
  const formatIndex = argv.indexOf('--format');
  if (formatIndex !== -1) {
    const formatValue = argv[formatIndex + 1];
    if (formatValue === 'text' || formatValue === 'json') {
      format = formatValue;
    } else if (!formatValue || formatValue.startsWith('-')) {
      throw new Error('--format requires argument: text or json');
    } else {
      throw new Error(`Invalid format: ${formatValue}. Expected text or json`);
    }
  }

  let file: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-')) {
      if (!KNOWN_FLAGS.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (arg === '--format') {
        i++;
      }
      continue;
    }

    // First positional argument is the file
    file ??= arg;
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, verbose, format };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostics for output
 *
 * Text format: file:line:col: severity: message (code)
 * JSON format: errors array and a severity summary
 * Verbose mode adds the rule category to JSON entries.
 */
export function formatDiagnostics(
  file: string,
  diagnostics: readonly CheckDiagnostic[],
  format: 'text' | 'json',
  verbose: boolean
): string {
  if (format === 'json') {
    return formatDiagnosticsJSON(file, diagnostics, verbose);
  }
  return formatDiagnosticsText(file, diagnostics);
}

function formatDiagnosticsText(
  file: string,
  diagnostics: readonly CheckDiagnostic[]
): string {
  return diagnostics
    .map((d) => {
      const { line, column } = d.location;
      return `${file}:${line}:${column}: ${d.severity}: ${d.message} (${d.code})`;
    })
    .join('\n');
}

function formatDiagnosticsJSON(
  file: string,
  diagnostics: readonly CheckDiagnostic[],
  verbose: boolean
): string {
  const categoryMap = new Map<string, string>();
  for (const rule of VALIDATION_RULES) {
    categoryMap.set(rule.code, rule.category);
  }

  const errors = diagnostics.map((d) => {
    const error: Record<string, unknown> = {
      location: {
        line: d.location.line,
        column: d.location.column,
        offset: d.location.offset,
      },
      severity: d.severity,
      code: d.code,
      message: d.message,
      context: d.context,
    };

    if (verbose) {
      const category = categoryMap.get(d.code);
      if (category) {
        error['category'] = category;
      }
    }

    return error;
  });

  const summary = {
    total: diagnostics.length,
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };

  return JSON.stringify({ file, errors, summary }, null, 2);
}

/**
 * Exit code for a finished check: 3 when the file has syntax errors,
 * 1 for any other finding, 0 when clean.
 */
export function exitCodeFor(diagnostics: readonly CheckDiagnostic[]): number {
  if (diagnostics.some((d) => d.code === 'syntax-error')) return 3;
  return diagnostics.length > 0 ? 1 : 0;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

const HELP = `ftl-check - Validate FTL resources

Usage: ftl-check [options] <file>

Options:
  --format <fmt>  Output format: text (default) or json
  --verbose       Include rule categories in JSON output
  -h, --help      Show this help message
  -v, --version   Show version number`;

async function main(): Promise<void> {
  const args = parseCheckArgs(process.argv.slice(2));

  if (args.mode === 'help') {
    console.log(HELP);
    return;
  }
  if (args.mode === 'version') {
    console.log(readVersion());
    return;
  }

  const config = loadConfig(process.cwd()) ?? createDefaultConfig();

  const file = readSourceFile(args.file);
  if (!file.ok) {
    console.error(file.message);
    process.exitCode = 2;
    return;
  }

  const resource = parse(file.source);
  const diagnostics = validateResource(resource, file.source, config);

  if (diagnostics.length === 0 && args.format === 'text') {
    console.log('No issues found');
  } else {
    console.log(
      formatDiagnostics(args.file, diagnostics, args.format, args.verbose)
    );
  }
  process.exitCode = exitCodeFor(diagnostics);
}

if (shouldRunMain()) {
  main().catch((err: unknown) => {
    console.error(`Error: ${formatError(err)}`);
    process.exitCode = 1;
  });
}
