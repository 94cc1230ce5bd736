#!/usr/bin/env node
/**
 * ftl-eval - Format one message from an FTL file
 *
 * Usage:
 *   ftl-eval messages.ftl greeting --arg name=Ada
 *   ftl-eval messages.ftl login --attribute placeholder --locale de
 *   ftl-eval --help
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { formatDiagnostic } from './diagnostics.js';
import { FluentBundle } from './runtime/index.js';
import type { FluentValue } from './runtime/index.js';
import {
  formatError,
  readSourceFile,
  readVersion,
  shouldRunMain,
} from './cli-shared.js';

/**
 * Parsed command-line arguments for ftl-eval
 */
export type ParsedEvalArgs =
  | {
      mode: 'eval';
      file: string;
      id: string;
      attribute: string | undefined;
      locale: string;
      argsFile: string | undefined;
      args: Record<string, FluentValue>;
      isolating: boolean;
      strict: boolean;
      verbose: boolean;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const VALUE_FLAGS = new Set(['--attribute', '--locale', '--args', '--arg']);
const BOOLEAN_FLAGS = new Set(['--no-isolating', '--strict', '--verbose']);

/**
 * Value of a `--arg name=value` pair.
 * Text that reads as a finite decimal number becomes a number.
 */
export function parseArgValue(raw: string): FluentValue {
  if (/^-?\d+(\.\d+)?$/.test(raw)) {
    return Number(raw);
  }
  return raw;
}

/**
 * Parse command-line arguments for ftl-eval
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseEvalArgs(argv: string[]): ParsedEvalArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const positional: string[] = [];
  const args: Record<string, FluentValue> = {};
  let attribute: string | undefined;
  let locale = 'en-US';
  let argsFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      positional.push(arg);
      continue;
    }
    if (BOOLEAN_FLAGS.has(arg)) {
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${arg} requires a value`);
    }
    i++;

    switch (arg) {
      case '--attribute':
        attribute = value;
        break;
      case '--locale':
        locale = value;
        break;
      case '--args':
        argsFile = value;
        break;
      case '--arg': {
        const eq = value.indexOf('=');
        if (eq <= 0) {
          throw new Error(`Invalid --arg: ${value}. Expected name=value`);
        }
        args[value.slice(0, eq)] = parseArgValue(value.slice(eq + 1));
        break;
      }
    }
  }

  const [file, id] = positional;
  if (!file) {
    throw new Error('Missing file argument');
  }
  if (!id) {
    throw new Error('Missing message id argument');
  }

  return {
    mode: 'eval',
    file,
    id,
    attribute,
    locale,
    argsFile,
    args,
    isolating: !argv.includes('--no-isolating'),
    strict: argv.includes('--strict'),
    verbose: argv.includes('--verbose'),
  };
}

// ============================================================
// ARGUMENT FILES
// ============================================================

function isScalar(value: unknown): value is string | number | boolean | null {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Read message arguments from YAML or JSON text.
 * The document must be a mapping of names to scalar values; empty text
 * yields no arguments.
 */
export function parseArgsDocument(text: string): Record<string, FluentValue> {
  const data: unknown = yaml.parse(text);
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid arguments file: must be a mapping');
  }

  const entries: [string, unknown][] = Object.entries(data);
  const args: Record<string, FluentValue> = {};
  for (const [name, value] of entries) {
    if (value instanceof Date || isScalar(value)) {
      args[name] = value;
    } else {
      throw new Error(
        `Invalid arguments file: '${name}' must be a string, number, boolean or date`
      );
    }
  }
  return args;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

const HELP = `ftl-eval - Format a message from an FTL file

Usage: ftl-eval [options] <file> <message-id>

Options:
  --attribute <name>  Format an attribute instead of the value
  --locale <code>     Locale for plurals and number formatting (default: en-US)
  --args <file>       YAML or JSON file with message arguments
  --arg <name=value>  Message argument (repeatable, overrides --args)
  --no-isolating      Do not wrap placeables in Unicode isolation marks
  --strict            Exit with status 1 when formatting reports diagnostics
  --verbose           Trace function calls and junk on stderr
  -h, --help          Show this help message
  -v, --version       Show version number`;

async function main(): Promise<void> {
  const command = parseEvalArgs(process.argv.slice(2));

  if (command.mode === 'help') {
    console.log(HELP);
    return;
  }
  if (command.mode === 'version') {
    console.log(`ftl-eval ${readVersion()}`);
    return;
  }

  const file = readSourceFile(command.file);
  if (!file.ok) {
    console.error(file.message);
    process.exitCode = 2;
    return;
  }

  let args: Record<string, FluentValue> = {};
  if (command.argsFile !== undefined) {
    args = parseArgsDocument(fs.readFileSync(command.argsFile, 'utf-8'));
  }
  args = { ...args, ...command.args };

  const verbose = command.verbose;
  const bundle = new FluentBundle(command.locale, {
    useIsolating: command.isolating,
    observability: {
      onJunk: (event) => {
        if (!verbose) return;
        for (const annotation of event.annotations) {
          console.error(`junk: ${annotation.message}`);
        }
      },
      onFunctionCall: (event) => {
        if (verbose) console.error(`call: ${event.name}()`);
      },
    },
  });
  bundle.addResource(file.source, { sourcePath: command.file });

  const { value, diagnostics } = bundle.formatPattern(command.id, args, {
    attribute: command.attribute,
  });

  console.log(value);
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }

  if (command.strict && diagnostics.length > 0) {
    process.exitCode = 1;
  }
}

if (shouldRunMain()) {
  main().catch((err: unknown) => {
    console.error(`Error: ${formatError(err)}`);
    process.exitCode = 1;
  });
}
