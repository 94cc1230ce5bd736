/**
 * CLI Shared Utilities
 * Common helpers for the ftl-check and ftl-eval command-line tools
 */

import * as fs from 'node:fs';
import { FtlError } from './error-classes.js';

/**
 * Package version from package.json.
 * Resolved relative to this module, which sits one level below the
 * package root both in src/ and in dist/.
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: unknown): string {
  if (err instanceof FtlError) {
    return err.format();
  }

  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  return err instanceof Error ? err.message : String(err);
}

/** Outcome of reading an input file */
export type SourceFile =
  | { readonly ok: true; readonly source: string }
  | { readonly ok: false; readonly message: string };

/**
 * Read a UTF-8 source file, describing the common failures
 * (missing file, directory, unreadable) instead of throwing.
 */
export function readSourceFile(file: string): SourceFile {
  try {
    if (fs.statSync(file).isDirectory()) {
      return { ok: false, message: `Error: Path is a directory: ${file}` };
    }
    return { ok: true, source: fs.readFileSync(file, 'utf-8') };
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      return { ok: false, message: `Error: File not found: ${file}` };
    }
    return { ok: false, message: `Error: Cannot read file: ${file}` };
  }
}

/**
 * Whether a CLI module should run its main function.
 * False under the test runner, which imports the modules for their
 * argument parsers and formatters.
 */
export function shouldRunMain(): boolean {
  return (
    process.env['NODE_ENV'] !== 'test' &&
    !process.env['VITEST'] &&
    !process.env['VITEST_WORKER_ID']
  );
}
