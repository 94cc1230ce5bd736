/**
 * Resource Loaders
 *
 * Filesystem loading of FTL resources and YAML localization manifests.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import {
  FluentLocalization,
  type LocalizationOptions,
  type ResourceLoader,
} from '../core/localization.js';

// ============================================================
// PATH LOADER
// ============================================================

/**
 * Loads `<basePath>/<resourceId>` where `{locale}` in the base path is
 * replaced by the requested locale.
 *
 * @example
 * ```typescript
 * const loader = new PathResourceLoader('locales/{locale}');
 * loader.load('de', 'main.ftl'); // contents of locales/de/main.ftl
 * ```
 */
export class PathResourceLoader implements ResourceLoader {
  constructor(readonly basePathTemplate: string) {}

  resolvePath(locale: string, resourceId: string): string {
    return path.join(this.basePathTemplate.replaceAll('{locale}', locale), resourceId);
  }

  /** @returns file contents, or null if the file does not exist */
  load(locale: string, resourceId: string): string | null {
    try {
      return readFileSync(this.resolvePath(locale, resourceId), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null;
      }
      throw err;
    }
  }
}

// ============================================================
// MANIFEST
// ============================================================

/** Parsed `locales`/`resources`/`basePath` manifest */
export interface LocalizationManifest {
  readonly locales: string[];
  readonly resources: string[];
  /** Absolute, with `{locale}` still in place */
  readonly basePath: string;
}

const DEFAULT_BASE_PATH = 'locales/{locale}';

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Read and validate a manifest file. Relative base paths are resolved
 * against the manifest's directory.
 *
 * @throws Error with "Invalid manifest: {reason}" for malformed content
 */
export function readLocalizationManifest(manifestPath: string): LocalizationManifest {
  const content = readFileSync(manifestPath, 'utf-8');

  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (err) {
    throw new Error(
      `Invalid manifest: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid manifest: must be a mapping');
  }

  const locales = 'locales' in data ? data.locales : undefined;
  if (!isStringList(locales) || locales.length === 0) {
    throw new Error('Invalid manifest: locales must be a non-empty list of strings');
  }

  const resources = 'resources' in data ? data.resources : [];
  if (!isStringList(resources)) {
    throw new Error('Invalid manifest: resources must be a list of strings');
  }

  const basePath = 'basePath' in data ? data.basePath : DEFAULT_BASE_PATH;
  if (typeof basePath !== 'string') {
    throw new Error('Invalid manifest: basePath must be a string');
  }

  return {
    locales,
    resources,
    basePath: path.resolve(path.dirname(manifestPath), basePath),
  };
}

/**
 * Build a FluentLocalization from a manifest file, loading every listed
 * resource for every locale from disk.
 *
 * @example
 * ```yaml
 * locales: [de-DE, en-US]
 * resources: [main.ftl, errors.ftl]
 * basePath: locales/{locale}
 * ```
 */
export function loadLocalizationManifest(
  manifestPath: string,
  options: Omit<LocalizationOptions, 'resourceIds' | 'loader'> = {}
): FluentLocalization {
  const manifest = readLocalizationManifest(manifestPath);
  return new FluentLocalization(manifest.locales, {
    ...options,
    resourceIds: manifest.resources,
    loader: new PathResourceLoader(manifest.basePath),
  });
}
