/**
 * Fluent Localization
 *
 * A locale fallback chain: one bundle per locale, consulted in priority
 * order until one of them has the requested message.
 */

import type { JunkNode } from '../../ast-nodes.js';
import { createDiagnostic } from '../../diagnostics.js';
import { FluentBundle } from './bundle.js';
import type {
  FluentFunction,
  FormatOptions,
  FormatResult,
  ObservabilityCallbacks,
} from './types.js';
import type { FluentArgs } from './values.js';

/** Synchronous source of FTL text per locale and resource id */
export interface ResourceLoader {
  /** FTL source, or null when the resource does not exist for the locale */
  load(locale: string, resourceId: string): string | null;
}

export interface LocalizationOptions {
  /** Resources to load for every locale through the loader */
  resourceIds?: readonly string[] | undefined;
  loader?: ResourceLoader | undefined;
  useIsolating?: boolean | undefined;
  functions?: Readonly<Record<string, FluentFunction>> | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export class FluentLocalization {
  private readonly bundles = new Map<string, FluentBundle>();

  /**
   * @param locales - Locale codes, most preferred first
   * @throws Error if locales is empty, or resourceIds are given without a loader
   */
  constructor(locales: readonly string[], options: LocalizationOptions = {}) {
    if (locales.length === 0) {
      throw new Error('At least one locale is required');
    }
    const resourceIds = options.resourceIds ?? [];
    if (resourceIds.length > 0 && options.loader === undefined) {
      throw new Error('A resource loader is required when resourceIds are given');
    }

    for (const locale of locales) {
      if (this.bundles.has(locale)) continue;
      const bundle = new FluentBundle(locale, {
        useIsolating: options.useIsolating,
        functions: options.functions,
        observability: options.observability,
      });
      for (const resourceId of resourceIds) {
        const source = options.loader?.load(locale, resourceId) ?? null;
        if (source !== null) {
          bundle.addResource(source, { sourcePath: resourceId });
        }
      }
      this.bundles.set(locale, bundle);
    }
  }

  /** Locale codes in priority order, without duplicates */
  get locales(): readonly string[] {
    return [...this.bundles.keys()];
  }

  /**
   * Add FTL source to one locale's bundle.
   *
   * @throws Error if the locale is not part of the chain
   */
  addResource(locale: string, source: string): JunkNode[] {
    const bundle = this.bundles.get(locale);
    if (!bundle) {
      throw new Error(`Locale '${locale}' is not in the fallback chain`);
    }
    return bundle.addResource(source);
  }

  /**
   * Format with the first bundle that defines the message. Never throws.
   */
  formatPattern(
    id: string,
    args: FluentArgs = {},
    options: FormatOptions = {}
  ): FormatResult {
    if (id === '') {
      return {
        value: '{???}',
        diagnostics: [createDiagnostic('MESSAGE_NOT_FOUND', { id })],
      };
    }

    for (const bundle of this.getBundles()) {
      if (bundle.hasMessage(id)) {
        return bundle.formatPattern(id, args, options);
      }
    }

    return {
      value: `{${id}}`,
      diagnostics: [
        createDiagnostic('MESSAGE_NOT_FOUND', { id, scope: ' in any locale' }),
      ],
    };
  }

  formatValue(id: string, args: FluentArgs = {}): string {
    return this.formatPattern(id, args).value;
  }

  hasMessage(id: string): boolean {
    for (const bundle of this.getBundles()) {
      if (bundle.hasMessage(id)) return true;
    }
    return false;
  }

  /** Bundles in priority order */
  *getBundles(): IterableIterator<FluentBundle> {
    yield* this.bundles.values();
  }
}
