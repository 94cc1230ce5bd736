/**
 * Function Registry
 *
 * Functions callable from FTL placeables. Each bundle owns its registry;
 * there is no process-wide table.
 */

import { isFunctionName } from '../../parser/helpers.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import type { FluentFunction } from './types.js';
import type { FluentValue } from './values.js';

export interface FunctionOptions {
  /** Shown by tooling that lists available functions */
  description?: string | undefined;
}

/** Registry entry; identity distinguishes built-ins from replacements */
export interface RegisteredFunction {
  readonly name: string;
  readonly fn: FluentFunction;
  readonly description?: string | undefined;
}

export class FunctionRegistry {
  private readonly entries: Map<string, RegisteredFunction>;
  private readonly builtins: ReadonlyMap<string, RegisteredFunction>;

  /**
   * @param builtins - Functions whose calls receive the locale. Kept by
   *   identity: re-registering a name replaces the entry and the new one
   *   is no longer treated as built-in.
   */
  constructor(builtins: ReadonlyMap<string, RegisteredFunction> = new Map()) {
    this.builtins = builtins;
    this.entries = new Map(builtins);
  }

  /**
   * Register or replace a function.
   *
   * @throws TypeError if the name is not a valid FTL function name
   */
  register(name: string, fn: FluentFunction, options: FunctionOptions = {}): this {
    if (!isFunctionName(name)) {
      throw new TypeError(
        `Invalid function name '${name}': must match [A-Z][A-Z0-9_-]*`
      );
    }
    this.entries.set(name, { name, fn, description: options.description });
    return this;
  }

  hasFunction(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): RegisteredFunction | undefined {
    return this.entries.get(name);
  }

  /**
   * Invoke a function. The locale is forwarded as given; deciding whether
   * a function should see it is the caller's concern.
   *
   * @throws RangeError if the function is not registered
   */
  call(
    name: string,
    positional: FluentValue[],
    named: Readonly<Record<string, FluentValue>>,
    locale?: string
  ): FluentValue {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new RangeError(`Function '${name}' is not registered`);
    }
    return locale === undefined
      ? entry.fn(positional, named)
      : entry.fn(positional, named, locale);
  }

  /** Whether the current entry for name is the registry's own built-in */
  isBuiltin(name: string): boolean {
    const entry = this.entries.get(name);
    return entry !== undefined && this.builtins.get(name) === entry;
  }

  /** Registered names, sorted */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Independent copy sharing the same built-in identities */
  clone(): FunctionRegistry {
    const copy = new FunctionRegistry(this.builtins);
    for (const [name, entry] of this.entries) {
      copy.entries.set(name, entry);
    }
    return copy;
  }
}

/** Fresh registry holding NUMBER, DATETIME and CURRENCY */
export function createDefaultRegistry(): FunctionRegistry {
  return new FunctionRegistry(BUILTIN_ENTRIES);
}

const BUILTIN_ENTRIES: ReadonlyMap<string, RegisteredFunction> = new Map(
  Object.entries(BUILTIN_FUNCTIONS).map(([name, definition]) => [
    name,
    { name, fn: definition.fn, description: definition.description },
  ])
);
