/**
 * Runtime Types
 *
 * Public types for runtime configuration and formatting results.
 * These types are the primary interface for host applications.
 */

import type { JunkNode, AnnotationNode } from '../../ast-nodes.js';
import type { CheckDiagnostic } from '../../check/types.js';
import type { Diagnostic } from '../../diagnostics.js';
import type { FluentValue } from './values.js';

/**
 * A function callable from FTL as `NAME(...)`.
 * Built-in functions also receive the bundle locale; custom functions
 * receive only their arguments.
 */
export type FluentFunction = (
  positional: FluentValue[],
  named: Readonly<Record<string, FluentValue>>,
  locale?: string
) => FluentValue;

/** Observability callbacks for monitoring bundles */
export interface ObservabilityCallbacks {
  /** Called after a resource has been parsed and registered */
  onResourceAdded?: (event: ResourceAddedEvent) => void;
  /** Called once per Junk entry found while adding a resource */
  onJunk?: (event: JunkEvent) => void;
  /** Called after every formatPattern call */
  onFormat?: (event: FormatEvent) => void;
  /** Called before a function is invoked */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called for each diagnostic a format call produces */
  onDiagnostic?: (event: DiagnosticEvent) => void;
}

/** Event emitted after a resource is added */
export interface ResourceAddedEvent {
  /** Messages defined by the resource */
  messages: number;
  /** Terms defined by the resource */
  terms: number;
  /** Junk entries in the resource */
  junk: number;
  sourcePath?: string | undefined;
}

/** Event emitted for unparseable content */
export interface JunkEvent {
  content: string;
  annotations: readonly AnnotationNode[];
  sourcePath?: string | undefined;
}

/** Event emitted after a message is formatted */
export interface FormatEvent {
  id: string;
  attribute?: string | undefined;
  result: string;
  diagnostics: readonly Diagnostic[];
  /** Formatting time in milliseconds */
  durationMs: number;
}

/** Event emitted before a function call */
export interface FunctionCallEvent {
  name: string;
  positional: readonly FluentValue[];
  named: Readonly<Record<string, FluentValue>>;
}

/** Event emitted per diagnostic */
export interface DiagnosticEvent {
  /** Message being formatted */
  id: string;
  diagnostic: Diagnostic;
}

/** Result of formatting a message */
export interface FormatResult {
  /** Best-effort text; never empty because of an error */
  readonly value: string;
  readonly diagnostics: readonly Diagnostic[];
}

export interface FormatOptions {
  /** Format this attribute instead of the message value */
  attribute?: string | undefined;
}

export interface AddResourceOptions {
  /** Reported in observability events */
  sourcePath?: string | undefined;
  /** Whether a later definition may replace an existing id (default true) */
  allowOverrides?: boolean | undefined;
}

/** Outcome of validating a resource without adding it */
export interface ValidationResult {
  readonly errors: readonly JunkNode[];
  readonly warnings: readonly CheckDiagnostic[];
  readonly isValid: boolean;
}
