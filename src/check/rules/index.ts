/**
 * Validation Rules Registry
 * Barrel export for all validation rules.
 */

import type { ValidationRule } from '../types.js';
import { SYNTAX_ERROR } from './syntax.js';
import { DUPLICATE_ID, UNUSED_TERM } from './entries.js';
import {
  CIRCULAR_REFERENCE,
  UNDEFINED_MESSAGE_REFERENCE,
  UNDEFINED_TERM_REFERENCE,
} from './references.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export { SYNTAX_ERROR } from './syntax.js';
export { DUPLICATE_ID, UNUSED_TERM } from './entries.js';
export {
  CIRCULAR_REFERENCE,
  UNDEFINED_MESSAGE_REFERENCE,
  UNDEFINED_TERM_REFERENCE,
} from './references.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/** All validation rules, in the order they run on each node */
export const VALIDATION_RULES: readonly ValidationRule[] = [
  SYNTAX_ERROR,
  DUPLICATE_ID,
  UNDEFINED_MESSAGE_REFERENCE,
  UNDEFINED_TERM_REFERENCE,
  CIRCULAR_REFERENCE,
  UNUSED_TERM,
];
