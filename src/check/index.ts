/**
 * Static analysis for FTL resources
 */

export type {
  Severity,
  RuleState,
  CheckDiagnostic,
  CheckConfig,
  ValidationContext,
  RuleCategory,
  ValidationRule,
} from './types.js';
export { validateResource, isRuleEnabled } from './validator.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  parseConfig,
  loadConfig,
} from './config.js';
export {
  VALIDATION_RULES,
  SYNTAX_ERROR,
  DUPLICATE_ID,
  UNUSED_TERM,
  CIRCULAR_REFERENCE,
  UNDEFINED_MESSAGE_REFERENCE,
  UNDEFINED_TERM_REFERENCE,
} from './rules/index.js';
export { childrenOf, visitNode, Visitor, type NodeVisitor } from './visitor.js';
export {
  Transformer,
  REMOVE,
  type TransformOutput,
} from './transformer.js';
export { collectReferences, type References } from './references.js';
