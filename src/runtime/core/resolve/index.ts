/**
 * Resolver
 * Entry point; loads every resolution step onto the Resolver prototype.
 */

// Import extension modules to register prototype methods on Resolver.
// These must be imported AFTER resolver.js to ensure the class is defined.
export {
  Resolver,
  FSI,
  PDI,
  type PluralCategorySelector,
  type ResolveResult,
  type ResolverOptions,
} from './resolver.js';
import './pattern.js';
import './references.js';
import './functions.js';
import './select.js';
