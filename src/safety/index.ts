/**
 * Safety Module
 *
 * Static deny-list gate for notebook code.
 */

export type {
  ViolationCategory,
  SafetyPolicy,
  SafetyViolation,
  SafetyVerdict,
} from './types.js';

export { DEFAULT_SAFETY_POLICY, extendPolicy } from './policy.js';
export { checkSafety, checkModule } from './checker.js';
export { parseFragment, collectTopLevelNames, collectDeclaredNames, usesModuleSyntax } from './syntax.js';
