/**
 * Test Definition Module
 *
 * Problem and test-case types, plus loading of test-definition files.
 */

export type {
  TestKind,
  VariableTestCase,
  OutputTestCase,
  TestCase,
  ProblemSpec,
  TestDefinition,
  RawTestCase,
  RawProblem,
  RawTestDefinition,
} from './types.js';

export { DEFINITION_DEFAULTS } from './types.js';

export type { ValidationError, ValidationResult } from './validator.js';

export { validateTestDefinition, loadTestDefinition } from './validator.js';
