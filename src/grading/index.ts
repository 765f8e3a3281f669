/**
 * Grading Module
 *
 * Notebook reading, per-student grading and feedback text.
 */

export type {
  CellType,
  NotebookCell,
  Notebook,
  ProblemState,
  ProblemFailure,
  ProblemScore,
  GradingException,
  StudentResult,
} from './types.js';

export type { GraderOptions } from './grader.js';

export {
  parseNotebook,
  countCodeCells,
  locateCodeCell,
  splitCell,
  removeInputLines,
  prepareCode,
} from './notebook.js';
export { NotebookGrader, createNotebookGrader, maxScore, describeInputs } from './grader.js';
export { renderFeedback } from './feedback.js';
