/**
 * Feedback text
 *
 * Plain-text report for one student, one block per problem.
 */

import type { StudentResult } from './types.js';

export function renderFeedback(result: StudentResult): string {
  const lines: string[] = [];

  for (const problem of result.problems) {
    lines.push(
      `Cell ${problem.cellIndex}: ${problem.passedCount}/${problem.totalCount} tests passed, ` +
        `Score: ${problem.earnedPoints.toFixed(2)}/${problem.points}`
    );
    if (problem.failureLines.length > 0) {
      lines.push('  Failed tests:');
      for (const failure of problem.failureLines) {
        lines.push(`    ${failure}`);
      }
    }
    if (problem.safetyViolations > 0) lines.push(`  Safety violations: ${problem.safetyViolations}`);
    if (problem.timeoutViolations > 0) lines.push(`  Timeout violations: ${problem.timeoutViolations}`);
  }

  if (result.unreadable) lines.push(`Notebook could not be graded: ${result.unreadable}`);
  lines.push(`Total Score: ${result.total.toFixed(2)}/${result.maxTotal}`);

  return `${lines.join('\n')}\n`;
}
