#!/usr/bin/env node
/**
 * Notebook Grader - Runner
 *
 * CLI entry point: grades each notebook against one test definition
 * and writes a feedback file per student.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  loadConfig,
  parseCliArgs,
  mergeConfig,
  studentIdFromPath,
  setVerbose,
  log,
  logError,
  logUnreadable,
  type GraderConfig,
} from './core/index.js';
import { loadTestDefinition, type ProblemSpec } from './definition/index.js';
import {
  createNotebookGrader,
  maxScore,
  parseNotebook,
  renderFeedback,
  type NotebookGrader,
  type StudentResult,
} from './grading/index.js';
import { createExecutor } from './sandbox/index.js';

interface BatchSummary {
  graded: number;
  unreadable: number;
  total: number;
  maxTotal: number;
}

function unreadableResult(studentId: string, problems: ProblemSpec[], reason: string): StudentResult {
  return {
    studentId,
    problems: [],
    total: 0,
    maxTotal: maxScore(problems),
    exceptions: [{ kind: 'UNREADABLE_CELL', detail: reason }],
    unreadable: reason,
  };
}

async function gradeFile(
  grader: NotebookGrader,
  notebookPath: string,
  problems: ProblemSpec[]
): Promise<StudentResult> {
  const studentId = studentIdFromPath(notebookPath);

  let json: string;
  try {
    json = await readFile(notebookPath, 'utf-8');
  } catch (error) {
    const reason = `Cannot read ${notebookPath}: ${error instanceof Error ? error.message : String(error)}`;
    logUnreadable(studentId, reason);
    return unreadableResult(studentId, problems, reason);
  }

  const { notebook, error } = parseNotebook(json);
  if (!notebook) {
    const reason = error ?? 'Notebook could not be parsed';
    logUnreadable(studentId, reason);
    return unreadableResult(studentId, problems, reason);
  }

  return grader.gradeNotebook(studentId, notebook, problems);
}

async function writeFeedback(config: GraderConfig, result: StudentResult): Promise<void> {
  const text = renderFeedback(result);

  if (config.debug) {
    log({ student: result.studentId, step: 'feedback_preview', details: { text } });
    return;
  }
  if (!config.feedbackDir) return;

  await mkdir(config.feedbackDir, { recursive: true });
  const path = join(config.feedbackDir, `${result.studentId}.txt`);
  await writeFile(path, text, 'utf-8');
  log({ student: result.studentId, step: 'feedback_written', details: { path } });
}

async function main(): Promise<void> {
  // Load configuration
  const envConfig = loadConfig();
  const cliOverrides = parseCliArgs(process.argv.slice(2));
  const config = mergeConfig(envConfig, cliOverrides);

  setVerbose(config.verbose);

  log({
    student: null,
    step: 'runner_start',
    details: {
      testsPath: config.testsPath,
      notebooks: config.notebookPaths.length,
      timeoutSeconds: config.timeoutSeconds,
      strictCellCount: config.strictCellCount,
      feedbackDir: config.feedbackDir || null,
    },
  });

  const { definition, validation } = loadTestDefinition(await readFile(config.testsPath, 'utf-8'));
  if (!definition) {
    log({ student: null, step: 'runner_fatal', details: { error: 'invalid_test_definition', errors: validation.errors } });
    process.exit(1);
  }
  const problems = definition.problems;

  if (config.notebookPaths.length === 0) {
    log({ student: null, step: 'max_score', details: { maxScore: maxScore(problems), problems: problems.length } });
    return;
  }

  const grader = createNotebookGrader({
    executor: createExecutor(),
    timeoutSeconds: config.timeoutSeconds,
    strictCellCount: config.strictCellCount,
  });

  // Finish the current student, then stop
  let running = true;
  const stop = (signal: string) => (): void => {
    log({ student: null, step: 'runner_shutdown', details: { reason: signal } });
    running = false;
  };
  process.on('SIGINT', stop('SIGINT'));
  process.on('SIGTERM', stop('SIGTERM'));

  const summary: BatchSummary = { graded: 0, unreadable: 0, total: 0, maxTotal: 0 };
  for (const notebookPath of config.notebookPaths) {
    if (!running) break;

    const result = await gradeFile(grader, notebookPath, problems);
    summary.graded++;
    if (result.unreadable) summary.unreadable++;
    summary.total += result.total;
    summary.maxTotal += result.maxTotal;

    try {
      await writeFeedback(config, result);
    } catch (error) {
      // A failed write loses one report; the batch continues
      logError(result.studentId, error, 'write_feedback');
    }
  }

  log({ student: null, step: 'runner_complete', details: { ...summary } });
}

// Run
main().catch((error) => {
  log({
    student: null,
    step: 'runner_fatal',
    details: { error: error instanceof Error ? error.message : String(error) },
  });
  process.exit(1);
});
