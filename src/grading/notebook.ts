/**
 * Notebook source
 *
 * Reads nbformat v4 notebooks and prepares cell code for execution.
 */

import type { TestCase } from '../definition/types.js';
import type { CellLanguage } from '../sandbox/types.js';
import type { CellType, Notebook, NotebookCell } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSource(source: unknown): string | null {
  if (typeof source === 'string') return source;
  if (Array.isArray(source) && source.every((line) => typeof line === 'string')) return source.join('');
  return null;
}

function readCellType(value: unknown): CellType | null {
  return value === 'code' || value === 'markdown' || value === 'raw' ? value : null;
}

function readLanguage(metadata: unknown): CellLanguage {
  if (!isRecord(metadata)) return 'javascript';
  const kernel = isRecord(metadata.kernelspec) ? metadata.kernelspec.language : undefined;
  const info = isRecord(metadata.language_info) ? metadata.language_info.name : undefined;
  const name = typeof kernel === 'string' ? kernel : typeof info === 'string' ? info : '';
  return name.toLowerCase() === 'typescript' ? 'typescript' : 'javascript';
}

/**
 * Parse notebook JSON
 */
export function parseNotebook(json: string): { notebook?: Notebook; error?: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    return { error: `Invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }

  if (!isRecord(parsed)) return { error: 'Notebook must be an object' };
  if (typeof parsed.nbformat === 'number' && parsed.nbformat < 4) {
    return { error: `Unsupported nbformat ${parsed.nbformat}; version 4 is required` };
  }
  if (!Array.isArray(parsed.cells)) return { error: 'Notebook has no cells array' };

  const cells: NotebookCell[] = [];
  for (const [i, raw] of parsed.cells.entries()) {
    const cellType = isRecord(raw) ? readCellType(raw.cell_type) : null;
    const source = isRecord(raw) ? readSource(raw.source) : null;
    if (cellType === null || source === null) {
      return { error: `Cell ${i} is malformed` };
    }
    cells.push({ cellType, source });
  }

  return { notebook: { language: readLanguage(parsed.metadata), cells } };
}

function isFilledCodeCell(cell: NotebookCell): boolean {
  return cell.cellType === 'code' && cell.source.trim() !== '';
}

export function countCodeCells(notebook: Notebook): { all: number; nonEmpty: number } {
  const code = notebook.cells.filter((cell) => cell.cellType === 'code');
  return { all: code.length, nonEmpty: code.filter(isFilledCodeCell).length };
}

/**
 * Code cell by 1-based index, counting only non-empty code cells
 */
export function locateCodeCell(notebook: Notebook, index: number): NotebookCell | undefined {
  if (index < 1) return undefined;
  return notebook.cells.filter(isFilledCodeCell)[index - 1];
}

/**
 * Split a cell into the instructor's leading lines and the student's code.
 * Blank lines are dropped first.
 */
export function splitCell(source: string, lineOffset: number): { setup: string; student: string } {
  const lines = source.split(/\r?\n/).filter((line) => line.trim() !== '');
  return {
    setup: lines.slice(0, lineOffset).join('\n'),
    student: lines.slice(lineOffset).join('\n'),
  };
}

/** Drop lines that read from input() or prompt() */
export function removeInputLines(code: string): string {
  return code
    .split('\n')
    .filter((line) => !/\b(?:input|prompt)\(/.test(line))
    .join('\n');
}

/**
 * Student code for one test: problem prefix, then test prefix, then the
 * student lines. Input lines are removed when the test supplies variables
 * but no scripted input.
 */
export function prepareCode(student: string, problemPrefix: string[] | undefined, testCase: TestCase): string {
  const prefix = [...(problemPrefix ?? []), ...(testCase.prefixCode ?? [])];
  let code = prefix.length > 0 ? `${prefix.join('\n')}\n${student}` : student;

  const hasVariables = testCase.variables !== undefined && Object.keys(testCase.variables).length > 0;
  if (hasVariables && testCase.stdin === undefined) {
    code = removeInputLines(code);
  }
  return code;
}
