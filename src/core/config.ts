/**
 * Notebook Grader - Configuration
 *
 * Parses environment variables and CLI arguments.
 * Env vars take precedence over defaults, CLI flags over env vars.
 */

export interface GraderConfig {
  /** Path to the test-definition JSON file */
  testsPath: string;
  /** Notebook files to grade, in order */
  notebookPaths: string[];
  /** Directory for per-student feedback files (empty = don't write) */
  feedbackDir: string;
  /** Wall-clock limit for one cell execution, in seconds */
  timeoutSeconds: number;
  /** Require the notebook to hold exactly the expected number of code cells */
  strictCellCount: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Log what would be written instead of writing feedback files */
  debug: boolean;
}

export const CONFIG_DEFAULTS: GraderConfig = {
  testsPath: 'tests.json',
  notebookPaths: [],
  feedbackDir: '',
  timeoutSeconds: 3,
  strictCellCount: true,
  verbose: false,
  debug: false,
};

function parseNumberEnv(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const parsed = parseFloat(val);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function parseBoolEnv(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val.toLowerCase() === 'true' || val === '1';
}

function parseStringEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export function loadConfig(): GraderConfig {
  return {
    testsPath: parseStringEnv('GRADER_TESTS', CONFIG_DEFAULTS.testsPath),
    notebookPaths: [],
    feedbackDir: parseStringEnv('GRADER_FEEDBACK_DIR', CONFIG_DEFAULTS.feedbackDir),
    timeoutSeconds: parseNumberEnv('GRADER_TIMEOUT_SECONDS', CONFIG_DEFAULTS.timeoutSeconds),
    strictCellCount: parseBoolEnv('GRADER_STRICT_CELL_COUNT', CONFIG_DEFAULTS.strictCellCount),
    verbose: parseBoolEnv('GRADER_VERBOSE', CONFIG_DEFAULTS.verbose),
    debug: parseBoolEnv('GRADER_DEBUG', CONFIG_DEFAULTS.debug),
  };
}

export function parseCliArgs(args: string[]): Partial<GraderConfig> {
  const result: Partial<GraderConfig> = {};
  const notebooks: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--tests':
      case '-t':
        if (next) result.testsPath = next;
        i++;
        break;
      case '--timeout':
        if (next) {
          const seconds = parseFloat(next);
          if (!isNaN(seconds) && seconds > 0) result.timeoutSeconds = seconds;
        }
        i++;
        break;
      case '--feedback-dir':
        if (next) result.feedbackDir = next;
        i++;
        break;
      case '--no-strict-cells':
        result.strictCellCount = false;
        break;
      case '--verbose':
      case '-v':
        result.verbose = true;
        break;
      case '--debug':
        result.debug = true;
        break;
      default:
        if (arg !== undefined && !arg.startsWith('-')) notebooks.push(arg);
    }
  }

  if (notebooks.length > 0) result.notebookPaths = notebooks;
  return result;
}

export function mergeConfig(envConfig: GraderConfig, cliOverrides: Partial<GraderConfig>): GraderConfig {
  return { ...envConfig, ...cliOverrides };
}

/** Student id for a notebook path: its file name without directory or extension */
export function studentIdFromPath(notebookPath: string): string {
  const base = notebookPath.split(/[\\/]/).pop() ?? notebookPath;
  return base.replace(/\.ipynb$/i, '');
}
