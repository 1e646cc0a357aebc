/**
 * Route-solving collaborators. The orchestrator only knows the {@link Solver} interface; the
 * production implementation runs an external LKH-style executable against files in a scoped
 * temporary directory.
 */
import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { OptimizerConfig } from '../config';
import { SolverInvocationError, describeError, isMissingFileError, toResourceExhaustionError } from '../errors';
import { formatParameterFile, formatProblemFile, type Problem } from './problemBuilder';
import { readTour, type Tour } from './tourReader';

export interface Solver {
  /**
   * Solves one layer problem. Rejects with {@link SolverInvocationError} or a
   * `TourValidationError` for layer-local failures, and with a `ResourceExhaustionError` when the
   * operating system runs out of handles or processes.
   */
  solve(problem: Problem, signal?: AbortSignal): Promise<Tour>;
}

export interface ProcessSolverOptions {
  /** Absolute path of the solver executable; its directory becomes the working directory. */
  program: string;
  /** Argument template, see {@link expandArguments}. */
  args: readonly string[];
  timeoutMs: number;
  /** Directory that receives the per-invocation scratch directories. Defaults to the OS temp dir. */
  tempRoot?: string;
}

export interface ArgumentValues {
  parameters: string;
  problem: string;
  tour: string;
  runs: number;
}

const PLACEHOLDER_PATTERN = /\{(parameters|problem|tour|runs)\}/g;
const STDERR_TAIL_LENGTH = 2000;

/** Substitutes `{parameters}`, `{problem}`, `{tour}` and `{runs}` in each argument. */
export const expandArguments = (template: readonly string[], values: ArgumentValues): string[] =>
  template.map((argument) =>
    argument.replace(PLACEHOLDER_PATTERN, (_match, key: keyof ArgumentValues) => String(values[key])),
  );

/** Runs `operation`, converting OS resource errors into `ResourceExhaustionError`. */
const guardResources = async <T>(context: string, operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    throw toResourceExhaustionError(error, context) ?? error;
  }
};

interface RunOptions {
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Spawns the solver and resolves once it exits with status 0. A timeout or an abort kills the
 * child with `SIGKILL`.
 */
export function runProcess(program: string, args: readonly string[], options: RunOptions): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new SolverInvocationError('Solver run aborted before start.', 'aborted'));
      return;
    }

    const child = spawn(program, [...args], { cwd: options.cwd, stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';
    let timedOut = false;
    let aborted = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    const onAbort = () => {
      aborted = true;
      child.kill('SIGKILL');
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_LENGTH);
    });

    child.once('error', (error) => {
      cleanup();
      reject(
        toResourceExhaustionError(error, `Unable to start solver ${program}`) ??
          new SolverInvocationError(`Unable to start solver ${program}: ${error.message}`, 'spawn', { cause: error }),
      );
    });

    child.once('close', (code, signal) => {
      cleanup();
      if (timedOut) {
        reject(new SolverInvocationError(`Solver timed out after ${options.timeoutMs} ms.`, 'timeout'));
        return;
      }
      if (aborted) {
        reject(new SolverInvocationError('Solver run aborted.', 'aborted'));
        return;
      }
      if (code !== 0) {
        const status = code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`;
        const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
        reject(new SolverInvocationError(`Solver exited with ${status}${detail}`, 'exit'));
        return;
      }
      resolve();
    });
  });
}

/**
 * Solver backed by an external executable. Each call writes the problem and parameter files into
 * its own temporary directory, which is removed however the call ends.
 */
export class ProcessSolver implements Solver {
  constructor(private readonly options: ProcessSolverOptions) {}

  static fromConfig(config: OptimizerConfig): ProcessSolver {
    return new ProcessSolver({
      program: config.program,
      args: config.solverArgs,
      timeoutMs: config.solverTimeoutMs,
    });
  }

  async solve(problem: Problem, signal?: AbortSignal): Promise<Tour> {
    const root = this.options.tempRoot ?? os.tmpdir();
    const workspace = await guardResources('Unable to create solver workspace', () =>
      fs.mkdtemp(path.join(root, `${problem.name}-`)),
    );

    try {
      const problemPath = path.join(workspace, `${problem.name}.tsp`);
      const parametersPath = path.join(workspace, `${problem.name}.par`);
      const tourPath = path.join(workspace, `${problem.name}.tour`);

      await guardResources('Unable to write solver input', async () => {
        await fs.writeFile(problemPath, formatProblemFile(problem), 'utf8');
        await fs.writeFile(
          parametersPath,
          formatParameterFile({ problemPath, tourPath, runs: problem.runs }),
          'utf8',
        );
      });

      const args = expandArguments(this.options.args, {
        parameters: parametersPath,
        problem: problemPath,
        tour: tourPath,
        runs: problem.runs,
      });

      await runProcess(this.options.program, args, {
        cwd: path.dirname(this.options.program),
        timeoutMs: this.options.timeoutMs,
        signal,
      });

      let text: string;
      try {
        text = await guardResources('Unable to read solver output', () => fs.readFile(tourPath, 'utf8'));
      } catch (error) {
        if (isMissingFileError(error)) {
          throw new SolverInvocationError(`Solver wrote no tour file for ${problem.name}.`, 'missing-output', {
            cause: error,
          });
        }
        throw error;
      }

      return readTour(text, problem);
    } finally {
      await fs.rm(workspace, { recursive: true, force: true }).catch((error: unknown) => {
        // reported rather than thrown so the layer keeps its tour
        process.emitWarning(`Unable to remove solver workspace ${workspace}: ${describeError(error)}`);
      });
    }
  }
}
