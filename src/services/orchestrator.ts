/**
 * Drives one solver invocation per layer problem through a bounded worker pool. A failure confined
 * to one layer degrades that layer to its original island order; resource exhaustion aborts every
 * running invocation and fails the whole run.
 */
import { OptimizerError, describeError, isFatal } from '../errors';
import type { Logger } from '../logger';
import type { Problem } from './problemBuilder';
import type { Solver } from './solver';
import { islandOrder, orientOpenPath, type Tour } from './tourReader';
import { WorkerPool } from './workerPool';

export type LayerSolution =
  | {
      status: 'optimized';
      layerIndex: number;
      tour: Tour;
      /** Island indices in visiting order. */
      order: number[];
    }
  | {
      status: 'fallback';
      layerIndex: number;
      error: Error;
    };

export interface OrchestratorOptions {
  solver: Solver;
  /** Maximum number of simultaneous solver invocations. */
  concurrency: number;
  logger: Logger;
}

const describeFailure = (error: unknown): string => {
  if (error instanceof OptimizerError) {
    return `${error.kind}: ${error.message}`;
  }
  return describeError(error);
};

export class SolverOrchestrator {
  readonly pool: WorkerPool;
  private readonly solver: Solver;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.pool = new WorkerPool(options.concurrency);
    this.solver = options.solver;
    this.logger = options.logger;
  }

  /**
   * Solves every problem and returns one solution per problem, in input order regardless of the
   * order in which invocations finish.
   *
   * @throws ResourceExhaustionError (or any other fatal error) after all running invocations have
   *   been aborted and have settled.
   */
  async solveAll(problems: readonly Problem[]): Promise<LayerSolution[]> {
    const controller = new AbortController();
    let fatal: unknown = null;

    const settled = await Promise.allSettled(
      problems.map((problem) =>
        this.pool.run(async (): Promise<LayerSolution> => {
          if (controller.signal.aborted) {
            return { status: 'fallback', layerIndex: problem.layerIndex, error: new Error('Run aborted.') };
          }
          try {
            const solved = await this.solver.solve(problem, controller.signal);
            const tour: Tour = { ...solved, order: orientOpenPath(problem, solved.order) };
            this.logger.debug(`Layer ${problem.layerIndex}: solved ${problem.nodes.length} nodes, cost ${tour.cost}`);
            return {
              status: 'optimized',
              layerIndex: problem.layerIndex,
              tour,
              order: islandOrder(problem, tour),
            };
          } catch (error) {
            if (isFatal(error)) {
              fatal ??= error;
              controller.abort();
              throw error;
            }
            if (!controller.signal.aborted) {
              this.logger.warn(
                `Layer ${problem.layerIndex}: keeping original island order (${describeFailure(error)})`,
              );
            }
            return {
              status: 'fallback',
              layerIndex: problem.layerIndex,
              error: error instanceof Error ? error : new Error(String(error)),
            };
          }
        }),
      ),
    );

    if (fatal !== null) {
      throw fatal;
    }

    return settled.map((result, index) => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      // run() only rejects with fatal errors, which were rethrown above
      return { status: 'fallback', layerIndex: problems[index].layerIndex, error: new Error(describeError(result.reason)) };
    });
  }
}
