/**
 * End-to-end optimization of one G-code document: parse, segment, merge, solve every layer through
 * the orchestrator and reassemble the program with islands in tour order. Shared by the CLI and the
 * HTTP API.
 */
import { randomUUID } from 'node:crypto';
import type { OptimizerConfig } from '../config';
import { silentLogger, type Logger, type UnsupportedCommandSink } from '../logger';
import { createDialect } from './dialect';
import { parseGcode } from './gcodeParser';
import { applyMerge, mergeIslands } from './merger';
import { SolverOrchestrator, type LayerSolution } from './orchestrator';
import { buildProblem, type Problem } from './problemBuilder';
import { reconstructProgram, type LayerPlan } from './reconstructor';
import { splitLayers, type Layer } from './segmenter';
import type { Solver } from './solver';
import { computeStats, travelReduction, type MotionStats } from './stats';
import { pathLength } from './tourReader';

export const OUTPUT_SIGNATURE = ';Optimized with gcode-travel-optimizer';

export type RoutingConfig = Pick<
  OptimizerConfig,
  'precision' | 'numRuns' | 'maxMergeLength' | 'minimumIslands' | 'maxConcurrency' | 'travelFeedrate' | 'extraStateCodes'
>;

export interface OptimizeOptions {
  config: RoutingConfig;
  solver: Solver;
  logger?: Logger;
  sink?: UnsupportedCommandSink;
  /** Name of the input file, recorded in the output header. */
  sourceName?: string;
}

/**
 * - `optimized`: islands emitted in the solver's order
 * - `unimproved`: the solver's path was longer than the original one, which is kept
 * - `fallback`: the solver failed for this layer
 * - `pinned`: a connector redefines coordinates, so the layer cannot be reordered
 * - `skipped`: too few islands to route
 */
export type LayerStatus = 'optimized' | 'unimproved' | 'fallback' | 'pinned' | 'skipped';

export interface LayerReport {
  index: number;
  z: number | null;
  /** Islands found by the segmenter. */
  islands: number;
  /** Merges performed before routing. */
  merged: number;
  status: LayerStatus;
  /** Scaled travel length from the layer start through every island, in original order. */
  originalPathLength: number | null;
  /** The same length in the emitted order. */
  optimizedPathLength: number | null;
  /** Failure description for fallback layers. */
  error?: string;
}

export interface OptimizationResult {
  /** Unique identifier for correlating the run with its report. */
  jobId: string;
  metadata: {
    sourceName: string | null;
    layerCount: number;
    optimizedLayers: number;
    fallbackLayers: number;
    unsupportedLines: number;
    synthesizedTravels: number;
    /** Metrics of the input program. */
    original: MotionStats;
    /** Metrics of the emitted program. */
    optimized: MotionStats;
    /** Percentage of travel distance removed. */
    travelReductionPercent: number;
    /** Largest number of solver invocations that ran at once. */
    peakConcurrency: number;
    layers: LayerReport[];
  };
  /** The optimized program text. */
  program: string;
}

interface PreparedLayer {
  layer: Layer;
  report: LayerReport;
  problem: Problem | null;
}

const prepareLayer = (layer: Layer, config: RoutingConfig): PreparedLayer => {
  const report: LayerReport = {
    index: layer.index,
    z: layer.z,
    islands: layer.islands.length,
    merged: 0,
    status: 'skipped',
    originalPathLength: null,
    optimizedPathLength: null,
  };

  if (layer.pinned) {
    return { layer, report: { ...report, status: 'pinned' }, problem: null };
  }

  const merge = mergeIslands(layer, config.maxMergeLength);
  const merged = applyMerge(layer, merge);
  report.merged = merge.merged;

  if (merged.islands.length < config.minimumIslands) {
    return { layer: merged, report, problem: null };
  }

  const problem = buildProblem(merged, { precision: config.precision, numRuns: config.numRuns });
  return { layer: merged, report, problem };
};

const identityOrder = (problem: Problem): number[] => problem.nodes.map((node) => node.id);

const planLayer = (prepared: PreparedLayer, solution: LayerSolution | undefined, logger: Logger): LayerPlan => {
  const { layer, report, problem } = prepared;
  if (!problem || !solution) {
    return { layer, order: null };
  }

  report.originalPathLength = pathLength(problem, identityOrder(problem));

  if (solution.status === 'fallback') {
    report.status = 'fallback';
    report.error = solution.error.message;
    report.optimizedPathLength = report.originalPathLength;
    return { layer, order: null };
  }

  const solvedLength = pathLength(problem, solution.tour.order);
  if (solvedLength > report.originalPathLength) {
    logger.debug(`Layer ${layer.index}: solver path ${solvedLength} is longer than ${report.originalPathLength}`);
    report.status = 'unimproved';
    report.optimizedPathLength = report.originalPathLength;
    return { layer, order: null };
  }

  report.status = 'optimized';
  report.optimizedPathLength = solvedLength;
  return { layer, order: solution.order };
};

/**
 * Optimizes the travel order of `text`.
 *
 * @throws ResourceExhaustionError when the operating system runs out of resources while solving.
 */
export async function optimizeGcode(text: string, options: OptimizeOptions): Promise<OptimizationResult> {
  const { config, solver } = options;
  const logger = options.logger ?? silentLogger;
  const dialect = createDialect(config.extraStateCodes);

  const parsed = parseGcode(text, { dialect, logger, sink: options.sink });
  const layers = splitLayers(parsed.commands);
  logger.info(`Parsed ${parsed.commands.length} lines into ${layers.length} layers`);
  if (parsed.unsupportedCount > 0) {
    logger.warn(`${parsed.unsupportedCount} unsupported lines were passed through unchanged`);
  }

  const prepared = layers.map((layer) => prepareLayer(layer, config));
  const problems = prepared.flatMap(({ problem }) => (problem ? [problem] : []));

  const orchestrator = new SolverOrchestrator({ solver, concurrency: config.maxConcurrency, logger });
  const solutions = await orchestrator.solveAll(problems);
  const byLayer = new Map(solutions.map((solution) => [solution.layerIndex, solution]));

  const plans = prepared.map((entry) => planLayer(entry, byLayer.get(entry.layer.index), logger));
  const reconstructed = reconstructProgram(plans, { travelFeedrate: config.travelFeedrate });

  const header = [OUTPUT_SIGNATURE];
  if (options.sourceName) {
    header.push(`;Original file: ${options.sourceName}`);
  }
  const program = `${[...header, ...reconstructed.lines].join('\n')}\n`;

  const reparsed = parseGcode(program, { dialect });
  const original = computeStats(parsed.commands, parsed.units);
  const optimized = computeStats(reparsed.commands, reparsed.units);
  const reports = prepared.map(({ report }) => report);

  const result: OptimizationResult = {
    jobId: randomUUID(),
    metadata: {
      sourceName: options.sourceName ?? null,
      layerCount: layers.length,
      optimizedLayers: reports.filter((report) => report.status === 'optimized').length,
      fallbackLayers: reports.filter((report) => report.status === 'fallback').length,
      unsupportedLines: parsed.unsupportedCount,
      synthesizedTravels: reconstructed.synthesizedTravels,
      original,
      optimized,
      travelReductionPercent: travelReduction(original, optimized),
      peakConcurrency: orchestrator.pool.highWaterMark,
      layers: reports,
    },
    program,
  };

  logger.info(
    `Optimized ${result.metadata.optimizedLayers} of ${layers.length} layers ` +
      `(${result.metadata.fallbackLayers} fell back), travel reduced by ${result.metadata.travelReductionPercent}%`,
  );

  return result;
}

/** Per-layer report as CSV with the columns `Layer,Islands,Merged,Status`. */
export function formatLayerCsv(reports: readonly LayerReport[]): string {
  const rows = reports.map((report) => `${report.index},${report.islands},${report.merged},${report.status}`);
  return `${['Layer,Islands,Merged,Status', ...rows].join('\n')}\n`;
}
