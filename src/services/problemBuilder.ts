/**
 * Reduces a layer's islands to a routing problem over scaled integer coordinates: an open path from
 * the tool position through every island entry. It is rendered in the TSPLIB format understood by
 * LKH-style solvers.
 */
import type { Layer } from './segmenter';

export interface ProblemNode {
  /** Zero-based node index; node 0 is the virtual start. */
  id: number;
  /** Scaled integer X coordinate. */
  x: number;
  /** Scaled integer Y coordinate. */
  y: number;
  /** Island index the node stands for, or `null` for the virtual start node. */
  island: number | null;
}

export interface Problem {
  layerIndex: number;
  name: string;
  nodes: ProblemNode[];
  /** Symmetric matrix of rounded euclidean distances between scaled coordinates. */
  matrix: number[][];
  /** Solver runs requested for this problem. */
  runs: number;
  precision: number;
}

export interface ProblemOptions {
  precision: number;
  numRuns: number;
}

export const VIRTUAL_START_NODE = 0;

export const scaleCoordinate = (value: number, precision: number): number => Math.round(value * precision);

export const unscaleCoordinate = (value: number, precision: number): number => value / precision;

/** TSPLIB `EUC_2D` edge weight: euclidean distance rounded to the nearest integer. */
export const euclideanWeight = (a: ProblemNode, b: ProblemNode): number => Math.round(Math.hypot(a.x - b.x, a.y - b.y));

export const buildDistanceMatrix = (nodes: readonly ProblemNode[]): number[][] =>
  nodes.map((from) => nodes.map((to) => euclideanWeight(from, to)));

/**
 * Builds the routing problem for a layer: the virtual start node at the tool position where the
 * layer's routing begins, then one node per island at its entry point. Returns `null` for a layer
 * without islands.
 */
export function buildProblem(layer: Layer, options: ProblemOptions): Problem | null {
  if (layer.islands.length === 0) {
    return null;
  }

  const { precision } = options;
  const nodes: ProblemNode[] = [
    {
      id: VIRTUAL_START_NODE,
      x: scaleCoordinate(layer.startPosition.x, precision),
      y: scaleCoordinate(layer.startPosition.y, precision),
      island: null,
    },
    ...layer.islands.map((island, index) => ({
      id: index + 1,
      x: scaleCoordinate(island.entry.x, precision),
      y: scaleCoordinate(island.entry.y, precision),
      island: index,
    })),
  ];

  return {
    layerIndex: layer.index,
    name: `layer-${layer.index}`,
    nodes,
    matrix: buildDistanceMatrix(nodes),
    runs: options.numRuns,
    precision,
  };
}

/**
 * Weight of the directed edge `from -> to` in the file handed to the solver. Returning to the
 * virtual start is free, so the cheapest closed tour is the cheapest open path that leaves the
 * tool position and ends at whichever island comes last.
 */
export const openPathWeight = (problem: Problem, from: number, to: number): number =>
  to === VIRTUAL_START_NODE ? 0 : problem.matrix[from][to];

/**
 * Renders the TSPLIB problem file as an asymmetric instance with an explicit full matrix. Node
 * indices in the solver's tour are one-based.
 */
export function formatProblemFile(problem: Problem): string {
  const rows = problem.nodes.map((from) =>
    problem.nodes.map((to) => openPathWeight(problem, from.id, to.id)).join(' '),
  );
  const lines = [
    `NAME: ${problem.name}`,
    `COMMENT: Travel optimization for layer ${problem.layerIndex} (runs: ${problem.runs})`,
    'TYPE: ATSP',
    `DIMENSION: ${problem.nodes.length}`,
    'EDGE_WEIGHT_TYPE: EXPLICIT',
    'EDGE_WEIGHT_FORMAT: FULL_MATRIX',
    'EDGE_WEIGHT_SECTION',
    ...rows,
    'EOF',
  ];
  return `${lines.join('\n')}\n`;
}

export interface ParameterFileOptions {
  problemPath: string;
  tourPath: string;
  runs: number;
}

/** Renders the LKH parameter file pointing the solver at the problem and tour files. */
export function formatParameterFile({ problemPath, tourPath, runs }: ParameterFileOptions): string {
  const lines = [
    `PROBLEM_FILE = ${problemPath}`,
    `TOUR_FILE = ${tourPath}`,
    `RUNS = ${runs}`,
    'TRACE_LEVEL = 0',
  ];
  return `${lines.join('\n')}\n`;
}
