/**
 * Reads the tour file written by the solver and checks it against the problem it answers.
 */
import { TourValidationError } from '../errors';
import { VIRTUAL_START_NODE, type Problem } from './problemBuilder';

export interface Tour {
  /** Zero-based node indices, starting with the virtual start node. */
  order: number[];
  /** Tour length reported by the solver, or the open path length when the file reports none. */
  cost: number;
}

const LENGTH_PATTERN = /Length\s*=\s*(\d+)/i;
const DIMENSION_PATTERN = /^DIMENSION\s*:\s*(\d+)\s*$/i;

/** Length of the open path from the virtual start through every node, without the return edge. */
export const pathLength = (problem: Problem, order: readonly number[]): number =>
  order.slice(1).reduce((total, node, index) => total + problem.matrix[order[index]][node], 0);

/**
 * Returns `order`, or the same cycle walked the other way from the virtual start when that open path
 * is strictly shorter. Solvers that treat the problem as symmetric may report either direction.
 */
export const orientOpenPath = (problem: Problem, order: readonly number[]): number[] => {
  const reversed = [order[0], ...order.slice(1).reverse()];
  return pathLength(problem, reversed) < pathLength(problem, order) ? reversed : [...order];
};

/**
 * Parses a TSPLIB tour file (`TOUR_SECTION`, one-based indices, terminated by `-1` or `EOF`) and
 * validates that it visits every node of `problem` exactly once, starting at the virtual start node.
 *
 * @throws TourValidationError when the file is malformed or the tour is not such a permutation.
 */
export function readTour(text: string, problem: Problem): Tour {
  const dimension = problem.nodes.length;
  const lines = text.split(/\r?\n/);
  const sectionIndex = lines.findIndex((line) => line.trim().toUpperCase() === 'TOUR_SECTION');

  if (sectionIndex === -1) {
    throw new TourValidationError(`Tour for ${problem.name} has no TOUR_SECTION.`);
  }

  let reportedCost: number | null = null;
  for (const line of lines.slice(0, sectionIndex)) {
    const declared = DIMENSION_PATTERN.exec(line.trim());
    if (declared && Number(declared[1]) !== dimension) {
      throw new TourValidationError(
        `Tour for ${problem.name} declares dimension ${declared[1]}, expected ${dimension}.`,
      );
    }
    const length = LENGTH_PATTERN.exec(line);
    if (length) {
      reportedCost = Number(length[1]);
    }
  }

  const order: number[] = [];
  let terminated = false;
  for (const token of lines.slice(sectionIndex + 1).join(' ').split(/\s+/)) {
    if (token === '') {
      continue;
    }
    if (token === '-1' || token.toUpperCase() === 'EOF') {
      terminated = true;
      break;
    }
    if (!/^\d+$/.test(token)) {
      throw new TourValidationError(`Tour for ${problem.name} contains invalid entry "${token}".`);
    }
    const node = Number(token) - 1;
    if (node < 0 || node >= dimension) {
      throw new TourValidationError(`Tour for ${problem.name} references unknown node ${token}.`);
    }
    order.push(node);
  }

  if (!terminated) {
    throw new TourValidationError(`Tour for ${problem.name} is not terminated.`);
  }
  if (new Set(order).size !== order.length) {
    throw new TourValidationError(`Tour for ${problem.name} visits a node more than once.`);
  }
  if (order.length !== dimension) {
    throw new TourValidationError(`Tour for ${problem.name} visits ${order.length} of ${dimension} nodes.`);
  }
  if (order[0] !== VIRTUAL_START_NODE) {
    throw new TourValidationError(`Tour for ${problem.name} does not start at the virtual start node.`);
  }

  return { order, cost: reportedCost ?? pathLength(problem, order) };
}

/** Island indices in visiting order, without the virtual start node. */
export const islandOrder = (problem: Problem, tour: Tour): number[] =>
  tour.order
    .filter((node) => node !== VIRTUAL_START_NODE)
    .map((node) => {
      const island = problem.nodes[node].island;
      if (island === null) {
        throw new TourValidationError(`Node ${node + 1} of ${problem.name} is not an island.`);
      }
      return island;
    });
