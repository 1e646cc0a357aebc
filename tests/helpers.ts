import type { Logger, LogLevel } from '../src/logger';
import { parseGcode, type Command } from '../src/services/gcodeParser';
import type { Problem } from '../src/services/problemBuilder';
import type { RoutingConfig } from '../src/services/optimizer';
import type { Solver } from '../src/services/solver';
import { pathLength, type Tour } from '../src/services/tourReader';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/** Logger that records entries for assertions. */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export const parseLines = (lines: readonly string[]): readonly Command[] => parseGcode(lines.join('\n')).commands;

export const toTour = (problem: Problem, order: number[]): Tour => ({ order, cost: pathLength(problem, order) });

type Answer = number[] | Error | ((problem: Problem) => number[] | Error);

/**
 * Deterministic in-process solver. Answers with the identity order unless told otherwise for a
 * layer; an `Error` answer rejects.
 */
export class FakeSolver implements Solver {
  readonly calls: number[] = [];

  constructor(private readonly answers: ReadonlyMap<number, Answer> = new Map()) {}

  solve(problem: Problem): Promise<Tour> {
    this.calls.push(problem.layerIndex);
    const configured = this.answers.get(problem.layerIndex);
    const answer = typeof configured === 'function' ? configured(problem) : configured;
    if (answer instanceof Error) {
      return Promise.reject(answer);
    }
    return Promise.resolve(toTour(problem, answer ?? problem.nodes.map((node) => node.id)));
  }
}

/** Solver that holds every call open for a while and records how many overlap. */
export class InstrumentedSolver implements Solver {
  private running = 0;
  highWaterMark = 0;
  completed = 0;

  constructor(private readonly delayMs: number) {}

  async solve(problem: Problem): Promise<Tour> {
    this.running += 1;
    this.highWaterMark = Math.max(this.highWaterMark, this.running);
    try {
      await new Promise<void>((resolve) => {
        setTimeout(resolve, this.delayMs);
      });
      this.completed += 1;
      return toTour(problem, problem.nodes.map((node) => node.id));
    } finally {
      this.running -= 1;
    }
  }
}

export const routingConfig = (overrides: Partial<RoutingConfig> = {}): RoutingConfig => ({
  precision: 1000,
  numRuns: 1,
  maxMergeLength: 1,
  minimumIslands: 2,
  maxConcurrency: 2,
  travelFeedrate: null,
  extraStateCodes: [],
  ...overrides,
});

/** Two islands on one layer with entries at (0,0) and (10,0). */
export const TWO_ISLAND_PROGRAM = [
  'G21',
  'G90',
  'M82',
  'G92 E0',
  'G0 X0 Y0 Z0.2 F6000',
  'G1 X5 Y0 E1 F1200',
  'G1 X5 Y5 E2',
  'G0 X10 Y0 F6000',
  'G1 X15 Y0 E3 F1200',
  'G1 X15 Y5 E4',
];
