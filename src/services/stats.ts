import type { Units } from './dialect';
import type { Command } from './gcodeParser';

/** Motion metrics of a parsed program, reported before and after optimization. */
export interface MotionStats {
  travelMoves: number;
  extrudeMoves: number;
  /** Total tool movement of non-extruding moves. */
  travelDistance: number;
  /** Total tool movement of extruding moves. */
  extrusionDistance: number;
  /** `units` when the program never declares G20/G21. */
  units: Units | 'units';
}

const moveLength = (command: Command): number =>
  Math.hypot(command.end.x - command.start.x, command.end.y - command.start.y, command.end.z - command.start.z);

export function computeStats(commands: readonly Command[], units: Units | null): MotionStats {
  const stats: MotionStats = {
    travelMoves: 0,
    extrudeMoves: 0,
    travelDistance: 0,
    extrusionDistance: 0,
    units: units ?? 'units',
  };

  for (const command of commands) {
    if (command.kind === 'travel') {
      stats.travelMoves += 1;
      stats.travelDistance += moveLength(command);
    } else if (command.kind === 'extrude') {
      stats.extrudeMoves += 1;
      stats.extrusionDistance += moveLength(command);
    }
  }

  return stats;
}

/** Percentage of travel distance removed, rounded to one decimal. */
export const travelReduction = (before: MotionStats, after: MotionStats): number =>
  before.travelDistance === 0
    ? 0
    : Math.round(((before.travelDistance - after.travelDistance) / before.travelDistance) * 1000) / 10;

export const formatDistance = (value: number, units: MotionStats['units']): string => `${value.toFixed(2)} ${units}`;
