/**
 * Emits the optimized program. Islands of a routed layer are written in tour order with their raw
 * text untouched; between them the reconstructor synthesizes the travel, feed rate, extruder and
 * positioning-mode lines that put the machine in exactly the state each island was recorded in.
 * After the last island the state the rest of the file expects is restored.
 */
import type { CommandEffect } from './dialect';
import { INITIAL_POSITION, keepsExtruder, stepPosition, type Command, type Position } from './gcodeParser';
import { layerCommands, redefinesCoordinates, type Island, type Layer } from './segmenter';

export interface ReconstructOptions {
  /** Feed rate for synthesized travel moves; falls back to the layer's own travel feed rate. */
  travelFeedrate: number | null;
}

export interface ReconstructedProgram {
  lines: string[];
  /** Synthesized `G0` travel moves. */
  synthesizedTravels: number;
  /** Every synthesized line, travel moves included. */
  synthesizedLines: number;
}

export interface LayerPlan {
  layer: Layer;
  /** Island indices in emission order, or `null` to emit the layer exactly as parsed. */
  order: readonly number[] | null;
}

export type Axis = 'X' | 'Y' | 'Z';

const POSITION_TOLERANCE = 1e-4;
const MOVE: CommandEffect = { type: 'move' };
const SET_POSITION: CommandEffect = { type: 'set-position' };

const same = (a: number, b: number): boolean => Math.abs(a - b) < POSITION_TOLERANCE;

/** Formats a coordinate with at most five decimals and no trailing zeros. */
export const formatNumber = (value: number): string => String(Number(value.toFixed(5)));

const roundWord = (value: number): number => Number(value.toFixed(5));

/** A connector command that only relocates the tool; synthesized travel replaces it. */
export const isDroppableTravel = (command: Command): boolean => command.kind === 'travel' && keepsExtruder(command);

/**
 * Axes that the commands after a layer set absolutely before anything depends on the current
 * position: the scan stops at the first extruding move or at any command other than a plain move,
 * a state change or a comment.
 */
export const axesSetAhead = (commands: readonly Command[], absolutePositioning: boolean): Set<Axis> => {
  const covered = new Set<Axis>();
  if (!absolutePositioning) {
    return covered;
  }
  for (const command of commands) {
    if (command.kind === 'comment' || command.kind === 'state') {
      if (command.effect?.type === 'positioning' || redefinesCoordinates(command)) {
        break;
      }
      continue;
    }
    if (command.kind !== 'travel' || command.effect?.type !== 'move') {
      break;
    }
    for (const axis of ['X', 'Y', 'Z'] as const) {
      if (command.words[axis] !== undefined) {
        covered.add(axis);
      }
    }
  }
  return covered;
};

const validateOrder = (layer: Layer, order: readonly number[]): void => {
  const count = layer.islands.length;
  const seen = new Set(order);
  if (order.length !== count || seen.size !== count || order.some((index) => !Number.isInteger(index) || index < 0 || index >= count)) {
    throw new RangeError(`Order [${order.join(', ')}] is not a permutation of the ${count} islands of layer ${layer.index}.`);
  }
};

/**
 * Stateful writer that carries the machine state across layers, so each layer's synthesized lines
 * start from where the previous layer actually left the tool.
 */
export class Reconstructor {
  private cursor: Position;
  private readonly output: string[] = [];
  private travels = 0;
  private synthesized = 0;

  constructor(private readonly options: ReconstructOptions, start: Position = INITIAL_POSITION) {
    this.cursor = start;
  }

  get position(): Position {
    return this.cursor;
  }

  result(): ReconstructedProgram {
    return {
      lines: [...this.output],
      synthesizedTravels: this.travels,
      synthesizedLines: this.synthesized,
    };
  }

  /** Emits a layer in its original order, keeping every line. */
  emitVerbatim(layer: Layer): void {
    this.replay(layerCommands(layer));
  }

  /**
   * Emits a layer with its islands in `order`. `following` holds the commands emitted after the
   * layer, which decide whether the tool has to be moved back to the layer's original end position.
   */
  emitRouted(layer: Layer, order: readonly number[], following: readonly Command[] = []): void {
    validateOrder(layer, order);
    const feed = this.options.travelFeedrate ?? this.layerTravelFeed(layer);

    this.replay(layer.leading);

    order.forEach((islandIndex, slot) => {
      const island = layer.islands[islandIndex];
      this.enter(island, feed);
      this.replay(island.commands);
      const connector = layer.connectors[slot];
      if (connector) {
        this.replay(connector.filter((command) => !isDroppableTravel(command)));
      }
    });

    this.restore(layer, feed, [...layer.trailing, ...following]);
    this.replay(layer.trailing);
  }

  private layerTravelFeed(layer: Layer): number | null {
    for (const connector of layer.connectors) {
      for (const command of connector) {
        const feed = command.words.F;
        if (isDroppableTravel(command) && feed !== undefined) {
          return feed;
        }
      }
    }
    return null;
  }

  private enter(island: Island, feed: number | null): void {
    const target = island.entry;
    this.setModes(target);
    this.travelTo(target, feed);
    if (island.commands[0].words.F === undefined && target.f > 0 && !same(this.cursor.f, target.f)) {
      this.synthesize(`G1 F${formatNumber(target.f)}`, MOVE, { F: target.f });
    }
    if (this.cursor.absoluteExtrusion && !same(this.cursor.e, target.e)) {
      this.synthesize(`G92 E${formatNumber(target.e)}`, SET_POSITION, { E: roundWord(target.e) });
    }
  }

  private restore(layer: Layer, feed: number | null, after: readonly Command[]): void {
    const target = layer.endPosition;
    this.setModes(target);
    // in either extrusion mode
    if (!same(this.cursor.e, target.e)) {
      this.synthesize(`G92 E${formatNumber(target.e)}`, SET_POSITION, { E: roundWord(target.e) });
    }

    const covered = axesSetAhead(after, target.absolutePositioning);
    const differs = (axis: Axis, current: number, wanted: number): boolean => !same(current, wanted) && !covered.has(axis);
    if (differs('X', this.cursor.x, target.x) || differs('Y', this.cursor.y, target.y) || differs('Z', this.cursor.z, target.z)) {
      this.travelTo(target, feed);
    }

    const nextMove = after.find((command) => command.effect?.type === 'move' || command.effect?.type === 'arc');
    if (target.f > 0 && !same(this.cursor.f, target.f) && nextMove?.words.F === undefined) {
      this.synthesize(`G1 F${formatNumber(target.f)}`, MOVE, { F: target.f });
    }
  }

  private setModes(target: Position): void {
    if (this.cursor.absolutePositioning !== target.absolutePositioning) {
      this.synthesize(target.absolutePositioning ? 'G90' : 'G91', {
        type: 'positioning',
        absolute: target.absolutePositioning,
      }, {});
    }
    if (this.cursor.absoluteExtrusion !== target.absoluteExtrusion) {
      this.synthesize(target.absoluteExtrusion ? 'M82' : 'M83', {
        type: 'extrusion-mode',
        absolute: target.absoluteExtrusion,
      }, {});
    }
  }

  /**
   * Moves the tool to the target's X/Y/Z without extruding. Climbs before the planar move and
   * descends after it.
   */
  private travelTo(target: Position, feed: number | null): void {
    const planar = !same(this.cursor.x, target.x) || !same(this.cursor.y, target.y);
    const vertical = !same(this.cursor.z, target.z);
    const climbing = vertical && target.z > this.cursor.z;

    if (climbing) {
      this.travelAxes({ Z: target.z }, feed);
    }
    if (planar) {
      this.travelAxes({ X: target.x, Y: target.y }, feed);
    }
    if (vertical && !climbing) {
      this.travelAxes({ Z: target.z }, feed);
    }
  }

  private travelAxes(axes: Partial<Record<Axis, number>>, feed: number | null): void {
    const words: Record<string, number> = {};
    const parts = ['G0'];
    const current: Record<Axis, number> = { X: this.cursor.x, Y: this.cursor.y, Z: this.cursor.z };

    for (const axis of ['X', 'Y', 'Z'] as const) {
      const wanted = axes[axis];
      if (wanted === undefined) {
        continue;
      }
      const value = roundWord(this.cursor.absolutePositioning ? wanted : wanted - current[axis]);
      words[axis] = value;
      parts.push(`${axis}${formatNumber(value)}`);
    }
    if (feed !== null) {
      words.F = feed;
      parts.push(`F${formatNumber(feed)}`);
    }

    this.synthesize(parts.join(' '), MOVE, words);
    this.travels += 1;
  }

  private synthesize(line: string, effect: CommandEffect, words: Record<string, number>): void {
    this.output.push(line);
    this.cursor = stepPosition(this.cursor, effect, words);
    this.synthesized += 1;
  }

  private replay(commands: readonly Command[]): void {
    for (const command of commands) {
      this.output.push(command.raw);
      this.cursor = stepPosition(this.cursor, command.effect, command.words, command.flags);
    }
  }
}

/** Reassembles every layer, in layer order, into the lines of the optimized program. */
export function reconstructProgram(plans: readonly LayerPlan[], options: ReconstructOptions): ReconstructedProgram {
  const reconstructor = new Reconstructor(options);
  plans.forEach(({ layer, order }, index) => {
    if (order === null) {
      reconstructor.emitVerbatim(layer);
      return;
    }
    const next = plans[index + 1];
    reconstructor.emitRouted(layer, order, next ? layerCommands(next.layer) : []);
  });
  return reconstructor.result();
}
