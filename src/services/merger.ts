/**
 * Collapses islands whose entry points lie closer than the merge threshold, in input order, so
 * geometrically negligible routing decisions never reach the solver.
 */
import type { Command, Position } from './gcodeParser';
import type { Island, Layer } from './segmenter';

export interface MergeResult {
  /** Islands after merging; composite islands keep their connector commands inside. */
  islands: Island[];
  /** `connectors[k]` sits between `islands[k]` and `islands[k + 1]`. */
  connectors: (readonly Command[])[];
  /** Number of merges performed. */
  merged: number;
}

export const planarDistance = (a: Position, b: Position): number => Math.hypot(b.x - a.x, b.y - a.y);

/**
 * Greedily merges each island into its predecessor when their entries are strictly closer than
 * `maxMergeLength`. The comparison is between adjacent islands in input order, never by smallest
 * distance, so results do not depend on anything but the input.
 */
export function mergeIslands(layer: Layer, maxMergeLength: number): MergeResult {
  const islands: Island[] = [];
  const connectors: (readonly Command[])[] = [];
  let merged = 0;

  layer.islands.forEach((island, index) => {
    if (index === 0) {
      islands.push(island);
      return;
    }

    const previous = layer.islands[index - 1];
    const connector = layer.connectors[index - 1] ?? [];

    if (planarDistance(previous.entry, island.entry) < maxMergeLength) {
      const composite = islands[islands.length - 1];
      islands[islands.length - 1] = {
        commands: [...composite.commands, ...connector, ...island.commands],
        entry: composite.entry,
        exit: island.exit,
        sources: [...composite.sources, ...island.sources],
      };
      merged += 1;
      return;
    }

    connectors.push(connector);
    islands.push(island);
  });

  return { islands, connectors, merged };
}

/** Returns the layer with its islands and connectors replaced by the merged ones. */
export const applyMerge = (layer: Layer, result: MergeResult): Layer => ({
  ...layer,
  islands: result.islands,
  connectors: result.connectors,
});
