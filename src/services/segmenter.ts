/**
 * Splits a parsed program into layers and each layer into islands: contiguous extruding paths that
 * are routed as atomic units. Commands between islands stay behind as connector groups.
 */
import { movesInPlane, keepsExtruder, type Command, type Position } from './gcodeParser';

export interface Island {
  /** Commands of the path, in original order. Never reordered or split. */
  readonly commands: readonly Command[];
  /** Machine state immediately before the first command. */
  readonly entry: Position;
  /** Machine state after the last command. */
  readonly exit: Position;
  /** Indices of the segmenter islands this island was built from (more than one once merged). */
  readonly sources: readonly number[];
}

export interface Layer {
  readonly index: number;
  /** Z height of the layer's extruding moves, or `null` for a layer without extrusion. */
  readonly z: number | null;
  /** Commands before the first island, emitted verbatim. */
  readonly leading: readonly Command[];
  readonly islands: readonly Island[];
  /** `connectors[k]` holds the commands between `islands[k]` and `islands[k + 1]`. */
  readonly connectors: readonly (readonly Command[])[];
  /** Commands after the last island, emitted verbatim. */
  readonly trailing: readonly Command[];
  /** Machine state once the leading commands have run; the virtual start of routing. */
  readonly startPosition: Position;
  /** Machine state after the last island, in original order. */
  readonly endPosition: Position;
  /** Set when a connector redefines coordinates, which rules out reordering. */
  readonly pinned: boolean;
}

/**
 * Groups commands into layers. A layer starts with the first extruding move at a Z height that
 * differs from the current layer's; everything before the first extruding move of the file forms a
 * preamble layer without islands.
 */
export function splitLayers(commands: readonly Command[]): Layer[] {
  const groups: Command[][] = [];
  let current: Command[] = [];
  let currentZ: number | null = null;

  for (const command of commands) {
    if (command.kind === 'extrude' && command.end.z !== currentZ) {
      if (current.length > 0) {
        groups.push(current);
      }
      current = [];
      currentZ = command.end.z;
    }
    current.push(command);
  }
  if (current.length > 0) {
    groups.push(current);
  }

  return groups.map((group, index) => segmentLayer(group, index));
}

const endsIsland = (command: Command): boolean => {
  switch (command.kind) {
    case 'travel':
      // retractions, wipes and Z hops stay attached to the path they finish
      return movesInPlane(command) && keepsExtruder(command);
    case 'comment':
      return false;
    default:
      return true;
  }
};

/** Whether a connector command changes the coordinate frame that later islands rely on. */
export const redefinesCoordinates = (command: Command): boolean => {
  if (command.kind === 'home') {
    return true;
  }
  if (command.effect?.type !== 'set-position') {
    return false;
  }
  return 'X' in command.words || 'Y' in command.words || 'Z' in command.words;
};

const makeIsland = (commands: Command[], source: number): Island => ({
  commands,
  entry: commands[0].start,
  exit: commands[commands.length - 1].end,
  sources: [source],
});

/**
 * Partitions one layer's commands into leading commands, islands, connector groups and trailing
 * commands. An extruding move opens an island; a travel move across the plane that leaves the
 * extruder untouched closes it, as does any home or state command. Retractions, wipes and Z hops
 * that follow an extruding run stay with the island; comments only when the path resumes after them.
 */
export function segmentLayer(commands: readonly Command[], index: number): Layer {
  const islands: Island[] = [];
  const connectors: Command[][] = [];
  let leading: Command[] = [];
  let pending: Command[] = [];
  let open: Command[] | null = null;
  let z: number | null = null;

  // comments and in-place moves seen since the last extruding move of the open island
  let tail: Command[] = [];

  const closeIsland = () => {
    if (!open) {
      return;
    }
    let keep = tail.length;
    while (keep > 0 && tail[keep - 1].kind === 'comment') {
      keep -= 1;
    }
    islands.push(makeIsland([...open, ...tail.slice(0, keep)], islands.length));
    pending.push(...tail.slice(keep));
    tail = [];
    open = null;
  };

  for (const command of commands) {
    if (command.kind === 'extrude') {
      if (!open) {
        if (islands.length === 0) {
          leading = pending;
        } else {
          connectors.push(pending);
        }
        pending = [];
        open = [];
      }
      open.push(...tail, command);
      tail = [];
      z ??= command.end.z;
      continue;
    }

    if (open && !endsIsland(command)) {
      tail.push(command);
      continue;
    }

    closeIsland();
    pending.push(command);
  }
  closeIsland();

  if (islands.length === 0) {
    if (commands.length === 0) {
      throw new RangeError(`Layer ${index} has no commands.`);
    }
    const { end } = commands[commands.length - 1];
    return {
      index,
      z: null,
      leading: pending,
      islands,
      connectors,
      trailing: [],
      startPosition: end,
      endPosition: end,
      pinned: false,
    };
  }

  return {
    index,
    z,
    leading,
    islands,
    connectors,
    trailing: pending,
    startPosition: islands[0].entry,
    endPosition: islands[islands.length - 1].exit,
    pinned: connectors.some((group) => group.some(redefinesCoordinates)),
  };
}

/** Every command of the layer in original order. */
export function layerCommands(layer: Layer): Command[] {
  const commands: Command[] = [...layer.leading];
  layer.islands.forEach((island, index) => {
    commands.push(...island.commands);
    const connector = layer.connectors[index];
    if (connector) {
      commands.push(...connector);
    }
  });
  commands.push(...layer.trailing);
  return commands;
}
