/**
 * Instruction dialect table. Maps the leading code of a G-code line to the effect it has on the
 * tracked machine state; anything missing from the table is passed through as unknown.
 */

export type Units = 'mm' | 'in';

export type CommandEffect =
  | { type: 'move' }
  | { type: 'arc' }
  | { type: 'home' }
  | { type: 'set-position' }
  | { type: 'positioning'; absolute: boolean }
  | { type: 'extrusion-mode'; absolute: boolean }
  | { type: 'units'; units: Units }
  | { type: 'state' };

export type Dialect = ReadonlyMap<string, CommandEffect>;

const STATE: CommandEffect = { type: 'state' };

/**
 * Non-motion codes emitted by common slicers (Cura, PrusaSlicer, Simplify3D) for Marlin-style
 * firmware. They keep their place in the output and never move the tool.
 */
const STATE_CODES = [
  'G4', // dwell
  'G10', // firmware retract
  'G11', // firmware unretract
  'G29', // bed probing
  'G80', // mesh bed leveling (Prusa)
  'M17',
  'M18',
  'M73', // progress
  'M74',
  'M84',
  'M104',
  'M105',
  'M106',
  'M107',
  'M109',
  'M114',
  'M115',
  'M117',
  'M140',
  'M142',
  'M190',
  'M201',
  'M203',
  'M204',
  'M205',
  'M220',
  'M221',
  'M302',
  'M400',
  'M486', // object labels
  'M555',
  'M569',
  'M572',
  'M593',
  'M862.1',
  'M862.3',
  'M862.5',
  'M862.6',
  'M900',
  'M907',
] as const;

const TOOL_SELECT_PATTERN = /^T\d+$/;

/**
 * Builds the dialect table, optionally extended with extra state codes (for example firmware
 * specific M-codes listed in the configuration).
 */
export function createDialect(extraStateCodes: readonly string[] = []): Dialect {
  const table = new Map<string, CommandEffect>([
    ['G0', { type: 'move' }],
    ['G1', { type: 'move' }],
    ['G2', { type: 'arc' }],
    ['G3', { type: 'arc' }],
    ['G28', { type: 'home' }],
    ['G92', { type: 'set-position' }],
    ['G90', { type: 'positioning', absolute: true }],
    ['G91', { type: 'positioning', absolute: false }],
    ['M82', { type: 'extrusion-mode', absolute: true }],
    ['M83', { type: 'extrusion-mode', absolute: false }],
    ['G20', { type: 'units', units: 'in' }],
    ['G21', { type: 'units', units: 'mm' }],
  ]);

  for (const code of [...STATE_CODES, ...extraStateCodes]) {
    const normalised = normaliseCode(code);
    if (!table.has(normalised)) {
      table.set(normalised, STATE);
    }
  }

  return table;
}

/**
 * Upper-cases a code and strips leading zeros from its number, so `g01` and `G1` share an entry.
 */
export const normaliseCode = (code: string): string => {
  const upper = code.trim().toUpperCase();
  const match = /^([A-Z])0*(\d.*)$/.exec(upper);
  return match ? `${match[1]}${match[2]}` : upper;
};

export const lookupEffect = (dialect: Dialect, code: string): CommandEffect | undefined => {
  const effect = dialect.get(code);
  if (effect) {
    return effect;
  }
  return TOOL_SELECT_PATTERN.test(code) ? STATE : undefined;
};
