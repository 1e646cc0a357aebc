/**
 * Line-oriented G-code parser. Classifies each line through the dialect table while tracking the
 * machine position, extruder position, feed rate and positioning modes, so that every parsed
 * command knows the machine state before and after it runs.
 */
import { ParseError } from '../errors';
import { silentLogger, type Logger, type UnsupportedCommandSink } from '../logger';
import { createDialect, lookupEffect, normaliseCode, type CommandEffect, type Dialect, type Units } from './dialect';

export type CommandKind = 'extrude' | 'travel' | 'home' | 'state' | 'comment' | 'unknown';

/** Machine state tracked while parsing. Coordinates are always logical absolute values. */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  /** Logical extruder position, accumulated even while extrusion is relative. */
  readonly e: number;
  /** Modal feed rate; `0` until the file sets one. */
  readonly f: number;
  readonly absolutePositioning: boolean;
  readonly absoluteExtrusion: boolean;
}

export type Words = Readonly<Record<string, number>>;

export interface Command {
  readonly kind: CommandKind;
  /** Normalised leading code (`G1`, `M104`, `T0`), or `null` for blank and comment lines. */
  readonly code: string | null;
  readonly effect: CommandEffect | null;
  /** Numeric parameter words, keyed by upper-case letter. */
  readonly words: Words;
  /** Parameter letters given without a value, such as the axes of `G28 X Y`. */
  readonly flags: readonly string[];
  readonly raw: string;
  readonly lineNumber: number;
  readonly start: Position;
  readonly end: Position;
  /** Why the line was passed through, for `unknown` commands. */
  readonly error?: ParseError;
}

export interface ParsedProgram {
  commands: readonly Command[];
  units: Units | null;
  unsupportedCount: number;
}

export interface ParserOptions {
  dialect?: Dialect;
  logger?: Logger;
  sink?: UnsupportedCommandSink;
}

export const INITIAL_POSITION: Position = Object.freeze({
  x: 0,
  y: 0,
  z: 0,
  e: 0,
  f: 0,
  absolutePositioning: true,
  absoluteExtrusion: true,
});

const CODE_PATTERN = /^([A-Za-z])(\d+(?:\.\d+)?)(?![\d.])/;
const LINE_NUMBER_PATTERN = /^N\d+\s*/i;
const CHECKSUM_PATTERN = /\*\d+\s*$/;
const WORD_PATTERN = /([A-Za-z])([^A-Za-z\s]*)/g;
const WORDS_LAYOUT_PATTERN = /^(?:\s*[A-Za-z][^A-Za-z\s]*)*\s*$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const AXES = ['X', 'Y', 'Z'] as const;

/** Removes `;` line comments and `( ... )` inline comments. */
export const stripComments = (raw: string): string => {
  const semicolon = raw.indexOf(';');
  const code = semicolon === -1 ? raw : raw.slice(0, semicolon);
  return code.replace(/\([^)]*\)/g, ' ').trim();
};

interface ParsedWords {
  words: Record<string, number>;
  flags: string[];
}

const parseWords = (text: string): ParsedWords | string => {
  if (!WORDS_LAYOUT_PATTERN.test(text)) {
    return `unexpected characters in "${text.trim()}"`;
  }
  const words: Record<string, number> = {};
  const flags: string[] = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const letter = match[1].toUpperCase();
    const value = match[2];
    if (value === '') {
      flags.push(letter);
      continue;
    }
    if (!NUMBER_PATTERN.test(value)) {
      return `malformed value "${letter}${value}"`;
    }
    words[letter] = Number.parseFloat(value);
  }
  return { words, flags };
};

const isMotionEffect = (effect: CommandEffect): boolean =>
  effect.type === 'move' || effect.type === 'arc' || effect.type === 'home' || effect.type === 'set-position';

/**
 * Applies a command's effect to the machine state. Shared by the parser and by the reconstructor,
 * which replays kept commands from a different starting state.
 */
export function stepPosition(
  previous: Position,
  effect: CommandEffect | null,
  words: Words,
  flags: readonly string[] = [],
): Position {
  if (!effect) {
    return previous;
  }

  switch (effect.type) {
    case 'move':
    case 'arc': {
      const axis = (letter: 'X' | 'Y' | 'Z', current: number): number => {
        const value = words[letter];
        if (value === undefined) {
          return current;
        }
        return previous.absolutePositioning ? value : current + value;
      };
      const extruder = words.E;
      return {
        ...previous,
        x: axis('X', previous.x),
        y: axis('Y', previous.y),
        z: axis('Z', previous.z),
        e: extruder === undefined ? previous.e : previous.absoluteExtrusion ? extruder : previous.e + extruder,
        f: words.F ?? previous.f,
      };
    }
    case 'home': {
      const listed = AXES.filter((axis) => axis in words || flags.includes(axis));
      const homed = listed.length > 0 ? listed : AXES;
      return {
        ...previous,
        x: homed.includes('X') ? 0 : previous.x,
        y: homed.includes('Y') ? 0 : previous.y,
        z: homed.includes('Z') ? 0 : previous.z,
      };
    }
    case 'set-position':
      return {
        ...previous,
        x: words.X ?? previous.x,
        y: words.Y ?? previous.y,
        z: words.Z ?? previous.z,
        e: words.E ?? previous.e,
      };
    case 'positioning':
      return { ...previous, absolutePositioning: effect.absolute, absoluteExtrusion: effect.absolute };
    case 'extrusion-mode':
      return { ...previous, absoluteExtrusion: effect.absolute };
    default:
      return previous;
  }
}

const classify = (effect: CommandEffect, start: Position, end: Position): CommandKind => {
  switch (effect.type) {
    case 'move':
    case 'arc':
      return end.e - start.e > 0 ? 'extrude' : 'travel';
    case 'home':
      return 'home';
    default:
      return 'state';
  }
};

/**
 * Incremental parser; feed it one line at a time with {@link GcodeParser.parseLine}.
 */
export class GcodeParser {
  private position: Position = INITIAL_POSITION;
  private lineNumber = 0;
  private units: Units | null = null;
  private unsupportedCount = 0;
  private readonly declaredModes = new Set<CommandEffect['type']>();
  private readonly dialect: Dialect;
  private readonly logger: Logger;
  private readonly sink: UnsupportedCommandSink | undefined;

  constructor(options: ParserOptions = {}) {
    this.dialect = options.dialect ?? createDialect();
    this.logger = options.logger ?? silentLogger;
    this.sink = options.sink;
  }

  get currentPosition(): Position {
    return this.position;
  }

  get currentUnits(): Units | null {
    return this.units;
  }

  get unsupported(): number {
    return this.unsupportedCount;
  }

  parseLine(raw: string): Command {
    this.lineNumber += 1;
    const lineNumber = this.lineNumber;
    const start = this.position;
    const body = stripComments(raw).replace(LINE_NUMBER_PATTERN, '').replace(CHECKSUM_PATTERN, '').trim();

    if (body === '') {
      return this.emit({ kind: 'comment', code: null, effect: null, words: {}, flags: [], raw, lineNumber, start, end: start });
    }

    const codeMatch = CODE_PATTERN.exec(body);
    const code = codeMatch ? normaliseCode(`${codeMatch[1]}${codeMatch[2]}`) : body.split(/\s+/)[0].toUpperCase();
    const effect = codeMatch ? lookupEffect(this.dialect, code) : undefined;

    if (!effect) {
      return this.reject(raw, lineNumber, code, `unsupported command ${code}`);
    }

    let parsed: ParsedWords = { words: {}, flags: [] };
    if (isMotionEffect(effect)) {
      const result = parseWords(body.slice(codeMatch ? codeMatch[0].length : 0));
      if (typeof result === 'string') {
        return this.reject(raw, lineNumber, code, result);
      }
      parsed = result;
    }

    this.noteModeDeclaration(effect, code, lineNumber);

    const end = Object.freeze(stepPosition(start, effect, parsed.words, parsed.flags));
    this.position = end;

    return this.emit({
      kind: classify(effect, start, end),
      code,
      effect,
      words: Object.freeze(parsed.words),
      flags: Object.freeze(parsed.flags),
      raw,
      lineNumber,
      start,
      end,
    });
  }

  private reject(raw: string, lineNumber: number, code: string, reason: string): Command {
    const error = new ParseError(reason, lineNumber, raw);
    this.unsupportedCount += 1;
    this.sink?.record({ lineNumber, raw, reason });
    this.logger.debug(`Passing through line ${lineNumber}: ${reason}`);
    const start = this.position;
    return this.emit({ kind: 'unknown', code, effect: null, words: {}, flags: [], raw, lineNumber, start, end: start, error });
  }

  private noteModeDeclaration(effect: CommandEffect, code: string, lineNumber: number): void {
    if (effect.type === 'units') {
      this.units = effect.units;
    }
    if (effect.type !== 'positioning' && effect.type !== 'extrusion-mode' && effect.type !== 'units') {
      return;
    }
    if (this.declaredModes.has(effect.type)) {
      this.logger.warn(`${code} command at line ${lineNumber} after ${effect.type} mode was already set`);
    }
    this.declaredModes.add(effect.type);
  }

  private emit(command: Command): Command {
    return Object.freeze(command);
  }
}

/** Splits G-code text into lines, dropping the empty remainder after a final newline. */
export const splitLines = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};

/**
 * Parses a whole G-code document. Unrecognized lines become `unknown` commands and are reported to
 * the sink; parsing itself never fails on content.
 */
export function parseGcode(text: string, options: ParserOptions = {}): ParsedProgram {
  const parser = new GcodeParser(options);
  const commands = splitLines(text).map((line) => parser.parseLine(line));
  return {
    commands,
    units: parser.currentUnits,
    unsupportedCount: parser.unsupported,
  };
}

/** Whether a move changes the tool's X/Y location. */
export const movesInPlane = (command: Command): boolean =>
  command.start.x !== command.end.x || command.start.y !== command.end.y;

/** Whether a command leaves the logical extruder position unchanged. */
export const keepsExtruder = (command: Command): boolean => command.start.e === command.end.e;
