/**
 * Console-backed logging with optional mirroring into a run log file, plus the append-only sink
 * that collects instruction lines the parser could not classify.
 */
import fs from 'node:fs';
import { once } from 'node:events';
import { toOutputError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);

const pad = (value: number): string => value.toString().padStart(2, '0');

/** Formats a timestamp as `YYYY-MM-DD HH:MM:SS` in local time. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatLogLine = (level: LogLevel, message: string, date = new Date()): string =>
  `[${formatTimestamp(date)}][${level.toUpperCase()}] ${message}`;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Also append every accepted entry to this file, replacing any previous content. */
  filePath?: string;
}

/**
 * Write stream over an output file that keeps its first error instead of raising it on the event
 * loop. Writes after a failure are dropped; {@link OutputFile.close} reports the failure.
 */
export class OutputFile {
  private readonly stream: fs.WriteStream;
  private failure: unknown = null;
  private closed = false;

  constructor(readonly filePath: string) {
    this.stream = fs.createWriteStream(filePath, { flags: 'w', encoding: 'utf8' });
    this.stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  write(text: string): void {
    if (this.failure !== null || this.closed) {
      return;
    }
    this.stream.write(text);
  }

  /**
   * Flushes and closes the file. Rejects once with an `OutputError` (or a
   * `ResourceExhaustionError`) when opening or writing failed; later calls resolve.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.failure === null) {
      this.stream.end();
      try {
        await once(this.stream, 'finish');
      } catch (error) {
        this.failure ??= error;
      }
    }
    if (this.failure !== null) {
      throw toOutputError(this.failure, this.filePath);
    }
  }
}

/**
 * Logger writing through `console`, optionally mirrored into a log file. Writes to the file go
 * through a single stream, so entries from concurrently processed layers never interleave.
 */
export class ConsoleLogger implements Logger {
  private readonly minimumRank: number;
  private readonly file: OutputFile | null;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minimumRank = LEVEL_RANK[options.level ?? 'info'];
    this.file = options.filePath ? new OutputFile(options.filePath) : null;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  /** Flushes and closes the mirrored log file, if any. */
  async close(): Promise<void> {
    await this.file?.close();
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < this.minimumRank) {
      return;
    }
    this.file?.write(`${formatLogLine(level, message)}\n`);
    /* eslint-disable no-console */
    if (level === 'error') {
      console.error(message);
    } else if (level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
    /* eslint-enable no-console */
  }
}

/** Logger that drops everything; used when reparsing generated output for statistics. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** One instruction line the parser passed through without understanding it. */
export interface UnsupportedEntry {
  lineNumber: number;
  raw: string;
  reason: string;
}

/**
 * Append-only destination for unsupported instruction lines. Implementations are shared by every
 * layer of a run and must keep entries in the order they were recorded.
 */
export interface UnsupportedCommandSink {
  record(entry: UnsupportedEntry): void;
  close(): Promise<void>;
}

export const formatUnsupportedEntry = ({ lineNumber, raw, reason }: UnsupportedEntry): string =>
  `line ${lineNumber}: ${raw.trim()} (${reason})`;

/** Writes unsupported lines to a file through a single append stream. */
export class FileUnsupportedCommandSink implements UnsupportedCommandSink {
  private readonly file: OutputFile;
  private count = 0;

  constructor(readonly filePath: string) {
    this.file = new OutputFile(filePath);
  }

  get size(): number {
    return this.count;
  }

  record(entry: UnsupportedEntry): void {
    this.count += 1;
    this.file.write(`${formatUnsupportedEntry(entry)}\n`);
  }

  close(): Promise<void> {
    return this.file.close();
  }
}

/** Keeps unsupported lines in memory, for the HTTP API and for tests. */
export class MemoryUnsupportedCommandSink implements UnsupportedCommandSink {
  readonly entries: UnsupportedEntry[] = [];

  record(entry: UnsupportedEntry): void {
    this.entries.push(entry);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
