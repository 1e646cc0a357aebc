import test from 'node:test';
import assert from 'node:assert/strict';
import { MemoryUnsupportedCommandSink } from '../src/logger';
import { createDialect } from '../src/services/dialect';
import { GcodeParser, parseGcode, splitLines, stripComments } from '../src/services/gcodeParser';
import { MemoryLogger, parseLines } from './helpers';

test('classifies moves by their extrusion delta', () => {
  const commands = parseLines([
    'G90',
    'M82',
    'G1 X10 Y0 F1200',
    'G1 X20 Y0 E1.5',
    'G1 E0.7',
    '; perimeter',
    'M104 S200',
    'G28',
  ]);

  assert.deepEqual(
    commands.map((command) => command.kind),
    ['state', 'state', 'travel', 'extrude', 'travel', 'comment', 'state', 'home'],
  );
  assert.equal(commands[3].start.e, 0);
  assert.equal(commands[3].end.e, 1.5);
  assert.equal(commands[4].end.e, 0.7);
  assert.equal(commands[3].end.f, 1200);
});

test('arcs move to their endpoint and are classified like linear moves', () => {
  const [arc, travelArc] = parseLines(['G2 X10 Y0 I5 J0 E1 F900', 'G03 X0 Y0 I-5 J0']);
  assert.equal(arc.kind, 'extrude');
  assert.equal(arc.code, 'G2');
  assert.deepEqual([arc.end.x, arc.end.y, arc.end.e, arc.end.f], [10, 0, 1, 900]);
  assert.equal(travelArc.kind, 'travel');
  assert.equal(travelArc.code, 'G3');
  assert.equal(travelArc.end.x, 0);
});

test('tracks relative positioning and relative extrusion', () => {
  const relative = parseLines(['G91', 'G1 X5 Y5', 'G1 X-2 Y1 E1']);
  const last = relative[2];
  assert.equal(last.kind, 'extrude');
  assert.equal(last.end.x, 3);
  assert.equal(last.end.y, 6);
  assert.equal(last.end.e, 1);
  assert.equal(last.end.absolutePositioning, false);
  assert.equal(last.end.absoluteExtrusion, false);

  const relativeExtrusion = parseLines(['M83', 'G1 X1 E0.5', 'G1 X2 E0.5']);
  assert.equal(relativeExtrusion[2].end.e, 1);
  assert.equal(relativeExtrusion[2].end.absolutePositioning, true);
  assert.equal(relativeExtrusion[2].kind, 'extrude');
});

test('G92 redefines the logical extruder position', () => {
  const commands = parseLines(['G1 X1 E5', 'G92 E0', 'G1 X2 E1']);
  assert.equal(commands[1].end.e, 0);
  assert.equal(commands[2].start.e, 0);
  assert.equal(commands[2].kind, 'extrude');
});

test('homing resets only the listed axes', () => {
  const commands = parseLines(['G1 X5 Y5 Z1', 'G28 X']);
  assert.deepEqual(commands[1].flags, ['X']);
  assert.equal(commands[1].end.x, 0);
  assert.equal(commands[1].end.y, 5);
  assert.equal(commands[1].end.z, 1);

  const all = parseLines(['G1 X5 Y5 Z1', 'G28']);
  assert.equal(all[1].end.x, 0);
  assert.equal(all[1].end.y, 0);
  assert.equal(all[1].end.z, 0);
});

test('strips line numbers, checksums and comments', () => {
  const [numbered, padded, commented] = parseLines(['N10 G1 X5 Y5*45', 'G01 X3', 'G1 X7 (inline) Y2 ; trailing']);
  assert.equal(numbered.code, 'G1');
  assert.equal(numbered.end.x, 5);
  assert.equal(numbered.end.y, 5);
  assert.equal(padded.code, 'G1');
  assert.equal(padded.end.x, 3);
  assert.equal(commented.end.x, 7);
  assert.equal(commented.end.y, 2);
  assert.equal(commented.raw, 'G1 X7 (inline) Y2 ; trailing');

  assert.equal(stripComments('G1 X1 ; move'), 'G1 X1');
  assert.equal(stripComments('(only a comment)'), '');
});

test('passes unknown lines through and reports them to the sink', () => {
  const sink = new MemoryUnsupportedCommandSink();
  const program = parseGcode(['G1 X1 Y1', 'FOO BAR', 'G1 X2.5.1', 'M9999'].join('\n'), { sink });

  assert.equal(program.unsupportedCount, 3);
  assert.deepEqual(
    program.commands.map((command) => command.kind),
    ['travel', 'unknown', 'unknown', 'unknown'],
  );
  assert.deepEqual(sink.entries, [
    { lineNumber: 2, raw: 'FOO BAR', reason: 'unsupported command FOO' },
    { lineNumber: 3, raw: 'G1 X2.5.1', reason: 'malformed value "X2.5.1"' },
    { lineNumber: 4, raw: 'M9999', reason: 'unsupported command M9999' },
  ]);
  assert.equal(program.commands[2].end.x, 1);
  assert.equal(program.commands[2].error?.lineNumber, 3);
});

test('extra state codes extend the dialect', () => {
  const sink = new MemoryUnsupportedCommandSink();
  const program = parseGcode('M9999 P1\nT1\n', { dialect: createDialect(['m9999']), sink });
  assert.deepEqual(
    program.commands.map((command) => command.kind),
    ['state', 'state'],
  );
  assert.equal(sink.entries.length, 0);
});

test('records units and warns when a mode is declared twice', () => {
  const logger = new MemoryLogger();
  const parser = new GcodeParser({ logger });
  ['G20', 'G90', 'G90'].forEach((line) => parser.parseLine(line));

  assert.equal(parser.currentUnits, 'in');
  assert.deepEqual(logger.messages('warn'), ['G90 command at line 3 after positioning mode was already set']);
});

test('commands are immutable', () => {
  const [command] = parseLines(['G1 X1 E1']);
  assert.ok(Object.isFrozen(command));
  assert.ok(Object.isFrozen(command.end));
  assert.ok(Object.isFrozen(command.words));
});

test('splitLines drops only the final empty remainder', () => {
  assert.deepEqual(splitLines('G1 X1\r\n\nG1 X2\n'), ['G1 X1', '', 'G1 X2']);
});
