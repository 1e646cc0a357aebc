import test from 'node:test';
import assert from 'node:assert/strict';
import { SolverInvocationError } from '../src/errors';
import { MemoryUnsupportedCommandSink } from '../src/logger';
import { OUTPUT_SIGNATURE, formatLayerCsv, optimizeGcode } from '../src/services/optimizer';
import { FakeSolver, MemoryLogger, TWO_ISLAND_PROGRAM, routingConfig } from './helpers';

const HEADER = [OUTPUT_SIGNATURE, ';Original file: part.gcode'];

/** Islands with entries at (0,0), (20,0) and (10,0): visiting the last one second saves travel. */
const DETOUR_PROGRAM = [
  'G21',
  'G90',
  'M82',
  'G92 E0',
  'G0 X0 Y0 Z0.2 F6000',
  'G1 X1 Y0 E1 F1200',
  'G0 X20 Y0 F6000',
  'G1 X21 Y0 E2 F1200',
  'G0 X10 Y0 F6000',
  'G1 X11 Y0 E3 F1200',
];

test('the two-island example keeps its blocks with one synthesized travel', async () => {
  const solver = new FakeSolver();
  const result = await optimizeGcode(`${TWO_ISLAND_PROGRAM.join('\n')}\n`, {
    config: routingConfig(),
    solver,
    sourceName: 'part.gcode',
  });

  assert.equal(result.program, `${[...HEADER, ...TWO_ISLAND_PROGRAM].join('\n')}\n`);
  assert.deepEqual(solver.calls, [1]);
  assert.equal(result.metadata.synthesizedTravels, 1);
  assert.equal(result.metadata.layerCount, 2);
  assert.equal(result.metadata.optimizedLayers, 1);
  assert.deepEqual(result.metadata.layers, [
    { index: 0, z: null, islands: 0, merged: 0, status: 'skipped', originalPathLength: null, optimizedPathLength: null },
    { index: 1, z: 0.2, islands: 2, merged: 0, status: 'optimized', originalPathLength: 10000, optimizedPathLength: 10000 },
  ]);
  assert.deepEqual(result.metadata.optimized, result.metadata.original);
  assert.equal(result.metadata.original.travelMoves, 2);
  assert.equal(result.metadata.original.extrudeMoves, 4);
  assert.equal(result.metadata.original.extrusionDistance, 20);
  assert.equal(result.metadata.original.units, 'mm');
  assert.match(result.jobId, /^[0-9a-f-]{36}$/);
});

test('a shorter tour reorders the islands and reduces travel', async () => {
  const solver = new FakeSolver(new Map([[1, [0, 1, 3, 2]]]));
  const result = await optimizeGcode(DETOUR_PROGRAM.join('\n'), { config: routingConfig(), solver, sourceName: 'part.gcode' });

  assert.deepEqual(result.program.trimEnd().split('\n'), [
    ...HEADER,
    ...DETOUR_PROGRAM.slice(0, 6),
    'G0 X10 Y0 F6000',
    'G92 E2',
    'G1 X11 Y0 E3 F1200',
    'G0 X20 Y0 F6000',
    'G92 E1',
    'G1 X21 Y0 E2 F1200',
    'G92 E3',
    'G0 X11 Y0 F6000',
    'G1 F1200',
  ]);
  const [, layer] = result.metadata.layers;
  assert.equal(layer.status, 'optimized');
  assert.equal(layer.originalPathLength, 30000);
  assert.equal(layer.optimizedPathLength, 20000);
  assert.equal(result.metadata.travelReductionPercent, 6.6);
});

test('a longer tour keeps the original order', async () => {
  const solver = new FakeSolver(new Map([[1, [0, 2, 1, 3]]]));
  const result = await optimizeGcode(DETOUR_PROGRAM.join('\n'), { config: routingConfig(), solver });

  assert.equal(result.program, `${[OUTPUT_SIGNATURE, ...DETOUR_PROGRAM].join('\n')}\n`);
  assert.equal(result.metadata.layers[1].status, 'unimproved');
});

test('an accepted tour is walked as the shorter open path from the tool position', async () => {
  // start at x = 0, islands entered at x = 0, 30, 10 and 20
  const program = [
    'G21',
    'G90',
    'M82',
    'G92 E0',
    'G0 X0 Y0 Z0.2 F6000',
    'G1 X0 Y1 E1 F1200',
    'G0 X30 Y0 F6000',
    'G1 X30 Y1 E2 F1200',
    'G0 X10 Y0 F6000',
    'G1 X10 Y1 E3 F1200',
    'G0 X20 Y0 F6000',
    'G1 X20 Y1 E4 F1200',
  ];
  // same cycle as [0, 1, 3, 4, 2], reported in the direction whose open path is twice as long
  const solver = new FakeSolver(new Map([[1, [0, 2, 4, 3, 1]]]));
  const result = await optimizeGcode(program.join('\n'), { config: routingConfig(), solver });

  const [, layer] = result.metadata.layers;
  assert.equal(layer.status, 'optimized');
  assert.equal(layer.originalPathLength, 60000);
  assert.equal(layer.optimizedPathLength, 30000);
  assert.deepEqual(
    result.program.split('\n').filter((line) => line.startsWith('G1 X')),
    ['G1 X0 Y1 E1 F1200', 'G1 X10 Y1 E3 F1200', 'G1 X20 Y1 E4 F1200', 'G1 X30 Y1 E2 F1200'],
  );
});

test('a solver failure falls back to the original order with one warning', async () => {
  const logger = new MemoryLogger();
  const solver = new FakeSolver(new Map([[1, new SolverInvocationError('Solver timed out after 10 ms.', 'timeout')]]));
  const result = await optimizeGcode(DETOUR_PROGRAM.join('\n'), { config: routingConfig(), solver, logger });

  assert.equal(result.program, `${[OUTPUT_SIGNATURE, ...DETOUR_PROGRAM].join('\n')}\n`);
  assert.equal(result.metadata.fallbackLayers, 1);
  assert.equal(result.metadata.layers[1].status, 'fallback');
  assert.equal(result.metadata.layers[1].error, 'Solver timed out after 10 ms.');
  assert.deepEqual(logger.messages('warn'), [
    'Layer 1: keeping original island order (solver-invocation: Solver timed out after 10 ms.)',
  ]);
});

test('close islands are merged and small layers are not sent to the solver', async () => {
  const solver = new FakeSolver();
  const result = await optimizeGcode(TWO_ISLAND_PROGRAM.join('\n'), { config: routingConfig({ maxMergeLength: 10.5 }), solver });

  assert.deepEqual(solver.calls, []);
  assert.equal(result.metadata.layers[1].merged, 1);
  assert.equal(result.metadata.layers[1].status, 'skipped');
  assert.equal(result.program, `${[OUTPUT_SIGNATURE, ...TWO_ISLAND_PROGRAM].join('\n')}\n`);
});

test('layers that home between islands are pinned', async () => {
  const solver = new FakeSolver();
  const program = ['G1 X1 Y0 E1', 'G28', 'G1 X2 Y0 E2'];
  const result = await optimizeGcode(program.join('\n'), { config: routingConfig(), solver });

  assert.deepEqual(solver.calls, []);
  assert.equal(result.metadata.layers[0].status, 'pinned');
});

test('unsupported lines are reported and kept in place', async () => {
  const sink = new MemoryUnsupportedCommandSink();
  const program = [...TWO_ISLAND_PROGRAM.slice(0, 5), 'M9999 custom', ...TWO_ISLAND_PROGRAM.slice(5)];
  const result = await optimizeGcode(program.join('\n'), { config: routingConfig(), solver: new FakeSolver(), sink });

  assert.equal(result.metadata.unsupportedLines, 1);
  assert.deepEqual(sink.entries, [{ lineNumber: 6, raw: 'M9999 custom', reason: 'unsupported command M9999' }]);
  assert.equal(result.program.split('\n')[6], 'M9999 custom');
});

test('formats the layer report as CSV', () => {
  assert.equal(
    formatLayerCsv([
      { index: 0, z: null, islands: 0, merged: 0, status: 'skipped', originalPathLength: null, optimizedPathLength: null },
      { index: 1, z: 0.2, islands: 5, merged: 2, status: 'fallback', originalPathLength: 10, optimizedPathLength: 10 },
    ]),
    'Layer,Islands,Merged,Status\n0,0,0,skipped\n1,5,2,fallback\n',
  );
});
