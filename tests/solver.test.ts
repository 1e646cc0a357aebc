import test, { after, before } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SolverInvocationError, TourValidationError, type SolverFailureReason } from '../src/errors';
import { buildProblem, type Problem } from '../src/services/problemBuilder';
import { ProcessSolver, expandArguments } from '../src/services/solver';
import { splitLayers } from '../src/services/segmenter';
import { TWO_ISLAND_PROGRAM, parseLines } from './helpers';

const SCRIPTS: Record<string, string> = {
  identity: [
    "const fs = require('fs');",
    "const text = fs.readFileSync(process.argv[2], 'utf8');",
    "const value = (key) => text.match(new RegExp('^' + key + ' = (.*)$', 'm'))[1];",
    "const problem = fs.readFileSync(value('PROBLEM_FILE'), 'utf8');",
    'const dimension = Number(problem.match(/^DIMENSION: (\\d+)$/m)[1]);',
    'const ids = Array.from({ length: dimension }, (_, index) => String(index + 1));',
    "fs.writeFileSync(value('TOUR_FILE'), ['COMMENT : Length = 42', 'TOUR_SECTION', ...ids, '-1', 'EOF', ''].join('\\n'));",
  ].join('\n'),
  garbage: [
    "const fs = require('fs');",
    "const text = fs.readFileSync(process.argv[2], 'utf8');",
    "fs.writeFileSync(text.match(/^TOUR_FILE = (.*)$/m)[1], 'not a tour\\n');",
  ].join('\n'),
  fail: "process.stderr.write('boom');\nprocess.exit(3);",
  silent: 'process.exit(0);',
  sleep: 'setTimeout(() => undefined, 10000);',
};

let scriptDir = '';
let tempRoot = '';

before(async () => {
  scriptDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fake-solver-'));
  tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'solver-runs-'));
  await Promise.all(
    Object.entries(SCRIPTS).map(([name, source]) => fs.writeFile(path.join(scriptDir, `${name}.js`), source, 'utf8')),
  );
});

after(async () => {
  await fs.rm(scriptDir, { recursive: true, force: true });
  await fs.rm(tempRoot, { recursive: true, force: true });
});

const twoIslandProblem = (): Problem => {
  const [, layer] = splitLayers(parseLines(TWO_ISLAND_PROGRAM));
  const problem = buildProblem(layer, { precision: 1000, numRuns: 1 });
  assert.ok(problem);
  return problem;
};

const solverFor = (script: string, timeoutMs = 10_000): ProcessSolver =>
  new ProcessSolver({
    program: process.execPath,
    args: [path.join(scriptDir, `${script}.js`), '{parameters}'],
    timeoutMs,
    tempRoot,
  });

const failsWith = (reason: SolverFailureReason) => (error: unknown) =>
  error instanceof SolverInvocationError && error.reason === reason;

test('expands argument placeholders', () => {
  assert.deepEqual(
    expandArguments(['-p', '{parameters}', '{problem}:{runs}', '{tour}'], {
      parameters: 'a.par',
      problem: 'a.tsp',
      tour: 'a.tour',
      runs: 4,
    }),
    ['-p', 'a.par', 'a.tsp:4', 'a.tour'],
  );
  assert.deepEqual(
    expandArguments(['{problem}', '{runs}'], { parameters: 'a.par', problem: 'a.tsp', tour: 'a.tour', runs: 4 }),
    ['a.tsp', '4'],
  );
});

test('runs the solver and reads its tour', async () => {
  const tour = await solverFor('identity').solve(twoIslandProblem());
  assert.deepEqual(tour, { order: [0, 1, 2], cost: 42 });
  assert.deepEqual(await fs.readdir(tempRoot), []);
});

test('a nonzero exit fails with the solver output', async () => {
  await assert.rejects(solverFor('fail').solve(twoIslandProblem()), (error: unknown) => {
    assert.ok(error instanceof SolverInvocationError);
    assert.equal(error.reason, 'exit');
    assert.equal(error.message, 'Solver exited with code 3: boom');
    return true;
  });
  assert.deepEqual(await fs.readdir(tempRoot), []);
});

test('a missing tour file fails the invocation', async () => {
  await assert.rejects(solverFor('silent').solve(twoIslandProblem()), failsWith('missing-output'));
});

test('an unreadable tour fails validation', async () => {
  await assert.rejects(solverFor('garbage').solve(twoIslandProblem()), TourValidationError);
  assert.deepEqual(await fs.readdir(tempRoot), []);
});

test('a slow solver is killed at the timeout', async () => {
  await assert.rejects(solverFor('sleep', 200).solve(twoIslandProblem()), failsWith('timeout'));
  assert.deepEqual(await fs.readdir(tempRoot), []);
});

test('an abort signal kills the running solver', async () => {
  const controller = new AbortController();
  const pending = solverFor('sleep').solve(twoIslandProblem(), controller.signal);
  setTimeout(() => controller.abort(), 100);
  await assert.rejects(pending, failsWith('aborted'));
});

test('a missing executable fails to spawn', async () => {
  const solver = new ProcessSolver({
    program: path.join(scriptDir, 'missing-solver'),
    args: ['{parameters}'],
    timeoutMs: 1000,
    tempRoot,
  });
  await assert.rejects(solver.solve(twoIslandProblem()), failsWith('spawn'));
});
