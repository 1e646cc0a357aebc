import test from 'node:test';
import assert from 'node:assert/strict';
import { computeStats, formatDistance, travelReduction, type MotionStats } from '../src/services/stats';
import { TWO_ISLAND_PROGRAM, parseLines } from './helpers';

const stats = (travelDistance: number): MotionStats => ({
  travelMoves: 1,
  extrudeMoves: 0,
  travelDistance,
  extrusionDistance: 0,
  units: 'mm',
});

test('counts moves and sums their lengths by kind', () => {
  const result = computeStats(parseLines(TWO_ISLAND_PROGRAM), 'mm');
  assert.equal(result.travelMoves, 2);
  assert.equal(result.extrudeMoves, 4);
  assert.ok(Math.abs(result.travelDistance - (0.2 + Math.hypot(5, 5))) < 1e-9);
  assert.equal(result.extrusionDistance, 20);
  assert.equal(result.units, 'mm');
});

test('measures travel in three dimensions', () => {
  const result = computeStats(parseLines(['G0 X3 Y4', 'G0 Z12']), null);
  assert.equal(result.travelDistance, 17);
  assert.equal(result.units, 'units');
});

test('state and comment lines are not moves', () => {
  const result = computeStats(parseLines(['; start', 'M104 S200', 'G92 E0']), 'in');
  assert.deepEqual(result, { travelMoves: 0, extrudeMoves: 0, travelDistance: 0, extrusionDistance: 0, units: 'in' });
});

test('reports the travel reduction as a rounded percentage', () => {
  assert.equal(travelReduction(stats(200), stats(150)), 25);
  assert.equal(travelReduction(stats(3), stats(2)), 33.3);
  assert.equal(travelReduction(stats(0), stats(0)), 0);
  assert.equal(travelReduction(stats(10), stats(12)), -20);
});

test('formats distances with two decimals and units', () => {
  assert.equal(formatDistance(12.3456, 'mm'), '12.35 mm');
  assert.equal(formatDistance(0, 'units'), '0.00 units');
});
