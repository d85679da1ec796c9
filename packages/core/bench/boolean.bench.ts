/**
 * Boolean operation benchmarks
 */

import {
  createNumericContext,
  plineBoolean,
  type BooleanOp,
  type NumericContext,
  type Polyline,
  type PolylineRead,
} from '../src/index.js';
import { gear, roundedPolygon, runBenchmark, summarizeResults, type BenchmarkResult } from './utils.js';

const ctx: NumericContext = createNumericContext();

const left = roundedPolygon(64, 50, 0.05);
const right = roundedPolygon(64, 50, 0.05, 40, 10);
const cog = gear(32, 40, 50);
const hub = roundedPolygon(48, 45, 0.02, 3, 2);

function combined(a: PolylineRead, b: PolylineRead, op: BooleanOp): Polyline[] {
  const { positive, negative } = plineBoolean(a, b, op, ctx);
  return [...positive, ...negative];
}

function benchmarkOp(op: BooleanOp): BenchmarkResult {
  return runBenchmark(`64-gon ${op}`, () => combined(left, right, op), 200);
}

/**
 * A circle-like outline crossing every tooth of a gear
 */
function benchmarkGearUnion(): BenchmarkResult {
  return runBenchmark('gear ∪ hub', () => combined(cog, hub, 'union'), 50);
}

export function runBooleanBenchmarks(): BenchmarkResult[] {
  console.log('='.repeat(60));
  console.log('BOOLEAN BENCHMARKS');
  console.log('='.repeat(60));
  console.log('');

  const ops: BooleanOp[] = ['union', 'intersect', 'subtract', 'xor'];
  const results = [...ops.map(benchmarkOp), benchmarkGearUnion()];
  console.log(summarizeResults(results));
  return results;
}

// Run if executed directly
const isMain = typeof process !== 'undefined' && process.argv[1]?.endsWith('boolean.bench.ts');
if (isMain) {
  runBooleanBenchmarks();
}
