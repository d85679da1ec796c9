/**
 * Parallel offset benchmarks
 */

import { createNumericContext, parallelOffset, type NumericContext } from '../src/index.js';
import { gear, roundedPolygon, runBenchmark, summarizeResults, type BenchmarkResult } from './utils.js';

const ctx: NumericContext = createNumericContext();

const polygon = roundedPolygon(64, 50, 0.05);
const bigPolygon = roundedPolygon(1024, 50, 0.01);
const cog = gear(32, 40, 50);

// ============================================================================
// Benchmarks
// ============================================================================

function benchmarkPolygonInward(): BenchmarkResult {
  return runBenchmark('64-gon inward', () => parallelOffset(polygon, -2, ctx), 200);
}

function benchmarkPolygonOutward(): BenchmarkResult {
  return runBenchmark('64-gon outward', () => parallelOffset(polygon, 2, ctx), 200);
}

function benchmarkLargePolygon(): BenchmarkResult {
  return runBenchmark('1024-gon inward', () => parallelOffset(bigPolygon, -2, ctx), 20);
}

/**
 * Inward offsets of a gear past half the tooth height split at every tooth
 */
function benchmarkGearCollapse(): BenchmarkResult {
  return runBenchmark('gear inward 6', () => parallelOffset(cog, -6, ctx), 50);
}

export function runOffsetBenchmarks(): BenchmarkResult[] {
  console.log('='.repeat(60));
  console.log('OFFSET BENCHMARKS');
  console.log('='.repeat(60));
  console.log('');

  const results = [
    benchmarkPolygonInward(),
    benchmarkPolygonOutward(),
    benchmarkLargePolygon(),
    benchmarkGearCollapse(),
  ];
  console.log(summarizeResults(results));
  return results;
}

// Run if executed directly
const isMain = typeof process !== 'undefined' && process.argv[1]?.endsWith('offset.bench.ts');
if (isMain) {
  runOffsetBenchmarks();
}
