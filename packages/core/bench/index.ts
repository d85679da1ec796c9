/**
 * Core Benchmarks
 *
 * Timing for the offset and boolean engines. The numbers are informative and
 * help spot regressions; nothing here asserts.
 *
 * Usage:
 *   npm run bench            - Run all benchmarks
 *   npm run bench:offset     - Run offset benchmarks
 *   npm run bench:boolean    - Run boolean benchmarks
 */

import { runOffsetBenchmarks } from './offset.bench.js';
import { runBooleanBenchmarks } from './boolean.bench.js';
import { summarizeResults, type BenchmarkResult } from './utils.js';

// ============================================================================
// Main Entry Point
// ============================================================================

export function runAllBenchmarks(): void {
  console.log('');
  console.log('╔══════════════════════════════════════════════════════════╗');
  console.log('║              POLYLINE KERNEL BENCHMARKS                  ║');
  console.log('╚══════════════════════════════════════════════════════════╝');
  console.log('');
  console.log(`Date: ${new Date().toISOString()}`);
  console.log(`Node: ${process.version}`);
  console.log('');

  const allResults: BenchmarkResult[] = [...runOffsetBenchmarks()];
  console.log('');
  allResults.push(...runBooleanBenchmarks());

  console.log('');
  console.log('='.repeat(60));
  console.log('OVERALL SUMMARY');
  console.log('='.repeat(60));
  console.log('');
  console.log(summarizeResults(allResults));
  console.log('');

  const slowest = allResults.reduce((a, b) => (a.avgMs > b.avgMs ? a : b));
  const fastest = allResults.reduce((a, b) => (a.avgMs < b.avgMs ? a : b));
  console.log(`  Fastest: ${fastest.name} (${fastest.avgMs.toFixed(3)} ms avg)`);
  console.log(`  Slowest: ${slowest.name} (${slowest.avgMs.toFixed(3)} ms avg)`);

  const empty = allResults.filter((r) => r.loops === 0);
  if (empty.length > 0) {
    console.log(`  No output: ${empty.map((r) => r.name).join(', ')}`);
  }
  console.log('');
}

// Run if executed directly
const isMain = typeof process !== 'undefined' && process.argv[1]?.endsWith('index.ts');
if (isMain) {
  runAllBenchmarks();
}

export { runOffsetBenchmarks } from './offset.bench.js';
export { runBooleanBenchmarks } from './boolean.bench.js';
export * from './utils.js';
