/**
 * Benchmark utilities
 *
 * Timing with output counts for the offset and boolean benchmarks, plus the
 * shape generators they share.
 */

import { Polyline } from '../src/pline/Polyline.js';
import type { PolylineRead, VertexTriple } from '../src/pline/types.js';

/**
 * Timing and output size of one benchmark case
 */
export interface BenchmarkResult {
  name: string;
  iterations: number;
  avgMs: number;
  minMs: number;
  /** Loops (or open chains) produced by one run */
  loops: number;
  /** Vertices summed over those loops */
  vertices: number;
}

const WARMUP_RUNS = 3;

/**
 * Time `fn`, which returns the polylines an engine call produced. The output
 * of the last run is counted so the table shows what each timing bought.
 */
export function runBenchmark(name: string, fn: () => readonly PolylineRead[], iterations = 100): BenchmarkResult {
  let output: readonly PolylineRead[] = [];
  for (let i = 0; i < WARMUP_RUNS; i++) {
    output = fn();
  }
  let totalMs = 0;
  let minMs = Infinity;
  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    output = fn();
    const elapsed = performance.now() - start;
    totalMs += elapsed;
    minMs = Math.min(minMs, elapsed);
  }
  return {
    name,
    iterations,
    avgMs: totalMs / iterations,
    minMs,
    loops: output.length,
    vertices: output.reduce((sum, p) => sum + p.vertexCount, 0),
  };
}

export function summarizeResults(results: BenchmarkResult[]): string {
  const width = Math.max(9, ...results.map((r) => r.name.length));
  const header = `| ${'Benchmark'.padEnd(width)} | Avg (ms) | Min (ms) | Loops | Vertices |`;
  const separator = `|${'-'.repeat(width + 2)}|----------|----------|-------|----------|`;
  const rows = results.map(
    (r) =>
      `| ${r.name.padEnd(width)} | ${r.avgMs.toFixed(3).padStart(8)} | ${r.minMs.toFixed(3).padStart(8)} | ` +
      `${String(r.loops).padStart(5)} | ${String(r.vertices).padStart(8)} |`
  );
  return [header, separator, ...rows].join('\n');
}

// ============================================================================
// Shapes
// ============================================================================

/**
 * Closed counter-clockwise polygon with `sides` vertices on a circle of
 * `radius`. Every edge bows outwards by `bulge`.
 */
export function roundedPolygon(sides: number, radius: number, bulge: number, cx = 0, cy = 0): Polyline {
  const triples: VertexTriple[] = [];
  for (let i = 0; i < sides; i++) {
    const angle = (2 * Math.PI * i) / sides;
    triples.push([cx + radius * Math.cos(angle), cy + radius * Math.sin(angle), bulge]);
  }
  return Polyline.fromTriples(triples, true);
}

/**
 * Closed outline with `teeth` teeth around a circle. Tooth tops and the gaps
 * between them are arcs on the `outer` and `inner` circles.
 */
export function gear(teeth: number, inner: number, outer: number): Polyline {
  const triples: VertexTriple[] = [];
  const step = (2 * Math.PI) / (teeth * 2);
  const arcBulge = Math.tan(step / 4);
  for (let i = 0; i < teeth * 2; i++) {
    const r = i % 2 === 0 ? inner : outer;
    const a0 = i * step;
    const a1 = (i + 1) * step;
    triples.push([r * Math.cos(a0), r * Math.sin(a0), arcBulge]);
    triples.push([r * Math.cos(a1), r * Math.sin(a1), 0]);
  }
  return Polyline.fromTriples(triples, true);
}
