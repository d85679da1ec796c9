/**
 * Raw offset polyline
 *
 * Every input segment is moved `distance` to the right of its direction of
 * travel (negative distances move left), then neighbours are joined at the
 * original vertices. The result may cross itself and may come too close to
 * the input; slicing and validation deal with that afterwards.
 */

import type { Vec2 } from '../num/vec2.js';
import { add2, sub2, mul2, cross2, dot2, dist2, normalize2, perpRight2, angleTo2 } from '../num/vec2.js';
import { fuzzyEqPoint } from '../num/tolerance.js';
import { deltaAngleSigned, bulgeToSweep, sweepToBulge, TAU } from '../num/angle.js';
import type { PolylineRead } from '../pline/types.js';
import { vertexAt, vertexPos } from '../pline/types.js';
import { arcRadiusAndCenter, bulgeIsZero, segEndTangent, segStartTangent } from '../pline/segment.js';
import { segmentCount, segmentVertices } from '../pline/traverse.js';
import { Polyline } from '../pline/Polyline.js';
import { intersectCircleCircle, intersectLineCircle, intersectLineLine } from '../geom/intersect2d.js';

interface RawArc {
  center: Vec2;
  radius: number;
  ccw: boolean;
  /** Signed sweep of the original arc */
  sweep: number;
}

interface RawSeg {
  start: Vec2;
  end: Vec2;
  /** Untrimmed end points; the line (or circle) both lie on */
  carrierStart: Vec2;
  carrierEnd: Vec2;
  arc: RawArc | null;
  /** Arc whose radius shrank to nothing, kept as a straight connector */
  collapsed: boolean;
  /** Original vertex at the end of this segment */
  origEnd: Vec2;
  origStartTangent: Vec2;
  origEndTangent: Vec2;
}

interface Connector {
  start: Vec2;
  bulge: number;
}

export interface RawOffsetPline {
  pline: Polyline;
  /** Per segment of `pline`: true when it stands in for a collapsed arc */
  collapsed: boolean[];
}

function createRawSegs(view: PolylineRead, distance: number, eps: number): RawSeg[] {
  const segs: RawSeg[] = [];
  const count = segmentCount(view);
  for (let i = 0; i < count; i++) {
    const [v1, v2] = segmentVertices(view, i);
    const p1 = vertexPos(v1);
    const p2 = vertexPos(v2);
    const origStartTangent = segStartTangent(v1, v2);
    const origEndTangent = segEndTangent(v1, v2);

    if (bulgeIsZero(v1.bulge)) {
      const shift = mul2(perpRight2(normalize2(sub2(p2, p1))), distance);
      const start = add2(p1, shift);
      const end = add2(p2, shift);
      segs.push({
        start,
        end,
        carrierStart: start,
        carrierEnd: end,
        arc: null,
        collapsed: false,
        origEnd: p2,
        origStartTangent,
        origEndTangent,
      });
      continue;
    }

    const { radius, center } = arcRadiusAndCenter(v1, v2);
    const ccw = v1.bulge > 0;
    const newRadius = ccw ? radius + distance : radius - distance;
    const start = add2(center, mul2(normalize2(sub2(p1, center)), newRadius));
    const end = add2(center, mul2(normalize2(sub2(p2, center)), newRadius));
    const collapsed = newRadius <= eps;
    segs.push({
      start,
      end,
      carrierStart: start,
      carrierEnd: end,
      arc: collapsed ? null : { center, radius: newRadius, ccw, sweep: bulgeToSweep(v1.bulge) },
      collapsed,
      origEnd: p2,
      origStartTangent,
      origEndTangent,
    });
  }
  return segs;
}

/**
 * Arc from `from` to `to` around `center`, turning in the offset direction
 */
function filletConnector(from: Vec2, to: Vec2, center: Vec2, distance: number): Connector {
  const sweep = deltaAngleSigned(angleTo2(center, from), angleTo2(center, to), distance < 0);
  return { start: from, bulge: sweepToBulge(sweep) };
}

/**
 * Candidate points where the carriers of `s1` and `s2` meet
 */
function carrierIntersections(s1: RawSeg, s2: RawSeg, eps: number): Vec2[] {
  if (s1.arc === null && s2.arc === null) {
    const res = intersectLineLine(s1.carrierStart, s1.carrierEnd, s2.carrierStart, s2.carrierEnd, eps);
    return res.kind === 'point' ? [res.point] : [];
  }
  if (s1.arc !== null && s2.arc !== null) {
    const res = intersectCircleCircle(s1.arc.center, s1.arc.radius, s2.arc.center, s2.arc.radius, eps);
    if (res.kind === 'tangent') {
      return [res.point];
    }
    return res.kind === 'two' ? [res.point0, res.point1] : [];
  }
  const line = s1.arc === null ? s1 : s2;
  const arc = s1.arc ?? s2.arc;
  if (arc === null) {
    return [];
  }
  const res = intersectLineCircle(line.carrierStart, line.carrierEnd, arc.center, arc.radius, eps);
  if (res.kind === 'tangent') {
    return [res.point];
  }
  return res.kind === 'two' ? [res.point0, res.point1] : [];
}

/**
 * Join `s1` to `s2` around the original vertex between them. Concave
 * corners trim both segments in place; convex ones (and reversals) return a
 * fillet; anything else gets a straight connector.
 */
function joinSegs(s1: RawSeg, s2: RawSeg, distance: number, eps: number): Connector[] {
  if (fuzzyEqPoint(s1.end, s2.start, eps)) {
    return [];
  }
  const vertex = s1.origEnd;
  if (s1.collapsed || s2.collapsed) {
    return [filletConnector(s1.end, s2.start, vertex, distance)];
  }

  const turn = cross2(s1.origEndTangent, s2.origStartTangent);
  if (Math.abs(turn) < 1e-12) {
    if (dot2(s1.origEndTangent, s2.origStartTangent) < 0) {
      return [filletConnector(s1.end, s2.start, vertex, distance)];
    }
    return [{ start: s1.end, bulge: 0 }];
  }
  if (turn * distance > 0) {
    return [filletConnector(s1.end, s2.start, vertex, distance)];
  }

  const candidates = carrierIntersections(s1, s2, eps);
  let best: Vec2 | undefined;
  for (const p of candidates) {
    if (best === undefined || dist2(p, vertex) < dist2(best, vertex)) {
      best = p;
    }
  }
  if (best === undefined) {
    return [{ start: s1.end, bulge: 0 }];
  }
  s1.end = best;
  s2.start = best;
  return [];
}

/**
 * Bulge of a possibly trimmed raw segment, or null when nothing of it is left
 */
function rawSegBulge(seg: RawSeg, eps: number): number | null {
  if (fuzzyEqPoint(seg.start, seg.end, eps)) {
    return null;
  }
  if (seg.arc === null) {
    return 0;
  }
  const { center, ccw, sweep } = seg.arc;
  let newSweep = deltaAngleSigned(angleTo2(center, seg.start), angleTo2(center, seg.end), !ccw);
  const magnitude = Math.abs(newSweep);
  // Trimmed past its own start: the short way round, backwards.
  if (TAU - magnitude < magnitude - Math.abs(sweep)) {
    newSweep = ccw ? newSweep - TAU : newSweep + TAU;
  }
  return sweepToBulge(newSweep);
}

/**
 * Build the joined raw offset of `view` (which must have at least one
 * segment and no repeated positions).
 */
export function createRawOffsetPline(view: PolylineRead, distance: number, eps: number): RawOffsetPline {
  const segs = createRawSegs(view, distance, eps);
  const count = segs.length;
  const connectors: Connector[][] = segs.map(() => []);
  const joinCount = view.isClosed ? count : count - 1;
  for (let i = 0; i < joinCount; i++) {
    const s1 = segs[i];
    const s2 = segs[(i + 1) % count];
    if (s1 && s2) {
      connectors[i] = joinSegs(s1, s2, distance, eps);
    }
  }

  const positions: Vec2[] = [];
  const bulges: number[] = [];
  const collapsed: boolean[] = [];
  const push = (pos: Vec2, bulge: number, isCollapsed: boolean): void => {
    const last = positions[positions.length - 1];
    if (last !== undefined && fuzzyEqPoint(last, pos, eps)) {
      bulges[bulges.length - 1] = bulge;
      collapsed[collapsed.length - 1] = isCollapsed;
      return;
    }
    positions.push(pos);
    bulges.push(bulge);
    collapsed.push(isCollapsed);
  };

  segs.forEach((seg, i) => {
    const bulge = rawSegBulge(seg, eps);
    if (bulge !== null) {
      push(seg.start, bulge, seg.collapsed);
    }
    for (const c of connectors[i] ?? []) {
      push(c.start, c.bulge, false);
    }
  });

  const lastSeg = segs[count - 1];
  if (!view.isClosed && lastSeg !== undefined) {
    push(lastSeg.end, 0, false);
  }
  if (view.isClosed && positions.length > 1) {
    const first = positions[0];
    const last = positions[positions.length - 1];
    if (first && last && fuzzyEqPoint(first, last, eps)) {
      positions.pop();
      bulges.pop();
      collapsed.pop();
    }
  }

  const vertices = positions.map((p, i) => vertexAt(p, bulges[i] ?? 0));
  return { pline: new Polyline(vertices, view.isClosed), collapsed };
}
