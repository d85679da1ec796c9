/**
 * Static packed bounding-box tree
 *
 * Items are sorted along a Hilbert curve over their box centers and packed
 * bottom-up into nodes of `nodeSize` children, so the whole tree lives in two
 * flat arrays. Building sorts once (O(n log n)); a query walks only the nodes
 * whose boxes overlap the query box. The index cannot change after `build()`.
 */

import type { AABB } from '../pline/types.js';

const HILBERT_MAX = (1 << 16) - 1;

/**
 * Position of cell (x, y) along a Hilbert curve filling a 2^16 square grid
 */
function hilbertIndex(x: number, y: number): number {
  const n = HILBERT_MAX + 1;
  let d = 0;
  let hx = x;
  let hy = y;
  for (let s = n >> 1; s > 0; s >>= 1) {
    const rx = (hx & s) > 0 ? 1 : 0;
    const ry = (hy & s) > 0 ? 1 : 0;
    d += s * s * ((3 * rx) ^ ry);
    if (ry === 0) {
      if (rx === 1) {
        hx = n - 1 - hx;
        hy = n - 1 - hy;
      }
      const t = hx;
      hx = hy;
      hy = t;
    }
  }
  return d;
}

export class StaticAABB2DIndex {
  /** Box of every node, items first, then each upper level, root last */
  private readonly _boxes: Float64Array;
  /** Item index for leaf slots, first child slot for upper-level slots */
  private readonly _indices: Uint32Array;
  /** End slot (exclusive) of each level, leaves first */
  private readonly _levelBounds: number[];
  readonly nodeSize: number;
  readonly numItems: number;

  /** @internal use StaticAABB2DIndexBuilder */
  constructor(
    boxes: Float64Array,
    indices: Uint32Array,
    levelBounds: number[],
    nodeSize: number,
    numItems: number
  ) {
    this._boxes = boxes;
    this._indices = indices;
    this._levelBounds = levelBounds;
    this.nodeSize = nodeSize;
    this.numItems = numItems;
  }

  /**
   * Overall bounds of every item, or null for an empty index
   */
  get bounds(): AABB | null {
    if (this.numItems === 0) {
      return null;
    }
    const root = (this._boxes.length / 4 - 1) * 4;
    return {
      minX: this._boxes[root] ?? 0,
      minY: this._boxes[root + 1] ?? 0,
      maxX: this._boxes[root + 2] ?? 0,
      maxY: this._boxes[root + 3] ?? 0,
    };
  }

  /**
   * Indices (in insertion order numbering) of every item whose box overlaps
   * the query box. Touching boxes count as overlapping.
   */
  query(minX: number, minY: number, maxX: number, maxY: number): number[] {
    const results: number[] = [];
    this.visitQuery(minX, minY, maxX, maxY, (index) => {
      results.push(index);
    });
    return results;
  }

  /**
   * Call `visitor` for each overlapping item. Returning `false` stops the walk.
   */
  visitQuery(
    minX: number,
    minY: number,
    maxX: number,
    maxY: number,
    visitor: (index: number) => boolean | void
  ): void {
    if (this.numItems === 0) {
      return;
    }
    const boxes = this._boxes;
    const indices = this._indices;
    const stack: number[] = [];
    let nodeIndex: number | undefined = (this._boxes.length / 4 - 1) * 4;

    while (nodeIndex !== undefined) {
      const end = Math.min(nodeIndex + this.nodeSize * 4, this.upperBoundFor(nodeIndex));
      for (let pos = nodeIndex; pos < end; pos += 4) {
        if (
          maxX < (boxes[pos] ?? 0) ||
          maxY < (boxes[pos + 1] ?? 0) ||
          minX > (boxes[pos + 2] ?? 0) ||
          minY > (boxes[pos + 3] ?? 0)
        ) {
          continue;
        }
        const child = indices[pos >> 2] ?? 0;
        if (nodeIndex < this.numItems * 4) {
          if (visitor(child) === false) {
            return;
          }
        } else {
          stack.push(child);
        }
      }
      nodeIndex = stack.pop();
    }
  }

  /**
   * End slot (in box array units) of the level containing `nodeIndex`
   */
  private upperBoundFor(nodeIndex: number): number {
    for (const bound of this._levelBounds) {
      if (nodeIndex < bound) {
        return bound;
      }
    }
    return this._boxes.length;
  }
}

/**
 * Collects item boxes, then packs them into a StaticAABB2DIndex
 */
export class StaticAABB2DIndexBuilder {
  readonly numItems: number;
  readonly nodeSize: number;
  private readonly _itemBoxes: Float64Array;
  private _added = 0;

  constructor(numItems: number, nodeSize = 16) {
    this.numItems = numItems;
    this.nodeSize = Math.min(Math.max(nodeSize, 2), 65535);
    this._itemBoxes = new Float64Array(numItems * 4);
  }

  /**
   * Add the next item's box; returns its index
   */
  add(minX: number, minY: number, maxX: number, maxY: number): number {
    if (this._added >= this.numItems) {
      throw new RangeError(`Index builder expected ${this.numItems} items`);
    }
    const index = this._added++;
    const pos = index * 4;
    this._itemBoxes[pos] = minX;
    this._itemBoxes[pos + 1] = minY;
    this._itemBoxes[pos + 2] = maxX;
    this._itemBoxes[pos + 3] = maxY;
    return index;
  }

  build(): StaticAABB2DIndex {
    if (this._added !== this.numItems) {
      throw new RangeError(`Added ${this._added} items, expected ${this.numItems}`);
    }
    const n = this.numItems;
    const nodeSize = this.nodeSize;

    // Level sizes, leaves first.
    const levelBounds: number[] = [];
    let count = n;
    let totalNodes = n;
    levelBounds.push(n * 4);
    while (count > 1) {
      count = Math.ceil(count / nodeSize);
      totalNodes += count;
      levelBounds.push(totalNodes * 4);
    }
    if (n === 0) {
      return new StaticAABB2DIndex(new Float64Array(0), new Uint32Array(0), [], nodeSize, 0);
    }

    const item = this._itemBoxes;
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (let i = 0; i < n; i++) {
      minX = Math.min(minX, item[i * 4] ?? 0);
      minY = Math.min(minY, item[i * 4 + 1] ?? 0);
      maxX = Math.max(maxX, item[i * 4 + 2] ?? 0);
      maxY = Math.max(maxY, item[i * 4 + 3] ?? 0);
    }

    const width = maxX - minX || 1;
    const height = maxY - minY || 1;
    const hilbert = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      const cx = ((item[i * 4] ?? 0) + (item[i * 4 + 2] ?? 0)) / 2;
      const cy = ((item[i * 4 + 1] ?? 0) + (item[i * 4 + 3] ?? 0)) / 2;
      const hx = Math.floor((HILBERT_MAX * (cx - minX)) / width);
      const hy = Math.floor((HILBERT_MAX * (cy - minY)) / height);
      hilbert[i] = hilbertIndex(hx, hy);
    }

    const order = Array.from({ length: n }, (_, i) => i);
    order.sort((a, b) => (hilbert[a] ?? 0) - (hilbert[b] ?? 0) || a - b);

    const boxes = new Float64Array(totalNodes * 4);
    const indices = new Uint32Array(totalNodes);
    order.forEach((itemIndex, slot) => {
      boxes.set(item.subarray(itemIndex * 4, itemIndex * 4 + 4), slot * 4);
      indices[slot] = itemIndex;
    });

    // Pack each level into its parent level.
    let pos = 0;
    let nextSlot = n;
    for (let level = 0; level < levelBounds.length - 1; level++) {
      const end = levelBounds[level] ?? 0;
      while (pos < end) {
        const firstChild = pos;
        let nodeMinX = Infinity;
        let nodeMinY = Infinity;
        let nodeMaxX = -Infinity;
        let nodeMaxY = -Infinity;
        for (let i = 0; i < nodeSize && pos < end; i++) {
          nodeMinX = Math.min(nodeMinX, boxes[pos] ?? 0);
          nodeMinY = Math.min(nodeMinY, boxes[pos + 1] ?? 0);
          nodeMaxX = Math.max(nodeMaxX, boxes[pos + 2] ?? 0);
          nodeMaxY = Math.max(nodeMaxY, boxes[pos + 3] ?? 0);
          pos += 4;
        }
        boxes[nextSlot * 4] = nodeMinX;
        boxes[nextSlot * 4 + 1] = nodeMinY;
        boxes[nextSlot * 4 + 2] = nodeMaxX;
        boxes[nextSlot * 4 + 3] = nodeMaxY;
        indices[nextSlot] = firstChild;
        nextSlot++;
      }
    }

    return new StaticAABB2DIndex(boxes, indices, levelBounds, nodeSize, n);
  }
}
