import type { Vec3 } from "../types.js";

/**
 * Uniform hash grid over world space. Entries are bucketed by the cell that
 * contains their position; queries return candidates from every cell the
 * query sphere's bounding cube overlaps, so callers still do the exact test.
 */
export class SpatialGrid<T> {
  private readonly cellSize: number;
  private readonly buckets = new Map<string, T[]>();

  constructor(cellSize: number) {
    this.cellSize = Math.max(1, Math.floor(cellSize));
  }

  get cellCount(): number {
    return this.buckets.size;
  }

  clear() {
    this.buckets.clear();
  }

  insert(item: T, position: Vec3) {
    const key = this.keyForCell(this.cellCoord(position.x), this.cellCoord(position.y), this.cellCoord(position.z));
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      this.buckets.set(key, [item]);
    }
  }

  querySphere(center: Vec3, radius: number): T[] {
    const result: T[] = [];
    const r = Math.max(0, radius);
    const minX = this.cellCoord(center.x - r);
    const maxX = this.cellCoord(center.x + r);
    const minY = this.cellCoord(center.y - r);
    const maxY = this.cellCoord(center.y + r);
    const minZ = this.cellCoord(center.z - r);
    const maxZ = this.cellCoord(center.z + r);

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        for (let cz = minZ; cz <= maxZ; cz++) {
          const bucket = this.buckets.get(this.keyForCell(cx, cy, cz));
          if (!bucket) continue;
          result.push(...bucket);
        }
      }
    }

    return result;
  }

  private cellCoord(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private keyForCell(cx: number, cy: number, cz: number): string {
    return `${cx},${cy},${cz}`;
  }
}
