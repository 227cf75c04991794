import { Matrix } from 'ml-matrix';

/**
 * Running NaN-ignoring bounding box of a growing set of 2D points.
 */
export class DispersionBounds {
  private minX = Infinity;
  private maxX = -Infinity;
  private minY = Infinity;
  private maxY = -Infinity;

  add(x: number, y: number): this {
    if (!Number.isNaN(x)) {
      if (x < this.minX) this.minX = x;
      if (x > this.maxX) this.maxX = x;
    }
    if (!Number.isNaN(y)) {
      if (y < this.minY) this.minY = y;
      if (y > this.maxY) this.maxY = y;
    }
    return this;
  }

  /**
   * Adds rows [start, end) of an (N, 2) matrix.
   */
  addRows(positions: Matrix, start: number, end: number): this {
    for (let i = start; i < end; i++) {
      this.add(positions.get(i, 0), positions.get(i, 1));
    }
    return this;
  }

  // NaN while a column has no values
  get value(): number {
    const rangeX = this.maxX >= this.minX ? this.maxX - this.minX : NaN;
    const rangeY = this.maxY >= this.minY ? this.maxY - this.minY : NaN;
    return rangeX + rangeY;
  }
}

/**
 * Dispersion of a group of consecutive 2D points: the sum of the differences
 * between the points' maximum and minimum x and y values.
 *
 * Missing samples (NaN) are ignored. A block whose x or y column is entirely
 * missing has a NaN dispersion, which compares false against any threshold.
 */
export function dispersion(positions: Matrix | ReadonlyArray<ReadonlyArray<number>>): number {
  if (positions instanceof Matrix) {
    return new DispersionBounds().addRows(positions, 0, positions.rows).value;
  }

  const bounds = new DispersionBounds();
  for (const point of positions) {
    bounds.add(point[0], point[1]);
  }
  return bounds.value;
}
