import { formatVec3, type Vec3Like } from './vec3.js';

/**
 * Thrown when a position falls outside the root cube of an octree that uses
 * the `'reject'` bounds policy.
 */
export class OutOfBoundsError extends RangeError {
  readonly position: Vec3Like;

  constructor(operation: string, position: Vec3Like, center: Vec3Like, side: number) {
    super(
      `${operation}: position ${formatVec3(position)} lies outside the root cube ` +
        `(center ${formatVec3(center)}, side ${side})`,
    );
    this.name = 'OutOfBoundsError';
    this.position = position;
  }
}

/**
 * Thrown by `splitWhere` when a split is requested past the configured depth
 * or side floor. A predicate that never becomes false on shrinking leaves
 * (for example, more coincident entities than the capacity) ends here.
 */
export class OctreeSplitError extends RangeError {
  readonly depth: number;
  readonly side: number;
  readonly count: number;

  constructor(reason: string, depth: number, side: number, count: number) {
    super(`splitWhere: ${reason} (depth ${depth}, side ${side}, ${count} entities in leaf)`);
    this.name = 'OctreeSplitError';
    this.depth = depth;
    this.side = side;
    this.count = count;
  }
}
