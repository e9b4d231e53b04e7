import { DEFAULT_MAX_DEPTH } from './split.js';
import { vec3, type Vec3Like } from './vec3.js';

/**
 * What to do with a position outside the root cube.
 *
 * - `'reject'`: throw an `OutOfBoundsError`.
 * - `'route'`: route it by octant comparison like any other position. It
 *   lands in a boundary leaf; radius and nearest queries near it may then
 *   miss or over-report it.
 */
export type BoundsPolicy = 'reject' | 'route';

export interface OctreeOptions {
  /** Center of the root cube. */
  center: Vec3Like;
  /** Edge length of the root cube. Must be > 0. */
  side: number;
  /** Default: 'reject' */
  bounds?: BoundsPolicy;
  /** Leaf capacity used by `Octree.rebalance()`. Default: DEFAULT_CAPACITY */
  capacity?: number;
  /** Split depth floor. Default: DEFAULT_MAX_DEPTH */
  maxDepth?: number;
  /** Split side floor. Default: 0 */
  minSide?: number;
}

export type ResolvedOctreeOptions = Readonly<Required<OctreeOptions>>;

export const DEFAULT_CAPACITY = 8;

/**
 * Fill in defaults and validate.
 * @throws RangeError on a non-positive side, a bad capacity or bad split limits.
 */
export function resolveOptions(options: OctreeOptions): ResolvedOctreeOptions {
  const {
    center,
    side,
    bounds = 'reject',
    capacity = DEFAULT_CAPACITY,
    maxDepth = DEFAULT_MAX_DEPTH,
    minSide = 0,
  } = options;

  if (![center.x, center.y, center.z].every(Number.isFinite)) {
    throw new RangeError('resolveOptions: center must have finite coordinates');
  }
  if (!Number.isFinite(side) || side <= 0) {
    throw new RangeError(`resolveOptions: side must be a finite number > 0, got ${side}`);
  }
  if (bounds !== 'reject' && bounds !== 'route') {
    throw new RangeError(`resolveOptions: unknown bounds policy "${String(bounds)}"`);
  }
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`resolveOptions: capacity must be a positive integer, got ${capacity}`);
  }
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`resolveOptions: maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  if (!Number.isFinite(minSide) || minSide < 0) {
    throw new RangeError(`resolveOptions: minSide must be a finite number >= 0, got ${minSide}`);
  }

  return Object.freeze({
    center: vec3(center.x, center.y, center.z),
    side,
    bounds,
    capacity,
    maxDepth,
    minSide,
  });
}
