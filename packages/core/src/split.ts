import { OctreeSplitError } from './errors.js';
import { insertAll } from './insert.js';
import { octuple } from './octant.js';
import { emptyInternal, makeInternal, type OctreeLeaf, type OctreeNode } from './octree-node.js';
import { vec3Equals, type Positioned } from './vec3.js';

/** Decides whether a leaf at the given depth (root = 0) should be split. */
export type SplitPredicate<T> = (leaf: OctreeLeaf<T>, depth: number) => boolean;

export interface SplitLimits {
  /** Deepest level a split may produce children at. Default: DEFAULT_MAX_DEPTH */
  maxDepth?: number;
  /** Smallest child side a split may produce. Default: 0 (no side floor) */
  minSide?: number;
}

export const DEFAULT_MAX_DEPTH = 32;

/**
 * Turn a leaf into an internal node with 8 empty children of half its side,
 * then route every entity of the leaf into its child through `insert`.
 * An internal node is returned unchanged.
 */
export function splitLeaf<T extends Positioned>(node: OctreeNode<T>): OctreeNode<T> {
  if (node.kind === 'internal') return node;
  return insertAll<T>(emptyInternal<T>(node.center, node.side), node.entities);
}

/**
 * Split every leaf for which `predicate` holds, repeatedly, until it holds
 * for no leaf. Internal nodes are always descended and never tested.
 * Subtrees that need no split are shared with the input tree.
 *
 * @throws OctreeSplitError when a split would exceed `maxDepth` or produce
 *         children smaller than `minSide`.
 */
export function splitWhere<T extends Positioned>(
  tree: OctreeNode<T>,
  predicate: SplitPredicate<T>,
  limits: SplitLimits = {},
): OctreeNode<T> {
  const { maxDepth = DEFAULT_MAX_DEPTH, minSide = 0 } = limits;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`splitWhere: maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  if (!Number.isFinite(minSide) || minSide < 0) {
    throw new RangeError(`splitWhere: minSide must be a finite number >= 0, got ${minSide}`);
  }

  const visit = (node: OctreeNode<T>, depth: number): OctreeNode<T> => {
    if (node.kind === 'leaf') {
      if (!predicate(node, depth)) return node;
      if (depth >= maxDepth) {
        throw new OctreeSplitError(`maximum depth ${maxDepth} reached`, depth, node.side, node.count);
      }
      if (node.side / 2 < minSide) {
        throw new OctreeSplitError(`children would be smaller than minSide ${minSide}`, depth, node.side, node.count);
      }
      return visit(splitLeaf(node), depth);
    }

    const children = node.children;
    const next = octuple((o) => visit(children[o], depth + 1));
    if (next.every((child, i) => child === children[i])) return node;
    return makeInternal(node.center, node.side, next);
  };

  return visit(tree, 0);
}

/**
 * Predicate splitting leaves holding more than `capacity` entities.
 * @throws RangeError when `capacity` is not a positive integer.
 */
export function byCapacity<T>(capacity: number): SplitPredicate<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`byCapacity: capacity must be a positive integer, got ${capacity}`);
  }
  return (leaf) => leaf.count > capacity;
}

/** True when every entity sits at the same position. An empty list counts as coincident. */
export function allCoincident<T extends Positioned>(entities: readonly T[]): boolean {
  const first = entities[0];
  if (first === undefined) return true;
  return entities.every((entity) => vec3Equals(entity.position, first.position));
}

/**
 * Like `byCapacity`, but leaves a crowded leaf alone once all of its entities
 * share one position, since no split can separate them. Use it for
 * populations that may stack entities on a single point.
 * @throws RangeError when `capacity` is not a positive integer.
 */
export function bySeparableCapacity<T extends Positioned>(capacity: number): SplitPredicate<T> {
  const crowded = byCapacity<T>(capacity);
  return (leaf, depth) => crowded(leaf, depth) && !allCoincident(leaf.entities);
}
