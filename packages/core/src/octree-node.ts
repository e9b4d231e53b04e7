/**
 * Octree nodes as persistent values.
 *
 * A node is either a leaf holding entities directly or an internal node
 * delegating to 8 children that exactly tile its cube. Nodes are frozen when
 * created; an update builds new nodes along the root-to-target path and
 * shares every other subtree by reference.
 *
 * Invariants:
 *   - leaf.count === leaf.entities.length
 *   - internal.count === sum of children[i].count
 *   - children[o] has side `side / 2` and center `octantCenter(center, side, o)`
 */

import { octantCenter, octuple, type Octant, type Octuple } from './octant.js';
import type { Vec3Like } from './vec3.js';

export interface OctreeLeaf<T> {
  readonly kind: 'leaf';
  readonly center: Vec3Like;
  readonly side: number;
  readonly count: number;
  readonly entities: readonly T[];
}

export interface OctreeInternal<T> {
  readonly kind: 'internal';
  readonly center: Vec3Like;
  readonly side: number;
  readonly count: number;
  readonly children: Octuple<OctreeNode<T>>;
}

export type OctreeNode<T> = OctreeLeaf<T> | OctreeInternal<T>;

export function isLeaf<T>(node: OctreeNode<T>): node is OctreeLeaf<T> {
  return node.kind === 'leaf';
}

/**
 * An empty leaf covering the cube at `center` with edge length `side`.
 * @throws RangeError when `side` is not a finite positive number.
 */
export function emptyTree<T>(center: Vec3Like, side: number): OctreeLeaf<T> {
  if (!Number.isFinite(side) || side <= 0) {
    throw new RangeError(`emptyTree: side must be a finite number > 0, got ${side}`);
  }
  return makeLeaf(center, side, []);
}

export function makeLeaf<T>(center: Vec3Like, side: number, entities: readonly T[]): OctreeLeaf<T> {
  return Object.freeze({
    kind: 'leaf',
    center,
    side,
    count: entities.length,
    entities: Object.freeze(entities),
  });
}

export function makeInternal<T>(
  center: Vec3Like,
  side: number,
  children: Octuple<OctreeNode<T>>,
): OctreeInternal<T> {
  let count = 0;
  for (const child of children) count += child.count;
  return Object.freeze({ kind: 'internal', center, side, count, children: Object.freeze(children) });
}

/** An internal node whose 8 children are empty leaves tiling the cube. */
export function emptyInternal<T>(center: Vec3Like, side: number): OctreeInternal<T> {
  const half = side / 2;
  return makeInternal<T>(
    center,
    side,
    octuple((o) => makeLeaf<T>(octantCenter(center, side, o), half, [])),
  );
}

/**
 * The child in `octant` of an internal node. A leaf has no children and is
 * returned as-is, so descent loops can call this without branching on kind.
 */
export function childOf<T>(node: OctreeNode<T>, octant: Octant): OctreeNode<T> {
  return node.kind === 'internal' ? node.children[octant] : node;
}

/**
 * A copy of `node` with the child in `octant` swapped for `child`. The count
 * is adjusted by the difference between the old and new child; the other 7
 * children are shared. Leaves are returned unchanged.
 */
export function replaceChild<T>(node: OctreeNode<T>, octant: Octant, child: OctreeNode<T>): OctreeNode<T> {
  if (node.kind === 'leaf') return node;
  const children = node.children;
  const previous = children[octant];
  if (previous === child) return node;
  return Object.freeze({
    kind: 'internal',
    center: node.center,
    side: node.side,
    count: node.count - previous.count + child.count,
    children: Object.freeze(octuple((o) => (o === octant ? child : children[o]))),
  });
}
