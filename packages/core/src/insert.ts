import { octantOf, octuple } from './octant.js';
import {
  childOf,
  emptyTree,
  makeInternal,
  makeLeaf,
  replaceChild,
  type OctreeNode,
} from './octree-node.js';
import type { Positioned, Vec3Like } from './vec3.js';

/**
 * Insert `entity` into the leaf its position routes to and return the new
 * tree. Only nodes on the root-to-leaf path are rebuilt; counts along that
 * path grow by one. Insertion never adds depth, so a leaf keeps accepting
 * entities until it is split explicitly.
 *
 * No containment check is made here: a position outside the root cube lands
 * in whichever boundary leaf the comparisons select.
 */
export function insert<T extends Positioned>(tree: OctreeNode<T>, entity: T): OctreeNode<T> {
  if (tree.kind === 'leaf') {
    return makeLeaf(tree.center, tree.side, [...tree.entities, entity]);
  }
  const octant = octantOf(tree.center, entity.position);
  return replaceChild(tree, octant, insert(childOf(tree, octant), entity));
}

/** Fold `insert` over `entities` from left to right. */
export function insertAll<T extends Positioned>(tree: OctreeNode<T>, entities: Iterable<T>): OctreeNode<T> {
  let result = tree;
  for (const entity of entities) {
    result = insert(result, entity);
  }
  return result;
}

/** Build a single-leaf tree over the given cube holding `entities`. */
export function fromEntities<T extends Positioned>(
  entities: Iterable<T>,
  center: Vec3Like,
  side: number,
): OctreeNode<T> {
  return insertAll<T>(emptyTree<T>(center, side), entities);
}

function* walk<T>(node: OctreeNode<T>): Generator<T, void, undefined> {
  if (node.kind === 'leaf') {
    yield* node.entities;
    return;
  }
  for (const child of node.children) {
    yield* walk(child);
  }
}

/**
 * Every entity in `tree`, children in octant order and leaf entities in
 * insertion order. The returned iterable can be iterated any number of times;
 * each pass walks the (immutable) tree afresh.
 */
export function entitiesOf<T>(tree: OctreeNode<T>): Iterable<T> {
  return {
    [Symbol.iterator]: () => walk(tree),
  };
}

export function foldTree<T, A>(tree: OctreeNode<T>, fn: (acc: A, entity: T) => A, initial: A): A {
  let acc = initial;
  for (const entity of walk(tree)) {
    acc = fn(acc, entity);
  }
  return acc;
}

/** Same shape as `tree` with every leaf emptied. */
export function clearTree<T, U = T>(tree: OctreeNode<T>): OctreeNode<U> {
  if (tree.kind === 'leaf') {
    return makeLeaf<U>(tree.center, tree.side, []);
  }
  const children = tree.children;
  return makeInternal<U>(tree.center, tree.side, octuple((o) => clearTree<T, U>(children[o])));
}

/**
 * Rebuild `tree` with every entity replaced by `fn(entity)`. Results are
 * re-inserted into an emptied copy of the tree's shape rather than kept in
 * place, since a transform may move an entity into another leaf.
 */
export function mapTree<T, U extends Positioned>(tree: OctreeNode<T>, fn: (entity: T) => U): OctreeNode<U> {
  let result = clearTree<T, U>(tree);
  for (const entity of walk(tree)) {
    result = insert(result, fn(entity));
  }
  return result;
}
