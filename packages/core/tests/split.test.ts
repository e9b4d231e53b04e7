import { describe, it, expect } from 'vitest';
import {
  splitLeaf,
  splitWhere,
  byCapacity,
  bySeparableCapacity,
  allCoincident,
  DEFAULT_MAX_DEPTH,
} from '../src/split.js';
import { OctreeSplitError } from '../src/errors.js';
import { fromEntities, entitiesOf } from '../src/insert.js';
import { emptyTree, makeLeaf, childOf } from '../src/octree-node.js';
import type { OctreeNode } from '../src/octree-node.js';
import { OCTANTS } from '../src/octant.js';
import { vec3 } from '../src/vec3.js';
import { boid, checkedCount, ids, makeRandom, randomBoids, type Boid } from './helpers.js';

const origin = vec3(0, 0, 0);

function depthOf<T>(node: OctreeNode<T>): number {
  if (node.kind === 'leaf') return 0;
  return 1 + Math.max(...node.children.map((child) => depthOf(child)));
}

function leafCount<T>(node: OctreeNode<T>): number {
  if (node.kind === 'leaf') return 1;
  return node.children.reduce((sum, child) => sum + leafCount(child), 0);
}

describe('splitLeaf', () => {
  it('converts a leaf into an internal node with 8 half-size children', () => {
    const tree = splitLeaf(fromEntities<Boid>([], origin, 8));
    expect(tree.kind).toBe('internal');
    for (const o of OCTANTS) {
      const child = childOf(tree, o);
      expect(child.kind).toBe('leaf');
      expect(child.side).toBe(4);
    }
  });

  it('routes every entity into its child and keeps the count', () => {
    const a = boid(1, 1, 1, 1);
    const b = boid(2, -3, 3, -3);
    const c = boid(3, 3, -1, 2);
    const tree = splitLeaf(fromEntities([a, b, c], origin, 8));

    expect(tree.count).toBe(3);
    expect(checkedCount(tree)).toBe(3);
    expect(Array.from(entitiesOf(childOf(tree, 0)))).toEqual([a]);
    // x < 0, z < 0 → 1 | 4
    expect(Array.from(entitiesOf(childOf(tree, 5)))).toEqual([b]);
    // y < 0 → 2
    expect(Array.from(entitiesOf(childOf(tree, 2)))).toEqual([c]);
  });

  it('is the identity on an internal node', () => {
    const internal = splitLeaf(fromEntities([boid(1, 1, 1, 1)], origin, 8));
    expect(splitLeaf(internal)).toBe(internal);
  });

  it('does not modify the source leaf', () => {
    const leaf = fromEntities([boid(1, 1, 1, 1)], origin, 8);
    splitLeaf(leaf);
    expect(leaf.kind).toBe('leaf');
    expect(leaf.count).toBe(1);
  });
});

describe('splitWhere', () => {
  it('splits a crowded leaf repeatedly until the predicate no longer holds', () => {
    // (1,1,1) and (3,3,3) share octant 0 at the root and separate one level down.
    const tree = splitWhere(
      fromEntities([boid(1, 1, 1, 1), boid(2, 3, 3, 3), boid(3, -3, -3, -3)], origin, 8),
      byCapacity(1),
    );
    expect(depthOf(tree)).toBe(2);
    expect(checkedCount(tree)).toBe(3);
    const octant0 = childOf(tree, 0);
    expect(octant0.kind).toBe('internal');
    expect(childOf(octant0, 7).count).toBe(1);
    expect(childOf(octant0, 0).count).toBe(1);
    expect(childOf(tree, 7).kind).toBe('leaf');
  });

  it('never evaluates the predicate on internal nodes', () => {
    const seen: string[] = [];
    splitWhere(fromEntities<Boid>([], origin, 8), (leaf, depth) => {
      seen.push(leaf.kind);
      return depth < 1;
    });
    // The root leaf once, then each of its 8 children.
    expect(seen).toEqual(['leaf', 'leaf', 'leaf', 'leaf', 'leaf', 'leaf', 'leaf', 'leaf', 'leaf']);
  });

  it('passes the depth of each leaf to the predicate', () => {
    const tree = splitWhere(fromEntities<Boid>([], origin, 8), (_leaf, depth) => depth < 2);
    expect(depthOf(tree)).toBe(2);
    expect(leafCount(tree)).toBe(64);
  });

  it('returns the same tree when nothing needs splitting', () => {
    const tree = splitWhere(fromEntities(randomBoids(30, makeRandom(5), 4), origin, 8), byCapacity(4));
    expect(splitWhere(tree, byCapacity(4))).toBe(tree);
  });

  it('shares subtrees that were not split', () => {
    const base = splitLeaf(fromEntities([boid(1, 1, 1, 1), boid(2, 2, 2, 2), boid(3, -1, -1, -1)], origin, 8));
    const next = splitWhere(base, byCapacity(1));
    expect(childOf(next, 0)).not.toBe(childOf(base, 0));
    expect(childOf(next, 7)).toBe(childOf(base, 7));
  });

  it('is idempotent on internal nodes with no crowded leaves', () => {
    const internal = splitLeaf(fromEntities([boid(1, 1, 1, 1)], origin, 8));
    expect(splitWhere(internal, () => false)).toBe(internal);
  });

  it('keeps every entity and all count invariants for random populations', () => {
    const rand = makeRandom(99);
    for (const capacity of [1, 2, 5, 20]) {
      const boids = randomBoids(150, rand, 50);
      const tree = splitWhere(fromEntities(boids, origin, 100), byCapacity(capacity));
      expect(checkedCount(tree)).toBe(150);
      expect(ids(entitiesOf(tree))).toEqual(ids(boids));
    }
  });

  it('throws OctreeSplitError instead of recursing forever on coincident entities', () => {
    const boids = [boid(1, 1, 1, 1), boid(2, 1, 1, 1)];
    const tree = fromEntities(boids, origin, 8);
    expect(() => splitWhere(tree, byCapacity(1), { maxDepth: 5 })).toThrow(OctreeSplitError);
    try {
      splitWhere(tree, byCapacity(1), { maxDepth: 5 });
    } catch (error) {
      expect(error).toBeInstanceOf(RangeError);
      expect(error).toMatchObject({ depth: 5, count: 2, side: 8 / 32 });
    }
  });

  it('applies the default depth floor', () => {
    const tree = fromEntities([boid(1, 1, 1, 1), boid(2, 1, 1, 1)], origin, 8);
    expect(() => splitWhere(tree, byCapacity(1))).toThrow(OctreeSplitError);
    expect(DEFAULT_MAX_DEPTH).toBe(32);
  });

  it('honours the minimum side', () => {
    const tree = fromEntities([boid(1, 1, 1, 1), boid(2, 1, 1, 1)], origin, 8);
    // 8 → 4 → 2 allowed, the next split would produce side 1 < 2
    expect(() => splitWhere(tree, byCapacity(1), { minSide: 2 })).toThrow(/minSide 2/);
  });

  it('rejects invalid limits', () => {
    const tree = emptyTree<Boid>(origin, 8);
    expect(() => splitWhere(tree, () => false, { maxDepth: -1 })).toThrow(RangeError);
    expect(() => splitWhere(tree, () => false, { minSide: Number.NaN })).toThrow(RangeError);
  });
});

describe('byCapacity', () => {
  it('holds for leaves with more entities than the capacity', () => {
    const predicate = byCapacity<Boid>(2);
    const two = [boid(1, 0, 0, 0), boid(2, 0, 0, 0)];
    expect(predicate(makeLeaf(origin, 8, two), 0)).toBe(false);
    expect(predicate(makeLeaf(origin, 8, [...two, boid(3, 0, 0, 0)]), 0)).toBe(true);
  });

  it('rejects a capacity below 1 or a fractional capacity', () => {
    expect(() => byCapacity(0)).toThrow(RangeError);
    expect(() => byCapacity(1.5)).toThrow(RangeError);
  });
});

describe('allCoincident', () => {
  it('holds for an empty list and for entities on one point', () => {
    expect(allCoincident<Boid>([])).toBe(true);
    expect(allCoincident([boid(1, 2, 3, 4), boid(2, 2, 3, 4), boid(3, 2, 3, 4)])).toBe(true);
  });

  it('fails as soon as one coordinate differs', () => {
    expect(allCoincident([boid(1, 2, 3, 4), boid(2, 2, 3, 4.5)])).toBe(false);
  });
});

describe('bySeparableCapacity', () => {
  it('does not split a crowded leaf whose entities share one position', () => {
    const stacked = Array.from({ length: 9 }, (_, i) => boid(i, 0, 0, 0));
    const tree = fromEntities(stacked, origin, 8);
    expect(splitWhere(tree, bySeparableCapacity(8))).toBe(tree);
  });

  it('separates distinct positions and stops at a stacked leaf', () => {
    const tree = splitWhere(
      fromEntities([boid(1, 1, 1, 1), boid(2, 1, 1, 1), boid(3, -1, -1, -1)], origin, 8),
      bySeparableCapacity(1),
    );
    expect(depthOf(tree)).toBe(1);
    expect(ids(entitiesOf(childOf(tree, 0)))).toEqual([1, 2]);
    expect(ids(entitiesOf(childOf(tree, 7)))).toEqual([3]);
  });

  it('rejects an invalid capacity like byCapacity', () => {
    expect(() => bySeparableCapacity(0)).toThrow(RangeError);
  });
});
