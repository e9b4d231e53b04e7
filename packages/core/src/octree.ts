import { describeTree } from './describe.js';
import { OutOfBoundsError } from './errors.js';
import { entitiesOf, foldTree, insert, insertAll, mapTree } from './insert.js';
import { kNearest, type Neighbor } from './nearest.js';
import { AXES } from './octant.js';
import { emptyTree, type OctreeNode } from './octree-node.js';
import { resolveOptions, type OctreeOptions, type ResolvedOctreeOptions } from './options.js';
import { collectWithinRadius, locate } from './query.js';
import { byCapacity, splitWhere, type SplitPredicate } from './split.js';
import type { Positioned, Vec3Like } from './vec3.js';

/**
 * Immutable point octree over entities exposing a `position`.
 *
 * Every operation that changes the population or the shape returns a new
 * `Octree`; the receiver is never modified and keeps answering queries for
 * the snapshot it describes. Unchanged subtrees are shared between versions.
 *
 * Leaves never split on their own. Call `rebalance()` (capacity policy) or
 * `split(predicate)` after inserting.
 *
 * @example
 * const tree = Octree.from(boids, { center: vec3(0, 0, 0), side: 200, capacity: 16 }).rebalance();
 * const flockmates = tree.nearest(boid.position, 7, 25);
 */
export class Octree<T extends Positioned> {
  readonly root: OctreeNode<T>;
  readonly options: ResolvedOctreeOptions;

  private constructor(root: OctreeNode<T>, options: ResolvedOctreeOptions) {
    this.root = root;
    this.options = options;
  }

  /** An empty octree covering the configured root cube. */
  static create<T extends Positioned>(options: OctreeOptions): Octree<T> {
    const resolved = resolveOptions(options);
    return new Octree<T>(emptyTree<T>(resolved.center, resolved.side), resolved);
  }

  /** An octree holding `entities` in a single root leaf. */
  static from<T extends Positioned>(entities: Iterable<T>, options: OctreeOptions): Octree<T> {
    return Octree.create<T>(options).insertAll(entities);
  }

  /** Number of entities in the tree. */
  get count(): number {
    return this.root.count;
  }

  /** True when `pos` lies inside the root cube (faces included). */
  contains(pos: Vec3Like): boolean {
    const half = this.options.side / 2;
    return AXES.every((axis) => Math.abs(pos[axis] - this.options.center[axis]) <= half);
  }

  insert(entity: T): Octree<T> {
    this.checkBounds('Octree.insert', entity.position);
    return this.withRoot(insert(this.root, entity));
  }

  insertAll(entities: Iterable<T>): Octree<T> {
    if (this.options.bounds === 'route') {
      return this.withRoot(insertAll(this.root, entities));
    }
    let root = this.root;
    for (const entity of entities) {
      this.checkBounds('Octree.insertAll', entity.position);
      root = insert(root, entity);
    }
    return this.withRoot(root);
  }

  /**
   * Split leaves while `predicate` holds, within the configured depth and
   * side floors.
   * @throws OctreeSplitError when a floor is reached.
   */
  split(predicate: SplitPredicate<T>): Octree<T> {
    const { maxDepth, minSide } = this.options;
    return this.withRoot(splitWhere(this.root, predicate, { maxDepth, minSide }));
  }

  /** Split every leaf holding more than `capacity` entities. */
  rebalance(capacity: number = this.options.capacity): Octree<T> {
    return this.split(byCapacity<T>(capacity));
  }

  /** Entities of the leaf containing `pos`. */
  locate(pos: Vec3Like): readonly T[] {
    this.checkBounds('Octree.locate', pos);
    return locate(this.root, pos);
  }

  /** Entities strictly closer than `radius` to `pos`, unordered. */
  withinRadius(pos: Vec3Like, radius: number): T[] {
    return collectWithinRadius(this.root, pos, radius);
  }

  /** Up to `k` nearest entities strictly closer than `maxRadius`, ascending by distance. */
  nearest(pos: Vec3Like, k: number, maxRadius: number = Infinity): Neighbor<T>[] {
    return kNearest(this.root, pos, k, maxRadius);
  }

  /** Restartable iteration over every entity. */
  entities(): Iterable<T> {
    return entitiesOf(this.root);
  }

  fold<A>(fn: (acc: A, entity: T) => A, initial: A): A {
    return foldTree(this.root, fn, initial);
  }

  /**
   * Rebuild the tree from `fn(entity)` for every entity, keeping the current
   * shape. Transformed entities are re-routed, so moved entities change leaf.
   */
  map<U extends Positioned>(fn: (entity: T) => U): Octree<U> {
    const checked = (entity: T): U => {
      const next = fn(entity);
      this.checkBounds('Octree.map', next.position);
      return next;
    };
    return new Octree<U>(mapTree(this.root, checked), this.options);
  }

  describe(formatEntity?: (entity: T) => string): string {
    return describeTree(this.root, formatEntity);
  }

  private withRoot(root: OctreeNode<T>): Octree<T> {
    return root === this.root ? this : new Octree<T>(root, this.options);
  }

  private checkBounds(operation: string, pos: Vec3Like): void {
    if (this.options.bounds === 'reject' && !this.contains(pos)) {
      throw new OutOfBoundsError(operation, pos, this.options.center, this.options.side);
    }
  }
}
