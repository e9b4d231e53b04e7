import type { Object3D } from 'three';
import type { Neighbor, Octree } from '@flockindex/core';
import { indexObjects, toObjectEntry } from './objects.js';
import type { IndexObjectsOptions, ObjectEntry } from './objects.js';

/**
 * Keeps an immutable octree snapshot of a set of THREE.Object3D instances.
 *
 * Objects are registered with `add()`; nothing is indexed until `sync()`,
 * which captures every object's world position and publishes a fresh
 * snapshot. Earlier snapshots stay valid, so a frame can keep querying the
 * previous one while the next is built.
 */
export class ThreeSynchronizer<O extends Object3D = Object3D> {
  private readonly objects: Set<O> = new Set();
  private readonly options: IndexObjectsOptions;
  private _snapshot: Octree<ObjectEntry<O>>;
  private _disposed: boolean = false;

  constructor(options: IndexObjectsOptions = {}) {
    this.options = options;
    this._snapshot = indexObjects<O>([], options);
  }

  /** The most recently published snapshot. */
  get snapshot(): Octree<ObjectEntry<O>> {
    return this._snapshot;
  }

  /** Number of registered objects (not necessarily synced yet). */
  get size(): number {
    return this.objects.size;
  }

  add(object: O): void {
    if (this._disposed) return;
    this.objects.add(object);
  }

  /** Unregister `object`. It disappears from queries after the next `sync()`. */
  remove(object: O): boolean {
    return this.objects.delete(object);
  }

  /**
   * Re-read every registered object's world position and publish a new
   * snapshot. After `dispose()` this returns the last snapshot unchanged.
   */
  sync(): Octree<ObjectEntry<O>> {
    if (this._disposed) return this._snapshot;
    this._snapshot = indexObjects(this.objects, this.options);
    return this._snapshot;
  }

  /**
   * Up to `k` other objects nearest to `object` in the current snapshot,
   * measured from its current world position.
   */
  nearest(object: O, k: number, maxRadius: number = Infinity): Neighbor<ObjectEntry<O>>[] {
    const { position } = toObjectEntry(object);
    return this._snapshot
      .nearest(position, k + 1, maxRadius)
      .filter((neighbor) => neighbor.entity.object !== object)
      .slice(0, Math.max(0, Math.floor(k)));
  }

  /** Other objects strictly closer than `radius` to `object` in the current snapshot. */
  neighbors(object: O, radius: number): O[] {
    const { position } = toObjectEntry(object);
    return this._snapshot
      .withinRadius(position, radius)
      .map((entry) => entry.object)
      .filter((other) => other !== object);
  }

  /** Drop every registered object and publish an empty snapshot. Further `sync()` calls are no-ops. */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this.objects.clear();
    this._snapshot = indexObjects<O>([], this.options);
  }
}
