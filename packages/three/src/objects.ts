import { Box3, Vector3 } from 'three';
import type { Object3D } from 'three';
import { Octree, bySeparableCapacity } from '@flockindex/core';
import type { OctreeOptions } from '@flockindex/core';

/** An axis-aligned cube given by its center and edge length. */
export interface Cube {
  center: Vector3;
  side: number;
}

/**
 * A scene object paired with its world position at indexing time. The
 * position is a private copy, so a snapshot keeps its layout while the
 * object itself moves on.
 */
export interface ObjectEntry<O extends Object3D = Object3D> {
  readonly object: O;
  readonly position: Vector3;
}

export interface IndexObjectsOptions extends Omit<OctreeOptions, 'center' | 'side'> {
  /** Root cube. Default: the bounding cube of the object positions, padded. */
  cube?: Cube;
  /** Margin added on every face of the computed cube. Default: 1 */
  padding?: number;
}

/** Side given to a cube fitted around a single point with no padding. */
export const DEGENERATE_CUBE_SIDE = 1;

/**
 * Smallest cube containing a Three.js Box3, grown by `padding` on every face.
 * A box collapsed to one point with no padding gets `DEGENERATE_CUBE_SIDE`.
 * @throws RangeError when the box is empty or `padding` is negative.
 */
export function cubeFromBox3(box: Box3, padding: number = 0): Cube {
  if (box.isEmpty()) {
    throw new RangeError('cubeFromBox3: cannot build a cube around an empty Box3');
  }
  if (!Number.isFinite(padding) || padding < 0) {
    throw new RangeError(`cubeFromBox3: padding must be a finite number >= 0, got ${padding}`);
  }
  const size = box.getSize(new Vector3());
  const side = Math.max(size.x, size.y, size.z) + 2 * padding;
  return {
    center: box.getCenter(new Vector3()),
    side: side > 0 ? side : DEGENERATE_CUBE_SIDE,
  };
}

/** Capture the current world position of `object`. */
export function toObjectEntry<O extends Object3D>(object: O): ObjectEntry<O> {
  return { object, position: object.getWorldPosition(new Vector3()) };
}

/**
 * Index scene objects by world position and split leaves down to the
 * configured capacity. With no `cube` given, the root cube is fitted to the
 * objects so every one of them is in bounds. Objects sharing one world
 * position (fresh `Object3D`s all sit at the origin) stay together in a
 * single leaf, whatever the capacity.
 */
export function indexObjects<O extends Object3D>(
  objects: Iterable<O>,
  options: IndexObjectsOptions = {},
): Octree<ObjectEntry<O>> {
  const { cube, padding = 1, ...treeOptions } = options;
  const entries = Array.from(objects, (object) => toObjectEntry(object));
  const root =
    cube ??
    (entries.length > 0
      ? cubeFromBox3(new Box3().setFromPoints(entries.map((entry) => entry.position)), padding)
      : { center: new Vector3(), side: 1 });
  const tree = Octree.from(entries, { ...treeOptions, center: root.center, side: root.side });
  return tree.split(bySeparableCapacity<ObjectEntry<O>>(tree.options.capacity));
}
