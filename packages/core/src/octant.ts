/**
 * Octant addressing.
 *
 * An octant code packs three axis comparisons against a node center:
 *
 *   bit 0 (1): pos.x < center.x
 *   bit 1 (2): pos.y < center.y
 *   bit 2 (4): pos.z < center.z
 *
 * Equality on an axis leaves the bit clear, so a point lying exactly on a
 * splitting plane always belongs to the upper half. Changing this moves
 * boundary points into different leaves.
 */

import { vec3, type Vec3Like } from './vec3.js';

export type Octant = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type Axis = 'x' | 'y' | 'z';

export const AXIS_BIT = {
  x: 1,
  y: 2,
  z: 4,
} as const satisfies Record<Axis, number>;

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export const OCTANTS: readonly Octant[] = [0, 1, 2, 3, 4, 5, 6, 7];

/** A fixed-size tuple holding one value per octant, indexed by the octant code. */
export type Octuple<V> = readonly [V, V, V, V, V, V, V, V];

/** Build an Octuple by evaluating `make` for every octant in code order. */
export function octuple<V>(make: (octant: Octant) => V): Octuple<V> {
  return [make(0), make(1), make(2), make(3), make(4), make(5), make(6), make(7)];
}

/** Octant of `pos` relative to `center`. */
export function octantOf(center: Vec3Like, pos: Vec3Like): Octant {
  let code = 0;
  if (pos.x < center.x) code |= AXIS_BIT.x;
  if (pos.y < center.y) code |= AXIS_BIT.y;
  if (pos.z < center.z) code |= AXIS_BIT.z;
  return toOctant(code);
}

/** Mirror an octant across the splitting plane of `axis`. */
export function oppositeOctant(octant: Octant, axis: Axis): Octant {
  return toOctant(octant ^ AXIS_BIT[axis]);
}

/** True when `octant` lies on the lower (less-than) side of `axis`. */
export function isLowerHalf(octant: Octant, axis: Axis): boolean {
  return (octant & AXIS_BIT[axis]) !== 0;
}

/**
 * Center of the child cube for `octant` inside a cube of the given `side`.
 * Children have side `side / 2`, so their centers sit `side / 4` away from
 * the parent center on every axis.
 */
export function octantCenter(center: Vec3Like, side: number, octant: Octant): Vec3Like {
  const q = side / 4;
  return vec3(
    center.x + (isLowerHalf(octant, 'x') ? -q : q),
    center.y + (isLowerHalf(octant, 'y') ? -q : q),
    center.z + (isLowerHalf(octant, 'z') ? -q : q),
  );
}

function toOctant(code: number): Octant {
  const octant = OCTANTS[code & 7];
  if (octant === undefined) {
    throw new RangeError(`toOctant: ${code} is not an octant code`);
  }
  return octant;
}
