/**
 * Vec3 Utilities
 *
 * Structural 3D point math. Anything with numeric `x`, `y`, `z` fields
 * (including a `THREE.Vector3`) is accepted; results are plain frozen points.
 */

export interface Vec3Like {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** An entity the octree can index. Every other field is opaque to the core. */
export interface Positioned {
  readonly position: Vec3Like;
}

/** Create a frozen point. */
export function vec3(x: number, y: number, z: number): Vec3Like {
  return Object.freeze({ x, y, z });
}

/** Component-wise `a - b`. */
export function vec3Sub(a: Vec3Like, b: Vec3Like): Vec3Like {
  return vec3(a.x - b.x, a.y - b.y, a.z - b.z);
}

export function vec3LengthSq(v: Vec3Like): number {
  return v.x * v.x + v.y * v.y + v.z * v.z;
}

export function vec3Length(v: Vec3Like): number {
  return Math.sqrt(vec3LengthSq(v));
}

/**
 * Squared distance between `a` and `b`. Avoids allocating the difference
 * vector, since this sits on the hot path of every radius filter.
 */
export function vec3DistanceSq(a: Vec3Like, b: Vec3Like): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return dx * dx + dy * dy + dz * dz;
}

export function vec3Distance(a: Vec3Like, b: Vec3Like): number {
  return Math.sqrt(vec3DistanceSq(a, b));
}

export function vec3Equals(a: Vec3Like, b: Vec3Like): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatVec3(v: Vec3Like): string {
  return `(${v.x}, ${v.y}, ${v.z})`;
}
