import { AXES, oppositeOctant, octantOf, type Octant } from './octant.js';
import { childOf, type OctreeInternal, type OctreeNode } from './octree-node.js';
import { vec3DistanceSq, type Positioned, type Vec3Like } from './vec3.js';

/**
 * Entities of the leaf that `pos` routes to. Descends by octant comparison
 * only: a position outside the root cube still reaches some boundary leaf.
 */
export function locate<T>(tree: OctreeNode<T>, pos: Vec3Like): readonly T[] {
  let node = tree;
  while (node.kind === 'internal') {
    node = childOf(node, octantOf(node.center, pos));
  }
  return node.entities;
}

/**
 * True when the sphere of `radius` around `pos` lies strictly inside the
 * cube of `node` on all six faces.
 */
export function sphereWithinBounds<T>(node: OctreeNode<T>, pos: Vec3Like, radius: number): boolean {
  const half = node.side / 2;
  for (const axis of AXES) {
    const d = pos[axis] - node.center[axis];
    if (!(-half < d - radius && half > d + radius)) return false;
  }
  return true;
}

/**
 * Octants of `node` whose cubes may hold a point closer than `radius` to
 * `pos`. The octant containing `pos` comes first; on each axis where the
 * sphere crosses the splitting plane the mirrored octants are added, x
 * varying fastest. A radius larger than the node's side selects all 8.
 */
export function candidateOctants<T>(node: OctreeInternal<T>, pos: Vec3Like, radius: number): Octant[] {
  if (radius > node.side) {
    return [0, 1, 2, 3, 4, 5, 6, 7];
  }
  let octants: Octant[] = [octantOf(node.center, pos)];
  for (const axis of AXES) {
    if (radius > Math.abs(pos[axis] - node.center[axis])) {
      octants = [...octants, ...octants.map((o) => oppositeOctant(o, axis))];
    }
  }
  return octants;
}

/** Children of `node` that a sphere query must visit; a leaf is its own sole candidate. */
export function candidateChildren<T>(node: OctreeNode<T>, pos: Vec3Like, radius: number): OctreeNode<T>[] {
  if (node.kind === 'leaf') return [node];
  return candidateOctants(node, pos, radius).map((o) => childOf(node, o));
}

/** True when every point of the cube of `node` is closer than `radius` to `pos`. */
function cubeWithinSphere<T>(node: OctreeNode<T>, pos: Vec3Like, radius: number): boolean {
  const half = node.side / 2;
  let farthestSq = 0;
  for (const axis of AXES) {
    const d = Math.abs(pos[axis] - node.center[axis]) + half;
    farthestSq += d * d;
  }
  return farthestSq < radius * radius;
}

/**
 * All entities strictly closer than `radius` to `pos`, in no particular order.
 * Each entity is reported once, since leaves partition the population.
 */
export function collectWithinRadius<T extends Positioned>(
  tree: OctreeNode<T>,
  pos: Vec3Like,
  radius: number,
): T[] {
  if (!(radius > 0)) return [];
  const results: T[] = [];
  const visit = (node: OctreeNode<T>): void => {
    if (node.kind === 'internal') {
      for (const child of candidateChildren(node, pos, radius)) visit(child);
      return;
    }
    if (node.count === 0) return;
    // Whole-leaf shortcut relies on entities lying inside their leaf's cube.
    if (cubeWithinSphere(node, pos, radius)) {
      for (const entity of node.entities) results.push(entity);
      return;
    }
    const radiusSq = radius * radius;
    for (const entity of node.entities) {
      if (radiusSq > vec3DistanceSq(pos, entity.position)) results.push(entity);
    }
  };
  visit(tree);
  return results;
}
