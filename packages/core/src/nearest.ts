import { octantOf } from './octant.js';
import { childOf, type OctreeNode } from './octree-node.js';
import { candidateOctants, sphereWithinBounds } from './query.js';
import { vec3Distance, type Positioned, type Vec3Like } from './vec3.js';

export interface Neighbor<T> {
  readonly entity: T;
  readonly distance: number;
}

/**
 * Merge `incoming` into the ascending list `current`, keeping at most `k`
 * entries. An incoming neighbor goes after every current entry at the same
 * distance, so the result does not depend on which subtree finished first.
 */
export function mergeNeighbors<T>(
  current: readonly Neighbor<T>[],
  incoming: readonly Neighbor<T>[],
  k: number,
): Neighbor<T>[] {
  const merged: Neighbor<T>[] = [];
  let i = 0;
  let j = 0;
  while (merged.length < k && (i < current.length || j < incoming.length)) {
    const a = current[i];
    const b = incoming[j];
    if (a !== undefined && (b === undefined || a.distance <= b.distance)) {
      merged.push(a);
      i++;
    } else if (b !== undefined) {
      merged.push(b);
      j++;
    }
  }
  return merged;
}

/** Distance of the farthest kept neighbor once the list is full, else `maxRadius`. */
function pruningRadius<T>(found: readonly Neighbor<T>[], k: number, maxRadius: number): number {
  const last = found[found.length - 1];
  return found.length >= k && last !== undefined ? last.distance : maxRadius;
}

function search<T extends Positioned>(
  node: OctreeNode<T>,
  pos: Vec3Like,
  k: number,
  maxRadius: number,
): Neighbor<T>[] {
  if (node.kind === 'leaf') {
    const found: Neighbor<T>[] = [];
    for (const entity of node.entities) {
      const distance = vec3Distance(entity.position, pos);
      if (distance < maxRadius) found.push({ entity, distance });
    }
    // Array.prototype.sort is stable, so equal distances keep insertion order.
    found.sort((a, b) => a.distance - b.distance);
    return found.slice(0, k);
  }

  // Search the octant holding `pos` first; it usually yields the tightest radius.
  const own = octantOf(node.center, pos);
  const ownChild = childOf(node, own);
  let found = search(ownChild, pos, k, maxRadius);
  const radius = pruningRadius(found, k, maxRadius);
  if (found.length >= k && sphereWithinBounds(ownChild, pos, radius)) {
    return found;
  }

  for (const octant of candidateOctants(node, pos, radius)) {
    if (octant === own) continue;
    const bound = pruningRadius(found, k, radius);
    found = mergeNeighbors(found, search(childOf(node, octant), pos, k, bound), k);
  }
  return found;
}

/**
 * Up to `k` entities strictly closer than `maxRadius` to `pos`, ascending by
 * distance. Fewer are returned when fewer lie within range. `k` is floored;
 * a non-positive `k` or `maxRadius` gives an empty list.
 */
export function kNearest<T extends Positioned>(
  tree: OctreeNode<T>,
  pos: Vec3Like,
  k: number,
  maxRadius: number,
): Neighbor<T>[] {
  const limit = Math.floor(k);
  if (!(limit > 0) || !(maxRadius > 0)) return [];
  return search(tree, pos, limit, maxRadius);
}
