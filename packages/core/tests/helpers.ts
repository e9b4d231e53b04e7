import { vec3, vec3Distance, vec3DistanceSq } from '../src/vec3.js';
import type { Vec3Like } from '../src/vec3.js';
import type { OctreeNode } from '../src/octree-node.js';
import type { Neighbor } from '../src/nearest.js';

export interface Boid {
  readonly id: number;
  readonly position: Vec3Like;
}

export function boid(id: number, x: number, y: number, z: number): Boid {
  return { id, position: vec3(x, y, z) };
}

/** Deterministic LCG in [0, 1]. */
export function makeRandom(seed: number): () => number {
  let state = seed;
  return (): number => {
    state = (state * 1664525 + 1013904223) & 0xffffffff;
    return (state >>> 0) / 0xffffffff;
  };
}

/** `count` boids with coordinates in [-half, half]. */
export function randomBoids(count: number, rand: () => number, half: number): Boid[] {
  const boids: Boid[] = [];
  for (let id = 0; id < count; id++) {
    boids.push(boid(id, rand() * 2 * half - half, rand() * 2 * half - half, rand() * 2 * half - half));
  }
  return boids;
}

export function randomPoint(rand: () => number, half: number): Vec3Like {
  return vec3(rand() * 2 * half - half, rand() * 2 * half - half, rand() * 2 * half - half);
}

/**
 * Walk the whole tree, checking every node's count against what it actually
 * holds. Returns the number of entities reached.
 */
export function checkedCount<T>(node: OctreeNode<T>): number {
  if (node.kind === 'leaf') {
    if (node.count !== node.entities.length) {
      throw new Error(`leaf count ${node.count} != ${node.entities.length} entities`);
    }
    return node.count;
  }
  let total = 0;
  for (const child of node.children) total += checkedCount(child);
  if (node.count !== total) {
    throw new Error(`internal count ${node.count} != ${total} reachable entities`);
  }
  return total;
}

export function bruteForceWithinRadius(boids: readonly Boid[], pos: Vec3Like, radius: number): number[] {
  return boids
    .filter((b) => vec3DistanceSq(pos, b.position) < radius * radius)
    .map((b) => b.id)
    .sort((a, b) => a - b);
}

export function bruteForceNearest(
  boids: readonly Boid[],
  pos: Vec3Like,
  k: number,
  maxRadius: number,
): Neighbor<Boid>[] {
  return boids
    .map((entity) => ({ entity, distance: vec3Distance(entity.position, pos) }))
    .filter((n) => n.distance < maxRadius)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, k);
}

export function ids(boids: Iterable<Boid>): number[] {
  return Array.from(boids, (b) => b.id).sort((a, b) => a - b);
}
