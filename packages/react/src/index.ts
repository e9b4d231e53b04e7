import { useMemo } from 'react';
import { Octree, bySeparableCapacity } from '@flockindex/core';
import type { OctreeOptions, Positioned } from '@flockindex/core';

/**
 * Build an octree snapshot over `entities`, split down to the configured
 * capacity except where entities share one position. This is what
 * `useOctree` memoises; it is exported for callers outside React.
 */
export function buildOctree<T extends Positioned>(
  entities: readonly T[],
  options: OctreeOptions,
): Octree<T> {
  const tree = Octree.from(entities, options);
  return tree.split(bySeparableCapacity<T>(tree.options.capacity));
}

/**
 * React hook returning an octree snapshot of `entities`. The snapshot is
 * rebuilt only when the `entities` array identity or one of the option
 * values changes, so pass a new array when the population moves (for
 * example once per simulation step) and the same array otherwise.
 *
 * Snapshots are immutable and can be handed to child components or kept
 * across renders without copying.
 */
export function useOctree<T extends Positioned>(
  entities: readonly T[],
  options: OctreeOptions,
): Octree<T> {
  const { center, side, bounds, capacity, maxDepth, minSide } = options;
  const { x, y, z } = center;

  return useMemo(
    () => buildOctree(entities, { center: { x, y, z }, side, bounds, capacity, maxDepth, minSide }),
    [entities, x, y, z, side, bounds, capacity, maxDepth, minSide],
  );
}
