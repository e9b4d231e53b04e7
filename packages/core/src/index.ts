export { Octree } from './octree.js';
export { resolveOptions, DEFAULT_CAPACITY } from './options.js';
export type { OctreeOptions, ResolvedOctreeOptions, BoundsPolicy } from './options.js';
export { OutOfBoundsError, OctreeSplitError } from './errors.js';
export {
  vec3,
  vec3Sub,
  vec3LengthSq,
  vec3Length,
  vec3DistanceSq,
  vec3Distance,
  vec3Equals,
  formatVec3,
} from './vec3.js';
export type { Vec3Like, Positioned } from './vec3.js';
export {
  AXES,
  AXIS_BIT,
  OCTANTS,
  octantOf,
  oppositeOctant,
  octantCenter,
  isLowerHalf,
  octuple,
} from './octant.js';
export type { Octant, Axis, Octuple } from './octant.js';
export {
  emptyTree,
  emptyInternal,
  makeLeaf,
  makeInternal,
  isLeaf,
  childOf,
  replaceChild,
} from './octree-node.js';
export type { OctreeNode, OctreeLeaf, OctreeInternal } from './octree-node.js';
export { insert, insertAll, fromEntities, entitiesOf, foldTree, clearTree, mapTree } from './insert.js';
export {
  splitLeaf,
  splitWhere,
  byCapacity,
  bySeparableCapacity,
  allCoincident,
  DEFAULT_MAX_DEPTH,
} from './split.js';
export type { SplitPredicate, SplitLimits } from './split.js';
export {
  locate,
  sphereWithinBounds,
  candidateOctants,
  candidateChildren,
  collectWithinRadius,
} from './query.js';
export { kNearest, mergeNeighbors } from './nearest.js';
export type { Neighbor } from './nearest.js';
export { describeTree } from './describe.js';
