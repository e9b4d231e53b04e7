export { cubeFromBox3, indexObjects, toObjectEntry, DEGENERATE_CUBE_SIDE } from './objects.js';
export type { Cube, ObjectEntry, IndexObjectsOptions } from './objects.js';
export { ThreeSynchronizer } from './synchronizer.js';
