import type { OctreeNode } from './octree-node.js';
import { formatVec3, type Positioned } from './vec3.js';

const INDENT = '  ';

/**
 * Human-readable, indented dump of a tree for tracing. One header line per
 * node, then either the 8 children or one line per entity.
 */
export function describeTree<T extends Positioned>(
  tree: OctreeNode<T>,
  formatEntity: (entity: T) => string = (entity) => formatVec3(entity.position),
): string {
  const lines: string[] = [];
  const visit = (node: OctreeNode<T>, depth: number): void => {
    const pad = INDENT.repeat(depth);
    const label = node.kind === 'leaf' ? 'Leaf' : 'Internal';
    lines.push(`${pad}${label} center=${formatVec3(node.center)} side=${node.side} count=${node.count}`);
    if (node.kind === 'leaf') {
      for (const entity of node.entities) lines.push(`${pad}${INDENT}${formatEntity(entity)}`);
    } else {
      for (const child of node.children) visit(child, depth + 1);
    }
  };
  visit(tree, 0);
  return lines.join('\n');
}
