import type { StructuredNode } from './types';
import * as errors from './errors';
import * as constants from './constants';
import * as utils from './utils';

/**
 * Walks `path` segment by segment starting at `start`. Empty and `.` segments
 * are skipped, `..` moves to the parent, and every other segment is handed to
 * `step` to produce the child. The walk fails with `ErrorVFSNotFound` on the
 * first segment that `step` cannot satisfy, or when `..` climbs past the top
 * of the tree.
 */
function walk<T extends StructuredNode<T>>(
  start: T,
  path: string,
  step: (node: T, name: string) => T | undefined,
): T {
  let current = start;
  for (const segment of utils.splitPath(path)) {
    if (segment === constants.CURRENT_SEGMENT) continue;
    if (segment === constants.PARENT_SEGMENT) {
      if (current.parent == null) {
        throw new errors.ErrorVFSNotFound(
          `Cannot resolve ${path}: ${current} has no parent`,
        );
      }
      current = current.parent;
      continue;
    }
    const next = step(current, segment);
    if (next == null) {
      throw new errors.ErrorVFSNotFound(`${current} has no child: ${segment}`);
    }
    current = next;
  }
  return current;
}

/**
 * Finds a descendant of `start` by asking each node for its direct child.
 */
function findChild<T extends StructuredNode<T>>(start: T, path: string): T {
  return walk(start, path, (node, name) => node.getDirectChild(name));
}

export { walk, findChild };
