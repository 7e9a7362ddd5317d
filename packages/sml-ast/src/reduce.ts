import type { Node, Tree } from './index';
import { appendNode, createList } from './builders';
import { copy, copyList } from './copy';
import { ReduceError } from './errors';

export type ReduceOptions = {
  signal?: AbortSignal;
};

/** Deepest nesting parse and reduce accept. */
export const MAX_DEPTH = 1000;

/**
 * Structural simplification. Never mutates `node`; the result shares nothing with it.
 *
 * Operators are not evaluated: each one becomes a list of its two reduced operands.
 */
export function reduce(node: Node, opts: ReduceOptions = {}): Node {
  return reduceAt(node, opts, 0);
}

function reduceAt(node: Node, opts: ReduceOptions, depth: number): Node {
  const { signal } = opts;
  if (signal?.aborted) {
    throw new ReduceError('reduction cancelled', node.pos, { cause: signal.reason });
  }
  if (depth > MAX_DEPTH) throw new ReduceError('expression nested too deeply', node.pos);
  switch (node.type) {
    case 'List': {
      const list = copyList(node);
      for (let i = 0; i < list.nodes.length; i++) {
        list.nodes[i] = reduceAt(list.nodes[i], opts, depth + 1);
      }
      return list;
    }
    case 'Number':
    case 'Object':
      return copy(node);
    case 'Diff':
    case 'Intersection':
    case 'Union': {
      const list = createList(node.pos);
      appendNode(list, reduceAt(node.left, opts, depth + 1));
      appendNode(list, reduceAt(node.right, opts, depth + 1));
      return list;
    }
  }
}

export function reduceTree(tree: Tree, opts: ReduceOptions = {}): Tree {
  return { name: tree.name, text: tree.text, root: reduce(tree.root, opts) };
}
