import type { BinaryNode, ListNode, Node, NumberNode, ObjectNode, OperatorType, Tree } from './index';

// Deep copies. A copy shares no node, array or value object with its source.

export function copyList(list: ListNode): ListNode {
  return { type: 'List', pos: list.pos, nodes: list.nodes.map(copy) };
}

export function copyNumber(n: NumberNode): NumberNode {
  return { ...n, complex128: { ...n.complex128 } };
}

export function copyBinary<T extends OperatorType>(n: BinaryNode<T>): BinaryNode<T> {
  return { type: n.type, pos: n.pos, left: copy(n.left), right: copy(n.right) };
}

export function copyObject(o: ObjectNode): ObjectNode {
  return {
    type: 'Object',
    pos: o.pos,
    ident: o.ident,
    params: o.params.map(copy),
    locationParams: o.locationParams ? o.locationParams.map(copy) : null,
  };
}

export function copy(node: Node): Node {
  switch (node.type) {
    case 'List':
      return copyList(node);
    case 'Number':
      return copyNumber(node);
    case 'Diff':
    case 'Intersection':
    case 'Union':
      return copyBinary(node);
    case 'Object':
      return copyObject(node);
  }
}

export function copyTree(tree: Tree): Tree {
  return { name: tree.name, text: tree.text, root: copy(tree.root) };
}
