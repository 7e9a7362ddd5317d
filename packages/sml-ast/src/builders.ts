import type { BinaryNode, ListNode, Node, ObjectNode, OperatorType, Pos } from './index';

export function createList(pos: Pos, nodes: Node[] = []): ListNode {
  return { type: 'List', pos, nodes };
}

// Lists are assembled in two phases: create, then append children in order.
export function appendNode(list: ListNode, node: Node): void {
  list.nodes.push(node);
}

export function createBinary<T extends OperatorType>(type: T, pos: Pos, left: Node, right: Node): BinaryNode<T> {
  return { type, pos, left, right };
}

export function createObject(
  pos: Pos,
  ident: string,
  params: Node[] = [],
  locationParams: Node[] | null = null,
): ObjectNode {
  return { type: 'Object', pos, ident, params, locationParams };
}
