import type {
  DiffNode,
  IntersectionNode,
  ListNode,
  Node,
  NumberNode,
  ObjectNode,
  OperatorNode,
  UnionNode,
} from './index';

export const isList = (n: Node): n is ListNode => n.type === 'List';
export const isNumber = (n: Node): n is NumberNode => n.type === 'Number';
export const isObject = (n: Node): n is ObjectNode => n.type === 'Object';

// Operators
export const isDiff = (n: Node): n is DiffNode => n.type === 'Diff';
export const isIntersection = (n: Node): n is IntersectionNode => n.type === 'Intersection';
export const isUnion = (n: Node): n is UnionNode => n.type === 'Union';
export const isOperator = (n: Node): n is OperatorNode => isDiff(n) || isIntersection(n) || isUnion(n);
