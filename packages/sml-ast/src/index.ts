/**
 * Typed syntax tree for SML documents.
 * Nodes are plain tagged objects; copy, reduce and render live beside them.
 */

export type Pos = number; // 0-based offset into the source text

export type Position = {
  offset: number; // 0-based absolute offset
  line: number;   // 1-based
  column: number; // 1-based
};

export type BaseNode = {
  type: string;
  pos: Pos;
};

export type ListNode = BaseNode & {
  type: 'List';
  nodes: Node[]; // lexical order
};

export type Complex = {
  re: number;
  im: number;
};

/**
 * A numeric literal kept under every representation that holds it exactly.
 * Flags say which of the value fields are meaningful.
 */
export type NumberNode = BaseNode & {
  type: 'Number';
  isInt: boolean;
  isUint: boolean;
  isFloat: boolean;
  isComplex: boolean;
  int64: bigint;
  uint64: bigint;
  float64: number;
  complex128: Complex;
  text: string; // literal as written
};

export type OperatorType = 'Diff' | 'Intersection' | 'Union';

export type BinaryNode<T extends OperatorType> = BaseNode & {
  type: T;
  left: Node;
  right: Node;
};

export type DiffNode = BinaryNode<'Diff'>;
export type IntersectionNode = BinaryNode<'Intersection'>;
export type UnionNode = BinaryNode<'Union'>;

export type OperatorNode = DiffNode | IntersectionNode | UnionNode;

export type ObjectNode = BaseNode & {
  type: 'Object';
  ident: string;
  params: Node[];
  locationParams: Node[] | null; // null when there is no `@` clause
};

export type Node =
  | ListNode
  | NumberNode
  | DiffNode
  | IntersectionNode
  | UnionNode
  | ObjectNode;

export type NodeType = Node['type'];

export type Tree = {
  name: string;
  text: string;
  root: Node;
};

export * from './guards';
export * from './builders';
export * from './number';
export * from './copy';
export * from './reduce';
export * from './render';
export * from './errors';
