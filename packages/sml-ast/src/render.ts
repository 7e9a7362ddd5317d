import type { Node, OperatorNode, OperatorType } from './index';
import { isObject, isOperator } from './guards';

export const OPERATOR_SYMBOLS: Record<OperatorType, string> = {
  Diff: '-',
  Intersection: '&&',
  Union: '||',
};

// Binding strength; higher binds tighter.
const PRECEDENCE: Record<OperatorType, number> = {
  Union: 1,
  Intersection: 2,
  Diff: 2,
};

function renderOperand(child: Node, parent: OperatorNode, right: boolean): string {
  const text = render(child);
  if (!isOperator(child)) return text;
  const cp = PRECEDENCE[child.type];
  const pp = PRECEDENCE[parent.type];
  // Operators fold left, so an equal-precedence right operand needs its parens back.
  return cp < pp || (right && cp === pp) ? `(${text})` : text;
}

function renderParam(param: Node): string {
  const text = render(param);
  const grouped =
    isOperator(param) ||
    (isObject(param) && (param.params.length > 0 || param.locationParams !== null));
  return grouped ? `(${text})` : text;
}

/** Source-like text for a node. Parsing the rendering of a parsed tree renders the same. */
export function render(node: Node): string {
  switch (node.type) {
    case 'List':
      return node.nodes.map((n) => `(${render(n)})`).join('');
    case 'Number':
      return node.text;
    case 'Diff':
    case 'Intersection':
    case 'Union':
      return `${renderOperand(node.left, node, false)} ${OPERATOR_SYMBOLS[node.type]} ${renderOperand(node.right, node, true)}`;
    case 'Object': {
      const parts = [node.ident, ...node.params.map(renderParam)];
      if (node.locationParams !== null) {
        parts.push('@', ...node.locationParams.map(renderParam));
      }
      return parts.join(' ');
    }
  }
}
