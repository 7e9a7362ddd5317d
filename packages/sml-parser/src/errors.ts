import type { Pos, Position } from '@sml/ast';
import { positionAt } from './utils/pos';

/**
 * First error of a parse. Scanner errors arrive here with their message unchanged
 * as `detail`; the message adds the document name and line/column.
 */
export class ParseError extends Error {
  readonly position: Position;

  constructor(
    readonly detail: string,
    readonly document: string,
    text: string,
    pos: Pos,
    options?: ErrorOptions,
  ) {
    const position = positionAt(text, pos);
    super(`${document}:${position.line}:${position.column}: ${detail}`, options);
    this.name = 'ParseError';
    this.position = position;
  }
}
