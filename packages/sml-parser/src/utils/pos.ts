import type { Pos, Position } from '@sml/ast';

export function makePos(offset: number, line: number, column: number): Position {
  return { offset, line, column };
}

// Line and column (both 1-based) of an offset; offsets past the end clamp to it.
export function positionAt(input: string, offset: Pos): Position {
  const end = Math.min(Math.max(offset, 0), input.length);
  let line = 1;
  let column = 1;
  for (let i = 0; i < end; i++) {
    if (input.charCodeAt(i) === 10 /* \n */) {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
  }
  return makePos(end, line, column);
}
