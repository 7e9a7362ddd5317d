import {
  createBinary,
  createNumber,
  createObject,
  MAX_DEPTH,
  type Node,
  type NumberNode,
  type ObjectNode,
  type Pos,
  type Tree,
} from '@sml/ast';
import { resolveParseOptions } from './config';
import { ParseError } from './errors';
import { Scanner } from './scanner';
import { formatToken, isKeyword, tokenKindName, TokenKind, type Token } from './token';
import type { ParseOptions } from './types';

const isNumberToken = (tok: Token): boolean => tok.kind === TokenKind.Number || tok.kind === TokenKind.Complex;

// `rect` and any later keyword are plain identifiers at the grammar level.
const isWordToken = (tok: Token): boolean => tok.kind === TokenKind.Identifier || isKeyword(tok.kind);

/**
 * Parse one document.
 *
 * ```
 * expression := term ( '||' term )*
 * term       := factor ( ('&&' | '-') factor )*
 * factor     := NUMBER | object | '(' expression ')'
 * object     := IDENTIFIER param* ( '@' param* )?
 * param      := NUMBER | IDENTIFIER | '(' expression ')'
 * ```
 *
 * Throws a ParseError at the first scanner or grammar error.
 */
export function parse(name: string, text: string, opts: ParseOptions = {}): Tree {
  const { debug, log, signal } = resolveParseOptions(opts, 'parser');
  if (debug) log(`parse start ${name} (len=${text.length})`);
  const scanner = new Scanner(name, text);
  let lookahead: Token | null = null;
  let lastPos: Pos = 0;
  let depth = 0; // open groups

  function fail(detail: string, pos: Pos, cause?: unknown): never {
    throw new ParseError(detail, name, text, pos, cause === undefined ? undefined : { cause });
  }

  // Next significant token; spaces only separate grammatical units.
  function pull(): Token {
    for (;;) {
      if (signal?.aborted) fail('parse cancelled', lastPos, signal.reason);
      const tok = scanner.nextToken();
      if (tok.kind === TokenKind.Space) continue;
      if (tok.kind === TokenKind.Error) fail(tok.value, tok.pos);
      lastPos = tok.pos;
      return tok;
    }
  }

  function peek(): Token {
    if (lookahead === null) lookahead = pull();
    return lookahead;
  }

  function next(): Token {
    const tok = peek();
    lookahead = null;
    return tok;
  }

  function number(tok: Token): NumberNode {
    const n = createNumber(tok.pos, tok.value, tok.kind === TokenKind.Complex);
    if (!n) fail(`illegal number syntax: ${JSON.stringify(tok.value)}`, tok.pos);
    return n;
  }

  function expression(): Node {
    let left = term();
    while (peek().kind === TokenKind.Union) {
      next();
      const right = term();
      left = createBinary('Union', left.pos, left, right);
    }
    return left;
  }

  function term(): Node {
    let left = factor();
    for (;;) {
      const op = peek();
      if (op.kind === TokenKind.Intersection) {
        next();
        const right = factor();
        left = createBinary('Intersection', left.pos, left, right);
      } else if (op.kind === TokenKind.Diff) {
        next();
        const right = factor();
        left = createBinary('Diff', left.pos, left, right);
      } else {
        return left;
      }
    }
  }

  function factor(): Node {
    const tok = peek();
    if (isNumberToken(tok)) return number(next());
    if (isWordToken(tok)) return object();
    if (tok.kind === TokenKind.LeftParen) return group();
    fail(`unexpected ${formatToken(tok)} in operand`, tok.pos);
  }

  function group(): Node {
    const open = next();
    if (++depth > MAX_DEPTH) fail('expression nested too deeply', open.pos);
    const inner = expression();
    const close = next();
    if (close.kind === TokenKind.EOF) {
      fail(`unclosed ${tokenKindName(TokenKind.LeftParen)}: unexpected EOF`, close.pos);
    }
    if (close.kind !== TokenKind.RightParen) {
      fail(`unexpected ${formatToken(close)} in parenthesized expression`, close.pos);
    }
    depth--;
    return inner;
  }

  function object(): ObjectNode {
    const ident = next();
    const params = paramList();
    let locationParams: Node[] | null = null;
    if (peek().kind === TokenKind.Location) {
      next();
      locationParams = paramList();
    }
    return createObject(ident.pos, ident.value, params, locationParams);
  }

  function paramList(): Node[] {
    const params: Node[] = [];
    for (;;) {
      const tok = peek();
      if (isNumberToken(tok)) {
        params.push(number(next()));
      } else if (isWordToken(tok)) {
        next();
        params.push(createObject(tok.pos, tok.value));
      } else if (tok.kind === TokenKind.LeftParen) {
        params.push(group());
      } else {
        return params;
      }
    }
  }

  const root = expression();
  const end = next();
  if (end.kind !== TokenKind.EOF) fail(`unexpected ${formatToken(end)} after expression`, end.pos);
  if (debug) log(`parse done ${name} (root=${root.type})`);
  return { name, text, root };
}
