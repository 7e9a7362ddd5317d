// Chevrotain-based parser for SML that directly builds the AST.
import {
  createBinary,
  createNumber,
  createObject,
  MAX_DEPTH,
  type Node,
  type NumberNode,
  type ObjectNode,
  type Tree,
} from '@sml/ast';
import { EmbeddedActionsParser, type IToken } from 'chevrotain';
import { resolveParseOptions } from '../config';
import { ParseError } from '../errors';
import type { ParseOptions } from '../types';
import {
  AllTokens,
  ComplexNumber,
  Diff,
  Intersection,
  Location,
  LParen,
  NumberLike,
  RParen,
  SmlLexer,
  Union,
  Word,
} from './tokens';

type Source = { name: string; text: string };

class SmlGrammar extends EmbeddedActionsParser {
  source: Source = { name: '', text: '' };

  constructor() {
    super(AllTokens);
    this.performSelfAnalysis();
  }

  private number(tok: IToken): NumberNode {
    const n = createNumber(tok.startOffset, tok.image, tok.tokenType === ComplexNumber);
    if (!n) {
      throw new ParseError(`illegal number syntax: ${JSON.stringify(tok.image)}`, this.source.name, this.source.text, tok.startOffset);
    }
    return n;
  }

  public expression = this.RULE('expression', (): Node => {
    let left = this.SUBRULE(this.term);
    this.MANY(() => {
      this.CONSUME(Union);
      const right = this.SUBRULE2(this.term);
      left = this.ACTION(() => createBinary('Union', left.pos, left, right));
    });
    return left;
  });

  private term = this.RULE('term', (): Node => {
    let left = this.SUBRULE(this.factor);
    this.MANY(() => {
      const op = this.OR([
        { ALT: () => this.CONSUME(Intersection) },
        { ALT: () => this.CONSUME(Diff) },
      ]);
      const right = this.SUBRULE2(this.factor);
      left = this.ACTION(() =>
        createBinary(op.tokenType === Diff ? 'Diff' : 'Intersection', left.pos, left, right),
      );
    });
    return left;
  });

  private factor = this.RULE('factor', (): Node =>
    this.OR<Node>([
      {
        ALT: () => {
          const tok = this.CONSUME(NumberLike);
          return this.ACTION(() => this.number(tok));
        },
      },
      { ALT: () => this.SUBRULE(this.object) },
      { ALT: () => this.SUBRULE(this.group) },
    ]),
  );

  private group = this.RULE('group', (): Node => {
    this.CONSUME(LParen);
    const inner = this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    return inner;
  });

  private object = this.RULE('object', (): ObjectNode => {
    const ident = this.CONSUME(Word);
    const params: Node[] = [];
    let locationParams: Node[] | null = null;
    this.MANY(() => {
      const p = this.SUBRULE(this.param);
      this.ACTION(() => params.push(p));
    });
    this.OPTION(() => {
      this.CONSUME(Location);
      const located: Node[] = [];
      this.MANY2(() => {
        const p = this.SUBRULE2(this.param);
        this.ACTION(() => located.push(p));
      });
      locationParams = located;
    });
    return this.ACTION(() => createObject(ident.startOffset, ident.image, params, locationParams));
  });

  private param = this.RULE('param', (): Node =>
    this.OR<Node>([
      {
        ALT: () => {
          const tok = this.CONSUME(NumberLike);
          return this.ACTION(() => this.number(tok));
        },
      },
      {
        ALT: () => {
          const tok = this.CONSUME(Word);
          return this.ACTION(() => createObject(tok.startOffset, tok.image));
        },
      },
      { ALT: () => this.SUBRULE(this.group) },
    ]),
  );
}

// One instance is reused; parsing is synchronous, so runs never interleave.
const grammar = new SmlGrammar();

// The grammar recurses once per group; refuse input nested past the limit before parsing.
// Returns the offset of the deepest `(`.
function checkNesting(tokens: IToken[], name: string, text: string): number {
  let depth = 0;
  let max = 0;
  let deepest = 0;
  for (const tok of tokens) {
    if (tok.tokenType === LParen) {
      depth++;
      if (depth > MAX_DEPTH) throw new ParseError('expression nested too deeply', name, text, tok.startOffset);
      if (depth > max) {
        max = depth;
        deepest = tok.startOffset;
      }
    } else if (tok.tokenType === RParen) {
      depth--;
    }
  }
  return deepest;
}

function offsetOf(tok: IToken, text: string): number {
  return Number.isNaN(tok.startOffset) ? text.length : tok.startOffset;
}

export function parseChevrotain(name: string, text: string, opts: ParseOptions = {}): Tree {
  const { debug, log, signal } = resolveParseOptions(opts, 'parser-chev');
  if (debug) log(`lex start ${name} (len=${text.length})`);
  if (signal?.aborted) throw new ParseError('parse cancelled', name, text, 0, { cause: signal.reason });
  const lex = SmlLexer.tokenize(text);
  if (lex.errors.length) {
    const e = lex.errors[0];
    throw new ParseError(e.message, name, text, e.offset);
  }
  if (debug) log(`lex done ${name} (tokens=${lex.tokens.length})`);
  const deepest = checkNesting(lex.tokens, name, text);
  grammar.source = { name, text };
  grammar.input = lex.tokens;
  let root: Node;
  try {
    root = grammar.expression();
  } catch (e) {
    // Stack ran out below MAX_DEPTH.
    if (e instanceof RangeError) {
      throw new ParseError('expression nested too deeply', name, text, deepest, { cause: e });
    }
    throw e;
  }
  if (grammar.errors.length) {
    const e = grammar.errors[0];
    throw new ParseError(e.message, name, text, offsetOf(e.token, text));
  }
  if (debug) log(`parse done ${name} (root=${root.type})`);
  return { name, text, root };
}
