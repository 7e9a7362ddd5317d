import type { Pos } from '@sml/ast';

export const TokenKind = {
  Error: 0, // value is the message
  Bool: 1, // true, false
  Complex: 2, // 1+2i as a single literal
  EOF: 3,
  Identifier: 4,
  LeftParen: 5, // (
  Number: 6, // simple number, including imaginary
  RightParen: 7, // )
  Space: 8, // run of whitespace
  String: 9, // quoted string, quotes included
  Diff: 10, // -
  Intersection: 11, // &&
  Union: 12, // ||
  Location: 13, // @
  // Keywords sort after this marker.
  Keyword: 14,
  Rect: 15, // rect
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];

export type Token = {
  kind: TokenKind;
  pos: Pos; // offset of the first character
  value: string; // source text, or the message for Error
};

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['rect', TokenKind.Rect],
]);

const KIND_NAMES: Record<TokenKind, string> = {
  [TokenKind.Error]: 'error',
  [TokenKind.Bool]: 'boolean',
  [TokenKind.Complex]: 'complex number',
  [TokenKind.EOF]: 'EOF',
  [TokenKind.Identifier]: 'identifier',
  [TokenKind.LeftParen]: 'left paren',
  [TokenKind.Number]: 'number',
  [TokenKind.RightParen]: 'right paren',
  [TokenKind.Space]: 'space',
  [TokenKind.String]: 'string',
  [TokenKind.Diff]: 'diff',
  [TokenKind.Intersection]: 'intersection',
  [TokenKind.Union]: 'union',
  [TokenKind.Location]: 'location',
  [TokenKind.Keyword]: 'keyword',
  [TokenKind.Rect]: 'rect',
};

export function tokenKindName(kind: TokenKind): string {
  return KIND_NAMES[kind];
}

export function isKeyword(kind: TokenKind): boolean {
  return kind > TokenKind.Keyword;
}

/** Diagnostic rendering of a token. */
export function formatToken(tok: Token): string {
  if (tok.kind === TokenKind.EOF) return 'EOF';
  if (tok.kind === TokenKind.Error) return tok.value;
  if (isKeyword(tok.kind)) return `<${tok.value}>`;
  if (tok.value.length > 10) return `${JSON.stringify(tok.value.slice(0, 10))}...`;
  return JSON.stringify(tok.value);
}
