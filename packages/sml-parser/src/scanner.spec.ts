import { describe, it, expect } from 'vitest';
import { Scanner, TokenKind, type Token } from './index';

function scan(input: string): Token[] {
  return [...new Scanner('test', input)];
}

function kinds(input: string): TokenKind[] {
  return scan(input).map((t) => t.kind);
}

describe('scanner', () => {
  it('scans an object with a location clause', () => {
    const tokens = scan('rect 1 2 @ 3 4');

    expect(tokens.map((t) => t.kind)).toEqual([
      TokenKind.Rect,
      TokenKind.Space,
      TokenKind.Number,
      TokenKind.Space,
      TokenKind.Number,
      TokenKind.Space,
      TokenKind.Location,
      TokenKind.Space,
      TokenKind.Number,
      TokenKind.Space,
      TokenKind.Number,
      TokenKind.EOF,
    ]);
    expect(tokens[2]).toEqual({ kind: TokenKind.Number, pos: 5, value: '1' });
    expect(tokens[11]).toEqual({ kind: TokenKind.EOF, pos: 14, value: '' });
  });

  it('loses no text when there are no comments', () => {
    const inputs = ['(a && b) || c - 1', 'rect 1.5e3 -2 @ 0x1F 1+2i', '  x\t\n'];

    for (const input of inputs) {
      const tokens = scan(input);

      expect(tokens.map((t) => t.value).join('')).toBe(input);
      expect(tokens.filter((t) => t.kind === TokenKind.EOF)).toHaveLength(1);
      expect(tokens[tokens.length - 1].kind).toBe(TokenKind.EOF);
    }
  });

  it('tells a diff operator from a negative number', () => {
    expect(kinds('1 - 2')).toEqual([
      TokenKind.Number,
      TokenKind.Space,
      TokenKind.Diff,
      TokenKind.Space,
      TokenKind.Number,
      TokenKind.EOF,
    ]);
    expect(scan('1 - -2')[4]).toEqual({ kind: TokenKind.Number, pos: 4, value: '-2' });
  });

  it('scans set operators', () => {
    expect(kinds('1&&2||3')).toEqual([
      TokenKind.Number,
      TokenKind.Intersection,
      TokenKind.Number,
      TokenKind.Union,
      TokenKind.Number,
      TokenKind.EOF,
    ]);
  });

  it('drops comments', () => {
    const tokens = scan('1 // note\n- 2');

    expect(tokens.map((t) => t.value)).toEqual(['1', ' ', '-', ' ', '2', '']);
    expect(tokens[2].pos).toBe(10);
    expect(scan('/* a */x')[0]).toEqual({ kind: TokenKind.Identifier, pos: 7, value: 'x' });
  });

  it('reports an unclosed block comment', () => {
    expect(scan('1 /* a')[2]).toEqual({ kind: TokenKind.Error, pos: 2, value: 'unclosed comment' });
  });

  it('classifies words', () => {
    expect(kinds('true false rectangle rect')).toEqual([
      TokenKind.Bool,
      TokenKind.Space,
      TokenKind.Bool,
      TokenKind.Space,
      TokenKind.Identifier,
      TokenKind.Space,
      TokenKind.Rect,
      TokenKind.EOF,
    ]);
    expect(scan('größe 1')[0]).toEqual({ kind: TokenKind.Identifier, pos: 0, value: 'größe' });
  });

  it('ends identifiers at parentheses', () => {
    expect(kinds('a(1)')).toEqual([
      TokenKind.Identifier,
      TokenKind.LeftParen,
      TokenKind.Number,
      TokenKind.RightParen,
      TokenKind.EOF,
    ]);
  });

  it('rejects a bad character after an identifier', () => {
    expect(scan('a@')[0]).toEqual({ kind: TokenKind.Error, pos: 0, value: "bad character U+0040 '@'" });
  });

  it('scans number forms', () => {
    expect(scan('0x1A')[0]).toEqual({ kind: TokenKind.Number, pos: 0, value: '0x1A' });
    expect(scan('1.5e-3')[0]).toEqual({ kind: TokenKind.Number, pos: 0, value: '1.5e-3' });
    expect(scan('3i')[0]).toEqual({ kind: TokenKind.Number, pos: 0, value: '3i' });
    expect(scan('1+2i')[0]).toEqual({ kind: TokenKind.Complex, pos: 0, value: '1+2i' });
  });

  it('starts a number at a sign before a bare fraction', () => {
    expect(kinds('-.5')).toEqual([TokenKind.Number, TokenKind.EOF]);
    expect(scan('rect -.5')[2]).toEqual({ kind: TokenKind.Number, pos: 5, value: '-.5' });
    expect(scan('+.5')[0]).toEqual({ kind: TokenKind.Number, pos: 0, value: '+.5' });
    expect(kinds('- .5')[0]).toBe(TokenKind.Diff);
  });

  it('rejects malformed numbers', () => {
    expect(scan('1 +')[2]).toEqual({ kind: TokenKind.Error, pos: 2, value: 'bad number syntax: "+"' });
    expect(scan('12ab')[0]).toEqual({ kind: TokenKind.Error, pos: 0, value: 'bad number syntax: "12a"' });
    expect(scan('1-2')[0]).toEqual({ kind: TokenKind.Error, pos: 0, value: 'bad number syntax: "1-2"' });
  });

  it('balances parentheses', () => {
    expect(scan(')')[0]).toEqual({ kind: TokenKind.Error, pos: 0, value: "unexpected right paren U+0029 ')'" });
    expect(kinds('(1))')).toEqual([TokenKind.LeftParen, TokenKind.Number, TokenKind.RightParen, TokenKind.Error]);
    expect(scan('(1))')[3].pos).toBe(3);
  });

  it('rejects unknown characters', () => {
    expect(scan('$')[0]).toEqual({ kind: TokenKind.Error, pos: 0, value: "unrecognized character U+0024 '$'" });
  });

  it('scans quoted strings', () => {
    expect(scan('"a\\"b"')[0]).toEqual({ kind: TokenKind.String, pos: 0, value: '"a\\"b"' });
    expect(scan('"abc')[0]).toEqual({ kind: TokenKind.Error, pos: 0, value: 'unterminated quoted string' });
    expect(scan('"a\nb"')[0].kind).toBe(TokenKind.Error);
  });

  it('stops at the first error', () => {
    expect(kinds('1 $ 2')).toEqual([TokenKind.Number, TokenKind.Space, TokenKind.Error]);
  });

  it('keeps returning the terminal token', () => {
    const scanner = new Scanner('test', 'x');

    const ident = scanner.nextToken();
    const eof = scanner.nextToken();
    const again = scanner.nextToken();

    expect(ident.kind).toBe(TokenKind.Identifier);
    expect(eof.kind).toBe(TokenKind.EOF);
    expect(again).toBe(eof);
  });
});
