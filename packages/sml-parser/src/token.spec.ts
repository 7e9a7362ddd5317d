import { describe, it, expect } from 'vitest';
import { formatRune, formatToken, isKeyword, KEYWORDS, tokenKindName, TokenKind } from './index';

describe('tokens', () => {
  it('formats tokens for diagnostics', () => {
    expect(formatToken({ kind: TokenKind.EOF, pos: 0, value: '' })).toBe('EOF');
    expect(formatToken({ kind: TokenKind.Error, pos: 0, value: 'unclosed comment' })).toBe('unclosed comment');
    expect(formatToken({ kind: TokenKind.Rect, pos: 0, value: 'rect' })).toBe('<rect>');
    expect(formatToken({ kind: TokenKind.Identifier, pos: 0, value: 'abc' })).toBe('"abc"');
    expect(formatToken({ kind: TokenKind.Identifier, pos: 0, value: 'abcdefghijklm' })).toBe('"abcdefghij"...');
  });

  it('sorts keywords after the marker', () => {
    expect(isKeyword(TokenKind.Rect)).toBe(true);
    expect(isKeyword(TokenKind.Keyword)).toBe(false);
    expect(isKeyword(TokenKind.Identifier)).toBe(false);
  });

  it('maps only keyword spellings', () => {
    expect([...KEYWORDS.entries()]).toEqual([['rect', TokenKind.Rect]]);
    expect(KEYWORDS.get('rectangle')).toBeUndefined();
  });

  it('names kinds', () => {
    expect(tokenKindName(TokenKind.LeftParen)).toBe('left paren');
    expect(tokenKindName(TokenKind.Union)).toBe('union');
  });

  it('formats code points', () => {
    expect(formatRune(0x29)).toBe("U+0029 ')'");
    expect(formatRune(0x1f600)).toBe("U+1F600 '😀'");
  });
});
