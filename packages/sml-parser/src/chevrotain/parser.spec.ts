import { describe, it, expect, vi } from 'vitest';
import { MAX_DEPTH } from '@sml/ast';
import { parse, parseChevrotain, ParseError } from '../index';

function chevError(text: string): ParseError {
  try {
    parseChevrotain('test', text, { debug: false });
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

describe('chevrotain parser', () => {
  it('builds the same trees as the hand-written parser', () => {
    const inputs = [
      '1 - 2',
      'rect 1 2 @ 3 4',
      'a || b && c',
      '(a || b) && c - 1',
      'rect a (b 1) @ 2',
      'rect @',
      '1+2i',
      '0x1A',
      '-2',
      '-.5',
      'rect -.5 +.5',
      'x /* note */ || y // tail',
    ];

    for (const input of inputs) {
      expect(parseChevrotain('doc', input, { debug: false })).toEqual(parse('doc', input, { debug: false }));
    }
  });

  it('throws ParseError on grammar errors', () => {
    const unclosed = chevError('(1 - 2');

    expect(unclosed.position.offset).toBe(6);
    expect(chevError('1 2')).toBeInstanceOf(ParseError);
    expect(chevError('true')).toBeInstanceOf(ParseError);
  });

  it('throws ParseError on lexer errors', () => {
    const err = chevError('1 $');

    expect(err.position.offset).toBe(2);
  });

  it('rejects groups nested past the limit', () => {
    const text = `${'('.repeat(MAX_DEPTH + 1)}1${')'.repeat(MAX_DEPTH + 1)}`;

    const err = chevError(text);

    expect(err.detail).toBe('expression nested too deeply');
    expect(err.position.offset).toBe(MAX_DEPTH);
  });

  it('rejects literals no number holds', () => {
    expect(chevError('1e400').detail).toBe('illegal number syntax: "1e400"');
  });

  it('logs lexing and parsing when debugging', () => {
    const logger = vi.fn();

    parseChevrotain('doc', '1 - 2', { debug: true, logger });

    expect(logger.mock.calls).toEqual([
      ['lex start doc (len=5)'],
      ['lex done doc (tokens=3)'],
      ['parse done doc (root=Diff)'],
    ]);
  });
});
