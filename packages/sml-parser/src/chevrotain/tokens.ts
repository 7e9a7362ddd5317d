// Chevrotain token set for SML, mirroring the hand-written scanner.
// Comments and whitespace are skipped instead of emitted.
import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\r\n]+/, group: Lexer.SKIPPED });
export const LineComment = createToken({ name: 'LineComment', pattern: /\/\/[^\n]*/, group: Lexer.SKIPPED });
export const BlockComment = createToken({ name: 'BlockComment', pattern: /\/\*[\s\S]*?\*\//, group: Lexer.SKIPPED });

// Categories: the grammar consumes these instead of the concrete kinds.
export const Word = createToken({ name: 'Word', pattern: Lexer.NA });
export const NumberLike = createToken({ name: 'NumberLike', pattern: Lexer.NA });

export const Intersection = createToken({ name: 'Intersection', pattern: /&&/ });
export const Union = createToken({ name: 'Union', pattern: /\|\|/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const Location = createToken({ name: 'Location', pattern: /@/ });

export const ComplexNumber = createToken({
  name: 'ComplexNumber',
  pattern: /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[+-](?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?i/,
  categories: [NumberLike],
});
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /[+-]?(?:0[xX][0-9a-fA-F]+|\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?i?/,
  categories: [NumberLike],
});
// After the numbers so `-2` stays a literal.
export const Diff = createToken({ name: 'Diff', pattern: /-/ });

export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_][A-Za-z0-9_]*/, categories: [Word] });
export const RectKw = createToken({ name: 'RectKw', pattern: /rect/, longer_alt: Identifier, categories: [Word] });
export const BoolLiteral = createToken({ name: 'BoolLiteral', pattern: /true|false/, longer_alt: Identifier });

export const AllTokens = [
  WhiteSpace,
  LineComment, BlockComment,
  Intersection, Union, LParen, RParen, Location,
  ComplexNumber, NumberLiteral, Diff,
  RectKw, BoolLiteral, Identifier,
  Word, NumberLike,
];

export const SmlLexer = new Lexer(AllTokens);
